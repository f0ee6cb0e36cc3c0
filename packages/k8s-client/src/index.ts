export * from './constants.js'
export * from './deployment-rollout.js'
export * from './kubernetes-access.js'
export * from './kubernetes-client.js'
export type * from './types.js'
