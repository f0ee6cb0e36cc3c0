export * from './chart-loader'
export * from './constants'
export * from './errors'
export * from './helpers'
export * from './labels'
export * from './lint'
export * from './manifests'
export * from './renderer'
export * from './schema'
export * from './substitution'
export type * from './types'
export * from './validation'
export * from './values'
