/**
 * Components of the chart. Each is an alias of the `server` subchart and the
 * only valid targets of an ingress path.
 */
export const COMPONENTS = ['frontend', 'backend'] as const

export type Component = (typeof COMPONENTS)[number]

/**
 * Bundled MongoDB subchart wiring used when `mongodbEnabled` is set and no
 * `mongodbUri` is given
 */
export const MONGODB = {
  PORT: 27017,
  DATABASE: 'growthbook',
  PASSWORD_KEY: 'mongodb-root-password',
  PASSWORD_ENV: 'MONGODB_PASSWORD',
  URI_ENV: 'MONGODB_URI'
} as const

/**
 * Helm limits release names to 53 characters so that generated names with
 * suffixes still fit in 63
 */
export const MAX_RELEASE_NAME_LENGTH = 53

export const DEFAULT_NAMESPACE = 'default'

/**
 * Install order of the kinds this chart renders, mirroring Helm's sort order
 */
export const KIND_ORDER = [
  'ServiceAccount',
  'PersistentVolumeClaim',
  'Service',
  'Deployment',
  'HorizontalPodAutoscaler',
  'Ingress'
] as const
