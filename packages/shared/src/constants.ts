/**
 * Value of the app.kubernetes.io/managed-by label and default
 * server-side apply field manager
 */
export const MANAGED_BY = 'chart-actions'

/**
 * Git ref prefix that marks a release build
 */
export const TAG_REF_PREFIX = 'refs/tags/'

/**
 * Status emojis for pipeline steps and summaries
 */
export const STATUS_EMOJI = {
  success: '✅',
  failure: '❌',
  skipped: '⏭️'
} as const

export type StepStatus = keyof typeof STATUS_EMOJI
