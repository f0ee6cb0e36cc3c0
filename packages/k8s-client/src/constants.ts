/**
 * Value of the dryRun query parameter that validates without persisting
 */
export const DRY_RUN_ALL = 'All'

/**
 * Delay between Deployment reads while waiting for a rollout
 */
export const DEFAULT_POLL_INTERVAL_MS = 2000
