import type { ValidationIssue } from './types'

/**
 * Raised when values fail validation with at least one error
 */
export class ChartValidationError extends Error {
  readonly issues: ValidationIssue[]

  constructor(issues: ValidationIssue[]) {
    const errors = issues.filter((issue) => issue.severity === 'error')
    super(
      `Chart values are invalid (${errors.length} error${errors.length === 1 ? '' : 's'}):\n` +
        errors.map((issue) => `  - ${issue.path}: ${issue.message}`).join('\n')
    )
    this.name = 'ChartValidationError'
    this.issues = issues
  }
}
