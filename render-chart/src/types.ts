import type { RenderedManifest, ValidationIssue } from '@chart-actions/chart'

export interface ActionInputs {
  chartPath: string
  releaseName: string
  namespace: string
  valuesFiles: string[]
  set: string[]
  outputFile: string
  strict: boolean
}

export interface RenderOutcome {
  manifests: RenderedManifest[]
  issues: ValidationIssue[]
  errors: number
  warnings: number
  passed: boolean
}
