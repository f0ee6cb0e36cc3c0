import type { StepStatus } from '@chart-actions/shared/constants'
import type { HelmCli } from './helm'

export interface ActionInputs {
  chartPath: string
  registry: string
  repository: string
  username: string
  password: string
  ref: string
}

export type StepName = 'dependencies' | 'lint' | 'package' | 'login' | 'push'

/**
 * Helm commands the pipeline needs; HelmCli in production
 */
export type HelmRunner = Pick<
  HelmCli,
  'dependencyBuild' | 'lint' | 'package' | 'registryLogin' | 'push'
>

export interface PipelineOptions {
  chartPath: string
  /** Git ref of the triggering push; only tag refs publish */
  ref: string
  registry: string
  /** OCI repository URL, e.g. oci://ghcr.io/acme/charts */
  repository: string
  username: string
  password: string
}

export interface PipelineStep {
  name: StepName
  status: StepStatus
  durationMs?: number
  /** Failure message, or why the step was skipped */
  detail?: string
}

export interface PipelineResult {
  succeeded: boolean
  steps: PipelineStep[]
  /** Archive file names produced by the package step */
  archives: string[]
  /** Archives pushed to the repository */
  published: string[]
  /** Set when a publish failure removed the archives */
  discarded: boolean
}
