import type { DeploymentRollout } from '@chart-actions/k8s-client'

export interface ActionInputs {
  kubernetesContext: string
  manifestsFile: string
  namespace: string
  fieldManager: string
  dryRun: boolean
  wait: boolean
  timeout: string
}

export interface AppliedObject {
  kind: string
  name: string
  /** Empty for cluster-scoped kinds */
  namespace: string
}

export interface ApplyOutcome {
  applied: AppliedObject[]
  rollouts: DeploymentRollout[]
}
