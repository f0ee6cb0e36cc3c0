import type * as k8s from '@kubernetes/client-node'

/**
 * Object accepted by server-side apply: kind, apiVersion and a name are
 * required, the namespace is filled in by the caller when missing
 */
export interface ApplicableObject extends k8s.KubernetesObject {
  apiVersion: string
  kind: string
  metadata: k8s.V1ObjectMeta & { name: string }
}

export interface ApplyOptions {
  /** Field manager recorded on every applied field */
  fieldManager: string
  /** Validate on the server without persisting */
  dryRun?: boolean
}

/**
 * Reference to a Deployment to wait for
 */
export interface DeploymentRef {
  name: string
  namespace: string
}

/**
 * Rollout state of a Deployment, following `kubectl rollout status`
 */
export interface RolloutStatus {
  done: boolean
  /** Set when the Deployment exceeded its progress deadline */
  failed: boolean
  message: string
}

export interface DeploymentRollout extends DeploymentRef {
  ready: boolean
  message: string
}

export interface WaitOptions {
  /** Overall timeout, e.g. '5m' */
  timeout: string
  /** Milliseconds between reads of each Deployment */
  pollInterval?: number
}
