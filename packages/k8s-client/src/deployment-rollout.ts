import * as core from '@actions/core'
import type * as k8s from '@kubernetes/client-node'
import { parseTimeout } from '@chart-actions/shared/time-utils'
import { DEFAULT_POLL_INTERVAL_MS } from './constants.js'
import type { KubernetesClient } from './kubernetes-client.js'
import type {
  DeploymentRef,
  DeploymentRollout,
  RolloutStatus,
  WaitOptions
} from './types.js'

const PROGRESS_DEADLINE_EXCEEDED = 'ProgressDeadlineExceeded'

/**
 * Rollout state of a Deployment, worded like `kubectl rollout status`
 */
export function rolloutStatus(deployment: k8s.V1Deployment): RolloutStatus {
  const name = deployment.metadata?.name ?? ''
  const generation = deployment.metadata?.generation ?? 0
  const status: k8s.V1DeploymentStatus = deployment.status ?? {}

  if ((status.observedGeneration ?? 0) < generation) {
    return {
      done: false,
      failed: false,
      message: `Waiting for deployment '${name}' spec update to be observed`
    }
  }

  const progressing = status.conditions?.find(
    (condition) => condition.type === 'Progressing'
  )
  if (progressing?.reason === PROGRESS_DEADLINE_EXCEEDED) {
    return {
      done: false,
      failed: true,
      message: `Deployment '${name}' exceeded its progress deadline`
    }
  }

  const desired = deployment.spec?.replicas ?? 1
  const updated = status.updatedReplicas ?? 0
  const total = status.replicas ?? 0
  const available = status.availableReplicas ?? 0

  if (updated < desired) {
    return {
      done: false,
      failed: false,
      message: `Waiting for deployment '${name}' rollout to finish: ${updated} out of ${desired} new replicas have been updated`
    }
  }
  if (total > updated) {
    return {
      done: false,
      failed: false,
      message: `Waiting for deployment '${name}' rollout to finish: ${total - updated} old replicas are pending termination`
    }
  }
  if (available < updated) {
    return {
      done: false,
      failed: false,
      message: `Waiting for deployment '${name}' rollout to finish: ${available} of ${updated} updated replicas are available`
    }
  }

  return {
    done: true,
    failed: false,
    message: `Deployment '${name}' successfully rolled out`
  }
}

/**
 * Polls each Deployment in turn until it has rolled out. The timeout covers
 * all of them together.
 */
export async function waitForDeployments(
  client: KubernetesClient,
  deployments: DeploymentRef[],
  options: WaitOptions
): Promise<DeploymentRollout[]> {
  const timeoutMs = parseTimeout(options.timeout)
  const pollInterval = options.pollInterval ?? DEFAULT_POLL_INTERVAL_MS
  const startTime = Date.now()
  const results: DeploymentRollout[] = []

  for (const ref of deployments) {
    core.info(
      `Waiting for Deployment '${ref.name}' in namespace '${ref.namespace}' to roll out...`
    )

    for (;;) {
      const status = rolloutStatus(await client.readDeployment(ref.name, ref.namespace))

      if (status.failed) {
        throw new Error(status.message)
      }

      if (status.done) {
        core.info(`✅ ${status.message}`)
        results.push({ ...ref, ready: true, message: status.message })
        break
      }

      if (Date.now() - startTime >= timeoutMs) {
        throw new Error(
          `Timed out after ${options.timeout} waiting for Deployment '${ref.name}': ${status.message}`
        )
      }

      core.debug(status.message)
      await new Promise((resolve) => setTimeout(resolve, pollInterval))
    }
  }

  return results
}
