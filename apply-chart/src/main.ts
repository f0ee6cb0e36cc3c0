import * as core from '@actions/core'
import { DEFAULT_NAMESPACE } from '@chart-actions/chart'
import {
  KubernetesClient,
  verifyKubernetesAccess,
  waitForDeployments
} from '@chart-actions/k8s-client'
import { MANAGED_BY } from '@chart-actions/shared/constants'
import { parseDuration } from '@chart-actions/shared/time-utils'
import { applyManifests, deploymentRefs, readManifests } from './k8s-operations'
import { generateSummary } from './summary'
import type { ActionInputs, ApplyOutcome } from './types'

const DEFAULT_MANIFESTS_FILE = 'rendered/manifests.yaml'
const DEFAULT_TIMEOUT = '5m'

export function getActionInputs(): ActionInputs {
  const timeout = core.getInput('timeout') || DEFAULT_TIMEOUT
  // Throws on a malformed duration
  parseDuration(timeout)

  return {
    kubernetesContext: core.getInput('kubernetes-context', { required: true }),
    manifestsFile: core.getInput('manifests-file') || DEFAULT_MANIFESTS_FILE,
    namespace: core.getInput('namespace') || DEFAULT_NAMESPACE,
    fieldManager: core.getInput('field-manager') || MANAGED_BY,
    dryRun: core.getBooleanInput('dry-run'),
    wait: core.getBooleanInput('wait'),
    timeout
  }
}

export async function run(): Promise<void> {
  let inputs: ActionInputs | undefined
  const outcome: ApplyOutcome = { applied: [], rollouts: [] }

  try {
    inputs = getActionInputs()

    const manifests = readManifests(inputs.manifestsFile, inputs.namespace)
    core.info(`Read ${manifests.length} manifests from ${inputs.manifestsFile}`)

    const kc = await verifyKubernetesAccess(inputs.kubernetesContext)
    const client = new KubernetesClient(kc)

    await applyManifests(
      client,
      manifests,
      { fieldManager: inputs.fieldManager, dryRun: inputs.dryRun },
      outcome.applied
    )

    const deployments = deploymentRefs(manifests)
    if (inputs.dryRun) {
      core.info('Dry run: skipping rollout wait')
    } else if (!inputs.wait) {
      core.info('Not waiting for Deployments to roll out')
    } else if (deployments.length > 0) {
      core.startGroup(`Waiting for ${deployments.length} Deployment(s) to roll out`)
      try {
        outcome.rollouts = await waitForDeployments(client, deployments, {
          timeout: inputs.timeout
        })
      } finally {
        core.endGroup()
      }
    }

    core.setOutput('applied-count', outcome.applied.length)
    core.setOutput(
      'objects',
      outcome.applied.map(({ kind, name }) => `${kind}/${name}`).join('\n')
    )

    await generateSummary(true, inputs, outcome)

    core.info(
      `✅ Applied ${outcome.applied.length} objects${inputs.dryRun ? ' (dry run)' : ''}`
    )
  } catch (error) {
    const errorMessage =
      error instanceof Error ? error.message : 'An unexpected error occurred'

    if (inputs) {
      await generateSummary(false, inputs, outcome, errorMessage)
    }

    core.setFailed(errorMessage)
  }
}
