import * as core from '@actions/core'
import * as github from '@actions/github'
import { HelmCli } from './helm'
import { runPackagePipeline } from './pipeline'
import { generateSummary } from './summary'
import type { ActionInputs, PipelineResult } from './types'

const DEFAULT_CHART_PATH = 'charts/growthbook'
const DEFAULT_REGISTRY = 'ghcr.io'

export function getActionInputs(): ActionInputs {
  const registry = core.getInput('registry') || DEFAULT_REGISTRY
  const owner = github.context.repo.owner.toLowerCase()

  return {
    chartPath: core.getInput('chart-path') || DEFAULT_CHART_PATH,
    registry,
    repository: core.getInput('oci-repository') || `oci://${registry}/${owner}/charts`,
    username: core.getInput('registry-username') || github.context.actor,
    password: core.getInput('registry-password') || process.env.GITHUB_TOKEN || '',
    ref: github.context.ref
  }
}

function failureMessage(result: PipelineResult): string {
  const failed = result.steps.find((step) => step.status === 'failure')
  return failed
    ? `Step '${failed.name}' failed: ${failed.detail ?? 'unknown error'}`
    : 'Chart pipeline failed'
}

export async function run(): Promise<void> {
  try {
    const inputs = getActionInputs()
    if (inputs.password) {
      core.setSecret(inputs.password)
    }

    const helm = new HelmCli(inputs.chartPath)
    core.info(`Using helm ${await helm.version()}`)

    const result = await runPackagePipeline(helm, inputs)

    core.setOutput('archives', result.archives.join('\n'))
    core.setOutput('published', result.published.join('\n'))

    await generateSummary(inputs, result)

    if (!result.succeeded) {
      core.setFailed(failureMessage(result))
      return
    }

    core.info(
      result.published.length > 0
        ? `✅ Published ${result.published.join(', ')} to ${inputs.repository}`
        : `✅ Packaged ${result.archives.join(', ')}`
    )
  } catch (error) {
    const errorMessage =
      error instanceof Error ? error.message : 'An unexpected error occurred'
    core.setFailed(errorMessage)
  }
}
