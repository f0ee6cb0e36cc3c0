import * as core from '@actions/core'
import { STATUS_EMOJI } from '@chart-actions/shared/constants'
import { getWorkflowRunUrl } from '@chart-actions/shared/git-utils'
import type { ActionInputs, ApplyOutcome } from './types'

function heading(success: boolean, dryRun: boolean): string {
  if (!success) {
    return `${STATUS_EMOJI.failure} Apply failed`
  }
  return dryRun
    ? `${STATUS_EMOJI.success} Manifests validated (dry run)`
    : `${STATUS_EMOJI.success} Manifests applied`
}

export async function generateSummary(
  success: boolean,
  inputs: ActionInputs,
  outcome: ApplyOutcome,
  errorMessage?: string
): Promise<void> {
  core.startGroup('Generating GitHub summary')

  const summary = core.summary

  summary.addHeading(heading(success, inputs.dryRun), 2)

  if (outcome.applied.length > 0) {
    summary.addHeading('Applied objects', 3)
    summary.addTable([
      [
        { data: 'Kind', header: true },
        { data: 'Name', header: true },
        { data: 'Namespace', header: true }
      ],
      ...outcome.applied.map((object) => [
        { data: object.kind },
        { data: object.name },
        { data: object.namespace || '-' }
      ])
    ])
  }

  if (outcome.rollouts.length > 0) {
    summary.addHeading('Rollouts', 3)
    summary.addTable([
      [
        { data: 'Deployment', header: true },
        { data: 'Status', header: true }
      ],
      ...outcome.rollouts.map((rollout) => [
        { data: rollout.name },
        { data: `${rollout.ready ? STATUS_EMOJI.success : STATUS_EMOJI.failure} ${rollout.message}` }
      ])
    ])
  }

  summary.addHeading('Apply details', 3)
  summary.addEOL()
  const detailsList: string[][] = [
    ['**Context**', `\`${inputs.kubernetesContext}\``],
    ['**Manifests file**', `\`${inputs.manifestsFile}\``],
    ['**Namespace**', `\`${inputs.namespace}\``],
    ['**Field manager**', `\`${inputs.fieldManager}\``]
  ]

  if (inputs.dryRun) {
    detailsList.push(['**Dry run**', 'enabled'])
  } else if (inputs.wait) {
    detailsList.push(['**Rollout timeout**', inputs.timeout])
  }

  detailsList.forEach((item) => {
    summary.addRaw(`- ${item[0]}: ${item[1]}\n`)
  })

  if (errorMessage) {
    summary.addHeading('Error', 3)
    summary.addCodeBlock(errorMessage)
  }

  summary.addRaw(
    `\n---\n*[Workflow run](${getWorkflowRunUrl()}) at ${new Date().toISOString().replace('T', ' ').substring(0, 19)} UTC*`
  )

  await summary.write()

  core.endGroup()
}
