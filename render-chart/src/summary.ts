import * as core from '@actions/core'
import { STATUS_EMOJI } from '@chart-actions/shared/constants'
import { getWorkflowRunUrl } from '@chart-actions/shared/git-utils'
import type { ActionInputs, RenderOutcome } from './types'

export async function generateSummary(
  success: boolean,
  inputs: ActionInputs,
  outcome: RenderOutcome | undefined,
  errorMessage?: string
): Promise<void> {
  core.startGroup('Generating GitHub summary')

  const summary = core.summary

  if (success) {
    summary.addHeading(`${STATUS_EMOJI.success} Chart rendered`, 2)
  } else {
    summary.addHeading(`${STATUS_EMOJI.failure} Chart rendering failed`, 2)
  }

  if (outcome && outcome.manifests.length > 0) {
    summary.addHeading('Manifests', 3)
    summary.addTable([
      [
        { data: 'Kind', header: true },
        { data: 'Name', header: true },
        { data: 'Source', header: true }
      ],
      ...outcome.manifests.map(({ source, object }) => [
        { data: object.kind },
        { data: object.metadata.name },
        { data: source }
      ])
    ])
  }

  if (outcome && outcome.issues.length > 0) {
    summary.addHeading('Lint issues', 3)
    summary.addTable([
      [
        { data: 'Severity', header: true },
        { data: 'Path', header: true },
        { data: 'Message', header: true }
      ],
      ...outcome.issues.map((issue) => [
        { data: issue.severity },
        { data: issue.path },
        { data: issue.message }
      ])
    ])
  }

  summary.addHeading('Render details', 3)
  summary.addEOL()
  const detailsList: string[][] = [
    ['**Chart**', `\`${inputs.chartPath}\``],
    ['**Release**', `\`${inputs.releaseName}\``],
    ['**Namespace**', `\`${inputs.namespace}\``]
  ]

  if (inputs.valuesFiles.length > 0) {
    detailsList.push([
      '**Values files**',
      inputs.valuesFiles.map((file) => `\`${file}\``).join(', ')
    ])
  }

  if (inputs.strict) {
    detailsList.push(['**Strict lint**', 'enabled'])
  }

  if (success) {
    detailsList.push(['**Output file**', `\`${inputs.outputFile}\``])
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
