import * as core from '@actions/core'
import { STATUS_EMOJI } from '@chart-actions/shared/constants'
import { refShortName } from '@chart-actions/shared/git-utils'
import { formatElapsed } from '@chart-actions/shared/time-utils'
import type { ActionInputs, PipelineResult } from './types'

export async function generateSummary(
  inputs: ActionInputs,
  result: PipelineResult
): Promise<void> {
  core.startGroup('Generating GitHub summary')

  const summary = core.summary

  if (!result.succeeded) {
    summary.addHeading(`${STATUS_EMOJI.failure} Chart pipeline failed`, 2)
  } else if (result.published.length > 0) {
    summary.addHeading(`${STATUS_EMOJI.success} Chart published`, 2)
  } else {
    summary.addHeading(`${STATUS_EMOJI.success} Chart packaged`, 2)
  }

  summary.addHeading('Steps', 3)
  summary.addTable([
    [
      { data: 'Step', header: true },
      { data: 'Status', header: true },
      { data: 'Duration', header: true },
      { data: 'Details', header: true }
    ],
    ...result.steps.map((step) => [
      { data: step.name },
      { data: `${STATUS_EMOJI[step.status]} ${step.status}` },
      { data: step.durationMs === undefined ? '-' : formatElapsed(step.durationMs) },
      { data: step.detail ?? '' }
    ])
  ])

  summary.addHeading('Pipeline details', 3)
  summary.addEOL()
  const detailsList: string[][] = [
    ['**Chart**', `\`${inputs.chartPath}\``],
    ['**Ref**', `\`${refShortName(inputs.ref)}\``]
  ]

  if (result.archives.length > 0) {
    detailsList.push([
      result.discarded ? '**Discarded archives**' : '**Archives**',
      result.archives.map((archive) => `\`${archive}\``).join(', ')
    ])
  }

  if (result.published.length > 0) {
    detailsList.push(['**Repository**', `\`${inputs.repository}\``])
  }

  detailsList.forEach((item) => {
    summary.addRaw(`- ${item[0]}: ${item[1]}\n`)
  })

  summary.addRaw(
    `\n---\n*Pipeline timestamp: ${new Date().toISOString().replace('T', ' ').substring(0, 19)} UTC*`
  )

  await summary.write()

  core.endGroup()
}
