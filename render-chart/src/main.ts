import * as core from '@actions/core'
import { mkdirSync, writeFileSync } from 'fs'
import { dirname } from 'path'
import {
  ChartValidationError,
  DEFAULT_NAMESPACE,
  lintChart,
  loadChart,
  loadValuesFile,
  renderChart,
  serializeManifests,
  type LoadedChart,
  type RenderResult,
  type ValidationIssue,
  type ValuesDocument
} from '@chart-actions/chart'
import { generateSummary } from './summary'
import type { ActionInputs, RenderOutcome } from './types'

const DEFAULT_CHART_PATH = 'charts/growthbook'
const DEFAULT_OUTPUT_FILE = 'rendered/manifests.yaml'

export function getActionInputs(): ActionInputs {
  return {
    chartPath: core.getInput('chart-path') || DEFAULT_CHART_PATH,
    releaseName: core.getInput('release-name', { required: true }),
    namespace: core.getInput('namespace') || DEFAULT_NAMESPACE,
    valuesFiles: core.getMultilineInput('values-files'),
    set: core.getMultilineInput('set'),
    outputFile: core.getInput('output-file') || DEFAULT_OUTPUT_FILE,
    strict: core.getBooleanInput('strict')
  }
}

function annotate(issues: ValidationIssue[]): void {
  for (const issue of issues) {
    if (issue.severity === 'error') {
      core.error(issue.message, { title: issue.path })
    } else {
      core.warning(issue.message, { title: issue.path })
    }
  }
}

export function renderRelease(inputs: ActionInputs): RenderOutcome {
  core.startGroup(`Loading chart from ${inputs.chartPath}`)
  let chart: LoadedChart
  let values: ValuesDocument[]
  try {
    chart = loadChart(inputs.chartPath)
    values = inputs.valuesFiles.map((file) => {
      core.info(`Using values file ${file}`)
      return loadValuesFile(file)
    })
  } finally {
    core.endGroup()
  }

  core.startGroup(
    `Rendering release '${inputs.releaseName}' in namespace '${inputs.namespace}'`
  )
  let result: RenderResult
  try {
    result = renderChart(chart, {
      releaseName: inputs.releaseName,
      namespace: inputs.namespace,
      values,
      set: inputs.set
    })
    for (const { source, object } of result.manifests) {
      core.info(`${object.kind}/${object.metadata.name} (${source})`)
    }
  } finally {
    core.endGroup()
  }

  core.startGroup('Linting rendered manifests')
  const report = lintChart(result, { strict: inputs.strict })
  annotate(report.issues)
  core.info(`${report.errors} error(s), ${report.warnings} warning(s)`)
  core.endGroup()

  return {
    manifests: result.manifests,
    issues: report.issues,
    errors: report.errors,
    warnings: report.warnings,
    passed: report.passed
  }
}

function lintFailure(outcome: RenderOutcome): string {
  return outcome.errors > 0
    ? `Chart lint failed with ${outcome.errors} error(s)`
    : `Chart lint failed with ${outcome.warnings} warning(s) in strict mode`
}

function writeManifests(outputFile: string, outcome: RenderOutcome): void {
  mkdirSync(dirname(outputFile), { recursive: true })
  writeFileSync(outputFile, serializeManifests(outcome.manifests))
  core.info(`✅ Wrote ${outcome.manifests.length} manifests to ${outputFile}`)
}

function invalidValuesOutcome(error: ChartValidationError): RenderOutcome {
  const errors = error.issues.filter((issue) => issue.severity === 'error').length
  return {
    manifests: [],
    issues: error.issues,
    errors,
    warnings: error.issues.length - errors,
    passed: false
  }
}

export async function run(): Promise<void> {
  let inputs: ActionInputs | undefined
  let outcome: RenderOutcome | undefined

  try {
    inputs = getActionInputs()

    outcome = renderRelease(inputs)
    if (!outcome.passed) {
      throw new Error(lintFailure(outcome))
    }

    writeManifests(inputs.outputFile, outcome)

    core.setOutput('output-file', inputs.outputFile)
    core.setOutput('manifest-count', outcome.manifests.length)
    core.setOutput('warnings', outcome.warnings)

    await generateSummary(true, inputs, outcome)
  } catch (error) {
    const errorMessage =
      error instanceof Error ? error.message : 'An unexpected error occurred'

    if (error instanceof ChartValidationError) {
      annotate(error.issues)
      outcome = invalidValuesOutcome(error)
    }

    if (inputs) {
      await generateSummary(false, inputs, outcome, errorMessage)
    }

    core.setFailed(errorMessage)
  }
}
