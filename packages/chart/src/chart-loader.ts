import * as core from '@actions/core'
import yaml from 'js-yaml'
import { existsSync, readdirSync, readFileSync, statSync } from 'fs'
import { join } from 'path'
import { z } from 'zod'
import type { ChartMetadata, LoadedChart, ValuesDocument } from './types'
import { isValuesDocument } from './values'

const scalarString = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))

const chartMetadataSchema = z.object({
  apiVersion: z.string().min(1),
  name: z.string().min(1),
  version: scalarString,
  appVersion: scalarString.optional(),
  description: z.string().optional(),
  type: z.string().optional(),
  dependencies: z
    .array(
      z.object({
        name: z.string().min(1),
        version: scalarString,
        repository: z.string().optional(),
        alias: z.string().optional(),
        condition: z.string().optional()
      })
    )
    .optional()
})

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function readYaml(path: string): unknown {
  try {
    return yaml.load(readFileSync(path, 'utf8'), { filename: path })
  } catch (error) {
    throw new Error(`Failed to read '${path}': ${errorMessage(error)}`)
  }
}

/**
 * Reads a values file. An empty file is an empty document; any other
 * top-level type is rejected.
 */
export function loadValuesFile(path: string): ValuesDocument {
  const document = readYaml(path)

  if (document === null || document === undefined) {
    return {}
  }

  if (!isValuesDocument(document)) {
    throw new Error(`Values file '${path}' must contain a mapping at the top level`)
  }

  return document
}

function loadChartMetadata(chartDir: string): ChartMetadata {
  const chartFile = join(chartDir, 'Chart.yaml')
  if (!existsSync(chartFile)) {
    throw new Error(`No Chart.yaml found in '${chartDir}'`)
  }

  const result = chartMetadataSchema.safeParse(readYaml(chartFile))
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid Chart.yaml in '${chartDir}': ${details}`)
  }

  return result.data
}

/**
 * Loads a chart directory with its default values and every unpacked
 * subchart under charts/. Packaged dependencies (*.tgz) are left alone.
 */
export function loadChart(chartDir: string): LoadedChart {
  const metadata = loadChartMetadata(chartDir)

  const valuesFile = join(chartDir, 'values.yaml')
  const values = existsSync(valuesFile) ? loadValuesFile(valuesFile) : {}

  const subcharts: Record<string, LoadedChart> = {}
  const chartsDir = join(chartDir, 'charts')
  if (existsSync(chartsDir)) {
    for (const entry of readdirSync(chartsDir).sort()) {
      const subchartDir = join(chartsDir, entry)
      if (!statSync(subchartDir).isDirectory()) continue

      const subchart = loadChart(subchartDir)
      subcharts[subchart.metadata.name] = subchart
    }
  }

  core.debug(
    `Loaded chart ${metadata.name}-${metadata.version} from ${chartDir} (subcharts: ${Object.keys(subcharts).join(', ') || 'none'})`
  )

  return { path: chartDir, metadata, values, subcharts }
}
