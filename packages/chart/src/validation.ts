import type { ZodIssue } from 'zod'
import { COMPONENTS, MONGODB, type Component } from './constants'
import { formatPath, type PathSegment } from './paths'
import {
  chartValuesSchema,
  serverValuesSchema,
  type ChartValues,
  type EnvVarEntry,
  type ServerValues
} from './schema'
import type { ValidationIssue, ValuesDocument } from './types'

/**
 * Values to validate: the parent document and the merged values of each
 * component instance
 */
export interface ComposedValues {
  values: ValuesDocument
  components: Record<Component, ValuesDocument>
}

export interface ParsedValues {
  chart: ChartValues
  components: Record<Component, ServerValues>
}

export interface ValidationResult {
  issues: ValidationIssue[]
  /** Null when any schema error was found */
  parsed: ParsedValues | null
}

function schemaIssues(prefix: PathSegment[], issues: ZodIssue[]): ValidationIssue[] {
  return issues.map((issue): ValidationIssue => ({
    severity: 'error',
    path: formatPath([...prefix, ...issue.path]) || '(root)',
    message: issue.message
  }))
}

function checkEnvEntry(entry: EnvVarEntry, path: string): ValidationIssue[] {
  const hasValue = entry.value !== null && entry.value !== undefined
  const source = entry.valueFrom

  if (hasValue && source) {
    return [
      {
        severity: 'error',
        path,
        message: `Environment variable '${entry.name}' sets both value and valueFrom; set exactly one`
      }
    ]
  }

  if (!hasValue && !source) {
    return [
      {
        severity: 'warning',
        path,
        message: `Environment variable '${entry.name}' sets neither value nor valueFrom; it will be empty`
      }
    ]
  }

  if (!source) {
    return []
  }

  const references = [
    source.secretKeyRef ? 'secretKeyRef' : null,
    source.configMapKeyRef ? 'configMapKeyRef' : null,
    source.fieldRef ? 'fieldRef' : null
  ].filter((reference) => reference !== null)

  if (references.length !== 1) {
    return [
      {
        severity: 'error',
        path: `${path}.valueFrom`,
        message: `valueFrom for '${entry.name}' must set exactly one of secretKeyRef, configMapKeyRef or fieldRef`
      }
    ]
  }

  const selector = source.secretKeyRef ?? source.configMapKeyRef
  if (!selector) {
    return []
  }

  const missing = (['name', 'key'] as const).filter((field) => !selector[field])
  if (missing.length === 0) {
    return []
  }

  return [
    {
      severity: 'warning',
      path: `${path}.valueFrom.${references[0]}`,
      message: `${references[0]} for '${entry.name}' is missing: ${missing.join(', ')}`
    }
  ]
}

function checkEnvList(entries: EnvVarEntry[], prefix: string): ValidationIssue[] {
  return entries.flatMap((entry, index) =>
    checkEnvEntry(entry, `${prefix}[${index}]`)
  )
}

/**
 * Names of the MongoDB variables the deployment template adds ahead of user env
 */
export function mongodbEnvNames(values: ServerValues): string[] {
  if (values.mongodbUri) {
    return [MONGODB.URI_ENV]
  }
  if (values.mongodbEnabled) {
    return [MONGODB.PASSWORD_ENV, MONGODB.URI_ENV]
  }
  return []
}

function checkDuplicateEnv(
  component: Component,
  chart: ChartValues,
  values: ServerValues
): ValidationIssue[] {
  const names = [
    ...mongodbEnvNames(values),
    ...chart.global.env.map((entry) => entry.name),
    ...values.env.map((entry) => entry.name)
  ]

  const duplicates = [
    ...new Set(names.filter((name, index) => names.indexOf(name) !== index))
  ]

  return duplicates.map((name): ValidationIssue => ({
    severity: 'warning',
    path: `${component}.env`,
    message: `Environment variable '${name}' is defined more than once; the last definition wins`
  }))
}

function checkMongodb(
  component: Component,
  chart: ChartValues,
  values: ServerValues
): ValidationIssue[] {
  if (values.mongodbUri) {
    return []
  }

  if (values.mongodbEnabled && !chart.mongodb.enabled) {
    return [
      {
        severity: 'warning',
        path: `${component}.mongodbEnabled`,
        message:
          'mongodbEnabled is true but mongodb.enabled is false; the bundled MongoDB service will not exist'
      }
    ]
  }

  const definesUri = [...chart.global.env, ...values.env].some(
    (entry) => entry.name === MONGODB.URI_ENV
  )
  if (component === 'backend' && !values.mongodbEnabled && !definesUri) {
    return [
      {
        severity: 'warning',
        path: `${component}.mongodbEnabled`,
        message: `MongoDB is disabled and no mongodbUri is set; ${MONGODB.URI_ENV} will be absent`
      }
    ]
  }

  return []
}

function checkVolumeClaim(
  component: Component,
  values: ServerValues
): ValidationIssue[] {
  const claim = values.volumeClaim
  if (!claim.enabled) {
    return []
  }

  const missing = (['name', 'mountPath'] as const).filter((field) => !claim[field])
  if (missing.length === 0) {
    return []
  }

  return [
    {
      severity: 'error',
      path: `${component}.volumeClaim`,
      message: `volumeClaim is enabled but is missing: ${missing.join(', ')}`
    }
  ]
}

function checkIngress(chart: ChartValues): ValidationIssue[] {
  if (chart.ingress.enabled && chart.ingress.hosts.length === 0) {
    return [
      {
        severity: 'error',
        path: 'ingress.hosts',
        message: 'ingress is enabled but no hosts are defined'
      }
    ]
  }
  return []
}

/**
 * Checks values against the chart schema, then the rules between fields
 * that a schema cannot express
 */
export function validateValues(input: ComposedValues): ValidationResult {
  const issues: ValidationIssue[] = []

  const chartResult = chartValuesSchema.safeParse(input.values)
  if (!chartResult.success) {
    issues.push(...schemaIssues([], chartResult.error.issues))
  }

  const components: Partial<Record<Component, ServerValues>> = {}
  for (const component of COMPONENTS) {
    const result = serverValuesSchema.safeParse(input.components[component])
    if (result.success) {
      components[component] = result.data
    } else {
      issues.push(...schemaIssues([component], result.error.issues))
    }
  }

  const frontend = components.frontend
  const backend = components.backend
  if (!chartResult.success || !frontend || !backend) {
    return { issues, parsed: null }
  }

  const chart = chartResult.data
  const parsed: ParsedValues = { chart, components: { frontend, backend } }

  issues.push(...checkEnvList(chart.global.env, 'global.env'))
  issues.push(...checkIngress(chart))

  for (const component of COMPONENTS) {
    const values = parsed.components[component]
    issues.push(...checkEnvList(values.env, `${component}.env`))
    issues.push(...checkDuplicateEnv(component, chart, values))
    issues.push(...checkMongodb(component, chart, values))
    issues.push(...checkVolumeClaim(component, values))
  }

  return {
    issues,
    parsed: issues.some((issue) => issue.severity === 'error') ? null : parsed
  }
}
