import type * as k8s from '@kubernetes/client-node'
import {
  isDnsLabel,
  isDnsSubdomain,
  isValidLabelValue
} from '@chart-actions/shared/string-utils'
import type {
  ChartManifest,
  RenderResult,
  ValidationIssue
} from './types'

export interface LintOptions {
  /** Treat warnings as failures, like `helm lint --strict` */
  strict?: boolean
}

export interface LintReport {
  issues: ValidationIssue[]
  errors: number
  warnings: number
  passed: boolean
}

function resourcePath(manifest: ChartManifest): string {
  return `${manifest.kind}/${manifest.metadata.name}`
}

function checkName(manifest: ChartManifest): ValidationIssue[] {
  const { name } = manifest.metadata
  if (manifest.kind === 'Service') {
    return isDnsLabel(name)
      ? []
      : [
          {
            severity: 'error',
            path: resourcePath(manifest),
            message: `Service name '${name}' must be a DNS-1123 label of at most 63 characters`
          }
        ]
  }
  return isDnsSubdomain(name)
    ? []
    : [
        {
          severity: 'error',
          path: resourcePath(manifest),
          message: `${manifest.kind} name '${name}' must be a DNS-1123 subdomain`
        }
      ]
}

function checkLabels(
  path: string,
  labels: Record<string, string> | undefined
): ValidationIssue[] {
  return Object.entries(labels ?? {})
    .filter(([, value]) => !isValidLabelValue(value))
    .map(
      ([key, value]): ValidationIssue => ({
        severity: 'error',
        path,
        message: `Label '${key}' has invalid value '${value}'`
      })
    )
}

function checkPort(path: string, port: number | undefined): ValidationIssue[] {
  if (port === undefined || (Number.isInteger(port) && port >= 1 && port <= 65535)) {
    return []
  }
  return [
    {
      severity: 'error',
      path,
      message: `Port ${port} is out of range 1-65535`
    }
  ]
}

function checkContainer(path: string, container: k8s.V1Container): ValidationIssue[] {
  const issues = (container.ports ?? []).flatMap((port) =>
    checkPort(`${path}.ports`, port.containerPort)
  )

  const image = container.image ?? ''
  const lastSegment = image.substring(image.lastIndexOf('/') + 1)
  if (!lastSegment.includes(':') && !lastSegment.includes('@')) {
    issues.push({
      severity: 'warning',
      path,
      message: `Image '${image}' has no tag; set image.tag or the chart appVersion`
    })
  } else if (lastSegment.endsWith(':latest')) {
    issues.push({
      severity: 'warning',
      path,
      message: `Image '${image}' uses the 'latest' tag; pin image.tag`
    })
  }

  return issues
}

function checkManifest(manifest: ChartManifest): ValidationIssue[] {
  const path = resourcePath(manifest)
  const issues = [
    ...checkName(manifest),
    ...checkLabels(path, manifest.metadata.labels)
  ]

  switch (manifest.kind) {
    case 'Deployment': {
      const spec = manifest.spec
      if (spec?.replicas !== undefined && spec.replicas < 0) {
        issues.push({
          severity: 'error',
          path,
          message: `replicas must not be negative (got ${spec.replicas})`
        })
      }
      issues.push(...checkLabels(`${path}.template`, spec?.template.metadata?.labels))
      for (const container of spec?.template.spec?.containers ?? []) {
        issues.push(...checkContainer(`${path}.containers.${container.name}`, container))
      }
      break
    }
    case 'Service':
      for (const port of manifest.spec?.ports ?? []) {
        issues.push(...checkPort(`${path}.ports`, port.port))
      }
      break
    case 'HorizontalPodAutoscaler': {
      const spec = manifest.spec
      if (spec && (spec.minReplicas ?? 1) > spec.maxReplicas) {
        issues.push({
          severity: 'error',
          path,
          message: `minReplicas (${spec.minReplicas}) is greater than maxReplicas (${spec.maxReplicas})`
        })
      }
      break
    }
    default:
      break
  }

  return issues
}

/**
 * Lints a render: the warnings found while validating values plus checks on
 * the rendered objects
 */
export function lintChart(result: RenderResult, options: LintOptions = {}): LintReport {
  const issues = [
    ...result.issues,
    ...result.manifests.flatMap((manifest) => checkManifest(manifest.object))
  ]

  const errors = issues.filter((issue) => issue.severity === 'error').length
  const warnings = issues.length - errors

  return {
    issues,
    errors,
    warnings,
    passed: errors === 0 && (!options.strict || warnings === 0)
  }
}
