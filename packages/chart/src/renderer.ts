import * as core from '@actions/core'
import { MANAGED_BY } from '@chart-actions/shared/constants'
import { isDnsLabel } from '@chart-actions/shared/string-utils'
import {
  COMPONENTS,
  DEFAULT_NAMESPACE,
  KIND_ORDER,
  MAX_RELEASE_NAME_LENGTH,
  type Component
} from './constants'
import { ChartValidationError } from './errors'
import {
  commonLabels,
  fullname,
  selectorLabels,
  serviceAccountName
} from './helpers'
import type { ChartValues, ServerValues } from './schema'
import { substituteValues } from './substitution'
import { templateSource, type ComponentContext } from './templates/context'
import { renderDeployment } from './templates/deployment'
import { renderHorizontalPodAutoscaler } from './templates/hpa'
import { renderIngress } from './templates/ingress'
import { renderPersistentVolumeClaim } from './templates/pvc'
import { renderService } from './templates/service'
import { renderServiceAccount } from './templates/service-account'
import type {
  ChartManifest,
  ChartMetadata,
  LoadedChart,
  ReleaseInfo,
  RenderedManifest,
  RenderOptions,
  RenderResult,
  TemplateScope,
  ValuesDocument
} from './types'
import { validateValues } from './validation'
import { composeValues, dropNullValues, subchartValues } from './values'

export function validateReleaseName(name: string): void {
  if (name.length > MAX_RELEASE_NAME_LENGTH) {
    throw new Error(
      `Invalid release name '${name}': must be at most ${MAX_RELEASE_NAME_LENGTH} characters`
    )
  }
  if (!isDnsLabel(name)) {
    throw new Error(
      `Invalid release name '${name}': must consist of lowercase alphanumeric characters or '-', and start and end with an alphanumeric character`
    )
  }
}

function templateScope(
  release: ReleaseInfo,
  chart: ChartMetadata,
  values: ValuesDocument
): TemplateScope {
  return {
    Release: release,
    Chart: {
      Name: chart.name,
      Version: chart.version,
      AppVersion: chart.appVersion ?? ''
    },
    Values: values
  }
}

/**
 * Orders manifests the way they are installed; template order is kept
 * within a kind
 */
export function sortManifests(manifests: RenderedManifest[]): RenderedManifest[] {
  const rank = (manifest: RenderedManifest): number =>
    KIND_ORDER.indexOf(manifest.object.kind)
  return [...manifests].sort((a, b) => rank(a) - rank(b))
}

interface ComponentInstance {
  metadata: ChartMetadata
  values: ValuesDocument
}

function componentContext(
  component: Component,
  chart: ChartMetadata,
  release: ReleaseInfo,
  values: ServerValues,
  chartValues: ChartValues
): ComponentContext {
  const overrides = {
    nameOverride: values.nameOverride,
    fullnameOverride: values.fullnameOverride
  }
  const appFullname = fullname(chart, release.Name, overrides)

  return {
    component,
    release,
    chart,
    values,
    global: chartValues.global,
    fullname: appFullname,
    labels: commonLabels(chart, release.Name, overrides),
    selectorLabels: selectorLabels(chart, release.Name, overrides),
    serviceAccountName: serviceAccountName(values.serviceAccount, appFullname)
  }
}

function renderComponent(
  parentChart: string,
  ctx: ComponentContext
): RenderedManifest[] {
  const templates: Array<[string, ChartManifest | null]> = [
    ['serviceaccount.yaml', renderServiceAccount(ctx)],
    ['pvc.yaml', renderPersistentVolumeClaim(ctx)],
    ['service.yaml', renderService(ctx)],
    ['deployment.yaml', renderDeployment(ctx)],
    ['hpa.yaml', renderHorizontalPodAutoscaler(ctx)]
  ]

  return templates.flatMap(([template, object]) =>
    object
      ? [{ source: templateSource(parentChart, ctx.component, template), object }]
      : []
  )
}

/**
 * Renders the chart for a release: merge values, substitute references,
 * validate, then run every template. Throws ChartValidationError when values
 * have errors; warnings are returned in `issues`.
 */
export function renderChart(
  chart: LoadedChart,
  options: RenderOptions
): RenderResult {
  validateReleaseName(options.releaseName)

  const release: ReleaseInfo = {
    Name: options.releaseName,
    Namespace: options.namespace || DEFAULT_NAMESPACE,
    Service: MANAGED_BY
  }

  const composed = composeValues(chart, options.values, options.set)
  const parentValues = dropNullValues(composed)

  // Dependency sections are resolved in their own chart: components below,
  // the MongoDB chart not at all
  const dependencySections = new Set(
    (chart.metadata.dependencies ?? []).map((dep) => dep.alias ?? dep.name)
  )
  const ownSections = Object.fromEntries(
    Object.entries(parentValues).filter(([key]) => !dependencySections.has(key))
  )
  const values: ValuesDocument = {
    ...parentValues,
    ...substituteValues(ownSections, templateScope(release, chart.metadata, parentValues))
  }

  const instance = (component: Component): ComponentInstance => {
    const { chart: subchart, name, values: raw } = subchartValues(chart, component, {
      ...composed,
      global: values.global
    })
    const metadata: ChartMetadata = { ...subchart.metadata, name }
    return {
      metadata,
      values: substituteValues(raw, templateScope(release, metadata, raw))
    }
  }
  const instances: Record<Component, ComponentInstance> = {
    frontend: instance('frontend'),
    backend: instance('backend')
  }

  const validation = validateValues({
    values,
    components: {
      frontend: instances.frontend.values,
      backend: instances.backend.values
    }
  })

  for (const issue of validation.issues) {
    core.debug(`[${issue.severity}] ${issue.path}: ${issue.message}`)
  }

  const parsed = validation.parsed
  if (!parsed) {
    throw new ChartValidationError(validation.issues)
  }

  const context = (component: Component): ComponentContext =>
    componentContext(
      component,
      instances[component].metadata,
      release,
      parsed.components[component],
      parsed.chart
    )
  const contexts: Record<Component, ComponentContext> = {
    frontend: context('frontend'),
    backend: context('backend')
  }

  const manifests = COMPONENTS.flatMap((component) =>
    renderComponent(chart.metadata.name, contexts[component])
  )

  const ingress = renderIngress({
    ingress: parsed.chart.ingress,
    fullname: fullname(chart.metadata, release.Name),
    labels: commonLabels(chart.metadata, release.Name),
    backends: {
      frontend: {
        name: contexts.frontend.fullname,
        port: parsed.components.frontend.service.port
      },
      backend: {
        name: contexts.backend.fullname,
        port: parsed.components.backend.service.port
      }
    }
  })
  if (ingress) {
    manifests.push({
      source: `${chart.metadata.name}/templates/ingress.yaml`,
      object: ingress
    })
  }

  return {
    manifests: sortManifests(manifests),
    values,
    componentValues: {
      frontend: instances.frontend.values,
      backend: instances.backend.values
    },
    issues: validation.issues
  }
}
