import { MANAGED_BY } from '@chart-actions/shared/constants'
import { trimSuffix, truncateName } from '@chart-actions/shared/string-utils'
import { Labels } from './labels'
import type { ChartMetadata } from './types'

export interface NameOverrides {
  nameOverride?: string | null
  fullnameOverride?: string | null
}

function dnsTrim(name: string): string {
  return trimSuffix(truncateName(name), '-')
}

/**
 * Name of the chart, or nameOverride when set
 */
export function chartName(chart: ChartMetadata, overrides: NameOverrides = {}): string {
  return dnsTrim(overrides.nameOverride || chart.name)
}

/**
 * Fully qualified app name. The release name alone when it already contains
 * the chart name, otherwise `<release>-<name>`.
 */
export function fullname(
  chart: ChartMetadata,
  releaseName: string,
  overrides: NameOverrides = {}
): string {
  if (overrides.fullnameOverride) {
    return dnsTrim(overrides.fullnameOverride)
  }

  const name = overrides.nameOverride || chart.name
  if (releaseName.includes(name)) {
    return dnsTrim(releaseName)
  }
  return dnsTrim(`${releaseName}-${name}`)
}

/**
 * Value of the helm.sh/chart label
 */
export function chartLabel(chart: ChartMetadata): string {
  return dnsTrim(`${chart.name}-${chart.version}`.replace(/\+/g, '_'))
}

export function selectorLabels(
  chart: ChartMetadata,
  releaseName: string,
  overrides: NameOverrides = {}
): Record<string, string> {
  return {
    [Labels.NAME]: chartName(chart, overrides),
    [Labels.INSTANCE]: releaseName
  }
}

export function commonLabels(
  chart: ChartMetadata,
  releaseName: string,
  overrides: NameOverrides = {}
): Record<string, string> {
  return {
    [Labels.CHART]: chartLabel(chart),
    ...selectorLabels(chart, releaseName, overrides),
    ...(chart.appVersion ? { [Labels.VERSION]: chart.appVersion } : {}),
    [Labels.MANAGED_BY]: MANAGED_BY
  }
}

export function serviceAccountName(
  serviceAccount: { create: boolean; name?: string | null },
  appFullname: string
): string {
  if (serviceAccount.create) {
    return serviceAccount.name || appFullname
  }
  return serviceAccount.name || 'default'
}

/**
 * `{ [key]: value }` when value is set and not an empty string, list or mapping,
 * otherwise `{}`. Spread into a manifest to leave empty sections out.
 */
export function optional<K extends string, V>(
  key: K,
  value: V | null | undefined
): Partial<Record<K, V>> {
  if (value === null || value === undefined || value === '') {
    return {}
  }
  if (Array.isArray(value) && value.length === 0) {
    return {}
  }
  if (typeof value === 'object' && Object.keys(value).length === 0) {
    return {}
  }
  const entry: Partial<Record<K, V>> = {}
  entry[key] = value
  return entry
}
