import type { Component } from '../constants'
import type { GlobalValues, ServerValues } from '../schema'
import type { ChartMetadata, ReleaseInfo } from '../types'

/**
 * Everything a component template reads: the subchart instance metadata
 * (named after its alias), its parsed values and the names derived from them
 */
export interface ComponentContext {
  component: Component
  release: ReleaseInfo
  chart: ChartMetadata
  values: ServerValues
  global: GlobalValues
  fullname: string
  labels: Record<string, string>
  selectorLabels: Record<string, string>
  serviceAccountName: string
}

export function templateSource(
  parentChart: string,
  component: Component,
  template: string
): string {
  return `${parentChart}/charts/${component}/templates/${template}`
}
