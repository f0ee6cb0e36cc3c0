import type * as k8s from '@kubernetes/client-node'
import type { Component } from './constants'

/**
 * Nested mapping of string keys to scalars, lists or nested mappings
 */
export type ValuesDocument = Record<string, unknown>

export interface ChartDependency {
  name: string
  version: string
  repository?: string
  alias?: string
  condition?: string
}

/**
 * Contents of Chart.yaml
 */
export interface ChartMetadata {
  apiVersion: string
  name: string
  version: string
  appVersion?: string
  description?: string
  type?: string
  dependencies?: ChartDependency[]
}

export interface LoadedChart {
  path: string
  metadata: ChartMetadata
  values: ValuesDocument
  subcharts: Record<string, LoadedChart>
}

export type IssueSeverity = 'error' | 'warning'

export interface ValidationIssue {
  severity: IssueSeverity
  path: string
  message: string
}

export interface ReleaseInfo {
  Name: string
  Namespace: string
  Service: string
}

/**
 * Objects that `{{ ... }}` references in values resolve against
 */
export interface TemplateScope {
  Release: ReleaseInfo
  Chart: {
    Name: string
    Version: string
    AppVersion: string
  }
  Values: ValuesDocument
}

/**
 * A Kubernetes object with the fields every rendered manifest carries
 */
export type Manifest<T extends k8s.KubernetesObject, K extends string> = Omit<
  T,
  'apiVersion' | 'kind' | 'metadata'
> & {
  apiVersion: string
  kind: K
  metadata: k8s.V1ObjectMeta & { name: string }
}

export type ChartManifest =
  | Manifest<k8s.V1ServiceAccount, 'ServiceAccount'>
  | Manifest<k8s.V1PersistentVolumeClaim, 'PersistentVolumeClaim'>
  | Manifest<k8s.V1Service, 'Service'>
  | Manifest<k8s.V1Deployment, 'Deployment'>
  | Manifest<k8s.V2HorizontalPodAutoscaler, 'HorizontalPodAutoscaler'>
  | Manifest<k8s.V1Ingress, 'Ingress'>

export interface RenderedManifest {
  /** Template path, e.g. growthbook/charts/backend/templates/deployment.yaml */
  source: string
  object: ChartManifest
}

export interface RenderOptions {
  releaseName: string
  namespace?: string
  /** User values documents, applied in order over the chart defaults */
  values?: ValuesDocument[]
  /** `--set` style overrides applied last */
  set?: string[]
}

export interface RenderResult {
  manifests: RenderedManifest[]
  /** Parent chart values after merging and substitution */
  values: ValuesDocument
  /** Values each component instance rendered with */
  componentValues: Record<Component, ValuesDocument>
  /** Warnings found while validating values; errors abort rendering */
  issues: ValidationIssue[]
}
