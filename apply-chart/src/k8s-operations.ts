import * as core from '@actions/core'
import { readFileSync } from 'fs'
import { parseManifests } from '@chart-actions/chart'
import type {
  ApplicableObject,
  ApplyOptions,
  DeploymentRef,
  KubernetesClient
} from '@chart-actions/k8s-client'
import type { AppliedObject } from './types'

const CLUSTER_SCOPED_KINDS = new Set([
  'Namespace',
  'ClusterRole',
  'ClusterRoleBinding',
  'CustomResourceDefinition',
  'PersistentVolume',
  'StorageClass',
  'IngressClass',
  'PriorityClass'
])

export function isClusterScoped(manifest: ApplicableObject): boolean {
  return CLUSTER_SCOPED_KINDS.has(manifest.kind)
}

/**
 * Reads the manifests file and puts every namespaced object without a
 * namespace into the given one
 */
export function readManifests(file: string, namespace: string): ApplicableObject[] {
  let text: string
  try {
    text = readFileSync(file, 'utf8')
  } catch (error) {
    throw new Error(
      `Failed to read manifests file '${file}': ${error instanceof Error ? error.message : String(error)}`
    )
  }

  const manifests = parseManifests(text, file)
  if (manifests.length === 0) {
    throw new Error(`Manifests file '${file}' contains no objects`)
  }

  return manifests.map((manifest) =>
    isClusterScoped(manifest) || manifest.metadata.namespace
      ? manifest
      : { ...manifest, metadata: { ...manifest.metadata, namespace } }
  )
}

export function describeObject(manifest: ApplicableObject): AppliedObject {
  return {
    kind: manifest.kind,
    name: manifest.metadata.name,
    namespace: manifest.metadata.namespace ?? ''
  }
}

/**
 * Applies the manifests in file order. Each applied object is appended to
 * `applied` as soon as the server accepts it.
 */
export async function applyManifests(
  client: KubernetesClient,
  manifests: ApplicableObject[],
  options: ApplyOptions,
  applied: AppliedObject[]
): Promise<void> {
  core.startGroup(
    `Applying ${manifests.length} manifests${options.dryRun ? ' (dry run)' : ''}`
  )
  core.info(`Field manager: ${options.fieldManager}`)

  try {
    for (const manifest of manifests) {
      await client.applyManifest(manifest, options)
      applied.push(describeObject(manifest))
    }
  } finally {
    core.endGroup()
  }
}

export function deploymentRefs(manifests: ApplicableObject[]): DeploymentRef[] {
  return manifests
    .filter((manifest) => manifest.kind === 'Deployment')
    .map((manifest) => ({
      name: manifest.metadata.name,
      namespace: manifest.metadata.namespace ?? ''
    }))
}
