import type * as k8s from '@kubernetes/client-node'
import yaml from 'js-yaml'
import { isPlainObject } from 'lodash'
import type { RenderedManifest } from './types'

/**
 * A parsed manifest with the fields needed to apply it
 */
export type ManifestObject = k8s.KubernetesObject & {
  apiVersion: string
  kind: string
  metadata: k8s.V1ObjectMeta & { name: string }
}

/**
 * Multi-document YAML, one document per manifest, each preceded by the
 * template it came from
 */
export function serializeManifests(manifests: RenderedManifest[]): string {
  return manifests
    .map(
      (manifest) =>
        `---\n# Source: ${manifest.source}\n${yaml.dump(manifest.object, {
          noRefs: true,
          lineWidth: -1,
          skipInvalid: true
        })}`
    )
    .join('')
}

function isManifestObject(value: unknown): value is ManifestObject {
  if (!isPlainObject(value) || typeof value !== 'object' || value === null) {
    return false
  }
  if (!('apiVersion' in value) || typeof value.apiVersion !== 'string') {
    return false
  }
  if (!('kind' in value) || typeof value.kind !== 'string') {
    return false
  }
  if (!('metadata' in value) || !isPlainObject(value.metadata)) {
    return false
  }
  const metadata = value.metadata
  return (
    typeof metadata === 'object' &&
    metadata !== null &&
    'name' in metadata &&
    typeof metadata.name === 'string' &&
    metadata.name !== ''
  )
}

/**
 * Parses multi-document YAML back into manifests. Empty documents are
 * skipped; documents without apiVersion, kind and metadata.name are rejected.
 */
export function parseManifests(text: string, filename?: string): ManifestObject[] {
  const documents = yaml.loadAll(text, null, { filename })
  const source = filename ? ` in '${filename}'` : ''

  return documents
    .filter((document) => document !== null && document !== undefined)
    .map((document, index) => {
      if (!isManifestObject(document)) {
        throw new Error(
          `Document ${index + 1}${source} is not a Kubernetes object: apiVersion, kind and metadata.name are required`
        )
      }
      return document
    })
}
