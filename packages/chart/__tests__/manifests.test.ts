import { describe, it, expect, vi } from 'vitest'
import { fileURLToPath } from 'url'
import { loadChart } from '../src/chart-loader.js'
import { parseManifests, serializeManifests } from '../src/manifests.js'
import { renderChart } from '../src/renderer.js'

vi.mock('@actions/core')

describe('serializeManifests', () => {
  it('should prefix each document with its source', () => {
    const text = serializeManifests([
      {
        source: 'growthbook/charts/frontend/templates/service.yaml',
        object: { apiVersion: 'v1', kind: 'Service', metadata: { name: 'gb-frontend' } }
      },
      {
        source: 'growthbook/charts/frontend/templates/serviceaccount.yaml',
        object: {
          apiVersion: 'v1',
          kind: 'ServiceAccount',
          metadata: { name: 'gb-frontend' },
          automountServiceAccountToken: true
        }
      }
    ])

    expect(text).toBe(
      [
        '---',
        '# Source: growthbook/charts/frontend/templates/service.yaml',
        'apiVersion: v1',
        'kind: Service',
        'metadata:',
        '  name: gb-frontend',
        '---',
        '# Source: growthbook/charts/frontend/templates/serviceaccount.yaml',
        'apiVersion: v1',
        'kind: ServiceAccount',
        'metadata:',
        '  name: gb-frontend',
        'automountServiceAccountToken: true',
        ''
      ].join('\n')
    )
  })

  it('should return an empty string when nothing was rendered', () => {
    expect(serializeManifests([])).toBe('')
  })
})

describe('parseManifests', () => {
  it('should read back a rendered chart', () => {
    const chart = loadChart(
      fileURLToPath(new URL('../../../charts/growthbook', import.meta.url))
    )
    const result = renderChart(chart, { releaseName: 'gb' })

    const parsed = parseManifests(serializeManifests(result.manifests))

    expect(parsed.map((object) => `${object.kind}/${object.metadata.name}`)).toEqual(
      result.manifests.map(({ object }) => `${object.kind}/${object.metadata.name}`)
    )
    expect(parsed[6]).toEqual(result.manifests[6].object)
  })

  it('should skip empty documents', () => {
    const parsed = parseManifests(
      '---\n---\napiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: settings\n---\n'
    )

    expect(parsed).toEqual([
      { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'settings' } }
    ])
  })

  it('should reject documents without metadata.name', () => {
    expect(() =>
      parseManifests('apiVersion: v1\nkind: ConfigMap\nmetadata: {}\n', 'manifests.yaml')
    ).toThrow(
      "Document 1 in 'manifests.yaml' is not a Kubernetes object: apiVersion, kind and metadata.name are required"
    )
  })

  it('should reject scalar documents', () => {
    expect(() => parseManifests('just text\n')).toThrow(
      'Document 1 is not a Kubernetes object: apiVersion, kind and metadata.name are required'
    )
  })
})
