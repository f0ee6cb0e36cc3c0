import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as core from '@actions/core'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import type { ApplicableObject, KubernetesClient } from '@chart-actions/k8s-client'
import {
  applyManifests,
  deploymentRefs,
  describeObject,
  readManifests
} from '../src/k8s-operations.js'
import type { AppliedObject } from '../src/types.js'

const MANIFESTS = `---
# Source: growthbook/charts/frontend/templates/service.yaml
apiVersion: v1
kind: Service
metadata:
  name: gb-frontend
---
# Source: growthbook/charts/backend/templates/deployment.yaml
apiVersion: apps/v1
kind: Deployment
metadata:
  name: gb-backend
  namespace: analytics-api
---
apiVersion: v1
kind: Namespace
metadata:
  name: analytics
`

describe('k8s-operations', () => {
  let dir: string
  let file: string

  beforeEach(() => {
    vi.clearAllMocks()
    vi.spyOn(core, 'startGroup').mockImplementation(() => {})
    vi.spyOn(core, 'endGroup').mockImplementation(() => {})
    vi.spyOn(core, 'info').mockImplementation(() => {})
    dir = mkdtempSync(join(tmpdir(), 'apply-chart-'))
    file = join(dir, 'manifests.yaml')
    writeFileSync(file, MANIFESTS)
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  describe('readManifests', () => {
    it('should fill in the namespace of namespaced objects only', () => {
      const manifests = readManifests(file, 'analytics')

      expect(manifests.map((manifest) => manifest.metadata.namespace)).toEqual([
        'analytics',
        'analytics-api',
        undefined
      ])
    })

    it('should keep the file order', () => {
      expect(readManifests(file, 'analytics').map((manifest) => manifest.kind)).toEqual([
        'Service',
        'Deployment',
        'Namespace'
      ])
    })

    it('should reject a file without objects', () => {
      writeFileSync(file, '---\n# empty\n')

      expect(() => readManifests(file, 'analytics')).toThrow(
        `Manifests file '${file}' contains no objects`
      )
    })

    it('should name a missing file', () => {
      const missing = join(dir, 'missing.yaml')

      expect(() => readManifests(missing, 'analytics')).toThrow(
        `Failed to read manifests file '${missing}'`
      )
    })
  })

  describe('applyManifests', () => {
    const applyManifest = vi.fn()
    const client = { applyManifest } as unknown as KubernetesClient

    it('should apply every manifest in order', async () => {
      applyManifest.mockResolvedValue({})
      const manifests = readManifests(file, 'analytics')
      const applied: AppliedObject[] = []

      await applyManifests(client, manifests, { fieldManager: 'chart-actions' }, applied)

      expect(applyManifest.mock.calls.map(([manifest]) => manifest)).toEqual(manifests)
      expect(applyManifest).toHaveBeenCalledWith(manifests[0], { fieldManager: 'chart-actions' })
      expect(applied).toEqual([
        { kind: 'Service', name: 'gb-frontend', namespace: 'analytics' },
        { kind: 'Deployment', name: 'gb-backend', namespace: 'analytics-api' },
        { kind: 'Namespace', name: 'analytics', namespace: '' }
      ])
      expect(core.startGroup).toHaveBeenCalledWith('Applying 3 manifests')
    })

    it('should keep the objects applied before a failure', async () => {
      applyManifest
        .mockResolvedValueOnce({})
        .mockRejectedValueOnce(new Error("Failed to apply Deployment 'gb-backend': conflict"))
      const applied: AppliedObject[] = []

      await expect(
        applyManifests(
          client,
          readManifests(file, 'analytics'),
          { fieldManager: 'chart-actions', dryRun: true },
          applied
        )
      ).rejects.toThrow("Failed to apply Deployment 'gb-backend': conflict")

      expect(applied).toEqual([{ kind: 'Service', name: 'gb-frontend', namespace: 'analytics' }])
      expect(core.startGroup).toHaveBeenCalledWith('Applying 3 manifests (dry run)')
      expect(core.endGroup).toHaveBeenCalledTimes(1)
    })
  })

  it('should collect Deployment references', () => {
    expect(deploymentRefs(readManifests(file, 'analytics'))).toEqual([
      { name: 'gb-backend', namespace: 'analytics-api' }
    ])
  })

  it('should describe an object without a namespace', () => {
    const namespace: ApplicableObject = {
      apiVersion: 'v1',
      kind: 'Namespace',
      metadata: { name: 'analytics' }
    }

    expect(describeObject(namespace)).toEqual({
      kind: 'Namespace',
      name: 'analytics',
      namespace: ''
    })
  })
})
