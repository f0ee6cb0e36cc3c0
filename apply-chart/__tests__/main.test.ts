import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as core from '@actions/core'
import * as k8s from '@kubernetes/client-node'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { verifyKubernetesAccess, waitForDeployments } from '@chart-actions/k8s-client'
import { getActionInputs, run } from '../src/main.js'
import { generateSummary } from '../src/summary.js'

vi.mock('../src/summary.js')
vi.mock('@chart-actions/k8s-client', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@chart-actions/k8s-client')>()),
  verifyKubernetesAccess: vi.fn(),
  waitForDeployments: vi.fn()
}))

const MANIFESTS = `---
# Source: growthbook/charts/frontend/templates/service.yaml
apiVersion: v1
kind: Service
metadata:
  name: gb-frontend
---
# Source: growthbook/charts/frontend/templates/deployment.yaml
apiVersion: apps/v1
kind: Deployment
metadata:
  name: gb-frontend
`

interface MockObjectApi {
  patch: ReturnType<typeof vi.fn>
}

describe('apply-chart', () => {
  let dir: string
  let inputs: Record<string, string>
  let booleans: Record<string, boolean>
  let mockObjectApi: MockObjectApi

  beforeEach(() => {
    vi.clearAllMocks()
    dir = mkdtempSync(join(tmpdir(), 'apply-chart-main-'))
    writeFileSync(join(dir, 'manifests.yaml'), MANIFESTS)

    inputs = {
      'kubernetes-context': 'test-context',
      'manifests-file': join(dir, 'manifests.yaml'),
      namespace: 'analytics'
    }
    booleans = { 'dry-run': false, wait: true }

    vi.spyOn(core, 'getInput').mockImplementation((name) => inputs[name] ?? '')
    vi.spyOn(core, 'getBooleanInput').mockImplementation((name) => booleans[name] ?? false)
    vi.spyOn(core, 'setOutput').mockImplementation(() => {})
    vi.spyOn(core, 'setFailed').mockImplementation(() => {})
    vi.spyOn(core, 'startGroup').mockImplementation(() => {})
    vi.spyOn(core, 'endGroup').mockImplementation(() => {})
    vi.spyOn(core, 'info').mockImplementation(() => {})

    mockObjectApi = { patch: vi.fn().mockResolvedValue({}) }
    vi.mocked(k8s.KubernetesObjectApi.makeApiClient).mockReturnValue(
      mockObjectApi as unknown as k8s.KubernetesObjectApi
    )
    vi.mocked(verifyKubernetesAccess).mockResolvedValue(new k8s.KubeConfig())
    vi.mocked(waitForDeployments).mockResolvedValue([
      {
        name: 'gb-frontend',
        namespace: 'analytics',
        ready: true,
        message: "Deployment 'gb-frontend' successfully rolled out"
      }
    ])
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  describe('getActionInputs', () => {
    it('should apply defaults for optional inputs', () => {
      inputs = { 'kubernetes-context': 'test-context' }

      expect(getActionInputs()).toEqual({
        kubernetesContext: 'test-context',
        manifestsFile: 'rendered/manifests.yaml',
        namespace: 'default',
        fieldManager: 'chart-actions',
        dryRun: false,
        wait: true,
        timeout: '5m'
      })
      expect(core.getInput).toHaveBeenCalledWith('kubernetes-context', { required: true })
    })

    it('should reject a malformed timeout', () => {
      inputs.timeout = 'invalid'

      expect(() => getActionInputs()).toThrow('Invalid duration format: invalid')
    })
  })

  describe('run', () => {
    it('should apply the manifests and wait for the Deployment', async () => {
      await run()

      expect(core.setFailed).not.toHaveBeenCalled()
      expect(verifyKubernetesAccess).toHaveBeenCalledWith('test-context')
      expect(mockObjectApi.patch).toHaveBeenCalledTimes(2)
      expect(mockObjectApi.patch).toHaveBeenNthCalledWith(
        1,
        {
          apiVersion: 'v1',
          kind: 'Service',
          metadata: { name: 'gb-frontend', namespace: 'analytics' }
        },
        undefined,
        undefined,
        'chart-actions',
        true,
        'application/apply-patch+yaml'
      )
      expect(waitForDeployments).toHaveBeenCalledWith(
        expect.anything(),
        [{ name: 'gb-frontend', namespace: 'analytics' }],
        { timeout: '5m' }
      )
      expect(core.setOutput).toHaveBeenCalledWith('applied-count', 2)
      expect(core.setOutput).toHaveBeenCalledWith(
        'objects',
        'Service/gb-frontend\nDeployment/gb-frontend'
      )
      expect(generateSummary).toHaveBeenCalledWith(
        true,
        expect.objectContaining({ namespace: 'analytics' }),
        {
          applied: [
            { kind: 'Service', name: 'gb-frontend', namespace: 'analytics' },
            { kind: 'Deployment', name: 'gb-frontend', namespace: 'analytics' }
          ],
          rollouts: [
            {
              name: 'gb-frontend',
              namespace: 'analytics',
              ready: true,
              message: "Deployment 'gb-frontend' successfully rolled out"
            }
          ]
        }
      )
    })

    it('should validate on the server without waiting in dry-run mode', async () => {
      booleans['dry-run'] = true

      await run()

      expect(mockObjectApi.patch.mock.calls.map((call) => call[2])).toEqual(['All', 'All'])
      expect(waitForDeployments).not.toHaveBeenCalled()
      expect(core.info).toHaveBeenCalledWith('Dry run: skipping rollout wait')
      expect(core.setFailed).not.toHaveBeenCalled()
    })

    it('should not wait when wait is disabled', async () => {
      booleans.wait = false

      await run()

      expect(waitForDeployments).not.toHaveBeenCalled()
      expect(core.info).toHaveBeenCalledWith('Not waiting for Deployments to roll out')
    })

    it('should use the field manager input', async () => {
      inputs['field-manager'] = 'release-bot'

      await run()

      expect(mockObjectApi.patch.mock.calls.map((call) => call[3])).toEqual([
        'release-bot',
        'release-bot'
      ])
    })

    it('should report the objects applied before a failure', async () => {
      mockObjectApi.patch
        .mockResolvedValueOnce({})
        .mockRejectedValueOnce(new Error('conflict'))

      await run()

      const message = "Failed to apply Deployment 'gb-frontend': conflict"
      expect(core.setFailed).toHaveBeenCalledWith(message)
      expect(waitForDeployments).not.toHaveBeenCalled()
      expect(generateSummary).toHaveBeenCalledWith(
        false,
        expect.objectContaining({ kubernetesContext: 'test-context' }),
        {
          applied: [{ kind: 'Service', name: 'gb-frontend', namespace: 'analytics' }],
          rollouts: []
        },
        message
      )
    })

    it('should fail when the rollout times out', async () => {
      vi.mocked(waitForDeployments).mockRejectedValue(
        new Error(
          "Timed out after 5m waiting for Deployment 'gb-frontend': Waiting for deployment 'gb-frontend' rollout to finish: 0 of 1 updated replicas are available"
        )
      )

      await run()

      expect(core.setFailed).toHaveBeenCalledWith(
        "Timed out after 5m waiting for Deployment 'gb-frontend': Waiting for deployment 'gb-frontend' rollout to finish: 0 of 1 updated replicas are available"
      )
      expect(core.setOutput).not.toHaveBeenCalled()
      expect(core.startGroup).toHaveBeenCalledTimes(2)
      expect(core.endGroup).toHaveBeenCalledTimes(2)
    })

    it('should fail before connecting when the manifests file is missing', async () => {
      inputs['manifests-file'] = join(dir, 'missing.yaml')

      await run()

      expect(verifyKubernetesAccess).not.toHaveBeenCalled()
      expect(core.setFailed).toHaveBeenCalledWith(
        expect.stringContaining(`Failed to read manifests file '${join(dir, 'missing.yaml')}'`)
      )
    })

    it('should fail without a summary when inputs are invalid', async () => {
      inputs.timeout = 'invalid'

      await run()

      expect(generateSummary).not.toHaveBeenCalled()
      expect(core.setFailed).toHaveBeenCalledWith(
        expect.stringContaining('Invalid duration format: invalid')
      )
    })
  })
})
