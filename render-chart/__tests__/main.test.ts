import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as core from '@actions/core'
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { fileURLToPath } from 'url'
import { parseManifests } from '@chart-actions/chart'
import { getActionInputs, run } from '../src/main.js'
import { generateSummary } from '../src/summary.js'

vi.mock('../src/summary.js')

const CHART_DIR = fileURLToPath(new URL('../../charts/growthbook', import.meta.url))

describe('render-chart', () => {
  let dir: string
  let inputs: Record<string, string>
  let multiline: Record<string, string[]>
  let strict: boolean

  beforeEach(() => {
    vi.clearAllMocks()
    dir = mkdtempSync(join(tmpdir(), 'render-chart-'))

    inputs = {
      'chart-path': CHART_DIR,
      'release-name': 'gb',
      namespace: 'analytics',
      'output-file': join(dir, 'rendered', 'manifests.yaml')
    }
    multiline = {}
    strict = false

    vi.spyOn(core, 'getInput').mockImplementation((name) => inputs[name] ?? '')
    vi.spyOn(core, 'getMultilineInput').mockImplementation(
      (name) => multiline[name] ?? []
    )
    vi.spyOn(core, 'getBooleanInput').mockImplementation(() => strict)
    vi.spyOn(core, 'setOutput').mockImplementation(() => {})
    vi.spyOn(core, 'setFailed').mockImplementation(() => {})
    vi.spyOn(core, 'startGroup').mockImplementation(() => {})
    vi.spyOn(core, 'endGroup').mockImplementation(() => {})
    vi.spyOn(core, 'info').mockImplementation(() => {})
    vi.spyOn(core, 'debug').mockImplementation(() => {})
    vi.spyOn(core, 'warning').mockImplementation(() => {})
    vi.spyOn(core, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  describe('getActionInputs', () => {
    it('should apply defaults for optional inputs', () => {
      inputs = { 'release-name': 'gb' }

      expect(getActionInputs()).toEqual({
        chartPath: 'charts/growthbook',
        releaseName: 'gb',
        namespace: 'default',
        valuesFiles: [],
        set: [],
        outputFile: 'rendered/manifests.yaml',
        strict: false
      })
      expect(core.getInput).toHaveBeenCalledWith('release-name', { required: true })
    })
  })

  describe('run', () => {
    it('should write the rendered manifests and set outputs', async () => {
      await run()

      expect(core.setFailed).not.toHaveBeenCalled()
      const text = readFileSync(inputs['output-file'], 'utf8')
      expect(text.startsWith(
        '---\n# Source: growthbook/charts/frontend/templates/serviceaccount.yaml\n'
      )).toBe(true)
      expect(parseManifests(text)).toHaveLength(7)

      expect(core.setOutput).toHaveBeenCalledWith('output-file', inputs['output-file'])
      expect(core.setOutput).toHaveBeenCalledWith('manifest-count', 7)
      expect(core.setOutput).toHaveBeenCalledWith('warnings', 4)
      expect(core.warning).toHaveBeenCalledWith(
        "secretKeyRef for 'JWT_SECRET' is missing: name, key",
        { title: 'backend.env[0].valueFrom.secretKeyRef' }
      )
      expect(generateSummary).toHaveBeenCalledWith(
        true,
        expect.objectContaining({ releaseName: 'gb', namespace: 'analytics' }),
        expect.objectContaining({ errors: 0, warnings: 4, passed: true })
      )
    })

    it('should apply values files and set expressions in order', async () => {
      const valuesFile = join(dir, 'production.yaml')
      writeFileSync(
        valuesFile,
        'backend:\n  image:\n    tag: "4.1.0"\n  replicaCount: 3\n'
      )
      multiline = {
        'values-files': [valuesFile],
        set: ['backend.replicaCount=2']
      }

      await run()

      const backend = parseManifests(readFileSync(inputs['output-file'], 'utf8')).find(
        (object) => object.kind === 'Deployment' && object.metadata.name === 'gb-backend'
      )
      expect(backend).toMatchObject({
        spec: {
          replicas: 2,
          template: {
            spec: { containers: [{ image: 'growthbook/growthbook:4.1.0' }] }
          }
        }
      })
      expect(core.setOutput).toHaveBeenCalledWith('warnings', 3)
    })

    it('should fail on warnings in strict mode without writing manifests', async () => {
      strict = true

      await run()

      expect(core.setFailed).toHaveBeenCalledWith(
        'Chart lint failed with 4 warning(s) in strict mode'
      )
      expect(existsSync(inputs['output-file'])).toBe(false)
      expect(generateSummary).toHaveBeenCalledWith(
        false,
        expect.objectContaining({ strict: true }),
        expect.objectContaining({ passed: false, warnings: 4 }),
        'Chart lint failed with 4 warning(s) in strict mode'
      )
    })

    it('should annotate every values error', async () => {
      multiline = { set: ['ingress.enabled=true', 'ingress.hosts=null'] }

      await run()

      expect(core.error).toHaveBeenCalledWith(
        'ingress is enabled but no hosts are defined',
        { title: 'ingress.hosts' }
      )
      expect(core.setFailed).toHaveBeenCalledWith(
        'Chart values are invalid (1 error):\n' +
          '  - ingress.hosts: ingress is enabled but no hosts are defined'
      )
      expect(generateSummary).toHaveBeenCalledWith(
        false,
        expect.anything(),
        expect.objectContaining({ errors: 1, warnings: 2, manifests: [] }),
        expect.any(String)
      )
    })

    it('should close the render group before reporting values errors', async () => {
      multiline = { set: ['ingress.enabled=true', 'ingress.hosts=null'] }

      await run()

      expect(core.startGroup).toHaveBeenCalledTimes(2)
      expect(core.endGroup).toHaveBeenCalledTimes(2)
      expect(vi.mocked(core.endGroup).mock.invocationCallOrder[1]).toBeLessThan(
        vi.mocked(core.error).mock.invocationCallOrder[0]
      )
    })

    it('should close the loading group when the chart is missing', async () => {
      inputs['chart-path'] = join(dir, 'missing-chart')

      await run()

      expect(core.startGroup).toHaveBeenCalledTimes(1)
      expect(core.endGroup).toHaveBeenCalledTimes(1)
      expect(core.setFailed).toHaveBeenCalled()
    })

    it('should reject an invalid release name', async () => {
      inputs['release-name'] = 'GrowthBook'

      await run()

      expect(core.setFailed).toHaveBeenCalledWith(
        "Invalid release name 'GrowthBook': must consist of lowercase alphanumeric characters or '-', and start and end with an alphanumeric character"
      )
      expect(generateSummary).toHaveBeenCalledWith(
        false,
        expect.anything(),
        undefined,
        expect.any(String)
      )
    })
  })
})
