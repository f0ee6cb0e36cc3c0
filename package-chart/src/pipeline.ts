import * as core from '@actions/core'
import { readdirSync, rmSync } from 'fs'
import { join } from 'path'
import { isTagRef } from '@chart-actions/shared/git-utils'
import type {
  HelmRunner,
  PipelineOptions,
  PipelineResult,
  PipelineStep,
  StepName
} from './types'

interface StepDefinition {
  name: StepName
  title: string
  /** Runs only for tag pushes */
  publishOnly: boolean
  run: () => Promise<void>
}

/**
 * Packaged charts in the chart directory, in name order
 */
export function listArchives(chartPath: string): string[] {
  return readdirSync(chartPath)
    .filter((entry) => entry.endsWith('.tgz'))
    .sort()
}

function discardArchives(chartPath: string, archives: string[]): void {
  for (const archive of archives) {
    rmSync(join(chartPath, archive), { force: true })
    core.info(`Discarded ${archive}`)
  }
}

/**
 * dependencies -> lint -> package -> login -> push. Login and push only run
 * for tag refs. The first failure skips every later step; a failed login or
 * push removes the packaged archives.
 */
export async function runPackagePipeline(
  helm: HelmRunner,
  options: PipelineOptions
): Promise<PipelineResult> {
  const publish = isTagRef(options.ref)
  const steps: PipelineStep[] = []
  const published: string[] = []
  let archives: string[] = []
  let failed = false
  let discarded = false

  const definitions: StepDefinition[] = [
    {
      name: 'dependencies',
      title: 'Rebuilding chart dependencies',
      publishOnly: false,
      run: () => helm.dependencyBuild()
    },
    {
      name: 'lint',
      title: 'Linting chart',
      publishOnly: false,
      run: () => helm.lint()
    },
    {
      name: 'package',
      title: 'Packaging chart',
      publishOnly: false,
      run: async () => {
        await helm.package()
        archives = listArchives(options.chartPath)
        if (archives.length === 0) {
          throw new Error(`helm package produced no archive in '${options.chartPath}'`)
        }
      }
    },
    {
      name: 'login',
      title: `Logging in to ${options.registry}`,
      publishOnly: true,
      run: async () => {
        if (!options.password) {
          throw new Error('No registry password available; set registry-password or GITHUB_TOKEN')
        }
        await helm.registryLogin(options.registry, options.username, options.password)
      }
    },
    {
      name: 'push',
      title: `Pushing chart to ${options.repository}`,
      publishOnly: true,
      run: async () => {
        for (const archive of archives) {
          await helm.push(archive, options.repository)
          published.push(archive)
          core.info(`✅ Pushed ${archive} to ${options.repository}`)
        }
      }
    }
  ]

  if (!publish) {
    core.info(`Ref '${options.ref}' is not a tag; the chart will not be published`)
  }

  for (const step of definitions) {
    if (failed) {
      steps.push({ name: step.name, status: 'skipped', detail: 'A previous step failed' })
      continue
    }
    if (step.publishOnly && !publish) {
      steps.push({ name: step.name, status: 'skipped', detail: 'Not a tag push' })
      continue
    }

    core.startGroup(step.title)
    const startTime = Date.now()
    try {
      await step.run()
      steps.push({ name: step.name, status: 'success', durationMs: Date.now() - startTime })
      core.info(`✅ ${step.title} succeeded`)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      steps.push({
        name: step.name,
        status: 'failure',
        durationMs: Date.now() - startTime,
        detail: message
      })
      core.error(message, { title: `${step.name} failed` })
      failed = true

      if (step.publishOnly) {
        discardArchives(options.chartPath, archives)
        discarded = archives.length > 0
      }
    }
    core.endGroup()
  }

  return { succeeded: !failed, steps, archives, published, discarded }
}
