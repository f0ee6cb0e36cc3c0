import * as core from '@actions/core'
import * as k8s from '@kubernetes/client-node'
import { DRY_RUN_ALL } from './constants.js'
import type { ApplicableObject, ApplyOptions } from './types.js'

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Kubernetes operations used to install rendered manifests
 */
export class KubernetesClient {
  private readonly kubeConfig: k8s.KubeConfig
  private appsApi?: k8s.AppsV1Api
  private objectApi?: k8s.KubernetesObjectApi

  constructor(kubeConfig: k8s.KubeConfig) {
    this.kubeConfig = kubeConfig
  }

  private getAppsApi(): k8s.AppsV1Api {
    if (!this.appsApi) {
      this.appsApi = this.kubeConfig.makeApiClient(k8s.AppsV1Api)
    }
    return this.appsApi
  }

  private getObjectApi(): k8s.KubernetesObjectApi {
    if (!this.objectApi) {
      this.objectApi = k8s.KubernetesObjectApi.makeApiClient(this.kubeConfig)
    }
    return this.objectApi
  }

  /**
   * Apply any object using Server-Side Apply, taking ownership of
   * conflicting fields
   */
  async applyManifest<T extends ApplicableObject>(
    manifest: T,
    options: ApplyOptions
  ): Promise<T> {
    const resource = `${manifest.kind} '${manifest.metadata.name}'`

    let applied: T
    try {
      applied = await this.getObjectApi().patch(
        manifest,
        undefined, // pretty
        options.dryRun ? DRY_RUN_ALL : undefined,
        options.fieldManager,
        true, // force
        k8s.PatchStrategy.ServerSideApply
      )
    } catch (error) {
      throw new Error(`Failed to apply ${resource}: ${errorMessage(error)}`)
    }

    core.info(
      `✅ ${resource} applied${options.dryRun ? ' (dry run)' : ''} in namespace '${manifest.metadata.namespace}'`
    )
    return applied
  }

  /**
   * Read a Deployment from a namespace
   */
  async readDeployment(name: string, namespace: string): Promise<k8s.V1Deployment> {
    try {
      return await this.getAppsApi().readNamespacedDeployment({ name, namespace })
    } catch (error) {
      if (this.isNotFoundError(error)) {
        throw new Error(`Deployment '${name}' not found in namespace '${namespace}'`)
      }
      throw new Error(
        `Failed to read Deployment '${name}' from namespace '${namespace}': ${errorMessage(error)}`
      )
    }
  }

  /**
   * Check if an error is a 404 Not Found error
   */
  isNotFoundError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 404
  }
}
