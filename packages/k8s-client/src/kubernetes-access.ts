import * as core from '@actions/core'
import * as k8s from '@kubernetes/client-node'

/**
 * Loads the default kubeconfig, switches to the given context and checks that
 * the cluster accepts the credentials
 */
export async function verifyKubernetesAccess(
  kubernetesContext: string
): Promise<k8s.KubeConfig> {
  core.startGroup('Verifying Kubernetes connectivity')

  const kc = new k8s.KubeConfig()
  kc.loadFromDefault()

  const contexts = kc.getContexts()
  const contextExists = contexts.some((ctx) => ctx.name === kubernetesContext)

  if (!contextExists) {
    core.error(
      `Cannot find context '${kubernetesContext}' in kubeconfig. Available contexts:`
    )
    contexts.forEach((ctx) => core.info(`  - ${ctx.name}`))
    core.endGroup()
    throw new Error(`Context '${kubernetesContext}' does not exist`)
  }

  kc.setCurrentContext(kubernetesContext)
  core.info(`Using context: ${kubernetesContext}`)

  // Equivalent to kubectl auth whoami
  const authApi = kc.makeApiClient(k8s.AuthenticationV1Api)
  try {
    const whoami = await authApi.createSelfSubjectReview({
      body: {
        apiVersion: 'authentication.k8s.io/v1',
        kind: 'SelfSubjectReview'
      }
    })
    const username = whoami.status?.userInfo?.username || 'authenticated user'
    core.info(`✅ Successfully authenticated as: ${username}`)
  } catch (error) {
    core.endGroup()
    throw new Error(
      `Cannot connect to the cluster using context '${kubernetesContext}': ${error instanceof Error ? error.message : String(error)}`
    )
  }

  core.endGroup()
  return kc
}
