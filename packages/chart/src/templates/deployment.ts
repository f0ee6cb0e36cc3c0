import type * as k8s from '@kubernetes/client-node'
import { MONGODB } from '../constants'
import { optional } from '../helpers'
import type { EnvVarEntry, EnvVarSource } from '../schema'
import type { Manifest } from '../types'
import type { ComponentContext } from './context'

function toEnvVarSource(source: EnvVarSource): k8s.V1EnvVarSource {
  if (source.secretKeyRef) {
    const { name, key, optional: isOptional } = source.secretKeyRef
    return {
      secretKeyRef: {
        key: key ?? '',
        ...optional('name', name),
        ...optional('optional', isOptional)
      }
    }
  }

  if (source.configMapKeyRef) {
    const { name, key, optional: isOptional } = source.configMapKeyRef
    return {
      configMapKeyRef: {
        key: key ?? '',
        ...optional('name', name),
        ...optional('optional', isOptional)
      }
    }
  }

  return { ...optional('fieldRef', source.fieldRef) }
}

export function toEnvVar(entry: EnvVarEntry): k8s.V1EnvVar {
  if (entry.valueFrom) {
    return { name: entry.name, valueFrom: toEnvVarSource(entry.valueFrom) }
  }
  return { name: entry.name, value: entry.value ?? '' }
}

/**
 * Variables pointing the container at MongoDB. An explicit URI wins; otherwise
 * the bundled MongoDB release is referenced when enabled.
 */
export function mongodbEnv(ctx: ComponentContext): k8s.V1EnvVar[] {
  const { mongodbUri, mongodbEnabled } = ctx.values

  if (mongodbUri) {
    return [{ name: MONGODB.URI_ENV, value: mongodbUri }]
  }

  if (!mongodbEnabled) {
    return []
  }

  const service = `${ctx.release.Name}-mongodb`
  return [
    {
      name: MONGODB.PASSWORD_ENV,
      valueFrom: {
        secretKeyRef: { name: service, key: MONGODB.PASSWORD_KEY }
      }
    },
    {
      name: MONGODB.URI_ENV,
      value: `mongodb://root:$(${MONGODB.PASSWORD_ENV})@${service}:${MONGODB.PORT}/${MONGODB.DATABASE}?authSource=admin`
    }
  ]
}

/**
 * Container env in order: MongoDB wiring, global env, component env
 */
export function containerEnv(ctx: ComponentContext): k8s.V1EnvVar[] {
  return [
    ...mongodbEnv(ctx),
    ...ctx.global.env.map(toEnvVar),
    ...ctx.values.env.map(toEnvVar)
  ]
}

export function claimName(ctx: ComponentContext): string | null {
  const claim = ctx.values.volumeClaim
  if (!claim.enabled || !claim.name) {
    return null
  }
  return `${ctx.fullname}-${claim.name}`
}

function volumeMounts(ctx: ComponentContext): k8s.V1VolumeMount[] {
  const { volumeClaim } = ctx.values
  const mounts: k8s.V1VolumeMount[] = []
  if (volumeClaim.enabled && volumeClaim.name && volumeClaim.mountPath) {
    mounts.push({ name: volumeClaim.name, mountPath: volumeClaim.mountPath })
  }
  return [...mounts, ...ctx.values.volumeMounts]
}

function volumes(ctx: ComponentContext): k8s.V1Volume[] {
  const claim = claimName(ctx)
  const result: k8s.V1Volume[] = []
  if (claim && ctx.values.volumeClaim.name) {
    result.push({
      name: ctx.values.volumeClaim.name,
      persistentVolumeClaim: { claimName: claim }
    })
  }
  return [...result, ...ctx.values.volumes]
}

export function imageReference(ctx: ComponentContext): string {
  const { repository, tag } = ctx.values.image
  const resolved = tag || ctx.chart.appVersion
  return resolved ? `${repository}:${resolved}` : repository
}

export function renderDeployment(
  ctx: ComponentContext
): Manifest<k8s.V1Deployment, 'Deployment'> {
  const { values } = ctx

  const container: k8s.V1Container = {
    name: ctx.chart.name,
    ...optional('securityContext', values.securityContext),
    image: imageReference(ctx),
    imagePullPolicy: values.image.pullPolicy,
    ...optional('command', values.command),
    ...optional('args', values.args),
    ports: [
      {
        name: 'http',
        containerPort: values.service.port,
        protocol: 'TCP'
      }
    ],
    ...optional('livenessProbe', values.livenessProbe),
    ...optional('readinessProbe', values.readinessProbe),
    ...optional('env', containerEnv(ctx)),
    ...optional('resources', values.resources),
    ...optional('volumeMounts', volumeMounts(ctx))
  }

  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: {
      name: ctx.fullname,
      labels: ctx.labels
    },
    spec: {
      ...(values.autoscaling.enabled ? {} : { replicas: values.replicaCount }),
      selector: {
        matchLabels: ctx.selectorLabels
      },
      template: {
        metadata: {
          ...optional('annotations', values.podAnnotations),
          labels: { ...ctx.labels, ...values.podLabels }
        },
        spec: {
          ...optional('imagePullSecrets', values.imagePullSecrets),
          serviceAccountName: ctx.serviceAccountName,
          ...optional('securityContext', values.podSecurityContext),
          containers: [container],
          ...optional('volumes', volumes(ctx)),
          ...optional('nodeSelector', values.nodeSelector),
          ...optional('affinity', values.affinity),
          ...optional('tolerations', values.tolerations)
        }
      }
    }
  }
}
