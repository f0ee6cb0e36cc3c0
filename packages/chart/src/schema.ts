import type * as k8s from '@kubernetes/client-node'
import { isPlainObject } from 'lodash'
import { z } from 'zod'
import { COMPONENTS } from './constants'

// Kubernetes structures the chart passes through untouched (probes, resources,
// security contexts, ...). Only their shape as a mapping is checked here.
function kubernetesObject<T>() {
  return z.custom<T>((value) => isPlainObject(value), {
    message: 'Expected a mapping'
  })
}

function nullableList<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((value) => value ?? [])
}

const stringMap = z
  .record(z.string())
  .nullish()
  .transform((value) => value ?? {})

const scalarString = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value))

const keySelectorSchema = z.object({
  name: z.string().nullish(),
  key: z.string().nullish(),
  optional: z.boolean().optional()
})

export const envVarSourceSchema = z.object({
  secretKeyRef: keySelectorSchema.nullish(),
  configMapKeyRef: keySelectorSchema.nullish(),
  fieldRef: z
    .object({
      fieldPath: z.string().min(1),
      apiVersion: z.string().optional()
    })
    .nullish()
})

/**
 * One environment variable: a literal `value` or a `valueFrom` reference.
 * Which of the two is set is checked in validation, not here.
 */
export const envVarSchema = z.object({
  name: z.string().min(1),
  value: scalarString.nullish(),
  valueFrom: envVarSourceSchema.nullish()
})

const envListSchema = nullableList(envVarSchema)

export const globalValuesSchema = z
  .object({
    env: envListSchema
  })
  .nullish()
  .transform((value) => value ?? { env: [] })

export const serverValuesSchema = z.object({
  replicaCount: z.number().int().default(1),
  image: z.object({
    repository: z.string().min(1),
    tag: scalarString.nullish(),
    pullPolicy: z.enum(['Always', 'IfNotPresent', 'Never']).default('IfNotPresent')
  }),
  imagePullSecrets: nullableList(z.object({ name: z.string().min(1) })),
  nameOverride: z.string().nullish(),
  fullnameOverride: z.string().nullish(),
  serviceAccount: z
    .object({
      create: z.boolean().default(true),
      automount: z.boolean().default(true),
      annotations: stringMap,
      name: z.string().nullish()
    })
    .default({}),
  podAnnotations: stringMap,
  podLabels: stringMap,
  podSecurityContext: kubernetesObject<k8s.V1PodSecurityContext>().nullish(),
  securityContext: kubernetesObject<k8s.V1SecurityContext>().nullish(),
  service: z.object({
    type: z.string().default('ClusterIP'),
    port: z.number().int()
  }),
  resources: kubernetesObject<k8s.V1ResourceRequirements>().nullish(),
  livenessProbe: kubernetesObject<k8s.V1Probe>().nullish(),
  readinessProbe: kubernetesObject<k8s.V1Probe>().nullish(),
  autoscaling: z
    .object({
      enabled: z.boolean().default(false),
      minReplicas: z.number().int().default(1),
      maxReplicas: z.number().int().default(100),
      targetCPUUtilizationPercentage: z.number().int().nullish(),
      targetMemoryUtilizationPercentage: z.number().int().nullish()
    })
    .default({}),
  command: nullableList(z.string()),
  args: nullableList(scalarString),
  env: envListSchema,
  volumeClaim: z
    .object({
      enabled: z.boolean().default(false),
      name: z.string().nullish(),
      mountPath: z.string().nullish(),
      storage: scalarString.default('1Gi'),
      accessModes: z.array(z.string()).default(['ReadWriteOnce']),
      storageClassName: z.string().nullish()
    })
    .default({}),
  mongodbEnabled: z.boolean().default(false),
  mongodbUri: z.string().nullish(),
  volumes: nullableList(kubernetesObject<k8s.V1Volume>()),
  volumeMounts: nullableList(kubernetesObject<k8s.V1VolumeMount>()),
  nodeSelector: stringMap,
  tolerations: nullableList(kubernetesObject<k8s.V1Toleration>()),
  affinity: kubernetesObject<k8s.V1Affinity>().nullish()
})

const ingressPathSchema = z.object({
  path: z.string().default('/'),
  pathType: z
    .enum(['Exact', 'Prefix', 'ImplementationSpecific'])
    .default('ImplementationSpecific'),
  service: z.enum(COMPONENTS, {
    errorMap: () => ({ message: "must be either 'frontend' or 'backend'" })
  })
})

export const ingressValuesSchema = z
  .object({
    enabled: z.boolean().default(false),
    className: z.string().nullish(),
    annotations: stringMap,
    hosts: nullableList(
      z.object({
        host: z.string().min(1),
        paths: z.array(ingressPathSchema).min(1)
      })
    ),
    tls: nullableList(
      z.object({
        secretName: z.string().nullish(),
        hosts: nullableList(z.string())
      })
    )
  })
  .default({})

/**
 * Parent chart sections. Component sections are validated separately after
 * they are merged with the subchart defaults.
 */
export const chartValuesSchema = z.object({
  global: globalValuesSchema,
  mongodb: z
    .object({ enabled: z.boolean().default(true) })
    .passthrough()
    .default({}),
  ingress: ingressValuesSchema
})

export type EnvVarEntry = z.infer<typeof envVarSchema>
export type EnvVarSource = z.infer<typeof envVarSourceSchema>
export type GlobalValues = z.infer<typeof globalValuesSchema>
export type ServerValues = z.infer<typeof serverValuesSchema>
export type IngressValues = z.infer<typeof ingressValuesSchema>
export type ChartValues = z.infer<typeof chartValuesSchema>
