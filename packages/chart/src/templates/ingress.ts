import type * as k8s from '@kubernetes/client-node'
import type { Component } from '../constants'
import { optional } from '../helpers'
import type { IngressValues } from '../schema'
import type { Manifest } from '../types'

export interface IngressContext {
  ingress: IngressValues
  fullname: string
  labels: Record<string, string>
  /** Service name and port of each component */
  backends: Record<Component, { name: string; port: number }>
}

export function renderIngress(
  ctx: IngressContext
): Manifest<k8s.V1Ingress, 'Ingress'> | null {
  const { ingress } = ctx
  if (!ingress.enabled) {
    return null
  }

  const tls: k8s.V1IngressTLS[] = ingress.tls.map((entry) => ({
    hosts: entry.hosts,
    ...optional('secretName', entry.secretName)
  }))

  const rules: k8s.V1IngressRule[] = ingress.hosts.map((host) => ({
    host: host.host,
    http: {
      paths: host.paths.map((path) => ({
        path: path.path,
        pathType: path.pathType,
        backend: {
          service: {
            name: ctx.backends[path.service].name,
            port: { number: ctx.backends[path.service].port }
          }
        }
      }))
    }
  }))

  return {
    apiVersion: 'networking.k8s.io/v1',
    kind: 'Ingress',
    metadata: {
      name: ctx.fullname,
      labels: ctx.labels,
      ...optional('annotations', ingress.annotations)
    },
    spec: {
      ...optional('ingressClassName', ingress.className),
      ...optional('tls', tls),
      rules
    }
  }
}
