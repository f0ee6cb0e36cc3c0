import type * as k8s from '@kubernetes/client-node'
import type { Manifest } from '../types'
import type { ComponentContext } from './context'

export function renderService(
  ctx: ComponentContext
): Manifest<k8s.V1Service, 'Service'> {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name: ctx.fullname,
      labels: ctx.labels
    },
    spec: {
      type: ctx.values.service.type,
      ports: [
        {
          port: ctx.values.service.port,
          targetPort: 'http',
          protocol: 'TCP',
          name: 'http'
        }
      ],
      selector: ctx.selectorLabels
    }
  }
}
