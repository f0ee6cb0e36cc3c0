import type * as k8s from '@kubernetes/client-node'
import { optional } from '../helpers'
import type { Manifest } from '../types'
import type { ComponentContext } from './context'
import { claimName } from './deployment'

export function renderPersistentVolumeClaim(
  ctx: ComponentContext
): Manifest<k8s.V1PersistentVolumeClaim, 'PersistentVolumeClaim'> | null {
  const name = claimName(ctx)
  if (!name) {
    return null
  }

  const { volumeClaim } = ctx.values
  return {
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: {
      name,
      labels: ctx.labels
    },
    spec: {
      accessModes: volumeClaim.accessModes,
      ...optional('storageClassName', volumeClaim.storageClassName),
      resources: {
        requests: { storage: volumeClaim.storage }
      }
    }
  }
}
