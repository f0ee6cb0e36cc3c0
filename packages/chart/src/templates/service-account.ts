import type * as k8s from '@kubernetes/client-node'
import { optional } from '../helpers'
import type { Manifest } from '../types'
import type { ComponentContext } from './context'

export function renderServiceAccount(
  ctx: ComponentContext
): Manifest<k8s.V1ServiceAccount, 'ServiceAccount'> | null {
  const { serviceAccount } = ctx.values
  if (!serviceAccount.create) {
    return null
  }

  return {
    apiVersion: 'v1',
    kind: 'ServiceAccount',
    metadata: {
      name: ctx.serviceAccountName,
      labels: ctx.labels,
      ...optional('annotations', serviceAccount.annotations)
    },
    automountServiceAccountToken: serviceAccount.automount
  }
}
