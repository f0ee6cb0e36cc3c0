import type * as k8s from '@kubernetes/client-node'
import type { Manifest } from '../types'
import type { ComponentContext } from './context'

function utilizationMetric(
  resource: 'cpu' | 'memory',
  averageUtilization: number
): k8s.V2MetricSpec {
  return {
    type: 'Resource',
    resource: {
      name: resource,
      target: { type: 'Utilization', averageUtilization }
    }
  }
}

export function renderHorizontalPodAutoscaler(
  ctx: ComponentContext
): Manifest<k8s.V2HorizontalPodAutoscaler, 'HorizontalPodAutoscaler'> | null {
  const { autoscaling } = ctx.values
  if (!autoscaling.enabled) {
    return null
  }

  const metrics: k8s.V2MetricSpec[] = []
  if (autoscaling.targetCPUUtilizationPercentage) {
    metrics.push(
      utilizationMetric('cpu', autoscaling.targetCPUUtilizationPercentage)
    )
  }
  if (autoscaling.targetMemoryUtilizationPercentage) {
    metrics.push(
      utilizationMetric('memory', autoscaling.targetMemoryUtilizationPercentage)
    )
  }

  return {
    apiVersion: 'autoscaling/v2',
    kind: 'HorizontalPodAutoscaler',
    metadata: {
      name: ctx.fullname,
      labels: ctx.labels
    },
    spec: {
      scaleTargetRef: {
        apiVersion: 'apps/v1',
        kind: 'Deployment',
        name: ctx.fullname
      },
      minReplicas: autoscaling.minReplicas,
      maxReplicas: autoscaling.maxReplicas,
      metrics
    }
  }
}
