/**
 * Kubernetes label constants applied to every rendered resource
 */
export const Labels = {
  NAME: 'app.kubernetes.io/name',
  INSTANCE: 'app.kubernetes.io/instance',
  VERSION: 'app.kubernetes.io/version',
  MANAGED_BY: 'app.kubernetes.io/managed-by',
  CHART: 'helm.sh/chart'
} as const
