export type PathSegment = string | number

/**
 * Formats a key path the way values files are addressed:
 * ['backend', 'env', 0, 'value'] -> 'backend.env[0].value'
 */
export function formatPath(segments: readonly PathSegment[]): string {
  return segments.reduce<string>((path, segment) => {
    if (typeof segment === 'number') {
      return `${path}[${segment}]`
    }
    if (segment === '') {
      return path
    }
    return path ? `${path}.${segment}` : segment
  }, '')
}
