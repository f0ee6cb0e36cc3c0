import * as core from '@actions/core'

const DNS_LABEL_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/
const DNS_SUBDOMAIN_PATTERN =
  /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/
const LABEL_VALUE_PATTERN = /^(([A-Za-z0-9][-A-Za-z0-9_.]*)?[A-Za-z0-9])?$/

/**
 * Truncates a name to a maximum length, logging a warning if truncation occurs.
 */
export function truncateName(name: string, maxLength: number = 63): string {
  if (name.length > maxLength) {
    core.warning(`Name truncated to ${maxLength} characters: ${name}`)
    return name.substring(0, maxLength)
  }
  return name
}

/**
 * Removes every trailing occurrence of `suffix`.
 */
export function trimSuffix(value: string, suffix: string): string {
  let result = value
  while (suffix && result.endsWith(suffix)) {
    result = result.substring(0, result.length - suffix.length)
  }
  return result
}

/**
 * RFC 1123 label: lowercase alphanumerics and hyphens, at most 63 characters.
 * Used for Service names and release names.
 */
export function isDnsLabel(name: string): boolean {
  return name.length <= 63 && DNS_LABEL_PATTERN.test(name)
}

/**
 * RFC 1123 subdomain: dot separated labels, at most 253 characters.
 * Used for most other resource names.
 */
export function isDnsSubdomain(name: string): boolean {
  return name.length <= 253 && DNS_SUBDOMAIN_PATTERN.test(name)
}

/**
 * Kubernetes label values must:
 * - Be 63 characters or less (may be empty)
 * - Contain only alphanumeric characters, hyphens, underscores, and dots
 * - Start and end with an alphanumeric character
 */
export function isValidLabelValue(value: string): boolean {
  return value.length <= 63 && LABEL_VALUE_PATTERN.test(value)
}
