import * as github from '@actions/github'
import { TAG_REF_PREFIX } from './constants'

/**
 * Whether the ref is a tag push (refs/tags/*). Only tag pushes publish charts.
 */
export function isTagRef(ref: string): boolean {
  return ref.startsWith(TAG_REF_PREFIX)
}

/**
 * Short name of a ref: 'refs/tags/v1.2.0' -> 'v1.2.0', 'refs/heads/main' -> 'main'
 */
export function refShortName(ref: string): string {
  return ref.replace(/^refs\/(heads|tags|pull)\//, '')
}

export function getWorkflowRunUrl(): string {
  return `${github.context.serverUrl}/${github.context.repo.owner}/${github.context.repo.repo}/actions/runs/${github.context.runId}`
}
