import { cloneDeep, isPlainObject, set, unset } from 'lodash'
import type { LoadedChart, ValuesDocument } from './types'

export function isValuesDocument(value: unknown): value is ValuesDocument {
  return isPlainObject(value)
}

export interface MergeOptions {
  /**
   * Keep `null` overrides as entries instead of removing the key, so a later
   * merge over subchart defaults can still remove it there
   */
  keepNulls?: boolean
}

/**
 * Deep merges `override` over `base`. The override wins at every leaf, lists
 * are replaced as a whole and a `null` override removes the key. Neither
 * input is modified.
 */
export function mergeValues(
  base: ValuesDocument,
  override: ValuesDocument,
  options: MergeOptions = {}
): ValuesDocument {
  const result = cloneDeep(base)

  for (const [key, value] of Object.entries(override)) {
    if (value === null) {
      if (options.keepNulls) {
        result[key] = null
      } else {
        delete result[key]
      }
      continue
    }

    const current = result[key]
    if (isValuesDocument(value)) {
      result[key] = mergeValues(isValuesDocument(current) ? current : {}, value, options)
    } else {
      result[key] = cloneDeep(value)
    }
  }

  return result
}

/**
 * Removes `null` entries from every mapping of the document. Nulls inside
 * lists are list items and stay.
 */
export function dropNullValues(document: ValuesDocument): ValuesDocument {
  return mergeValues({}, document)
}

export type SetValue = string | number | boolean | null

function coerceSetValue(raw: string): SetValue {
  if (raw === 'true') return true
  if (raw === 'false') return false
  if (raw === 'null') return null
  if (/^-?\d+$/.test(raw) && Number.isSafeInteger(Number(raw))) {
    return Number(raw)
  }
  return raw
}

/**
 * Parses a `--set` expression such as `backend.replicaCount=2,ingress.enabled=true`.
 * Commas inside a value are escaped as `\,`.
 */
export function parseSetArgument(expr: string): Array<[string, SetValue]> {
  return expr
    .split(/(?<!\\),/)
    .filter((fragment) => fragment.trim() !== '')
    .map((fragment) => {
      const separator = fragment.indexOf('=')
      if (separator === -1) {
        throw new Error(
          `Invalid set expression '${fragment}'. Expected format: key.path=value`
        )
      }

      const key = fragment.substring(0, separator).trim()
      if (!key) {
        throw new Error(`Invalid set expression '${fragment}': key is empty`)
      }

      const raw = fragment.substring(separator + 1).replace(/\\,/g, ',')
      return [key, coerceSetValue(raw)]
    })
}

/**
 * Applies `--set` expressions to the document. A list index edits the
 * existing item (`backend.env[0].value=x` keeps the item's name) rather than
 * replacing the list the way `helm --set` does.
 */
export function applySetArguments(
  values: ValuesDocument,
  expressions: readonly string[],
  options: MergeOptions = {}
): ValuesDocument {
  const result = cloneDeep(values)

  for (const expr of expressions) {
    for (const [key, value] of parseSetArgument(expr)) {
      if (value === null && !options.keepNulls) {
        unset(result, key)
      } else {
        set(result, key, value)
      }
    }
  }

  return result
}

/**
 * Chart defaults, then each user document in order, then `--set` overrides.
 * A `null` override stays in the result as a `null` entry: the key is removed
 * once the document is merged over subchart defaults ({@link subchartValues})
 * or cleaned with {@link dropNullValues}.
 */
export function composeValues(
  chart: LoadedChart,
  documents: readonly ValuesDocument[] = [],
  setExpressions: readonly string[] = []
): ValuesDocument {
  const merged = documents.reduce<ValuesDocument>(
    (acc, document) => mergeValues(acc, document, { keepNulls: true }),
    chart.values
  )
  return applySetArguments(merged, setExpressions, { keepNulls: true })
}

export interface SubchartInstance {
  chart: LoadedChart
  /** Chart name as the templates see it: the dependency alias when set */
  name: string
  values: ValuesDocument
}

/**
 * Values a subchart instance renders with: its own defaults under the parent's
 * section for it, plus the parent's `global` section. `null` entries in the
 * parent document remove the matching subchart defaults.
 */
export function subchartValues(
  chart: LoadedChart,
  alias: string,
  parentValues: ValuesDocument
): SubchartInstance {
  const dependency = chart.metadata.dependencies?.find(
    (dep) => (dep.alias ?? dep.name) === alias
  )
  if (!dependency) {
    throw new Error(
      `Chart '${chart.metadata.name}' has no dependency named '${alias}'`
    )
  }

  const subchart = chart.subcharts[dependency.name]
  if (!subchart) {
    throw new Error(
      `Subchart '${dependency.name}' for '${alias}' not found in ${chart.path}/charts`
    )
  }

  const section = parentValues[alias]
  const values = mergeValues(
    subchart.values,
    isValuesDocument(section) ? section : {}
  )

  const ownGlobal = isValuesDocument(values.global) ? values.global : {}
  const parentGlobal = isValuesDocument(parentValues.global)
    ? parentValues.global
    : {}
  values.global = mergeValues(ownGlobal, parentGlobal)

  return { chart: subchart, name: alias, values }
}
