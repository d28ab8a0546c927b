import merged from 'lodash.merge'

/**
 * Deep-merges `options` over a copy of `defaults`; `undefined` options fall back to the default, sets and regular expressions are replaced whole.
 */
export function merge<T extends object>(options: Partial<T>, defaults: T): T {
  return merged({}, defaults, options)
}
