/**
 * Case conversion utilities for YAML (snake_case) → TypeScript (camelCase)
 *
 * Definition files use snake_case keys. TypeScript code uses camelCase.
 * Conversion is shallow on purpose: nested maps such as `environment` hold
 * user keys that must never be renamed.
 */

import type { CamelCasedProperties } from 'type-fest'

/**
 * Convert a string from snake_case to camelCase
 */
export function snakeToCamel(str: string): string {
  return str.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase())
}

/**
 * Convert top-level object keys from snake_case to camelCase
 */
export function snakeToCamelKeys<T extends object>(obj: T): CamelCasedProperties<T> {
  const result: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(obj)) {
    result[snakeToCamel(key)] = value
  }
  return result as CamelCasedProperties<T>
}
