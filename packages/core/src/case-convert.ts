/**
 * Case conversion utilities (snake_case ↔ camelCase)
 *
 * Glance payloads and the YAML config use snake_case field names
 * (`min_ram`, `scratch_dir`); TypeScript code uses camelCase.
 */

import type { CamelCasedPropertiesDeep, SnakeCasedPropertiesDeep } from 'type-fest'

export function snakeToCamel(str: string): string {
  return str.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase())
}

export function camelToSnake(str: string): string {
  return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`)
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function convertKeys(value: unknown, convert: (key: string) => string): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => convertKeys(item, convert))
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {}
    for (const [key, inner] of Object.entries(value)) {
      result[convert(key)] = convertKeys(inner, convert)
    }
    return result
  }
  return value
}

/**
 * Recursively convert object keys from snake_case to camelCase.
 * Keys of user-defined maps (store names) are converted too, so callers
 * convert only objects whose keys are all field names.
 */
export function snakeToCamelDeep<T>(obj: T): CamelCasedPropertiesDeep<T> {
  return convertKeys(obj, snakeToCamel) as CamelCasedPropertiesDeep<T>
}

/**
 * Recursively convert object keys from camelCase to snake_case.
 */
export function camelToSnakeDeep<T>(obj: T): SnakeCasedPropertiesDeep<T> {
  return convertKeys(obj, camelToSnake) as SnakeCasedPropertiesDeep<T>
}

export type { CamelCasedPropertiesDeep, SnakeCasedPropertiesDeep }
