/**
 * Recursive JSON-shaped values and their structural deep copy.
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonMap

export interface JsonMap {
  [key: string]: JsonValue
}

export function cloneJsonValue(value: JsonValue): JsonValue {
  if (value === null || typeof value !== 'object') {
    return value
  }
  if (Array.isArray(value)) {
    return value.map(cloneJsonValue)
  }
  return cloneJsonMap(value)
}

/**
 * Deep-copy a map. Nested maps and arrays are freshly allocated.
 *
 * Keys become own data properties, so a key such as "__proto__" is copied
 * as data and never touches the copy's prototype.
 */
export function cloneJsonMap(map: JsonMap): JsonMap {
  return Object.fromEntries(
    Object.entries(map).map(([key, value]) => [key, cloneJsonValue(value)])
  )
}
