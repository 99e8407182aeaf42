/**
 * Prototype Type System
 *
 * Metadata is a recursive value so that cloning can walk it structurally
 * instead of relying on a generic object-graph copy.
 */

import type { JsonMap, JsonValue } from '../../../utils/jsonValue.js'

export type MetadataValue = JsonValue

export type MetadataMap = JsonMap

/**
 * Anything that can produce an independent copy of itself.
 */
export interface Prototype<T> {
  clone(): T
}

export interface JobConfigInput {
  /** Job name, fixed for the lifetime of the config */
  name: string
  /** Retry attempts (non-negative integer) */
  retries: number
  /** Timeout in seconds (positive integer) */
  timeout: number
  /** Free-form metadata; defaults to an empty map */
  metadata?: MetadataMap
}

export interface JobConfigSnapshot {
  name: string
  retries: number
  timeout: number
  metadata: MetadataMap
}
