import { cloneJsonMap, cloneJsonValue } from '../../../utils/jsonValue.js'
import type { MetadataMap, MetadataValue } from './types.js'

export function cloneMetadataValue(value: MetadataValue): MetadataValue {
  return cloneJsonValue(value)
}

/**
 * Deep-copy a metadata map. Nested maps and arrays are freshly allocated.
 */
export function cloneMetadata(metadata: MetadataMap): MetadataMap {
  return cloneJsonMap(metadata)
}

export function formatMetadata(metadata: MetadataMap): string {
  return JSON.stringify(metadata)
}
