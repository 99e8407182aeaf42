/**
 * Prototype pattern — public API
 */
export type {
  JobConfigInput,
  JobConfigSnapshot,
  MetadataMap,
  MetadataValue,
  Prototype,
} from './types.js'

export { cloneMetadata, cloneMetadataValue } from './metadata.js'
export { JobConfig } from './jobConfig.js'
export { TemplateStore, JobTemplates } from './templateStore.js'
export { registerJobTemplates, runPrototypeDemo } from './demo.js'
export type { PrototypeDemoResult } from './demo.js'
