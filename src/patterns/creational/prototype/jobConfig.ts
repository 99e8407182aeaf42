import { ValidationError } from '../../../utils/errors.js'
import { cloneMetadata, formatMetadata } from './metadata.js'
import type { JobConfigInput, JobConfigSnapshot, MetadataMap, Prototype } from './types.js'

export class JobConfig implements Prototype<JobConfig> {
  readonly name: string
  readonly retries: number
  readonly timeout: number
  metadata: MetadataMap

  constructor(input: JobConfigInput) {
    if (!Number.isInteger(input.retries) || input.retries < 0) {
      throw new ValidationError('retries', `expected a non-negative integer, got ${input.retries}`)
    }
    if (!Number.isInteger(input.timeout) || input.timeout <= 0) {
      throw new ValidationError('timeout', `expected a positive integer, got ${input.timeout}`)
    }

    this.name = input.name
    this.retries = input.retries
    this.timeout = input.timeout
    this.metadata = input.metadata ?? {}
  }

  clone(): JobConfig {
    return new JobConfig({
      name: this.name,
      retries: this.retries,
      timeout: this.timeout,
      metadata: cloneMetadata(this.metadata),
    })
  }

  toJSON(): JobConfigSnapshot {
    return {
      name: this.name,
      retries: this.retries,
      timeout: this.timeout,
      metadata: cloneMetadata(this.metadata),
    }
  }

  toString(): string {
    return (
      `JobConfig(name='${this.name}', retries=${this.retries}, ` +
      `timeout=${this.timeout}, metadata=${formatMetadata(this.metadata)})`
    )
  }
}
