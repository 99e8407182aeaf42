/**
 * Template Store
 *
 * Holds one canonical prototype per key and hands out clones. Callers never
 * see the canonical instance, so mutating a fetched template cannot leak into
 * the store or into other callers' copies.
 *
 * Usage:
 *   const templates = new JobTemplates()
 *   templates.register('fast', new JobConfig({ name: 'fast-job', retries: 1, timeout: 5 }))
 *   const job = templates.get('fast')
 */

import { NotFoundError } from '../../../utils/errors.js'
import { createLogger } from '../../../utils/logger.js'
import type { JobConfig } from './jobConfig.js'
import type { Prototype } from './types.js'

const logger = createLogger('template-store')

export class TemplateStore<T extends Prototype<T>> {
  private readonly templates = new Map<string, T>()

  constructor(private readonly resource: string = 'Template') {}

  /**
   * Store `template` as the canonical instance for `key`, replacing any
   * previous one.
   */
  register(key: string, template: T): void {
    if (this.templates.has(key)) {
      logger.debug('Replacing canonical template', { key })
    }
    this.templates.set(key, template)
  }

  /**
   * Clone the canonical instance for `key`.
   * @throws NotFoundError when nothing is registered under `key`
   */
  get(key: string): T {
    const template = this.templates.get(key)
    if (!template) {
      throw new NotFoundError(this.resource, key, this.keys())
    }
    return template.clone()
  }

  tryGet(key: string): T | null {
    return this.templates.get(key)?.clone() ?? null
  }

  has(key: string): boolean {
    return this.templates.has(key)
  }

  keys(): string[] {
    return [...this.templates.keys()]
  }

  get size(): number {
    return this.templates.size
  }
}

export class JobTemplates extends TemplateStore<JobConfig> {
  constructor() {
    super('Job template')
  }
}
