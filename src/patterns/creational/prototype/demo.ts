import { createLogger } from '../../../utils/logger.js'
import { JobConfig } from './jobConfig.js'
import { JobTemplates } from './templateStore.js'

const logger = createLogger('prototype')

export function registerJobTemplates(templates: JobTemplates): void {
  templates.register(
    'fast',
    new JobConfig({ name: 'fast-job', retries: 1, timeout: 5, metadata: { priority: 'high' } })
  )
  templates.register(
    'safe',
    new JobConfig({ name: 'safe-job', retries: 5, timeout: 30, metadata: { priority: 'low' } })
  )
}

export interface PrototypeDemoResult {
  job1: JobConfig
  job2: JobConfig
  job3: JobConfig
}

export function runPrototypeDemo(templates: JobTemplates = new JobTemplates()): PrototypeDemoResult {
  registerJobTemplates(templates)

  const job1 = templates.get('fast')
  const job2 = templates.get('fast')
  const job3 = templates.get('safe')

  job2.metadata['priority'] = 'critical'

  for (const job of [job1, job2, job3]) {
    logger.info(job.toString())
  }

  return { job1, job2, job3 }
}
