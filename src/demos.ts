/**
 * Demo catalogue: every pattern scenario, runnable by name.
 */

import { NotFoundError } from './utils/errors.js'
import { createLogger } from './utils/logger.js'
import { runPrototypeDemo } from './patterns/creational/prototype/index.js'
import { runAbstractFactoryDemo } from './patterns/creational/abstractFactory/index.js'
import { runFactoryMethodDemo } from './patterns/creational/factoryMethod/index.js'
import { runBuilderDemo } from './patterns/creational/builder/index.js'
import { runSingletonDemo } from './patterns/creational/singleton/index.js'
import { runAdapterDemo } from './patterns/structural/adapter/index.js'

const logger = createLogger('demos')

export const DEMOS = {
  'abstract-factory': runAbstractFactoryDemo,
  builder: runBuilderDemo,
  'factory-method': runFactoryMethodDemo,
  prototype: runPrototypeDemo,
  singleton: runSingletonDemo,
  adapter: runAdapterDemo,
} satisfies Record<string, () => unknown>

export type DemoName = keyof typeof DEMOS

function isDemoName(name: string): name is DemoName {
  return Object.prototype.hasOwnProperty.call(DEMOS, name)
}

export function getDemoNames(): DemoName[] {
  return Object.keys(DEMOS).filter(isDemoName)
}

/**
 * Run the named demos in catalogue order, or all of them when `names` is
 * empty. Unknown names are rejected before anything runs.
 */
export function runDemos(names: string[] = []): DemoName[] {
  for (const name of names) {
    if (!isDemoName(name)) {
      throw new NotFoundError('Demo', name, getDemoNames())
    }
  }

  const selected = getDemoNames().filter((name) => names.length === 0 || names.includes(name))
  for (const name of selected) {
    logger.info(`Running ${name} demo`)
    DEMOS[name]()
  }
  return selected
}
