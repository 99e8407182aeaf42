export interface Singleton<T> {
  /** Returns the shared instance, creating it on first use. */
  get(): T
  /** Drops the shared instance so the next get() builds a new one. */
  reset(): void
}

/**
 * Lazily-initialized shared instance behind a single initialization check.
 */
export function createSingleton<T>(factory: () => T): Singleton<T> {
  let instance: { value: T } | null = null

  return {
    get(): T {
      if (!instance) {
        instance = { value: factory() }
      }
      return instance.value
    },
    reset(): void {
      instance = null
    },
  }
}
