/**
 * Execution context for work that outlives a request.
 *
 * Handlers pass background promises to waitUntil() and return their
 * response straight away. The context logs any rejection and lets the
 * server wait for outstanding work before it exits.
 */

export interface ExecutionContext {
  waitUntil(promise: Promise<unknown>): void
}

export interface TrackingExecutionContext extends ExecutionContext {
  /** Number of background tasks still running */
  readonly pending: number
  /** Resolves once every task handed over so far has settled */
  drain(): Promise<void>
}

export function createExecutionContext(tag: string): TrackingExecutionContext {
  const tasks = new Set<Promise<void>>()

  return {
    waitUntil(promise: Promise<unknown>): void {
      const task: Promise<void> = promise.then(
        () => undefined,
        (error: unknown) => {
          const errorMessage = error instanceof Error ? error.message : 'Unknown error'
          console.error(`${tag} Background task failed:`, errorMessage)
        }
      )
      tasks.add(task)
      void task.then(() => {
        tasks.delete(task)
      })
    },

    get pending(): number {
      return tasks.size
    },

    async drain(): Promise<void> {
      while (tasks.size > 0) {
        await Promise.all(tasks)
      }
    },
  }
}
