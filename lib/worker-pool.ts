/**
 * Bounded-concurrency task runner for per-file batch work.
 *
 * Keeps at most `concurrency` tasks in flight and never lets one task's
 * failure stop the others: every task ends up as a fulfilled or rejected
 * outcome at its input index.
 */

import { availableParallelism } from 'os'
import { toError } from './errors.js'

export type TaskOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: Error }

interface PoolOptions {
  /** Progress callback after each finished task */
  onProgress?: (completed: number, total: number) => void
}

/**
 * Resolves the worker count: a positive request is used as is, 0 means one
 * worker per logical core.
 */
export function resolveConcurrency(threads: number): number {
  if (threads > 0) return threads
  return Math.max(1, availableParallelism())
}

/**
 * Runs `task` over `items` with at most `concurrency` in flight.
 *
 * @example
 * const outcomes = await runPool(files, 4, file => processFile(file))
 * const failed = outcomes.filter(o => o.status === 'rejected').length
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
  options: PoolOptions = {}
): Promise<Array<TaskOutcome<R>>> {
  const outcomes: Array<TaskOutcome<R>> = new Array(items.length)
  const workerCount = Math.max(1, Math.min(concurrency, items.length))
  let next = 0
  let completed = 0

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++
      try {
        outcomes[index] = { status: 'fulfilled', value: await task(items[index], index) }
      } catch (error) {
        outcomes[index] = { status: 'rejected', reason: toError(error) }
      }
      completed++
      options.onProgress?.(completed, items.length)
    }
  }

  const workers: Array<Promise<void>> = []
  for (let i = 0; i < workerCount; i++) {
    workers.push(worker())
  }
  await Promise.all(workers)

  return outcomes
}
