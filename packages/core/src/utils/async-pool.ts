/**
 * Run tasks with at most `concurrency` in flight. Results keep task order;
 * a rejected task yields its Error in place of a value so one failure never
 * cancels the rest.
 *
 * `shouldStart` is consulted before each task is picked up; once it returns
 * false no further task starts and the unstarted slots stay `undefined`.
 */
export async function asyncPool<T>(
  concurrency: number,
  tasks: Array<() => Promise<T>>,
  shouldStart: () => boolean = () => true
): Promise<Array<T | Error | undefined>> {
  const limit = Math.max(1, Math.floor(concurrency))
  const results: Array<T | Error | undefined> = new Array(tasks.length).fill(undefined)
  let nextIndex = 0

  const workers = Array.from({ length: Math.min(limit, tasks.length) }, async () => {
    while (nextIndex < tasks.length && shouldStart()) {
      const current = nextIndex
      nextIndex += 1
      const task = tasks[current]
      if (!task) return

      try {
        results[current] = await task()
      } catch (error) {
        results[current] = error instanceof Error ? error : new Error(String(error))
      }
    }
  })

  await Promise.all(workers)
  return results
}
