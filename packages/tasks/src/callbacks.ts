/**
 * Run every step even when some throw, then rethrow what failed.
 * One failure is rethrown as is; several become an AggregateError.
 */
export function runEach(steps: Array<() => void>): void {
  const failures: Array<unknown> = []

  for (const step of steps) {
    try {
      step()
    } catch (error) {
      failures.push(error)
    }
  }

  if (failures.length === 1) {
    throw failures[0]
  }
  if (failures.length > 1) {
    throw new AggregateError(failures, `${failures.length} callbacks failed`)
  }
}
