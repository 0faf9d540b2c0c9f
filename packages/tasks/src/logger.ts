/**
 * Logging surface shared by the engine.
 *
 * Components log through `console` by default with a bracketed tag
 * (`[WorkerPool] ...`). Pass `silentLogger` to keep tests quiet.
 */

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>

const noop = () => {}

export const silentLogger: Logger = {
  log: noop,
  warn: noop,
  error: noop,
}
