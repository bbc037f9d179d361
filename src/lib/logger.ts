/**
 * Anything console-shaped. Engines only log when one is passed in;
 * the practice store falls back to `console`.
 */
export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>

const noop = () => undefined

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
}
