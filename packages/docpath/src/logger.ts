/**
 * The subset of `Console` used for diagnostics. Pass `console` to see them.
 */
export type Logger = Pick<Console, "debug" | "warn">

export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
}
