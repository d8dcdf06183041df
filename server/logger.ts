/**
 * Logging seam. Console by default; tests pass silentLogger.
 */

export type Logger = Pick<Console, "info" | "warn" | "error">;

export const consoleLogger: Logger = console;

const noop = (): void => {};

export const silentLogger: Logger = { info: noop, warn: noop, error: noop };
