/**
 * Timestamped console logging. Call sites tag their component, e.g. `[DebugLoop] ...`.
 */

const stamp = (message: string) => `[${new Date().toISOString()}] ${message}`;

export function log(message: string, ...args: unknown[]): void {
  console.log(stamp(message), ...args);
}

export function logWarn(message: string, ...args: unknown[]): void {
  console.warn(stamp(message), ...args);
}

export function logError(message: string, ...args: unknown[]): void {
  console.error(stamp(message), ...args);
}
