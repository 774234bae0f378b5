/**
 * Wrap an async shutdown for use as a signal or event listener.
 * A rejection goes to `onFailure` instead of becoming unhandled.
 */
export function toShutdownListener<T extends unknown[]>(
  shutdown: (...args: T) => Promise<void>,
  onFailure: (error: unknown) => void,
): (...args: T) => void {
  return (...args) => {
    shutdown(...args).catch(onFailure);
  };
}
