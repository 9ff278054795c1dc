import { errorMessage } from "../errors.js";

/**
 * Wrap a command action: failures are printed as `❌ <message>` on stderr and
 * turn into exit code 1 instead of an unhandled rejection.
 */
export function withErrorBoundary<A extends unknown[]>(
  fn: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      console.error(`❌ ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  };
}
