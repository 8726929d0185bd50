/**
 * Run `fn`, expecting it to throw an instance of `type`, and return the error.
 */
export function captureError<T>(fn: () => unknown, type: new (...args: never[]) => T): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}
