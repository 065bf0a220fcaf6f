/**
 * Wraps a promise with a timeout.
 * @param p The promise to wrap
 * @param ms Timeout in milliseconds
 * @param label Description for the error message
 * @param onTimeout Builds the rejection; a plain Error by default
 */
export function withTimeout<T>(
  p: Promise<T>,
  ms: number,
  label: string,
  onTimeout: (message: string) => Error = (message) => new Error(message),
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(onTimeout(`${label} timed out after ${ms}ms`));
    }, ms);

    p.then(
      (result) => {
        clearTimeout(timer);
        resolve(result);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
