import { TimeoutError } from "./errors";

/**
 * Reject with TimeoutError if task has not settled after ms (0 disables)
 */
export function withTimeout<T>(
  task: Promise<T>,
  ms: number,
  label: string
): Promise<T> {
  if (ms <= 0) return task;

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(`${label} timed out after ${ms}ms`));
    }, ms);

    task.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}
