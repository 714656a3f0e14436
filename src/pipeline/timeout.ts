import { CapabilityTimeoutError } from "../errors";

/**
 * Race a capability call against a timer. On expiry, `onTimeout` runs (e.g. to abort the
 * underlying request) and the returned promise rejects with CapabilityTimeoutError.
 */
export function withTimeout<T>(
  p: Promise<T>,
  timeoutMs: number,
  label: string,
  onTimeout?: () => void
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout?.();
      reject(new CapabilityTimeoutError(label, timeoutMs));
    }, timeoutMs);
    p.then(
      (v) => {
        clearTimeout(timer);
        resolve(v);
      },
      (e: unknown) => {
        clearTimeout(timer);
        reject(e);
      }
    );
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
