import { CollaboratorTimeoutError } from "../errors";

export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number | undefined,
  metadata?: Record<string, unknown>
): Promise<T> {
  if (!ms) return promise;
  let timeoutId: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new CollaboratorTimeoutError("Collaborator call timed out", { ...metadata, timeoutMs: ms }));
        }, ms);
      }),
    ]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}
