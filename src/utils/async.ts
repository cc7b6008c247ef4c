export type JoinResult<T> = { kind: 'settled'; value: T } | { kind: 'timeout' };

/**
 * Waits for `task` up to `timeoutMs`. The task keeps running after a timeout;
 * a rejection that arrives after the deadline is left to the task's owner.
 */
export function joinWithTimeout<T>(task: Promise<T>, timeoutMs: number): Promise<JoinResult<T>> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<JoinResult<T>>((resolve) => {
    timer = setTimeout(() => resolve({ kind: 'timeout' }), Math.max(0, timeoutMs));
  });
  const settled = task.then((value): JoinResult<T> => ({ kind: 'settled', value }));

  return Promise.race([settled, deadline]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}
