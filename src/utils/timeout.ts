export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  ms: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | null = null;
  try {
    return await Promise.race([
      task(controller.signal),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          const error = onTimeout();
          controller.abort(error);
          reject(error);
        }, ms);
        timer.unref?.();
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
