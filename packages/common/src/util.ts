export const delay = (ms: number) => new Promise((r) => setTimeout(r, ms));
export const nowIso = () => new Date().toISOString();

export class TimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Races a promise against a timer. The timer is always cleared, so nothing is left
 * pending once the race settles.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Lowercased and trimmed, with runs of whitespace and path separators replaced by underscores and
 * leading dots dropped.
 */
export const normalizeToolName = (name: string) =>
  name
    .trim()
    .toLowerCase()
    .replace(/[\s/\\]+/g, '_')
    .replace(/^\.+/, '');
