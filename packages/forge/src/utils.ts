import JSON5 from 'json5';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readString = (value: unknown, key: string): string | undefined => {
  if (!isRecord(value)) return undefined;
  const field = value[key];
  return typeof field === 'string' ? field : undefined;
};

/**
 * Works on errors thrown from another vm realm, where `instanceof Error` is false.
 */
export const extractErrorMessage = (error: unknown, fallback = 'Unknown error'): string => {
  if (error instanceof Error && typeof error.message === 'string' && error.message.length > 0) {
    return error.message;
  }

  if (typeof error === 'string' && error.length > 0) {
    return error;
  }

  const message = readString(error, 'message');
  if (message) return message;

  try {
    return JSON.stringify(error) ?? fallback;
  } catch {
    return fallback;
  }
};

export interface ErrorDescription {
  kind: string;
  message: string;
  trace: string;
}

const constructorName = (value: unknown): string | undefined => {
  if (typeof value !== 'object' || value === null) return undefined;
  const ctor: unknown = value.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : undefined;
};

export const describeError = (error: unknown): ErrorDescription => {
  const kind = readString(error, 'name') ?? constructorName(error) ?? typeof error;
  const message = extractErrorMessage(error, String(error));
  const trace = readString(error, 'stack') ?? `${kind}: ${message}`;
  return { kind, message, trace };
};

export const toStringContent = (content: unknown): string => {
  if (typeof content === 'string') return content;
  if (Array.isArray(content)) {
    const parts: string[] = [];
    for (const item of content) {
      if (typeof item === 'string') parts.push(item);
      else {
        const text = readString(item, 'text') ?? readString(item, 'content');
        if (text) parts.push(text);
      }
    }
    return parts.length > 0 ? parts.join('') : JSON.stringify(content);
  }
  if (isRecord(content)) {
    return readString(content, 'text') ?? readString(content, 'content') ?? JSON.stringify(content);
  }
  return String(content ?? '');
};

const extractFirstJsonObject = (value: string): string | null => {
  const start = value.indexOf('{');
  if (start === -1) return null;
  let depth = 0;
  let inString = false;
  let escape = false;
  let stringDelimiter: string | null = null;
  for (let i = start; i < value.length; i += 1) {
    const ch = value[i];
    if (escape) {
      escape = false;
      continue;
    }
    if (ch === '\\') {
      escape = true;
      continue;
    }
    if (ch === '"' || ch === "'") {
      if (!inString) {
        inString = true;
        stringDelimiter = ch;
      } else if (stringDelimiter === ch) {
        inString = false;
        stringDelimiter = null;
      }
      continue;
    }
    if (inString) continue;
    if (ch === '{') {
      depth += 1;
    } else if (ch === '}') {
      depth -= 1;
      if (depth === 0) {
        return value.slice(start, i + 1);
      }
    }
  }
  return null;
};

/**
 * Parses a JSON object out of model output: strict JSON first, then JSON5, then the first
 * balanced object found in surrounding prose. Returns null when nothing parses to an object.
 */
export function parseJsonObject(raw: string): Record<string, unknown> | null {
  let text = raw.trim();
  if (text.startsWith('```')) {
    text = text
      .replace(/^```(?:json)?/i, '')
      .replace(/```$/i, '')
      .trim();
  }

  const attempts: Array<() => unknown> = [
    () => JSON.parse(text),
    () => JSON5.parse(text),
    () => {
      const firstJson = extractFirstJsonObject(text);
      return firstJson === null ? null : JSON5.parse(firstJson);
    },
  ];

  for (const attempt of attempts) {
    try {
      const parsed = attempt();
      if (isRecord(parsed)) return parsed;
    } catch {
      // next strategy
    }
  }
  return null;
}

export { isRecord };
