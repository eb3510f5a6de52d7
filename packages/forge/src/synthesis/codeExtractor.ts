const FENCED_BLOCK = /```[ \t]*([\w+-]*)[^\n]*\n([\s\S]*?)```/g;
const SOURCE_LANGUAGES = new Set(['', 'js', 'javascript', 'node', 'cjs']);

/**
 * Recovers raw module source from model output. A fenced block tagged as JavaScript (or untagged)
 * wins; otherwise stray fence lines are stripped from the whole text.
 */
export function extractCode(raw: string): string {
  const blocks = Array.from(raw.matchAll(FENCED_BLOCK));
  const sourceBlock = blocks.find((block) => SOURCE_LANGUAGES.has(block[1].toLowerCase()));
  if (sourceBlock) {
    const body = sourceBlock[2].trim();
    return body ? `${body}\n` : '';
  }

  const stripped = raw
    .replace(/^```[\w+-]*[ \t]*$/gm, '')
    .replace(/```/g, '')
    .trim();
  return stripped ? `${stripped}\n` : '';
}
