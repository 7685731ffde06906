const CHARS_PER_TOKEN = 4;

export function approximateTokenCount(text: string): number {
  if (!text) {
    return 0;
  }
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function countTokens(text: string): number {
  const collapsed = collapseWhitespace(text);
  return collapsed ? collapsed.split(' ').length : 0;
}

/** Keeps the head of `text` that fits in `maxTokens`; the overflow is dropped. */
export function truncateToTokens(text: string, maxTokens: number): string {
  if (approximateTokenCount(text) <= maxTokens) {
    return text;
  }
  return text.slice(0, maxTokens * CHARS_PER_TOKEN).trimEnd();
}
