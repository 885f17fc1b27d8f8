/**
 * Pulls the text out of an assistant message's content. Returns `null` when
 * nothing textual can be recovered; callers decide what absence means.
 */
export function extractText(content: unknown): string | null {
  if (typeof content === 'string') return content;
  if (content === null || content === undefined) return null;
  if (typeof content === 'number' || typeof content === 'boolean' || typeof content === 'bigint') {
    return String(content);
  }
  if (Array.isArray(content)) {
    const parts = content.map(textOfPart).filter((p): p is string => p !== null);
    return parts.length > 0 ? parts.join('') : null;
  }
  try {
    const encoded: string | undefined = JSON.stringify(content);
    return encoded ?? null;
  } catch {
    return null;
  }
}

// Message content parts look like { type: 'text', text: '...' }; images and tool calls carry no text.
function textOfPart(part: unknown): string | null {
  if (typeof part === 'string') return part;
  if (typeof part === 'object' && part !== null && 'text' in part && typeof part.text === 'string') {
    return part.text;
  }
  return null;
}
