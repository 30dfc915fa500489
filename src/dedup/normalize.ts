/**
 * Reduce a posting to the text that identifies the position: the author bio
 * prefix, link-preview annotations and URLs are dropped, whitespace collapsed.
 */
export function normalizeForDedup(message: string): string {
  return message
    .replace(/^\[Bio:.*?\]\s*/s, '')
    .replace(/\[Linked page -.*?\]/gs, '')
    .replace(/https?:\/\/\S+/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}
