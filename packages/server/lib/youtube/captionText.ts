/**
 * Collapse line breaks inside a caption into single spaces
 */
export function flattenCaptionText(text: string): string {
  return text.replace(/\s*\n\s*/g, ' ').trim();
}

/**
 * Decode the entities left in raw caption XML text and flatten line breaks.
 * `&amp;` goes first so double-escaped text (`&amp;#39;`) comes out clean.
 */
export function decodeCaptionText(text: string): string {
  return flattenCaptionText(text
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&apos;/g, "'")
    .replace(/&#x([0-9a-f]+);/gi, (_, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(Number(code))));
}

/**
 * Join segment texts into one transcript, skipping empty segments
 */
export function joinCaptionText(segments: ReadonlyArray<{ text: string }>): string {
  return segments
    .map(segment => segment.text)
    .filter(text => text.length > 0)
    .join(' ');
}
