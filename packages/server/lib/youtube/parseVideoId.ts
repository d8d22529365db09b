// `v=<id>` (watch URLs) or `youtu.be/<id>` (share links), searched anywhere in the input
const VIDEO_ID_PATTERN = /(?:v=|youtu\.be\/)([0-9A-Za-z_-]{11})/;

/**
 * Extract an 11-character YouTube video id from an arbitrary string.
 *
 * The input is searched, not validated: anything that contains `v=<id>` or
 * `youtu.be/<id>` yields the first such id. Returns `null` when nothing matches.
 */
export function parseVideoId(input: string): string | null {
  const match = VIDEO_ID_PATTERN.exec(input);
  return match?.[1] ?? null;
}
