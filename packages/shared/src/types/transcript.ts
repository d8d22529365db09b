/**
 * Transcript types for YouTube caption lookups
 * Shared by the relay service and any client consuming its responses
 */

/**
 * Source tags reported with every lookup
 * - YouTubeTranscriptAPI: caption track returned by the transcript library
 * - YouTubeTimedText: caption XML fetched for a language in the priority list
 * - YouTubeTimedTextTranslated: caption XML auto-translated to the target language
 * - YouTubeRequestFailed: every fallback attempt came back empty
 * - ServerError: uncaught exception in the HTTP layer
 */
export const TRANSCRIPT_SOURCES = Object.freeze({
  PRIMARY_API: 'YouTubeTranscriptAPI',
  TIMED_TEXT: 'YouTubeTimedText',
  TIMED_TEXT_TRANSLATED: 'YouTubeTimedTextTranslated',
  EXHAUSTED: 'YouTubeRequestFailed',
  SERVER_ERROR: 'ServerError'
} as const);

// Tags that accompany transcript text
export type FoundTranscriptSource =
  | typeof TRANSCRIPT_SOURCES.PRIMARY_API
  | typeof TRANSCRIPT_SOURCES.TIMED_TEXT
  | typeof TRANSCRIPT_SOURCES.TIMED_TEXT_TRANSLATED;

// Terminal failure of the transcript library, e.g. "Error: fetch failed"
export type LookupErrorSource = `Error: ${string}`;

// Tags that accompany a missing transcript
export type UnavailableTranscriptSource =
  | typeof TRANSCRIPT_SOURCES.EXHAUSTED
  | LookupErrorSource;

// A single timed caption fragment
export interface CaptionSegment {
  text: string;
  startMs: number;
  durationMs: number;
}

/**
 * Outcome of one transcript lookup
 *
 * Text and a success tag only ever travel together: an `unavailable`
 * result has no text and no language.
 */
export type TranscriptLookupResult =
  | { kind: 'found'; text: string; languageCode: string; source: FoundTranscriptSource }
  | { kind: 'unavailable'; source: UnavailableTranscriptSource };

export type FoundTranscript = Extract<TranscriptLookupResult, { kind: 'found' }>;

export function isTranscriptFound(result: TranscriptLookupResult): result is FoundTranscript {
  return result.kind === 'found';
}

export function lookupErrorSource(message: string): LookupErrorSource {
  return `Error: ${message}`;
}
