import {
  YoutubeTranscript,
  YoutubeTranscriptDisabledError,
  YoutubeTranscriptError,
  YoutubeTranscriptNotAvailableError,
  YoutubeTranscriptNotAvailableLanguageError,
} from 'youtube-transcript';
import { createLogger, type Logger } from '../logger.js';
import { flattenCaptionText } from '../youtube/captionText.js';

/**
 * Caption text from the library
 *
 * Timing is left out: the library's offset unit differs between caption
 * formats (seconds for classic XML, milliseconds for srv3).
 */
export interface CaptionTrackSegment {
  text: string;
  languageCode: string;
}

/**
 * Outcome of a caption track lookup through the transcript library
 *
 * - found: a track in one of the requested languages
 * - disabled: the uploader turned captions off
 * - not_found: captions exist, but none in the requested languages
 * - unretrievable: the library gave up for another reason (video unavailable,
 *   captcha wall, empty caption payload)
 *
 * Errors not raised by the library are rethrown to the caller.
 */
export type CaptionTrackResult =
  | { kind: 'found'; languageCode: string; segments: CaptionTrackSegment[] }
  | { kind: 'disabled'; message: string }
  | { kind: 'not_found'; message: string }
  | { kind: 'unretrievable'; message: string };

export interface CaptionTrackProvider {
  fetchTranscript(videoId: string, languages: readonly string[]): Promise<CaptionTrackResult>;
}

/**
 * Client for the `youtube-transcript` library
 *
 * The library takes one language per call, so the priority list is walked in
 * order and the first available track wins. A language-specific miss moves on
 * to the next language; any other library failure ends the lookup.
 */
export class YouTubeTranscriptClient implements CaptionTrackProvider {
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger()) {
    this.logger = logger;
  }

  async fetchTranscript(videoId: string, languages: readonly string[]): Promise<CaptionTrackResult> {
    const startTime = Date.now();

    for (const language of languages) {
      try {
        const rawSegments = await YoutubeTranscript.fetchTranscript(videoId, { lang: language });

        // the library has already decoded entities
        const segments: CaptionTrackSegment[] = rawSegments.map(segment => ({
          text: flattenCaptionText(segment.text),
          languageCode: segment.lang ?? language,
        }));

        this.logger.info('transcript_api', 'Caption track retrieved', {
          video_id: videoId,
          duration_ms: Date.now() - startTime,
          metadata: { language, segment_count: segments.length }
        });

        return {
          kind: 'found',
          languageCode: segments[0]?.languageCode ?? language,
          segments,
        };
      } catch (error) {
        if (error instanceof YoutubeTranscriptNotAvailableLanguageError) {
          this.logger.debug('transcript_api', 'No caption track in language', {
            video_id: videoId,
            metadata: { language }
          });
          continue;
        }
        return this.classifyFailure(videoId, error);
      }
    }

    return {
      kind: 'not_found',
      message: `No transcript found for ${videoId} in: ${languages.join(', ')}`,
    };
  }

  /**
   * Map a library error onto the result union; rethrow anything else
   */
  private classifyFailure(videoId: string, error: unknown): CaptionTrackResult {
    if (error instanceof YoutubeTranscriptDisabledError) {
      this.logger.warn('transcript_api', 'Transcripts disabled for video', { video_id: videoId, error: error.message });
      return { kind: 'disabled', message: error.message };
    }

    if (error instanceof YoutubeTranscriptNotAvailableError) {
      this.logger.warn('transcript_api', 'No transcripts available for video', { video_id: videoId, error: error.message });
      return { kind: 'not_found', message: error.message };
    }

    if (error instanceof YoutubeTranscriptError) {
      this.logger.warn('transcript_api', 'Could not retrieve transcript', { video_id: videoId, error: error.message });
      return { kind: 'unretrievable', message: error.message };
    }

    throw error;
  }
}
