import { TRANSCRIPT_SOURCES, type FoundTranscript } from '@transcript-relay/shared';
import type { CaptionTrackProvider, CaptionTrackResult } from '../clients/youtubeTranscriptClient.js';
import type { TimedTextProvider } from '../clients/timedTextClient.js';
import { joinCaptionText } from '../youtube/captionText.js';

/**
 * Outcome of one retrieval strategy
 *
 * - success: stop, this is the transcript
 * - empty: nothing here, move on to the next strategy
 * - failed: unrecognised upstream failure, stop the chain
 */
export type StrategyOutcome =
  | { status: 'success'; transcript: FoundTranscript }
  | { status: 'empty'; reason: string }
  | { status: 'failed'; message: string };

export interface TranscriptStrategy {
  readonly name: string;
  attempt(videoId: string): Promise<StrategyOutcome>;
}

/**
 * Primary strategy: caption tracks through the transcript library
 */
export class CaptionApiStrategy implements TranscriptStrategy {
  readonly name = 'caption_api';

  constructor(
    private readonly provider: CaptionTrackProvider,
    private readonly languages: readonly string[]
  ) {}

  async attempt(videoId: string): Promise<StrategyOutcome> {
    let result: CaptionTrackResult;
    try {
      result = await this.provider.fetchTranscript(videoId, this.languages);
    } catch (error) {
      return { status: 'failed', message: error instanceof Error ? error.message : String(error) };
    }

    if (result.kind !== 'found') {
      return { status: 'empty', reason: `${result.kind}: ${result.message}` };
    }

    const text = joinCaptionText(result.segments);
    if (!text) {
      return { status: 'empty', reason: 'caption track has no text' };
    }

    return {
      status: 'success',
      transcript: { kind: 'found', text, languageCode: result.languageCode, source: TRANSCRIPT_SOURCES.PRIMARY_API },
    };
  }
}

/**
 * First fallback: caption XML for each language in priority order
 */
export class TimedTextLanguageStrategy implements TranscriptStrategy {
  readonly name = 'timedtext';

  constructor(
    private readonly provider: TimedTextProvider,
    private readonly languages: readonly string[]
  ) {}

  async attempt(videoId: string): Promise<StrategyOutcome> {
    for (const language of this.languages) {
      const result = await this.provider.fetchTimedText(videoId, language);
      if (result.kind === 'found') {
        return {
          status: 'success',
          transcript: { kind: 'found', text: result.text, languageCode: language, source: TRANSCRIPT_SOURCES.TIMED_TEXT },
        };
      }
    }
    return { status: 'empty', reason: `no caption XML in: ${this.languages.join(', ')}` };
  }
}

/**
 * Last fallback: YouTube's machine translation of the auto-detected track
 */
export class TranslatedTimedTextStrategy implements TranscriptStrategy {
  readonly name = 'timedtext_translated';

  constructor(
    private readonly provider: TimedTextProvider,
    private readonly targetLanguage: string,
    private readonly sourceLanguage: string = 'auto'
  ) {}

  async attempt(videoId: string): Promise<StrategyOutcome> {
    const result = await this.provider.fetchTimedText(videoId, this.sourceLanguage, this.targetLanguage);
    if (result.kind !== 'found') {
      return { status: 'empty', reason: `no translated caption XML (${result.reason})` };
    }
    return {
      status: 'success',
      transcript: {
        kind: 'found',
        text: result.text,
        languageCode: `${this.sourceLanguage}→${this.targetLanguage}`,
        source: TRANSCRIPT_SOURCES.TIMED_TEXT_TRANSLATED,
      },
    };
  }
}
