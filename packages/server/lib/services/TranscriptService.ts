import {
  TRANSCRIPT_SOURCES,
  lookupErrorSource,
  type TranscriptLookupResult,
} from '@transcript-relay/shared';
import { createLogger, type Logger } from '../logger.js';
import { YouTubeTranscriptClient, type CaptionTrackProvider } from '../clients/youtubeTranscriptClient.js';
import { TimedTextClient, type TimedTextProvider } from '../clients/timedTextClient.js';
import {
  CaptionApiStrategy,
  TimedTextLanguageStrategy,
  TranslatedTimedTextStrategy,
  type TranscriptStrategy,
} from './transcriptStrategies.js';
import type { TranscriptServiceConfig } from '../../config/transcriptServiceConfig.js';

/**
 * What the HTTP layer needs from a transcript source
 */
export interface TranscriptLookup {
  getTranscript(videoId: string): Promise<TranscriptLookupResult>;
}

export interface TranscriptServiceDependencies {
  captionProvider?: CaptionTrackProvider;
  timedTextProvider?: TimedTextProvider;
  logger?: Logger;
}

/**
 * TranscriptService - best-effort transcript lookup for a video
 *
 * Runs an ordered chain of retrieval strategies until one produces text:
 * 1. Caption tracks through the transcript library
 * 2. Caption XML for each configured language
 * 3. Caption XML machine-translated from the auto-detected track
 *
 * `getTranscript` never rejects. Every outcome, including unexpected
 * failures, comes back as a TranscriptLookupResult whose source tag names
 * the stage that produced it.
 */
export class TranscriptService implements TranscriptLookup {
  private readonly strategies: readonly TranscriptStrategy[];
  private readonly logger: Logger;

  constructor(strategies: readonly TranscriptStrategy[], logger: Logger = createLogger()) {
    this.strategies = strategies;
    this.logger = logger;
  }

  /**
   * Build the standard strategy chain from service configuration
   */
  static fromConfig(config: TranscriptServiceConfig, deps: TranscriptServiceDependencies = {}): TranscriptService {
    const logger = deps.logger ?? createLogger();
    const captionProvider = deps.captionProvider ?? new YouTubeTranscriptClient(logger);
    const timedTextProvider = deps.timedTextProvider ?? new TimedTextClient({
      baseUrl: config.timedTextBaseUrl,
      timeout: config.timedTextTimeoutMs,
      logger,
    });

    return new TranscriptService([
      new CaptionApiStrategy(captionProvider, config.languages),
      new TimedTextLanguageStrategy(timedTextProvider, config.languages),
      new TranslatedTimedTextStrategy(timedTextProvider, config.translationTarget),
    ], logger);
  }

  async getTranscript(videoId: string): Promise<TranscriptLookupResult> {
    const startTime = Date.now();

    for (const strategy of this.strategies) {
      try {
        const outcome = await strategy.attempt(videoId);

        if (outcome.status === 'success') {
          this.logger.info('transcript_service', 'Transcript found', {
            video_id: videoId,
            duration_ms: Date.now() - startTime,
            metadata: {
              strategy: strategy.name,
              source: outcome.transcript.source,
              language: outcome.transcript.languageCode,
              characters: outcome.transcript.text.length
            }
          });
          return outcome.transcript;
        }

        if (outcome.status === 'failed') {
          this.logger.error('transcript_service', 'Transcript lookup aborted', {
            video_id: videoId,
            error: outcome.message,
            metadata: { strategy: strategy.name }
          });
          return { kind: 'unavailable', source: lookupErrorSource(outcome.message) };
        }

        this.logger.warn('transcript_service', 'Strategy found nothing, falling back', {
          video_id: videoId,
          metadata: { strategy: strategy.name, reason: outcome.reason }
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error('transcript_service', 'Strategy threw unexpectedly', {
          video_id: videoId,
          error: message,
          metadata: {
            strategy: strategy.name,
            stack_trace: error instanceof Error ? error.stack : undefined
          }
        });
        return { kind: 'unavailable', source: lookupErrorSource(message) };
      }
    }

    this.logger.warn('transcript_service', 'All transcript sources exhausted', {
      video_id: videoId,
      duration_ms: Date.now() - startTime
    });
    return { kind: 'unavailable', source: TRANSCRIPT_SOURCES.EXHAUSTED };
  }
}
