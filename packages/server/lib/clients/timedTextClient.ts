import fetch from 'node-fetch';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { CaptionSegment } from '@transcript-relay/shared';
import { createLogger, type Logger } from '../logger.js';
import { decodeCaptionText, joinCaptionText } from '../youtube/captionText.js';
import { DEFAULT_TIMEDTEXT_BASE_URL } from '../../config/transcriptServiceConfig.js';

/**
 * Configuration for the TimedTextClient
 */
export interface TimedTextClientConfig {
  baseUrl?: string;
  timeout?: number;
  userAgent?: string;
  logger?: Logger;
}

export type TimedTextUnavailableReason =
  | 'http_status'
  | 'empty_body'
  | 'malformed_xml'
  | 'no_text'
  | 'timeout'
  | 'network_error';

/**
 * Result of one caption XML request; failures never throw
 */
export type TimedTextResult =
  | { kind: 'found'; text: string; segments: CaptionSegment[] }
  | { kind: 'unavailable'; reason: TimedTextUnavailableReason; detail?: string };

export interface TimedTextProvider {
  fetchTimedText(videoId: string, lang: string, tlang?: string): Promise<TimedTextResult>;
}

const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36';

/**
 * Client for YouTube's caption XML endpoint (`/api/timedtext`)
 *
 * Sends browser-like headers, aborts after the configured timeout and parses
 * the `text` children of the document root in order. A missing track shows up
 * as a non-200 status or an empty body, so every failure is reported as
 * `unavailable` for the caller to try the next language.
 *
 * Usage:
 * ```typescript
 * const client = new TimedTextClient({ timeout: 5000 });
 * const result = await client.fetchTimedText('dQw4w9WgXcQ', 'auto', 'en');
 * if (result.kind === 'found') {
 *   console.log(result.text);
 * }
 * ```
 */
export class TimedTextClient implements TimedTextProvider {
  private readonly config: Required<Omit<TimedTextClientConfig, 'logger'>>;
  private readonly logger: Logger;
  private readonly parser: XMLParser;

  constructor(config: TimedTextClientConfig = {}) {
    this.config = {
      baseUrl: config.baseUrl ?? DEFAULT_TIMEDTEXT_BASE_URL,
      timeout: config.timeout ?? 10000, // 10 seconds
      userAgent: config.userAgent ?? BROWSER_USER_AGENT,
    };
    this.logger = config.logger ?? createLogger();

    // Caption bodies stay raw: inline markup is stripped and entities decoded afterwards
    this.parser = new XMLParser({
      ignoreAttributes: false,
      attributeNamePrefix: '@_',
      textNodeName: '#text',
      alwaysCreateTextNode: true,
      ignoreDeclaration: true,
      ignorePiTags: true,
      parseTagValue: false,
      processEntities: false,
      isArray: (tagName: string) => tagName === 'text',
      stopNodes: ['*.text'],
    });
  }

  /**
   * Build the request URL for a caption track
   * @param tlang - Optional target language for YouTube's machine translation
   */
  buildUrl(videoId: string, lang: string, tlang?: string): string {
    const url = new URL(this.config.baseUrl);
    url.searchParams.set('v', videoId);
    url.searchParams.set('lang', lang);
    if (tlang) {
      url.searchParams.set('tlang', tlang);
    }
    return url.toString();
  }

  async fetchTimedText(videoId: string, lang: string, tlang?: string): Promise<TimedTextResult> {
    const url = this.buildUrl(videoId, lang, tlang);
    const startTime = Date.now();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    let body: string;
    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: {
          'User-Agent': this.config.userAgent,
          'Accept-Language': 'en-US,en;q=0.9',
          'Referer': 'https://www.youtube.com/',
        },
      });

      if (response.status !== 200) {
        return this.unavailable(videoId, lang, 'http_status', `HTTP ${response.status}`);
      }

      body = await response.text();
    } catch (fetchError) {
      if (fetchError instanceof Error && fetchError.name === 'AbortError') {
        return this.unavailable(videoId, lang, 'timeout', `No response within ${this.config.timeout}ms`);
      }
      const detail = fetchError instanceof Error ? fetchError.message : String(fetchError);
      return this.unavailable(videoId, lang, 'network_error', detail);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!body.trim()) {
      return this.unavailable(videoId, lang, 'empty_body');
    }

    const segments = this.parseSegments(body);
    if (segments === null) {
      return this.unavailable(videoId, lang, 'malformed_xml');
    }

    const text = joinCaptionText(segments);
    if (!text) {
      return this.unavailable(videoId, lang, 'no_text');
    }

    this.logger.info('timedtext', 'Caption XML retrieved', {
      video_id: videoId,
      duration_ms: Date.now() - startTime,
      metadata: { lang, tlang, segment_count: segments.length }
    });

    return { kind: 'found', text, segments };
  }

  /**
   * Parse caption XML into segments
   * @returns Segments in document order, or null when the XML is malformed
   */
  parseSegments(xml: string): CaptionSegment[] | null {
    if (XMLValidator.validate(xml) !== true) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = this.parser.parse(xml);
    } catch (error) {
      this.logger.warn('timedtext', 'Caption XML parse failed', {
        error: error instanceof Error ? error.message : String(error)
      });
      return null;
    }

    if (!isRecord(parsed)) {
      return null;
    }

    // The root element's name varies (`transcript`, `timedtext`); only its direct `text` children count
    const root = Object.values(parsed)[0];
    const nodes = isRecord(root) && Array.isArray(root.text) ? root.text : [];

    const segments: CaptionSegment[] = [];
    for (const node of nodes) {
      if (!isRecord(node) || typeof node['#text'] !== 'string') continue;
      const text = decodeCaptionText(stripInlineMarkup(node['#text']));
      if (!text) continue;
      segments.push({
        text,
        startMs: secondsToMs(node['@_start']),
        durationMs: secondsToMs(node['@_dur']),
      });
    }
    return segments;
  }

  private unavailable(
    videoId: string,
    lang: string,
    reason: TimedTextUnavailableReason,
    detail?: string
  ): TimedTextResult {
    this.logger.warn('timedtext', 'Caption XML unavailable', {
      video_id: videoId,
      metadata: { lang, reason, detail }
    });
    return { kind: 'unavailable', reason, detail };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// `<font>`, `<i>` and similar wrappers inside a caption
function stripInlineMarkup(raw: string): string {
  return raw.replace(/<[^>]*>/g, '');
}

function secondsToMs(value: unknown): number {
  const seconds = typeof value === 'string' ? Number(value) : NaN;
  return Number.isFinite(seconds) ? Math.round(seconds * 1000) : 0;
}
