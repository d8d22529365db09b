/**
 * Configuration for the Transcript Relay service
 * Reads and validates environment variables with sensible defaults
 */

export const DEFAULT_TRANSCRIPT_LANGUAGES: readonly string[] = Object.freeze([
  'en',
  'en-US',
  'hi',
  'fr',
  'es',
  'de',
  'ne',
  'zh-Hans',
  'zh-Hant',
]);

export const DEFAULT_TIMEDTEXT_BASE_URL = 'https://www.youtube.com/api/timedtext';

export interface TranscriptServiceConfig {
  /** Port the HTTP server binds to */
  port: number;
  /** Interface the HTTP server binds to */
  host: string;
  /** Caption XML endpoint used by the fallback strategies */
  timedTextBaseUrl: string;
  /** Abort each caption XML request after this many milliseconds */
  timedTextTimeoutMs: number;
  /** Ordered language priority list for every retrieval strategy */
  languages: string[];
  /** Target language of the final translated caption attempt */
  translationTarget: string;
}

const LANGUAGE_CODE_PATTERN = /^[A-Za-z]+(-[A-Za-z]+)*$/;

/**
 * Parse and validate service configuration from environment variables
 * @returns Validated configuration object
 * @throws Error if validation fails
 */
export function getTranscriptServiceConfig(): TranscriptServiceConfig {
  // Parse port with validation
  const port = parseInt(process.env.PORT || '8080', 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid PORT: "${process.env.PORT}". Must be a number between 1 and 65535.`);
  }

  // Parse host (empty string counts as unset)
  const host = process.env.HOST?.trim() || '0.0.0.0';

  // Parse caption endpoint with validation
  const timedTextBaseUrl = process.env.TIMEDTEXT_BASE_URL || DEFAULT_TIMEDTEXT_BASE_URL;
  if (!isHttpUrl(timedTextBaseUrl)) {
    throw new Error(`Invalid TIMEDTEXT_BASE_URL: "${timedTextBaseUrl}". Must be an http(s) URL.`);
  }

  // Parse request timeout with validation
  const timedTextTimeoutMs = parseInt(process.env.TIMEDTEXT_TIMEOUT_MS || '10000', 10);
  if (isNaN(timedTextTimeoutMs) || timedTextTimeoutMs < 1000 || timedTextTimeoutMs > 60000) {
    throw new Error(`Invalid TIMEDTEXT_TIMEOUT_MS: "${process.env.TIMEDTEXT_TIMEOUT_MS}". Must be a number between 1000 and 60000.`);
  }

  // Parse language priority list (default: the built-in nine-language list)
  const languagesEnv = process.env.TRANSCRIPT_LANGUAGES;
  const languages = languagesEnv
    ? languagesEnv.split(',').map(s => s.trim()).filter(s => s.length > 0)
    : [...DEFAULT_TRANSCRIPT_LANGUAGES];
  if (languages.length === 0) {
    throw new Error(`Invalid TRANSCRIPT_LANGUAGES: "${languagesEnv}". Must list at least one language code.`);
  }
  for (const language of languages) {
    if (!LANGUAGE_CODE_PATTERN.test(language)) {
      throw new Error(`Invalid TRANSCRIPT_LANGUAGES: "${language}" is not a language code.`);
    }
  }

  // Parse translation target
  const translationTarget = process.env.TRANSCRIPT_TRANSLATION_TARGET || 'en';
  if (!LANGUAGE_CODE_PATTERN.test(translationTarget)) {
    throw new Error(`Invalid TRANSCRIPT_TRANSLATION_TARGET: "${translationTarget}". Must be a language code.`);
  }

  return {
    port,
    host,
    timedTextBaseUrl,
    timedTextTimeoutMs,
    languages,
    translationTarget,
  };
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Get a human-readable summary of the current configuration
 * Useful for logging at startup
 */
export function getConfigSummary(config: TranscriptServiceConfig): Record<string, unknown> {
  return {
    port: config.port,
    host: config.host,
    timedtext_base_url: config.timedTextBaseUrl,
    timedtext_timeout_ms: config.timedTextTimeoutMs,
    languages: config.languages.join(','),
    translation_target: config.translationTarget,
  };
}
