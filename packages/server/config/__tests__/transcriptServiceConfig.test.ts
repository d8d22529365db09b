/**
 * Unit Tests for Transcript Service Configuration
 *
 * Covers defaults, environment overrides, and validation errors.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  getTranscriptServiceConfig,
  getConfigSummary,
  DEFAULT_TRANSCRIPT_LANGUAGES,
} from '../transcriptServiceConfig.js';

// Store original environment variables for restoration
let originalEnv: NodeJS.ProcessEnv;

describe('Transcript Service Configuration', () => {
  beforeEach(() => {
    originalEnv = { ...process.env };

    delete process.env.PORT;
    delete process.env.HOST;
    delete process.env.TIMEDTEXT_BASE_URL;
    delete process.env.TIMEDTEXT_TIMEOUT_MS;
    delete process.env.TRANSCRIPT_LANGUAGES;
    delete process.env.TRANSCRIPT_TRANSLATION_TARGET;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('Default Configuration', () => {
    it('should return default values when no environment variables are set', () => {
      const config = getTranscriptServiceConfig();

      expect(config).toEqual({
        port: 8080,
        host: '0.0.0.0',
        timedTextBaseUrl: 'https://www.youtube.com/api/timedtext',
        timedTextTimeoutMs: 10000,
        languages: ['en', 'en-US', 'hi', 'fr', 'es', 'de', 'ne', 'zh-Hans', 'zh-Hant'],
        translationTarget: 'en',
      });
    });

    it('should hand out a copy of the default language list', () => {
      const config = getTranscriptServiceConfig();
      config.languages.push('it');

      expect(DEFAULT_TRANSCRIPT_LANGUAGES).toHaveLength(9);
    });
  });

  describe('Environment Variable Parsing', () => {
    it('should parse valid environment variables correctly', () => {
      process.env.PORT = '3001';
      process.env.HOST = '127.0.0.1';
      process.env.TIMEDTEXT_BASE_URL = 'http://localhost:9999/api/timedtext';
      process.env.TIMEDTEXT_TIMEOUT_MS = '2500';
      process.env.TRANSCRIPT_LANGUAGES = ' fr, de ,,pt-BR ';
      process.env.TRANSCRIPT_TRANSLATION_TARGET = 'de';

      const config = getTranscriptServiceConfig();

      expect(config).toEqual({
        port: 3001,
        host: '127.0.0.1',
        timedTextBaseUrl: 'http://localhost:9999/api/timedtext',
        timedTextTimeoutMs: 2500,
        languages: ['fr', 'de', 'pt-BR'],
        translationTarget: 'de',
      });
    });

    it('should fall back to the default host when HOST is blank', () => {
      process.env.HOST = '   ';

      expect(getTranscriptServiceConfig().host).toBe('0.0.0.0');
    });
  });

  describe('Validation', () => {
    it('should reject a non-numeric port', () => {
      process.env.PORT = 'abc';

      expect(() => getTranscriptServiceConfig()).toThrow(
        'Invalid PORT: "abc". Must be a number between 1 and 65535.'
      );
    });

    it('should reject an out-of-range port', () => {
      process.env.PORT = '70000';

      expect(() => getTranscriptServiceConfig()).toThrow('Invalid PORT: "70000"');
    });

    it('should reject a non-http caption endpoint', () => {
      process.env.TIMEDTEXT_BASE_URL = 'ftp://example.com/timedtext';

      expect(() => getTranscriptServiceConfig()).toThrow(
        'Invalid TIMEDTEXT_BASE_URL: "ftp://example.com/timedtext". Must be an http(s) URL.'
      );
    });

    it('should reject an unparseable caption endpoint', () => {
      process.env.TIMEDTEXT_BASE_URL = 'not a url';

      expect(() => getTranscriptServiceConfig()).toThrow('Invalid TIMEDTEXT_BASE_URL');
    });

    it('should reject a timeout below one second', () => {
      process.env.TIMEDTEXT_TIMEOUT_MS = '500';

      expect(() => getTranscriptServiceConfig()).toThrow(
        'Invalid TIMEDTEXT_TIMEOUT_MS: "500". Must be a number between 1000 and 60000.'
      );
    });

    it('should reject a language list with no entries', () => {
      process.env.TRANSCRIPT_LANGUAGES = ' , ,';

      expect(() => getTranscriptServiceConfig()).toThrow(
        'Invalid TRANSCRIPT_LANGUAGES: " , ,". Must list at least one language code.'
      );
    });

    it('should reject malformed language codes', () => {
      process.env.TRANSCRIPT_LANGUAGES = 'en,e n';

      expect(() => getTranscriptServiceConfig()).toThrow(
        'Invalid TRANSCRIPT_LANGUAGES: "e n" is not a language code.'
      );
    });

    it('should reject a malformed translation target', () => {
      process.env.TRANSCRIPT_TRANSLATION_TARGET = 'en_US';

      expect(() => getTranscriptServiceConfig()).toThrow('Invalid TRANSCRIPT_TRANSLATION_TARGET: "en_US"');
    });
  });

  describe('getConfigSummary', () => {
    it('should flatten the configuration for logging', () => {
      const summary = getConfigSummary(getTranscriptServiceConfig());

      expect(summary).toEqual({
        port: 8080,
        host: '0.0.0.0',
        timedtext_base_url: 'https://www.youtube.com/api/timedtext',
        timedtext_timeout_ms: 10000,
        languages: 'en,en-US,hi,fr,es,de,ne,zh-Hans,zh-Hant',
        translation_target: 'en',
      });
    });
  });
});
