/**
 * HTTP request and response bodies for the transcript relay
 */

import type { FoundTranscriptSource, UnavailableTranscriptSource, TRANSCRIPT_SOURCES } from './transcript.js';

// 200 response; field names are part of the public contract
export interface TranscriptResponse {
  transcript: string
  language_code: string
  source: FoundTranscriptSource
}

// 404 response
export interface TranscriptNotAvailableResponse {
  error: 'Transcript not available'
  source: UnavailableTranscriptSource
}

// 500 response
export interface ServerErrorResponse {
  error: string
  source: typeof TRANSCRIPT_SOURCES.SERVER_ERROR
}

// Unmatched route
export interface NotFoundResponse {
  error: string
  code: 'ENDPOINT_NOT_FOUND'
}
