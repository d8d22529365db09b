// Re-export all shared types
export * from './transcript.js';
export * from './api.js';
