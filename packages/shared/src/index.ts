// API endpoints exposed by the relay
export const API_ENDPOINTS = Object.freeze({
  ROOT: '/',
  TRANSCRIPT: '/transcript',
  HEALTH: '/healthz'
} as const);

// Export all types
export * from './types/index.js';
