import type { CorsOptions } from 'cors';

export function buildCorsOptions(origins: readonly string[]): CorsOptions {
  return {
    origin: [...origins],
    methods: [
      'GET',
      'POST',
      'OPTIONS',
    ],
    allowedHeaders: [
      'Content-Type',
      'Authorization',
      'X-Requested-With',
    ],
  };
}
