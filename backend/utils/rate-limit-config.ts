import type { Options } from 'express-rate-limit';

// Keyed on req.ip, which honours the app's 'trust proxy' setting
export const rateLimitConfig: Partial<Options> = {
  windowMs: 15 * 60 * 1000,
  limit: 30,
  message: { error: "Too many requests. Try again later." },
  standardHeaders: 'draft-8',
  legacyHeaders: false,
};
