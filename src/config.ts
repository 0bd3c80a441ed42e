import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Logging
  LOG_LEVEL:          z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:         z.enum(['text', 'json']).default('text'),

  // External tools (resolved through PATH unless absolute)
  OIIOTOOL_BIN:       z.string().min(1).default('oiiotool'),
  FFMPEG_BIN:         z.string().min(1).default('ffmpeg'),
  VIEWER_BIN:         z.string().min(1).default('djv'),

  // Encoding defaults
  DEFAULT_FRAMERATE:  z.coerce.number().positive().default(24),
  DEFAULT_VIDEO_EXT:  z.string().min(1).default('.mov'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${invalid}`);
}

export const env = parsed.data;

// ── Tools ─────────────────────────────────────────────────────────────────────

export const TOOLS = {
  oiiotool: env.OIIOTOOL_BIN,
  ffmpeg:   env.FFMPEG_BIN,
  viewer:   env.VIEWER_BIN,
} as const;

// ── Output defaults ───────────────────────────────────────────────────────────

export const ENCODE_DEFAULTS = {
  framerate: env.DEFAULT_FRAMERATE,
  extension: env.DEFAULT_VIDEO_EXT,
} as const;
