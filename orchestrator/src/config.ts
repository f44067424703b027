import { config as loadEnv } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';

// Load .env from the working directory, falling back to the parent (workspace root)
const envPaths = [
  resolve(process.cwd(), '.env'),
  resolve(process.cwd(), '../.env')
];

let loaded = false;
for (const envPath of envPaths) {
  const result = loadEnv({ path: envPath });
  if (!result.error) {
    console.log(`[config] Loaded .env from: ${envPath}`);
    loaded = true;
    break;
  }
}

if (!loaded && process.env.NODE_ENV !== 'test') {
  console.warn(`[config] Could not load .env. Tried paths:`, envPaths);
}

function booleanFlag(fallback: boolean) {
  return z.preprocess(
    (val) => {
      if (val === undefined || val === null) return fallback;
      if (typeof val === 'boolean') return val;
      if (typeof val === 'string') {
        const lower = val.toLowerCase().trim();
        return lower === 'true' || lower === '1';
      }
      return fallback;
    },
    z.boolean()
  );
}

const schema = z.object({
  GENERATION_API_URL: z.string().url().default('https://api.seedance.example.com/v1'),
  GENERATION_API_KEY: z.string().min(1).optional(),
  MOCK_MODE: booleanFlag(true),
  MOCK_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  VIDEO_STORAGE_PATH: z.string().min(1).default('./videos'),
  VIDEO_DURATION_SECONDS: z.coerce.number().int().positive().default(5),
  VIDEO_RESOLUTION: z.string().min(1).default('1080p'),
  GENERATION_TIMEOUT_SECONDS: z.coerce.number().positive().default(300),
  POLL_INTERVAL_SECONDS: z.coerce.number().positive().default(5),
  POLL_MAX_CONSECUTIVE_ERRORS: z.coerce.number().int().positive().optional(),
  REQUEST_TIMEOUT_SECONDS: z.coerce.number().positive().default(60),
  DOWNLOAD_TIMEOUT_SECONDS: z.coerce.number().positive().default(300),
  MONGODB_URI: z.string().min(1).optional(),
  MONGODB_DATABASE: z.string().min(1).default('video_bot'),
  TELEGRAM_BOT_TOKEN: z.string().min(1).optional(),
  TELEGRAM_CHAT_ID: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export type RuntimeConfig = z.infer<typeof schema>;

export function parseRuntimeConfig(source: NodeJS.ProcessEnv): RuntimeConfig {
  // Blank values count as unset so an empty line in .env falls back to the default
  const read = (key: string): string | undefined => {
    const value = source[key]?.trim();
    return value ? value : undefined;
  };

  return schema.parse({
    GENERATION_API_URL: read('GENERATION_API_URL') ?? read('SEEDANCE_API_URL'),
    GENERATION_API_KEY: read('GENERATION_API_KEY') ?? read('SEEDANCE_API_KEY'),
    MOCK_MODE: read('MOCK_MODE'),
    MOCK_DELAY_MS: read('MOCK_DELAY_MS'),
    VIDEO_STORAGE_PATH: read('VIDEO_STORAGE_PATH'),
    VIDEO_DURATION_SECONDS: read('VIDEO_DURATION_SECONDS'),
    VIDEO_RESOLUTION: read('VIDEO_RESOLUTION'),
    GENERATION_TIMEOUT_SECONDS: read('GENERATION_TIMEOUT_SECONDS') ?? read('GENERATION_TIMEOUT'),
    POLL_INTERVAL_SECONDS: read('POLL_INTERVAL_SECONDS'),
    POLL_MAX_CONSECUTIVE_ERRORS: read('POLL_MAX_CONSECUTIVE_ERRORS'),
    REQUEST_TIMEOUT_SECONDS: read('REQUEST_TIMEOUT_SECONDS'),
    DOWNLOAD_TIMEOUT_SECONDS: read('DOWNLOAD_TIMEOUT_SECONDS'),
    MONGODB_URI: read('MONGODB_URI'),
    MONGODB_DATABASE: read('MONGODB_DATABASE'),
    TELEGRAM_BOT_TOKEN: read('TELEGRAM_BOT_TOKEN'),
    TELEGRAM_CHAT_ID: read('TELEGRAM_CHAT_ID') ?? read('ADMIN_USER_ID'),
    LOG_LEVEL: read('LOG_LEVEL')
  });
}

let runtimeConfig: RuntimeConfig;
try {
  runtimeConfig = parseRuntimeConfig(process.env);
} catch (error) {
  if (error instanceof z.ZodError) {
    const invalidFields = error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    console.error(`[config] Configuration validation failed: ${invalidFields}`);
    console.error(`[config] Please check your .env file. Loaded from paths:`, envPaths);
  }
  throw error;
}

export { runtimeConfig };
