import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

function optionalList(key: string, fallback: string[]): string[] {
  const val = process.env[key];
  if (!val) return fallback;
  return val
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),

  redis: {
    enabled: optionalBool('REDIS_ENABLED', true),
    url: optional('REDIS_URL', 'redis://localhost:6379'),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'storeassist:'),
  },

  // ───── Sessions ─────
  session: {
    /** 0 keeps sessions until an external retention job removes them */
    ttlDays: optionalInt('SESSION_TTL_DAYS', 0),
    maxMessageLength: optionalInt('SESSION_MAX_MESSAGE_LENGTH', 2000),
    endPhrases: optionalList('SESSION_END_PHRASES', ['exit', 'quit', 'bye', 'goodbye', 'end chat']),
  },

  // ───── Intent classifier ─────
  classifier: {
    provider: optional('CLASSIFIER_PROVIDER', 'auto'),
    historyWindow: optionalInt('CLASSIFIER_HISTORY_WINDOW', 10),
    openaiApiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
    temperature: parseFloat(optional('OPENAI_TEMPERATURE', '0')),
    timeoutMs: optionalInt('OPENAI_TIMEOUT_MS', 15000),
  },

  // ───── Product catalog ─────
  catalog: {
    baseUrl: optional('CATALOG_API_URL', ''),
    timeoutMs: optionalInt('CATALOG_TIMEOUT_MS', 10000),
    maxItems: optionalInt('CATALOG_MAX_ITEMS', 5),
  },

  knowledge: {
    dir: optional('KNOWLEDGE_DIR', path.join(projectRoot, 'knowledge')),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },
} as const;
