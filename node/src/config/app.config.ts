/** App configuration, parsed once from the environment. */
import path from 'path';
import { z } from 'zod';

const numberFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  PORT: numberFromEnv(4000),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.coerce.number().int().min(0).max(6).default(3),
  OPENAI_API_KEY: z.string().min(1).optional(),
  LLM_MODEL_SMALL: z.string().default('gpt-4o-mini'),
  LLM_MODEL_MAIN: z.string().default('gpt-4.1-mini'),
  LLM_TIMEOUT_MS: numberFromEnv(2500),
  LLM_MAX_RETRIES: numberFromEnv(1),
  SHARD_TIMEOUT_MS: numberFromEnv(1500),
  TURN_TIMEOUT_MS: numberFromEnv(8000),
  SESSION_TTL_MINUTES: numberFromEnv(30),
  MAX_SESSIONS: numberFromEnv(1000),
  SHARD_MANIFEST: z.string().default('node/data/shards/manifest.json'),
  CATALOG_PATH: z.string().default('node/data/catalog.json'),
  PERSONA_PATH: z.string().default('node/data/personas.json'),
  LEXICON_PATH: z.string().default('node/data/lexicon.json'),
  RECOMMENDER_CONFIG: z.string().default('node/config/recommender.json'),
  EMBEDDER: z.enum(['hash', 'openai']).default('hash'),
  CORS_ORIGIN: z.string().optional(),
});

export type AppEnv = z.infer<typeof envSchema>;

function resolveFromCwd(p: string): string {
  return path.isAbsolute(p) ? p : path.resolve(process.cwd(), p);
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    corsOrigins: parsed.CORS_ORIGIN?.split(',') ?? ['http://localhost:3000'],
    llm: {
      apiKey: parsed.OPENAI_API_KEY,
      smallModel: parsed.LLM_MODEL_SMALL,
      mainModel: parsed.LLM_MODEL_MAIN,
      timeoutMs: parsed.LLM_TIMEOUT_MS,
      maxRetries: parsed.LLM_MAX_RETRIES,
    },
    retrieval: {
      shardTimeoutMs: parsed.SHARD_TIMEOUT_MS,
      manifestPath: resolveFromCwd(parsed.SHARD_MANIFEST),
      embedder: parsed.EMBEDDER,
    },
    turnTimeoutMs: parsed.TURN_TIMEOUT_MS,
    session: {
      ttlMinutes: parsed.SESSION_TTL_MINUTES,
      maxSessions: parsed.MAX_SESSIONS,
    },
    paths: {
      catalog: resolveFromCwd(parsed.CATALOG_PATH),
      personas: resolveFromCwd(parsed.PERSONA_PATH),
      lexicon: resolveFromCwd(parsed.LEXICON_PATH),
      recommender: resolveFromCwd(parsed.RECOMMENDER_CONFIG),
    },
  };
}

export type AppConfig = ReturnType<typeof loadAppConfig>;

export const appConfig: AppConfig = loadAppConfig();
