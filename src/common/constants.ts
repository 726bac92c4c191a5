/**
 * Environment configuration for the outreach core
 *
 * Environment variables are parsed once with zod into typed groups. Values
 * left unset stay `undefined`: each component owns its DEFAULT_*_CONFIG and
 * the runtime merges defaults < env < explicit overrides.
 */

import { z } from 'zod';

const optionalInt = () => z.coerce.number().int().optional();
const optionalNumber = () => z.coerce.number().optional();
const optionalFlag = () =>
  z
    .enum(['true', 'false'])
    .transform(value => value === 'true')
    .optional();

const envSchema = z.object({
  // Voyage AI embeddings
  VOYAGE_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().optional(),
  EMBEDDING_DIMENSIONS: optionalInt(),
  EMBEDDING_MAX_INPUT_TOKENS: optionalInt(),
  EMBEDDING_TIMEOUT_MS: optionalInt(),
  EMBEDDING_CONCURRENCY: optionalInt(),

  // Anthropic generation
  ANTHROPIC_API_KEY: z.string().optional(),
  CLAUDE_MODEL: z.string().optional(),
  GENERATION_MAX_TOKENS: optionalInt(),
  GENERATION_TEMPERATURE: optionalNumber(),
  GENERATION_TIMEOUT_MS: optionalInt(),
  GENERATION_CONCURRENCY: optionalInt(),

  // Storage backends
  VECTOR_BACKEND: z.enum(['qdrant', 'memory']).default('qdrant'),
  QDRANT_HOST: z.string().default('http://localhost:6333'),
  QDRANT_API_KEY: z.string().optional(),
  QDRANT_COLLECTION_PREFIX: z.string().default('outreach_kb'),
  QDRANT_TIMEOUT_MS: optionalInt(),
  REGISTRY_BACKEND: z.enum(['sqlite', 'memory']).default('sqlite'),
  REGISTRY_DATABASE_PATH: z.string().default('./data/outreach.db'),

  // Chunking
  CHUNK_MAX_TOKENS: optionalInt(),
  CHUNK_OVERLAP_TOKENS: optionalInt(),

  // Retrieval
  RETRIEVAL_TOP_K: optionalInt(),
  RETRIEVAL_TOKEN_BUDGET: optionalInt(),
  RETRIEVAL_MIN_SIMILARITY: optionalNumber(),

  // Prompt + orchestration
  PROMPT_MAX_TOKENS: optionalInt(),
  SPAM_THRESHOLD: optionalNumber(),
  SPAM_RULES_FILE: z.string().optional(),
  READINESS_RULES_FILE: z.string().optional(),

  // Retry policy (transient upstream errors)
  RETRY_ATTEMPTS: optionalInt(),
  RETRY_BASE_DELAY_MS: optionalInt(),
  RETRY_MAX_DELAY_MS: optionalInt(),

  // Query embedding cache
  CACHE_ENABLED: optionalFlag(),
  CACHE_MAX_ENTRIES: optionalInt(),
  CACHE_TTL_MS: optionalInt(),
});

export type RawEnv = z.infer<typeof envSchema>;

/**
 * Grouped environment configuration
 */
export interface EnvConfig {
  voyage: {
    apiKey?: string;
    model?: string;
    dimensions?: number;
    maxInputTokens?: number;
    timeoutMs?: number;
    concurrency?: number;
  };
  anthropic: {
    apiKey?: string;
    model?: string;
    maxTokens?: number;
    temperature?: number;
    timeoutMs?: number;
    concurrency?: number;
  };
  storage: {
    vectorBackend: 'qdrant' | 'memory';
    qdrantHost: string;
    qdrantApiKey?: string;
    collectionPrefix: string;
    qdrantTimeoutMs?: number;
    registryBackend: 'sqlite' | 'memory';
    registryPath: string;
  };
  chunking: { maxTokens?: number; overlapTokens?: number };
  retrieval: { k?: number; tokenBudget?: number; minSimilarity?: number };
  prompt: { maxPromptTokens?: number };
  spam: { threshold?: number; rulesFile?: string };
  readiness: { rulesFile?: string };
  retry: { attempts?: number; baseDelayMs?: number; maxDelayMs?: number };
  cache: { enabled?: boolean; maxEntries?: number; ttlMs?: number };
}

/**
 * Parse environment variables into grouped configuration
 *
 * @throws Error listing every invalid variable
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([name, messages]) => `${name}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment variables: ${problems}`);
  }

  const e = parsed.data;
  return {
    voyage: {
      apiKey: e.VOYAGE_API_KEY,
      model: e.EMBEDDING_MODEL,
      dimensions: e.EMBEDDING_DIMENSIONS,
      maxInputTokens: e.EMBEDDING_MAX_INPUT_TOKENS,
      timeoutMs: e.EMBEDDING_TIMEOUT_MS,
      concurrency: e.EMBEDDING_CONCURRENCY,
    },
    anthropic: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.CLAUDE_MODEL,
      maxTokens: e.GENERATION_MAX_TOKENS,
      temperature: e.GENERATION_TEMPERATURE,
      timeoutMs: e.GENERATION_TIMEOUT_MS,
      concurrency: e.GENERATION_CONCURRENCY,
    },
    storage: {
      vectorBackend: e.VECTOR_BACKEND,
      qdrantHost: e.QDRANT_HOST,
      qdrantApiKey: e.QDRANT_API_KEY,
      collectionPrefix: e.QDRANT_COLLECTION_PREFIX,
      qdrantTimeoutMs: e.QDRANT_TIMEOUT_MS,
      registryBackend: e.REGISTRY_BACKEND,
      registryPath: e.REGISTRY_DATABASE_PATH,
    },
    chunking: {
      maxTokens: e.CHUNK_MAX_TOKENS,
      overlapTokens: e.CHUNK_OVERLAP_TOKENS,
    },
    retrieval: {
      k: e.RETRIEVAL_TOP_K,
      tokenBudget: e.RETRIEVAL_TOKEN_BUDGET,
      minSimilarity: e.RETRIEVAL_MIN_SIMILARITY,
    },
    prompt: { maxPromptTokens: e.PROMPT_MAX_TOKENS },
    spam: { threshold: e.SPAM_THRESHOLD, rulesFile: e.SPAM_RULES_FILE },
    readiness: { rulesFile: e.READINESS_RULES_FILE },
    retry: {
      attempts: e.RETRY_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
    },
    cache: {
      enabled: e.CACHE_ENABLED,
      maxEntries: e.CACHE_MAX_ENTRIES,
      ttlMs: e.CACHE_TTL_MS,
    },
  };
}

/**
 * Merge: defaults < defined override values (undefined never erases a default)
 */
export function mergeDefined<T extends object>(
  defaults: T,
  ...overrides: Array<{ [K in keyof T]?: T[K] | undefined } | undefined>
): T {
  const result = { ...defaults };
  for (const override of overrides) {
    if (!override) continue;
    for (const key in override) {
      const value = override[key];
      if (value !== undefined) {
        result[key] = value;
      }
    }
  }
  return result;
}
