import * as path from "path";
import { InvalidConfigError } from "./errors.js";
import type { ChunkingOptions } from "./chunkOptions.js";
import type { CleanTextOptions } from "./textCleaner.js";

export type EmbeddingProviderConfig =
  | {
      type: "openai-compatible";
      name: string;
      baseURL: string;
      apiKey: string;
      model: string;
    }
  | {
      type: "azure";
      resourceName: string;
      apiVersion?: string;
      apiKey: string;
      model: string;
    };

/**
 * Everything a pipeline run needs, resolved from the environment once at startup.
 */
export interface IndexerConfig {
  provider: EmbeddingProviderConfig;
  /** Width of every vector the model returns and the store accepts. */
  dimensions: number;
  embeddingBatchSize: number;
  embeddingApiDelayMs: number;
  embeddingMaxAttempts: number;
  embeddingRetryInitialDelayMs: number;
  embeddingTimeoutMs: number;
  chunking: ChunkingOptions;
  cleaning: CleanTextOptions;
  /** Directory holding the index and metadata artifacts for this run. */
  storeDir: string;
  /** Course tag written into every chunk's metadata, if any. */
  course?: string;
  logLevel: string;
  logDir: string;
  pdfPaths: string[];
}

type Env = Record<string, string | undefined>;

const optional = (env: Env, name: string): string | undefined => {
  const value = env[name]?.trim();
  return value ? value : undefined;
};

const required = (env: Env, name: string): string => {
  const value = optional(env, name);
  if (value === undefined) {
    throw new InvalidConfigError(`Missing required environment variable: ${name}`);
  }
  return value;
};

const integer = (env: Env, name: string, fallback: number, min: number): number => {
  const raw = optional(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    const expectation = min > 0 ? "a positive integer" : "a non-negative integer";
    throw new InvalidConfigError(`${name} must be ${expectation}, got "${raw}"`);
  }
  return value;
};

const flag = (env: Env, name: string, fallback: boolean): boolean => {
  const raw = optional(env, name);
  if (raw === undefined) {
    return fallback;
  }
  switch (raw.toLowerCase()) {
    case "true":
    case "1":
      return true;
    case "false":
    case "0":
      return false;
    default:
      throw new InvalidConfigError(`${name} must be true or false, got "${raw}"`);
  }
};

// Course names become a directory name
const COURSE_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Reads and validates the indexer configuration.
 * @param env Source of variables; `process.env` after `dotenv.config()` in production.
 * @throws {InvalidConfigError} naming the first offending variable.
 */
export function loadConfig(env: Env = process.env): IndexerConfig {
  const providerType = optional(env, "EMBEDDING_PROVIDER_TYPE") ?? "openai-compatible";
  const apiKey = required(env, "EMBEDDING_PROVIDER_API_KEY");
  const model = optional(env, "EMBEDDING_MODEL") ?? "text-embedding-ada-002";

  let provider: EmbeddingProviderConfig;
  if (providerType === "openai-compatible") {
    provider = {
      type: providerType,
      name: optional(env, "EMBEDDING_PROVIDER_NAME") ?? "openai",
      baseURL: optional(env, "EMBEDDING_PROVIDER_BASE_URL") ?? "https://api.openai.com/v1",
      apiKey,
      model,
    };
  } else if (providerType === "azure") {
    provider = {
      type: providerType,
      resourceName: required(env, "AZURE_RESOURCE_NAME"),
      apiVersion: optional(env, "AZURE_API_VERSION"),
      apiKey,
      model,
    };
  } else {
    throw new InvalidConfigError(
      `Invalid EMBEDDING_PROVIDER_TYPE: ${providerType}. Must be 'openai-compatible' or 'azure'.`
    );
  }

  const course = optional(env, "COURSE");
  if (course !== undefined && !COURSE_PATTERN.test(course)) {
    throw new InvalidConfigError(`COURSE may only contain letters, digits, '-' and '_', got "${course}"`);
  }
  const baseStoreDir = optional(env, "VECTOR_STORE_DIR") ?? path.join("data", "vector_store");

  return {
    provider,
    dimensions: integer(env, "EMBEDDING_DIMENSIONS", 1536, 1),
    embeddingBatchSize: integer(env, "EMBEDDING_BATCH_SIZE", 16, 1),
    embeddingApiDelayMs: integer(env, "EMBEDDING_API_DELAY_MS", 300, 0),
    embeddingMaxAttempts: integer(env, "EMBEDDING_MAX_ATTEMPTS", 3, 1),
    embeddingRetryInitialDelayMs: integer(env, "EMBEDDING_RETRY_INITIAL_DELAY_MS", 1000, 0),
    embeddingTimeoutMs: integer(env, "EMBEDDING_TIMEOUT_MS", 30_000, 0),
    chunking: {
      size: integer(env, "DEFAULT_CHUNK_SIZE", 500, 1),
      overlap: integer(env, "DEFAULT_CHUNK_OVERLAP", 50, 0),
    },
    cleaning: {
      keepAllCharacters: flag(env, "CLEAN_KEEP_ALL_CHARACTERS", false),
    },
    storeDir: course ? path.join(baseStoreDir, course) : baseStoreDir,
    course,
    logLevel: optional(env, "LOG_LEVEL") ?? "info",
    logDir: optional(env, "LOG_DIR") ?? "logs",
    pdfPaths: (optional(env, "PDF_PATHS") ?? "")
      .split(",")
      .map(entry => entry.trim())
      .filter(Boolean),
  };
}
