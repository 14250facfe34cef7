import { APICallError, embedMany, type EmbeddingModel } from "ai";
import { createAzure } from "@ai-sdk/azure";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import type { EmbeddingProviderConfig } from "./config.js";

/**
 * The remote embedding capability: text in, one fixed-length vector per text out.
 */
export interface EmbeddingProvider {
  /** Identifier of the model producing the vectors, for logs. */
  readonly modelId: string;
  embedBatch(texts: string[]): Promise<number[][]>;
}

/**
 * Builds the AI SDK embedding model named by the configuration.
 * The API key is taken from the configuration value, never from the environment directly.
 */
export function createEmbeddingModel(config: EmbeddingProviderConfig): EmbeddingModel<string> {
  if (config.type === "azure") {
    const azure = createAzure({
      resourceName: config.resourceName,
      apiKey: config.apiKey,
      apiVersion: config.apiVersion,
    });
    return azure.textEmbeddingModel(config.model);
  }

  const provider = createOpenAICompatible({
    name: config.name,
    baseURL: config.baseURL,
    apiKey: config.apiKey,
  });
  return provider.textEmbeddingModel(config.model);
}

/**
 * {@link EmbeddingProvider} backed by the AI SDK's `embedMany`.
 * The SDK's built-in retries are turned off; callers apply their own retry policy.
 */
export class AiSdkEmbeddingProvider implements EmbeddingProvider {
  /**
   * @param embeddingModel The AI SDK embedding model instance.
   * @param timeoutMs Upper bound for a single request; 0 disables the bound.
   */
  constructor(
    private readonly embeddingModel: EmbeddingModel<string>,
    private readonly timeoutMs: number = 30_000
  ) {}

  get modelId(): string {
    return this.embeddingModel.modelId;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const { embeddings } = await embedMany({
      model: this.embeddingModel,
      values: texts,
      maxRetries: 0,
      abortSignal: this.timeoutMs > 0 ? AbortSignal.timeout(this.timeoutMs) : undefined,
    });
    return embeddings;
  }
}

const NETWORK_ERROR_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EAI_AGAIN", "UND_ERR_SOCKET"]);

const hasNetworkCode = (error: unknown): boolean =>
  error instanceof Error && "code" in error && typeof error.code === "string" && NETWORK_ERROR_CODES.has(error.code);

/**
 * Classifies a provider failure: rate limits, timeouts, 5xx responses and dropped
 * connections are transient; authentication failures and malformed requests are not.
 */
export function isTransientEmbeddingError(error: Error): boolean {
  if (APICallError.isInstance(error)) {
    return error.isRetryable;
  }
  if (error.name === "TimeoutError" || hasNetworkCode(error)) {
    return true;
  }
  // undici reports dropped connections as `TypeError: fetch failed` with the socket error as cause
  if (error instanceof TypeError && error.message === "fetch failed") {
    return true;
  }
  return hasNetworkCode(error.cause);
}
