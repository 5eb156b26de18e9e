/**
 * Completion Service Interface
 *
 * Black-box interface for the external completion (chat) service used by
 * structural extraction and answer synthesis.
 */

/**
 * Options for inference requests
 */
export interface InferenceOptions {
  /** System instructions, sent separately from the user prompt */
  systemPrompt?: string;
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Temperature for sampling (default: 0) */
  temperature?: number;
  /** Ask the provider for a bare JSON object */
  json?: boolean;
}

/**
 * Result of an inference operation
 */
export interface InferenceResult {
  text: string;
  /** Tokens generated (reported by the provider, estimated otherwise) */
  tokensGenerated: number;
  durationMs: number;
  /** Attempts spent, including the successful one */
  attempts: number;
}

export interface LLMStats {
  totalCalls: number;
  failedCalls: number;
  retries: number;
  totalTokens: number;
  avgDurationMs: number;
}

export interface ILLMService {
  readonly isReady: boolean;
  readonly modelId: string;

  initialize(): Promise<void>;

  /**
   * Run inference with the given prompt. Transport failures surface as
   * ServiceError once the retry policy is exhausted.
   */
  infer(prompt: string, options?: InferenceOptions): Promise<InferenceResult>;

  getStats(): LLMStats;

  shutdown(): Promise<void>;
}
