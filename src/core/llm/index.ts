/**
 * Completion service module
 *
 * @module
 */

export type { ILLMService, InferenceOptions, InferenceResult, LLMStats } from "./interfaces/ILLMService.js";
export { APILLMService, type APILLMServiceConfig, type APIProvider } from "./api-llm-service.js";

import type { LLMConfig, RetryConfig } from "../../utils/validation.js";
import { APILLMService } from "./api-llm-service.js";
import type { ILLMService } from "./interfaces/ILLMService.js";

/**
 * Create the completion service named by the configuration
 */
export function createLLMService(config: LLMConfig, retry: RetryConfig): ILLMService {
  return new APILLMService({
    provider: config.provider,
    apiKey: config.apiKey,
    modelId: config.model,
    baseUrl: config.baseUrl,
    maxTokens: config.maxTokens,
    retry,
  });
}
