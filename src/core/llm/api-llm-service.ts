/**
 * API-based Completion Service
 *
 * Chat completions through the OpenAI or Anthropic APIs. Every call runs
 * under the engine's retry policy with a per-attempt timeout; the SDKs' own
 * retries are disabled so the policy is the only one in effect.
 *
 * @module
 */

import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import { createLogger, type Logger } from "../../utils/logger.js";
import { DEFAULT_RETRY_POLICY, retry, timeout, type RetryPolicy } from "../../utils/async.js";
import { ConfigurationError, ErrorCode, isTransientServiceFailure, ServiceError } from "../errors.js";
import type {
  ILLMService,
  InferenceOptions,
  InferenceResult,
  LLMStats,
} from "./interfaces/ILLMService.js";

// =============================================================================
// Types
// =============================================================================

export type APIProvider = "anthropic" | "openai";

export interface APILLMServiceConfig {
  provider: APIProvider;
  apiKey?: string;
  modelId?: string;
  baseUrl?: string;
  /** Default max tokens when a request does not set one */
  maxTokens?: number;
  retry?: RetryPolicy;
}

const DEFAULT_MODELS: Record<APIProvider, string> = {
  anthropic: "claude-3-5-sonnet-latest",
  openai: "gpt-4o",
};

const API_KEY_ENV: Record<APIProvider, string> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
};

interface ProviderReply {
  text: string;
  outputTokens: number | null;
}

// =============================================================================
// API LLM Service
// =============================================================================

export class APILLMService implements ILLMService {
  private readonly provider: APIProvider;
  private readonly apiKey: string;
  private readonly baseUrl?: string;
  private readonly defaultMaxTokens: number;
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;
  private anthropicClient: Anthropic | null = null;
  private openaiClient: OpenAI | null = null;
  private ready = false;

  readonly modelId: string;

  private stats = {
    totalCalls: 0,
    failedCalls: 0,
    retries: 0,
    totalTokens: 0,
    totalDurationMs: 0,
  };

  constructor(config: APILLMServiceConfig) {
    const apiKey = config.apiKey ?? process.env[API_KEY_ENV[config.provider]];
    if (!apiKey) {
      throw new ConfigurationError(
        `API key not found. Set ${API_KEY_ENV[config.provider]} or provide llm.apiKey in config.`,
        ErrorCode.CONFIG_MISSING_CREDENTIALS,
        { provider: config.provider }
      );
    }
    this.provider = config.provider;
    this.apiKey = apiKey;
    this.baseUrl = config.baseUrl;
    this.modelId = config.modelId ?? DEFAULT_MODELS[config.provider];
    this.defaultMaxTokens = config.maxTokens ?? 2048;
    this.policy = config.retry ?? DEFAULT_RETRY_POLICY;
    this.logger = createLogger("llm-service");
  }

  get isReady(): boolean {
    return this.ready;
  }

  async initialize(): Promise<void> {
    if (this.ready) return;

    switch (this.provider) {
      case "anthropic":
        this.anthropicClient = new Anthropic({
          apiKey: this.apiKey,
          baseURL: this.baseUrl,
          maxRetries: 0,
          timeout: this.policy.timeoutMs,
        });
        break;

      case "openai":
        this.openaiClient = new OpenAI({
          apiKey: this.apiKey,
          baseURL: this.baseUrl,
          maxRetries: 0,
          timeout: this.policy.timeoutMs,
        });
        break;
    }

    this.ready = true;
    this.logger.debug({ provider: this.provider, model: this.modelId }, "Completion service initialized");
  }

  async infer(prompt: string, options: InferenceOptions = {}): Promise<InferenceResult> {
    if (!this.ready) {
      throw new ServiceError("Service not initialized. Call initialize() first.", ErrorCode.SERVICE_NOT_READY, {
        service: "completion",
      });
    }

    const startTime = Date.now();
    this.stats.totalCalls++;
    let attempts = 0;

    try {
      const reply = await retry(
        (attempt) => {
          attempts = attempt;
          return timeout(this.request(prompt, options), this.policy.timeoutMs, "Completion request timed out");
        },
        {
          ...this.policy,
          retryIf: isTransientServiceFailure,
          onRetry: (error, attempt) => {
            this.stats.retries++;
            this.logger.warn({ err: error, attempt, model: this.modelId }, "Completion request failed, retrying");
          },
        }
      );

      const durationMs = Date.now() - startTime;
      const tokensGenerated = reply.outputTokens ?? Math.ceil(reply.text.length / 4);
      this.stats.totalTokens += tokensGenerated;
      this.stats.totalDurationMs += durationMs;

      return { text: reply.text, tokensGenerated, durationMs, attempts };
    } catch (error) {
      this.stats.failedCalls++;
      throw new ServiceError(
        `Completion request failed after ${attempts} attempt(s)`,
        isTimeout(error) ? ErrorCode.SERVICE_TIMEOUT : ErrorCode.SERVICE_REQUEST_FAILED,
        { service: "completion", provider: this.provider, model: this.modelId },
        { cause: error }
      );
    }
  }

  private request(prompt: string, options: InferenceOptions): Promise<ProviderReply> {
    switch (this.provider) {
      case "anthropic":
        return this.inferAnthropic(prompt, options);
      case "openai":
        return this.inferOpenAI(prompt, options);
    }
  }

  private async inferAnthropic(prompt: string, options: InferenceOptions): Promise<ProviderReply> {
    if (!this.anthropicClient) {
      throw new Error("Anthropic client not initialized");
    }

    // Anthropic has no JSON mode; the instruction travels in the system prompt
    const system = options.json
      ? [options.systemPrompt, "Respond with a single JSON object and nothing else."].filter(Boolean).join("\n\n")
      : options.systemPrompt;

    const message = await this.anthropicClient.messages.create(
      {
        model: this.modelId,
        max_tokens: options.maxTokens ?? this.defaultMaxTokens,
        temperature: options.temperature ?? 0,
        system,
        messages: [{ role: "user", content: prompt }],
      },
      { timeout: this.policy.timeoutMs }
    );

    const text = message.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");
    return { text, outputTokens: message.usage.output_tokens };
  }

  private async inferOpenAI(prompt: string, options: InferenceOptions): Promise<ProviderReply> {
    if (!this.openaiClient) {
      throw new Error("OpenAI client not initialized");
    }

    const messages: OpenAI.ChatCompletionMessageParam[] = [];
    if (options.systemPrompt) {
      messages.push({ role: "system", content: options.systemPrompt });
    }
    messages.push({ role: "user", content: prompt });

    const response = await this.openaiClient.chat.completions.create(
      {
        model: this.modelId,
        max_tokens: options.maxTokens ?? this.defaultMaxTokens,
        temperature: options.temperature ?? 0,
        messages,
        response_format: options.json ? { type: "json_object" } : undefined,
      },
      { timeout: this.policy.timeoutMs }
    );

    return {
      text: response.choices[0]?.message?.content ?? "",
      outputTokens: response.usage?.completion_tokens ?? null,
    };
  }

  getStats(): LLMStats {
    const succeeded = this.stats.totalCalls - this.stats.failedCalls;
    return {
      totalCalls: this.stats.totalCalls,
      failedCalls: this.stats.failedCalls,
      retries: this.stats.retries,
      totalTokens: this.stats.totalTokens,
      avgDurationMs: succeeded > 0 ? this.stats.totalDurationMs / succeeded : 0,
    };
  }

  async shutdown(): Promise<void> {
    this.anthropicClient = null;
    this.openaiClient = null;
    this.ready = false;
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && /timed? ?out/i.test(`${error.name} ${error.message}`);
}
