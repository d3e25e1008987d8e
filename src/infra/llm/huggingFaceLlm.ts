import { err, ok, type Result } from "neverthrow";
import type {
  GenerationOptions,
  LlmPort,
} from "../../core/ports/outboundPorts";
import type { AppBoundaryError } from "../../core/entities/appError";
import {
  HttpJsonClient,
  type HttpClientError,
} from "../http/httpJsonClient";

export type HuggingFaceLlmOptions = {
  baseUrl: string;
  model: string;
  apiToken: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
  overloadDelayMs: number;
  maxOverloadWaits: number;
};

const pickText = (item: Record<string, unknown>): string => {
  const generated = item.generated_text;
  if (typeof generated === "string" && generated) {
    return generated;
  }

  const text = item.text;
  if (typeof text === "string" && text) {
    return text;
  }

  return "";
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Reads generated text from whichever payload shape the inference API returned.
 * Unknown shapes yield an empty string instead of an error.
 */
export const extractGeneratedText = (payload: unknown): string => {
  if (Array.isArray(payload) && payload.length > 0) {
    const item: unknown = payload[0];
    if (isRecord(item)) {
      return pickText(item);
    }

    if (typeof item === "string") {
      return item;
    }
  }

  if (isRecord(payload)) {
    return pickText(payload);
  }

  return "";
};

/**
 * Text-generation client for the Hugging Face Inference API.
 */
export class HuggingFaceLlm implements LlmPort {
  constructor(
    private readonly options: HuggingFaceLlmOptions,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async generate(
    prompt: string,
    generation: GenerationOptions,
  ): Promise<Result<string, AppBoundaryError>> {
    const response = await this.httpClient.requestJson<unknown>({
      url: `${this.options.baseUrl.replace(/\/+$/, "")}/models/${this.options.model}`,
      method: "POST",
      headers: {
        authorization: `Bearer ${this.options.apiToken}`,
        "content-type": "application/json",
      },
      body: {
        inputs: prompt,
        parameters: {
          temperature: generation.temperature,
          max_new_tokens: generation.maxTokens,
          return_full_text: false,
        },
      },
      timeoutMs: this.options.timeoutMs,
      retries: this.options.maxRetries,
      retryDelayMs: this.options.retryBaseMs,
      backoff: "exponential",
      hold: {
        status: 503,
        delayMs: this.options.overloadDelayMs,
        maxWaits: this.options.maxOverloadWaits,
      },
    });

    if (response.isErr()) {
      return err({
        source: "llm",
        code: this.mapHttpCode(response.error),
        provider: "huggingface",
        message: response.error.message,
        retryable: response.error.retryable,
        httpStatus: response.error.httpStatus,
        cause: response.error.cause,
      });
    }

    return ok(extractGeneratedText(response.value));
  }

  private mapHttpCode(error: HttpClientError): AppBoundaryError["code"] {
    if (error.code === "hold_exhausted") {
      return "model_overloaded";
    }

    if (error.httpStatus === 429) {
      return "rate_limited";
    }

    if (error.httpStatus === 401 || error.httpStatus === 403) {
      return "auth_invalid";
    }

    if (error.code === "timeout") {
      return "timeout";
    }

    if (error.code === "invalid_json") {
      return "invalid_json";
    }

    if (error.code === "transport_error") {
      return "transport_error";
    }

    return "provider_error";
  }
}
