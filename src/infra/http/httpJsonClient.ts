import { err, ok, type Result } from "neverthrow";
import { sleep as defaultSleep, type SleepFn } from "../../shared/async/sleep";

type HttpMethod = "GET" | "POST";

/**
 * Waits a fixed delay on one specific status without spending a retry attempt.
 */
export type HoldPolicy = {
  status: number;
  delayMs: number;
  maxWaits: number;
};

export type HttpJsonRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  backoff?: "linear" | "exponential";
  hold?: HoldPolicy;
};

export type HttpClientError = {
  code:
    | "timeout"
    | "transport_error"
    | "non_success_status"
    | "invalid_json"
    | "hold_exhausted";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

/**
 * Centralizes HTTP JSON IO so adapters share one timeout/retry/status parsing policy.
 */
export class HttpJsonClient {
  constructor(private readonly sleep: SleepFn = defaultSleep) {}

  /**
   * Executes JSON requests with bounded retries; held statuses wait separately up to their own cap.
   */
  async requestJson<T>(
    request: HttpJsonRequest,
  ): Promise<Result<T, HttpClientError>> {
    const maxAttempts = request.retries + 1;
    let attempt = 1;
    let holds = 0;

    while (attempt <= maxAttempts) {
      const response = await this.performRequest<T>(request);
      if (response.isOk()) {
        return response;
      }

      const failure = response.error;
      const hold = request.hold;
      if (hold && failure.httpStatus === hold.status) {
        if (holds >= hold.maxWaits) {
          return err({
            code: "hold_exhausted",
            message: `HTTP status ${hold.status} persisted after ${holds} waits.`,
            httpStatus: failure.httpStatus,
            retryable: true,
          });
        }

        holds += 1;
        await this.sleep(hold.delayMs);
        continue;
      }

      const hasAttemptsLeft = attempt < maxAttempts;
      if (!failure.retryable || !hasAttemptsLeft) {
        return response;
      }

      await this.sleep(this.retryDelay(request, attempt));
      attempt += 1;
    }

    return err({
      code: "transport_error",
      message: "HTTP request exhausted retry attempts.",
      retryable: false,
    });
  }

  private retryDelay(request: HttpJsonRequest, attempt: number): number {
    if (request.backoff === "exponential") {
      return request.retryDelayMs * 2 ** attempt;
    }

    return request.retryDelayMs * attempt;
  }

  private async performRequest<T>(
    request: HttpJsonRequest,
  ): Promise<Result<T, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable =
          response.status === 408 ||
          response.status === 429 ||
          response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      try {
        return ok((await response.json()) as T);
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: false,
          cause: jsonError,
        });
      }
    } catch (error) {
      const isTimeoutError =
        error instanceof DOMException && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: "HTTP request timed out.",
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
