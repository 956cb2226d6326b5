import { collectErrorCodes, getErrorMessage } from "@/common/utils/errors";
import { log } from "@/node/services/log";
import { readCompletionChunks } from "./completionStream";
import { LlmError, isLlmError } from "./errors";
import { DEFAULT_HEALTH_TIMEOUT_MS, probeHealth } from "./healthProbe";
import type { CompletionRequestBody, CompletionResponse, GenerationRequest } from "./types";

/** Generous default: cold model loads and long completions both take a while */
export const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

/** Socket-level codes that mean "nothing is listening there" */
const UNREACHABLE_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENOTFOUND",
  "EAI_AGAIN",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

export interface LlmHttpClientOptions {
  /** Total time for generate(); idle time between reads for generateStream() */
  requestTimeoutMs?: number;
  healthTimeoutMs?: number;
}

/** Anything that can produce completions; the streaming coordinator depends on this. */
export interface CompletionSource {
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<string>;
  generateStream(request: GenerationRequest, signal?: AbortSignal): AsyncGenerator<string>;
}

/**
 * Aborts a request when the caller's signal fires or when it has been idle
 * for `timeoutMs`. `touch()` restarts the idle clock.
 */
class RequestDeadline {
  readonly controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private expired = false;
  private readonly onCallerAbort = () => this.controller.abort();

  constructor(
    private readonly timeoutMs: number,
    private readonly callerSignal?: AbortSignal
  ) {
    if (callerSignal?.aborted) {
      this.controller.abort();
    } else {
      callerSignal?.addEventListener("abort", this.onCallerAbort, { once: true });
    }
    this.touch();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get timedOut(): boolean {
    return this.expired;
  }

  touch(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.expired = true;
      this.controller.abort();
    }, this.timeoutMs);
  }

  dispose(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.callerSignal?.removeEventListener("abort", this.onCallerAbort);
  }
}

/**
 * HTTP client for llama.cpp's `llama-server`.
 *
 * Speaks `GET /health` and `POST /completion` (blocking and streamed).
 * Request failures surface as LlmError and never touch supervisor state.
 */
export class LlmHttpClient implements CompletionSource {
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly healthTimeoutMs: number;

  constructor(baseUrl: string, options: LlmHttpClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.healthTimeoutMs = options.healthTimeoutMs ?? DEFAULT_HEALTH_TIMEOUT_MS;
  }

  get url(): string {
    return this.baseUrl;
  }

  // ─── Health ──────────────────────────────────────────────────────────

  healthCheck(): Promise<boolean> {
    return probeHealth(this.baseUrl, this.healthTimeoutMs);
  }

  // ─── Completion ──────────────────────────────────────────────────────

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    const deadline = new RequestDeadline(this.requestTimeoutMs, signal);
    try {
      const resp = await this.postCompletion(request, false, deadline.signal);
      const data: unknown = await resp.json();
      return readContent(data);
    } catch (err) {
      throw this.toLlmError(err, deadline, signal);
    } finally {
      deadline.dispose();
    }
  }

  /**
   * Streamed completion. Yields one chunk per `data:` frame with content.
   * Breaking out of the loop aborts the request; the server has no cancel
   * endpoint, so closing the connection is the only way to release it.
   */
  async *generateStream(request: GenerationRequest, signal?: AbortSignal): AsyncGenerator<string> {
    const deadline = new RequestDeadline(this.requestTimeoutMs, signal);
    let finished = false;
    try {
      const resp = await this.postCompletion(request, true, deadline.signal);
      if (!resp.body) {
        throw LlmError.generationFailed("no response body for streaming request");
      }

      deadline.touch();
      yield* readCompletionChunks(resp.body, () => deadline.touch());
      finished = true;
    } catch (err) {
      throw this.toLlmError(err, deadline, signal);
    } finally {
      if (!finished && !deadline.signal.aborted) {
        deadline.controller.abort();
        log.debug(`[llm/http] stream abandoned by consumer: ${this.baseUrl}/completion`);
      }
      deadline.dispose();
    }
  }

  private async postCompletion(
    request: GenerationRequest,
    stream: boolean,
    signal: AbortSignal
  ): Promise<Response> {
    const body: CompletionRequestBody = {
      prompt: request.prompt,
      n_predict: request.maxTokens,
      temperature: request.temperature,
      stream,
    };

    const resp = await fetch(`${this.baseUrl}/completion`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal,
    });

    if (!resp.ok) {
      const text = await resp.text();
      throw LlmError.generationFailed(
        `${resp.status} ${resp.statusText}${text ? `: ${text.slice(0, 200)}` : ""}`
      );
    }
    return resp;
  }

  private toLlmError(err: unknown, deadline: RequestDeadline, callerSignal?: AbortSignal): unknown {
    if (isLlmError(err)) {
      return err;
    }
    if (deadline.timedOut) {
      return LlmError.requestTimeout(this.requestTimeoutMs, err);
    }
    if (callerSignal?.aborted) {
      // Caller cancelled; hand back their abort as-is
      return err;
    }
    if (collectErrorCodes(err).some((code) => UNREACHABLE_CODES.has(code))) {
      return LlmError.serverUnreachable(this.baseUrl, err);
    }
    return LlmError.generationFailed(describeCause(err), err);
  }
}

function describeCause(err: unknown): string {
  const message = getErrorMessage(err);
  if (err instanceof Error && err.cause !== undefined) {
    return `${message} (${getErrorMessage(err.cause)})`;
  }
  return message;
}

function isCompletionResponse(data: unknown): data is CompletionResponse {
  return (
    typeof data === "object" && data !== null && "content" in data && typeof data.content === "string"
  );
}

/** Only `content` is consumed; a response without it reads as empty text. */
function readContent(data: unknown): string {
  return isCompletionResponse(data) ? data.content : "";
}
