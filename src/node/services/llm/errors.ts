/**
 * Error taxonomy for server supervision and inference requests.
 *
 * Supervisor operations return these inside a Result; the HTTP client throws
 * them. Messages are meant to be shown to a user as-is.
 */

export type LlmErrorType =
  | "binary_not_found"
  | "model_missing"
  | "model_not_found"
  | "process_start_failed"
  | "server_unreachable"
  | "request_timeout"
  | "generation_failed"
  | "stop_failed";

/** Max characters of server stderr carried by a process_start_failed error */
export const START_FAILURE_EXCERPT_CHARS = 200;

export class LlmError extends Error {
  readonly type: LlmErrorType;

  constructor(type: LlmErrorType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LlmError";
    this.type = type;
  }

  static binaryNotFound(configPath: string): LlmError {
    return new LlmError(
      "binary_not_found",
      "llama-server binary not found.\n\n" +
        "To fix:\n" +
        "1. Build or install llama.cpp so llama-server is on your PATH, or\n" +
        `2. Set 'llm.serverBinary' in ${configPath}`
    );
  }

  static modelMissing(configPath: string): LlmError {
    return new LlmError(
      "model_missing",
      "No model configured.\n\n" +
        "To fix:\n" +
        "1. Place .gguf model files in ~/models/\n" +
        "2. Run `llamakeeper select <path>`, or\n" +
        `3. Set 'llm.modelPath' in ${configPath}`
    );
  }

  static modelNotFound(modelPath: string): LlmError {
    return new LlmError(
      "model_not_found",
      `Model file not found:\n${modelPath}\n\n` +
        "Run `llamakeeper models` and select an available model."
    );
  }

  static processStartFailed(errorOutput: string): LlmError {
    const excerpt = errorOutput.trim() || "Unknown error";
    return new LlmError(
      "process_start_failed",
      `Server failed to start: ${excerpt.slice(0, START_FAILURE_EXCERPT_CHARS)}`
    );
  }

  static serverUnreachable(baseUrl: string, cause?: unknown): LlmError {
    return new LlmError(
      "server_unreachable",
      `Cannot connect to LLM server at ${baseUrl}.\n\n` +
        "Start it with `llamakeeper start`.",
      { cause }
    );
  }

  static requestTimeout(timeoutMs: number, cause?: unknown): LlmError {
    return new LlmError(
      "request_timeout",
      `Request timed out after ${Math.round(timeoutMs / 1000)}s.\n\n` +
        "The model may be loading or the prompt is too long. Try again.",
      { cause }
    );
  }

  static generationFailed(detail: string, cause?: unknown): LlmError {
    return new LlmError("generation_failed", `Generation failed: ${detail}`, { cause });
  }

  static stopFailed(detail: string): LlmError {
    return new LlmError("stop_failed", `Could not stop server: ${detail}`);
  }
}

export function isLlmError(error: unknown): error is LlmError {
  return error instanceof LlmError;
}
