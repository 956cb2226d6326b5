/**
 * Shared types for the local llama-server integration.
 *
 * Wire types mirror llama.cpp's `llama-server` HTTP API; only the fields
 * this package reads or writes are declared.
 */

// ─── Models ─────────────────────────────────────────────────────────────

/** A model file found on disk. Recomputed on every discovery pass. */
export interface ModelDescriptor {
  path: string;
  /** File name without the .gguf extension */
  name: string;
  sizeBytes: number;
}

export interface ImportProgress {
  fileName: string;
  copiedBytes: number;
  totalBytes: number;
  /** 0-100 */
  percent: number;
}

// ─── Generation ─────────────────────────────────────────────────────────

export interface GenerationRequest {
  prompt: string;
  maxTokens: number;
  temperature: number;
  stream: boolean;
}

/** POST /completion body. The server accepts more; we send exactly these. */
export interface CompletionRequestBody {
  prompt: string;
  n_predict: number;
  temperature: number;
  stream: boolean;
}

/** POST /completion (stream=false). Only `content` is consumed. */
export interface CompletionResponse {
  content: string;
  stop?: boolean;
  tokens_predicted?: number;
}

/** One `data: ` frame of a streamed completion. */
export interface CompletionChunkFrame {
  content: string;
  stop?: boolean;
}

// ─── Server process ─────────────────────────────────────────────────────

export type ServerState = "stopped" | "starting" | "running" | "stopping";

/** Command line for one `llama-server` launch. */
export interface ServerInvocation {
  binaryPath: string;
  args: string[];
  /** File that receives the child's stderr */
  logPath: string;
}

export type StartStatus = "already-running" | "started" | "starting";

export interface StartOutcome {
  /**
   * "starting" means the readiness window elapsed while the process was
   * still alive (large models can take longer to load). The server is
   * treated as started; callers that need readiness should poll isRunning().
   */
  status: StartStatus;
  message: string;
  pid?: number;
  modelPath?: string;
}

export type StopStatus = "not-running" | "stopped" | "force-killed" | "orphan-stopped";

export interface StopOutcome {
  status: StopStatus;
  message: string;
}
