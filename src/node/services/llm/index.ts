/**
 * Local llama-server orchestration.
 *
 * Re-exports the public API of the llm subsystem.
 */

// Service container
export { LlmService } from "./llmService";
export type {
  GenerationOverrides,
  LlmServiceOptions,
  LlmStatus,
  SelectModelResult,
} from "./llmService";

// Process lifecycle
export { ServerSupervisor } from "./serverSupervisor";
export type { ServerSupervisorOptions } from "./serverSupervisor";
export { buildServerArgs, spawnServerProcess } from "./serverProcess";
export type { ServerLauncher, ServerProcess } from "./serverProcess";
export { ServerPidFile } from "./serverPidFile";
export { findServerBinary, getServerBinaryName, listBinaryCandidates } from "./binaryLocator";
export type { BinaryCandidate, BinaryLocatorOptions } from "./binaryLocator";

// HTTP
export { LlmHttpClient } from "./llmHttpClient";
export type { CompletionSource, LlmHttpClientOptions } from "./llmHttpClient";
export { createHealthProbe, probeHealth } from "./healthProbe";
export { StreamingCoordinator, GenerationJob } from "./streamingCoordinator";
export type { GenerationResult, GenerationStatus } from "./streamingCoordinator";

// Models
export { findModels, getModelsDir, ModelImporter } from "./modelCatalog";

export { LlmError, isLlmError } from "./errors";
export type { LlmErrorType } from "./errors";

export type * from "./types";
