/**
 * LLM Service — wires config, the server supervisor, the HTTP client and the
 * streaming coordinator together for the CLI (or any other embedder).
 *
 * Architecture: caller → LlmService → ServerSupervisor (process lifecycle)
 *                                   → LlmHttpClient (llama-server HTTP API)
 */

import * as path from "path";
import { Err, Ok, type Result } from "@/common/types/result";
import { ConfigStore, type LlmConfig } from "@/node/config";
import { log } from "@/node/services/log";
import { expandTilde, pathExists } from "@/node/utils/pathUtils";
import { LlmError } from "./errors";
import { localBaseUrl } from "./healthProbe";
import { LlmHttpClient, type CompletionSource } from "./llmHttpClient";
import { findModels, getModelsDir, isModelFile, ModelImporter } from "./modelCatalog";
import type { ProcessScanner } from "./processScanner";
import type { ServerLauncher } from "./serverProcess";
import { ServerPidFile } from "./serverPidFile";
import { ServerSupervisor } from "./serverSupervisor";
import { StreamingCoordinator, type GenerationJob } from "./streamingCoordinator";
import type {
  GenerationRequest,
  ImportProgress,
  ModelDescriptor,
  ServerState,
  StartOutcome,
  StopOutcome,
} from "./types";

export interface LlmServiceOptions {
  configStore?: ConfigStore;
  /** Defaults to <configDir>/llama-server.log */
  logPath?: string;
  launcher?: ServerLauncher;
  scanner?: ProcessScanner;
  probe?: (port: number) => Promise<boolean>;
  locateBinary?: (configuredPath: string) => Promise<string | null>;
  sleep?: (ms: number) => Promise<void>;
}

export interface LlmStatus {
  running: boolean;
  state: ServerState;
  port: number;
  baseUrl: string;
  /** llama-server serves a chat UI at its root */
  webUiUrl: string;
  modelPath: string;
  pid?: number;
}

export interface SelectModelResult {
  modelPath: string;
  /** The running server still has the previous model loaded */
  needsRestart: boolean;
}

export interface GenerationOverrides {
  maxTokens?: number;
  temperature?: number;
  stream?: boolean;
}

export class LlmService {
  readonly config: ConfigStore;
  readonly supervisor: ServerSupervisor;
  readonly coordinator: StreamingCoordinator;

  private client: LlmHttpClient | null = null;
  private clientKey = "";

  constructor(options: LlmServiceOptions = {}) {
    this.config = options.configStore ?? new ConfigStore();
    this.supervisor = new ServerSupervisor({
      getConfig: () => this.getLlmConfig(),
      configPath: this.config.configPath,
      logPath: options.logPath ?? path.join(this.config.configDir, "llama-server.log"),
      pidFile: new ServerPidFile(this.config.configDir),
      launcher: options.launcher,
      scanner: options.scanner,
      probe: options.probe,
      locateBinary: options.locateBinary,
      sleep: options.sleep,
    });

    // Resolves the client per request so config edits take effect without a restart
    const source: CompletionSource = {
      generate: async (request, signal) => (await this.getClient()).generate(request, signal),
      generateStream: (request, signal) => this.streamFromClient(request, signal),
    };
    this.coordinator = new StreamingCoordinator(source);
  }

  async getLlmConfig(): Promise<LlmConfig> {
    return (await this.config.get()).llm;
  }

  // ─── Server lifecycle ────────────────────────────────────────────────

  isRunning(): Promise<boolean> {
    return this.supervisor.isRunning();
  }

  start(modelOverride?: string): Promise<Result<StartOutcome, LlmError>> {
    return this.supervisor.start(modelOverride);
  }

  stop(): Promise<Result<StopOutcome, LlmError>> {
    return this.supervisor.stop();
  }

  /** Let this process exit while the server keeps running. */
  release(): void {
    this.coordinator.cancelAll();
    this.supervisor.release();
  }

  async status(): Promise<LlmStatus> {
    const config = await this.getLlmConfig();
    const baseUrl = localBaseUrl(config.serverPort);
    return {
      running: await this.supervisor.isRunning(),
      state: this.supervisor.state,
      port: config.serverPort,
      baseUrl,
      webUiUrl: baseUrl,
      modelPath: config.modelPath,
      pid: this.supervisor.pid,
    };
  }

  // ─── Models ──────────────────────────────────────────────────────────

  async getModelsDir(): Promise<string> {
    return getModelsDir((await this.getLlmConfig()).modelDir);
  }

  async listModels(dirOverride?: string): Promise<ModelDescriptor[]> {
    const dir = dirOverride ? expandTilde(dirOverride) : await this.getModelsDir();
    return findModels(dir);
  }

  /**
   * Persist `llm.modelPath`. The running server keeps its model until it is
   * restarted; the result says so.
   */
  async selectModel(modelPath: string): Promise<Result<SelectModelResult, LlmError>> {
    const resolved = path.resolve(expandTilde(modelPath.trim()));
    if (!isModelFile(resolved) || !(await pathExists(resolved))) {
      return Err(LlmError.modelNotFound(resolved));
    }
    await this.config.updateLlm({ modelPath: resolved });
    log.info(`[llm] selected model ${resolved}`);
    return Ok({ modelPath: resolved, needsRestart: await this.supervisor.isRunning() });
  }

  async importModel(
    sourcePath: string,
    options: { signal?: AbortSignal; onProgress?: (progress: ImportProgress) => void } = {}
  ): Promise<ModelDescriptor> {
    const importer = new ModelImporter(await this.getModelsDir());
    if (options.onProgress) {
      importer.on("progress", options.onProgress);
    }
    return importer.import(sourcePath, options.signal);
  }

  // ─── Generation ──────────────────────────────────────────────────────

  /** Fill unset fields from the configured generation defaults. */
  async buildRequest(prompt: string, overrides: GenerationOverrides = {}): Promise<GenerationRequest> {
    const config = await this.getLlmConfig();
    return {
      prompt,
      maxTokens: overrides.maxTokens ?? config.maxTokens,
      temperature: overrides.temperature ?? config.temperature,
      stream: overrides.stream ?? true,
    };
  }

  async generate(prompt: string, overrides: GenerationOverrides = {}, signal?: AbortSignal): Promise<string> {
    const request = await this.buildRequest(prompt, { ...overrides, stream: false });
    return (await this.getClient()).generate(request, signal);
  }

  /** Run a generation in the background; see GenerationJob. */
  async runGeneration(prompt: string, overrides: GenerationOverrides = {}): Promise<GenerationJob> {
    return this.coordinator.run(await this.buildRequest(prompt, overrides));
  }

  private async *streamFromClient(
    request: GenerationRequest,
    signal?: AbortSignal
  ): AsyncGenerator<string> {
    const client = await this.getClient();
    yield* client.generateStream(request, signal);
  }

  async healthCheck(): Promise<boolean> {
    return (await this.getClient()).healthCheck();
  }

  /** One client per (port, timeouts); rebuilt when the config changes. */
  async getClient(): Promise<LlmHttpClient> {
    const config = await this.getLlmConfig();
    const key = `${config.serverPort}:${config.requestTimeoutMs}:${config.healthTimeoutMs}`;
    if (!this.client || this.clientKey !== key) {
      this.client = new LlmHttpClient(localBaseUrl(config.serverPort), {
        requestTimeoutMs: config.requestTimeoutMs,
        healthTimeoutMs: config.healthTimeoutMs,
      });
      this.clientKey = key;
    }
    return this.client;
  }
}
