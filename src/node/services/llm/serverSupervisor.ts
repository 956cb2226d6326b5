import { EventEmitter } from "events";
import * as path from "path";
import { Err, Ok, type Result } from "@/common/types/result";
import { getErrorMessage } from "@/common/utils/errors";
import type { LlmConfig } from "@/node/config";
import { log } from "@/node/services/log";
import { AsyncMutex } from "@/node/utils/concurrency/asyncMutex";
import { expandTilde, pathExists } from "@/node/utils/pathUtils";
import { findServerBinary, getServerBinaryName } from "./binaryLocator";
import { LlmError } from "./errors";
import { createHealthProbe } from "./healthProbe";
import {
  executableName,
  matchServerProcesses,
  psProcessScanner,
  terminateProcess,
  type ProcessScanner,
} from "./processScanner";
import {
  buildServerArgs,
  spawnServerProcess,
  type ServerLauncher,
  type ServerProcess,
} from "./serverProcess";
import type { ServerPidFile } from "./serverPidFile";
import type { ServerState, StartOutcome, StopOutcome } from "./types";

/** Grace period after SIGKILL before we stop waiting on a tracked process */
const KILL_GRACE_MS = 1000;

export interface ServerSupervisorOptions {
  /** Read on every start(); the returned snapshot is used for that run only */
  getConfig: () => Promise<LlmConfig> | LlmConfig;
  /** Where the config lives, for remediation messages */
  configPath: string;
  /** File receiving llama-server's stderr */
  logPath: string;
  pidFile?: ServerPidFile;
  launcher?: ServerLauncher;
  scanner?: ProcessScanner;
  /** Overrides the HTTP probe; receives the configured port */
  probe?: (port: number) => Promise<boolean>;
  /** Overrides binary discovery; receives `llm.serverBinary` */
  locateBinary?: (configuredPath: string) => Promise<string | null>;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Owns at most one llama-server process.
 *
 * stopped → starting → running → stopping → stopped; a failed start goes
 * straight back to stopped. start() and stop() are serialized by a mutex;
 * isRunning() takes no lock and changes nothing.
 *
 * Events: "state" (ServerState) on every transition, and "exited" (pid)
 * when the tracked process dies without stop() being called.
 */
export class ServerSupervisor extends EventEmitter {
  private handle: ServerProcess | null = null;
  private _state: ServerState = "stopped";
  private stopping = false;
  private readonly lock = new AsyncMutex();

  private readonly launcher: ServerLauncher;
  private readonly scanner: ProcessScanner;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: ServerSupervisorOptions) {
    super();
    this.launcher = options.launcher ?? spawnServerProcess;
    this.scanner = options.scanner ?? psProcessScanner;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get state(): ServerState {
    return this._state;
  }

  /** PID of the process we hold, if any */
  get pid(): number | undefined {
    return this.handle?.pid;
  }

  get hasHandle(): boolean {
    return this.handle !== null;
  }

  /**
   * True if our tracked process is alive; otherwise whether something is
   * answering the health probe on the configured port (e.g. a server left
   * running by an earlier session).
   */
  async isRunning(): Promise<boolean> {
    if (this.handle && !this.handle.hasExited()) {
      return true;
    }
    const config = await this.options.getConfig();
    return this.probe(config.serverPort, config.healthTimeoutMs);
  }

  start(modelOverride?: string): Promise<Result<StartOutcome, LlmError>> {
    return this.lock.withLock(() => this.startLocked(modelOverride));
  }

  stop(): Promise<Result<StopOutcome, LlmError>> {
    return this.lock.withLock(() => this.stopLocked());
  }

  /**
   * Hand the tracked process over to the OS: stop referencing it so this
   * Node process can exit while the server keeps running. Later calls find
   * it again through the health probe and the PID file.
   */
  release(): void {
    if (!this.handle) return;
    log.info(`[llm] releasing ownership of pid ${this.handle.pid}`);
    this.handle.release();
    this.handle = null;
    this.setState("stopped");
  }

  // ─── Start ───────────────────────────────────────────────────────────

  private async startLocked(modelOverride?: string): Promise<Result<StartOutcome, LlmError>> {
    if (await this.isRunning()) {
      this.setState("running");
      return Ok({ status: "already-running", message: "Server already running", pid: this.pid });
    }
    this.dropDeadHandle();

    const config = { ...(await this.options.getConfig()) };

    const binaryPath = await this.locateBinary(config.serverBinary);
    if (!binaryPath) {
      return Err(LlmError.binaryNotFound(this.options.configPath));
    }

    const requestedModel = (modelOverride ?? config.modelPath).trim();
    if (!requestedModel) {
      return Err(LlmError.modelMissing(this.options.configPath));
    }
    const modelPath = path.resolve(expandTilde(requestedModel));
    if (!(await pathExists(modelPath))) {
      return Err(LlmError.modelNotFound(modelPath));
    }

    const args = buildServerArgs({
      modelPath,
      port: config.serverPort,
      contextSize: config.contextSize,
      gpuLayers: config.gpuLayers,
    });

    this.setState("starting");
    let handle: ServerProcess;
    try {
      handle = await this.launcher({ binaryPath, args, logPath: this.options.logPath });
    } catch (err) {
      this.setState("stopped");
      return Err(
        new LlmError("process_start_failed", `Failed to start server: ${getErrorMessage(err)}`, {
          cause: err,
        })
      );
    }
    this.track(handle);

    await this.writePidFile(handle, config.serverPort, binaryPath, modelPath);

    const attempts = Math.max(1, Math.ceil(config.startupTimeoutMs / config.pollIntervalMs));
    for (let attempt = 0; attempt < attempts; attempt++) {
      await this.sleep(config.pollIntervalMs);

      if (handle.hasExited()) {
        const output = await handle.readErrorOutput();
        this.handle = null;
        await this.options.pidFile?.remove();
        this.setState("stopped");
        log.warn(`[llm] server exited during startup: ${output.trim().slice(0, 200)}`);
        return Err(LlmError.processStartFailed(output));
      }

      if (await this.probe(config.serverPort, config.healthTimeoutMs)) {
        this.setState("running");
        log.info(`[llm] server ready on port ${config.serverPort} (pid ${handle.pid})`);
        return Ok({
          status: "started",
          message: "Server started successfully",
          pid: handle.pid,
          modelPath,
        });
      }
    }

    // Still alive but not answering yet; large models can take longer to load
    this.setState("running");
    log.info(`[llm] server still loading after ${config.startupTimeoutMs}ms (pid ${handle.pid})`);
    return Ok({
      status: "starting",
      message: "Server starting (may take a moment to be ready)",
      pid: handle.pid,
      modelPath,
    });
  }

  private track(handle: ServerProcess): void {
    this.handle = handle;
    handle.onExit(() => {
      if (this.handle !== handle) return;
      if (!this.stopping && this._state === "running") {
        log.warn(`[llm] server process ${handle.pid} exited unexpectedly`);
        this.handle = null;
        this.setState("stopped");
        this.emit("exited", handle.pid);
      }
    });
  }

  private async writePidFile(
    handle: ServerProcess,
    port: number,
    binaryPath: string,
    modelPath: string
  ): Promise<void> {
    if (!this.options.pidFile || handle.pid === undefined) return;
    try {
      await this.options.pidFile.write({
        pid: handle.pid,
        port,
        binaryPath,
        modelPath,
        startedAt: new Date().toISOString(),
      });
    } catch (err) {
      log.warn(`[llm] could not write PID file: ${getErrorMessage(err)}`);
    }
  }

  // ─── Stop ────────────────────────────────────────────────────────────

  private async stopLocked(): Promise<Result<StopOutcome, LlmError>> {
    if (!(await this.isRunning())) {
      this.dropDeadHandle();
      this.setState("stopped");
      return Ok({ status: "not-running", message: "Server not running" });
    }
    this.dropDeadHandle();

    const config = await this.options.getConfig();
    this.setState("stopping");
    this.stopping = true;
    try {
      if (this.handle) {
        return Ok(await this.stopTracked(this.handle, config.stopTimeoutMs));
      }
      return await this.stopOrphan(config);
    } finally {
      this.stopping = false;
      this.setState("stopped");
    }
  }

  private async stopTracked(handle: ServerProcess, timeoutMs: number): Promise<StopOutcome> {
    handle.kill("SIGTERM");
    let forced = false;
    if (!(await handle.waitForExit(timeoutMs))) {
      log.warn(`[llm] force killing pid ${handle.pid} after ${timeoutMs}ms`);
      handle.kill("SIGKILL");
      forced = true;
      await handle.waitForExit(KILL_GRACE_MS);
    }
    this.handle = null;
    await this.options.pidFile?.remove();
    return forced
      ? { status: "force-killed", message: "Server stopped (forced)" }
      : { status: "stopped", message: "Server stopped" };
  }

  /**
   * Reconciliation for a server we have no handle for. A PID file entry is
   * trusted only while `ps` shows that pid running the recorded binary, since
   * pids are reused after a reboot. The command-line scan comes after it.
   * Success means the port went quiet, not merely that a process died.
   */
  private async stopOrphan(config: LlmConfig): Promise<Result<StopOutcome, LlmError>> {
    const port = config.serverPort;
    const processes = await this.scanner.list();
    const pids: number[] = [];

    const recorded = await this.options.pidFile?.read();
    if (recorded && recorded.port === port) {
      const recordedBinary = path.basename(recorded.binaryPath);
      const listed = processes.find((p) => p.pid === recorded.pid);
      if (listed && executableName(listed.command) === recordedBinary) {
        pids.push(recorded.pid);
      } else {
        log.warn(`[llm] pid ${recorded.pid} from PID file is not ${recordedBinary}; ignoring it`);
        await this.options.pidFile?.remove();
      }
    }

    const binaryName = config.serverBinary.trim()
      ? path.basename(config.serverBinary.trim())
      : getServerBinaryName();
    for (const candidate of matchServerProcesses(processes, binaryName, port)) {
      if (!pids.includes(candidate.pid)) {
        pids.push(candidate.pid);
      }
    }

    let terminated = 0;
    for (const pid of pids) {
      log.info(`[llm] stopping orphan pid ${pid}`);
      if (!(await terminateProcess(pid, config.stopTimeoutMs))) {
        continue;
      }
      terminated++;
      if (!(await this.probe(port, config.healthTimeoutMs))) {
        await this.options.pidFile?.remove();
        return Ok({ status: "orphan-stopped", message: "Server stopped" });
      }
      log.warn(`[llm] pid ${pid} is gone but port ${port} still answers`);
    }

    return Err(
      LlmError.stopFailed(
        terminated > 0
          ? `port ${port} still answers after stopping ${terminated} matching process(es)`
          : `a server answers on port ${port} but no matching "${binaryName}" process could be terminated`
      )
    );
  }

  // ─── Helpers ─────────────────────────────────────────────────────────

  private probe(port: number, timeoutMs: number): Promise<boolean> {
    return this.options.probe ? this.options.probe(port) : createHealthProbe(port, timeoutMs)();
  }

  private async locateBinary(configuredPath: string): Promise<string | null> {
    if (this.options.locateBinary) {
      return this.options.locateBinary(configuredPath);
    }
    const found = await findServerBinary({ configuredPath });
    if (found) {
      log.debug(`[llm] using ${found.source} binary ${found.path}`);
    }
    return found?.path ?? null;
  }

  private dropDeadHandle(): void {
    if (this.handle?.hasExited()) {
      this.handle = null;
    }
  }

  private setState(state: ServerState): void {
    if (this._state === state) return;
    this._state = state;
    this.emit("state", state);
  }
}
