import { spawn, type ChildProcess } from "child_process";
import * as fs from "fs";
import * as fsp from "fs/promises";
import * as path from "path";
import { getErrorMessage } from "@/common/utils/errors";
import { log } from "@/node/services/log";
import type { ServerInvocation } from "./types";

/** How much stderr we read back when diagnosing a failed start */
const MAX_ERROR_OUTPUT_BYTES = 16 * 1024;

/**
 * Ownership token for one spawned llama-server. Exists only while the
 * supervisor believes the process is alive.
 */
export interface ServerProcess {
  readonly pid: number | undefined;
  hasExited(): boolean;
  /** Resolves true once the process has exited, false if `timeoutMs` passes first. */
  waitForExit(timeoutMs: number): Promise<boolean>;
  kill(signal: NodeJS.Signals): boolean;
  /** Called once when the process exits (or fails to spawn). */
  onExit(listener: () => void): void;
  /** stderr written since launch (bounded), plus any spawn error. */
  readErrorOutput(): Promise<string>;
  /** Stop tracking the child so this Node process can exit without it. */
  release(): void;
}

export type ServerLauncher = (invocation: ServerInvocation) => Promise<ServerProcess>;

export function buildServerArgs(options: {
  modelPath: string;
  port: number;
  contextSize: number;
  gpuLayers: number;
}): string[] {
  const args = [
    "--model",
    options.modelPath,
    "--port",
    String(options.port),
    "--ctx-size",
    String(options.contextSize),
  ];
  // CPU-only runs omit the flag entirely
  if (options.gpuLayers > 0) {
    args.push("--n-gpu-layers", String(options.gpuLayers));
  }
  return args;
}

class ChildServerProcess implements ServerProcess {
  private exited = false;
  private spawnError: string | null = null;
  private readonly exitPromise: Promise<void>;

  constructor(
    private readonly child: ChildProcess,
    private readonly logPath: string,
    private readonly logOffset: number
  ) {
    this.exitPromise = new Promise<void>((resolve) => {
      child.once("exit", (code, signal) => {
        this.exited = true;
        log.debug(`[llm/process] pid ${child.pid} exited: code=${code} signal=${signal}`);
        resolve();
      });
      // Spawn failures (EACCES, ENOENT) emit "error" and never "exit"
      child.once("error", (err) => {
        this.exited = true;
        this.spawnError = err.message;
        log.error(`[llm/process] spawn error: ${err.message}`);
        resolve();
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  hasExited(): boolean {
    return this.exited || this.child.exitCode !== null || this.child.signalCode !== null;
  }

  async waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.hasExited()) return true;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([this.exitPromise.then(() => true), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  kill(signal: NodeJS.Signals): boolean {
    if (this.hasExited()) return false;
    return this.child.kill(signal);
  }

  onExit(listener: () => void): void {
    void this.exitPromise.then(listener);
  }

  async readErrorOutput(): Promise<string> {
    let output = "";
    try {
      const handle = await fsp.open(this.logPath, "r");
      try {
        const buffer = Buffer.alloc(MAX_ERROR_OUTPUT_BYTES);
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, this.logOffset);
        output = buffer.subarray(0, bytesRead).toString("utf-8");
      } finally {
        await handle.close();
      }
    } catch (err) {
      log.debug(`[llm/process] could not read ${this.logPath}: ${getErrorMessage(err)}`);
    }
    return this.spawnError ? `${this.spawnError}\n${output}` : output;
  }

  release(): void {
    this.child.unref();
  }
}

/**
 * Spawn llama-server detached (own process group, no inherited stdio) so its
 * lifetime is decoupled from ours. stderr is appended to `invocation.logPath`
 * instead of a pipe: a pipe would break, and could kill the server with
 * SIGPIPE, once this process exits.
 */
export const spawnServerProcess: ServerLauncher = async (invocation) => {
  await fsp.mkdir(path.dirname(invocation.logPath), { recursive: true });
  const logFd = fs.openSync(invocation.logPath, "a");
  const logOffset = fs.fstatSync(logFd).size;

  try {
    log.info(`[llm/process] spawning: ${invocation.binaryPath} ${invocation.args.join(" ")}`);
    const child = spawn(invocation.binaryPath, invocation.args, {
      detached: true,
      stdio: ["ignore", "ignore", logFd],
      env: { ...process.env },
      windowsHide: true,
    });
    return new ChildServerProcess(child, invocation.logPath, logOffset);
  } finally {
    // The child holds its own copy of the descriptor
    fs.closeSync(logFd);
  }
};
