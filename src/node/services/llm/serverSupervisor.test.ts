import { afterEach, beforeEach, describe, expect, test } from "@jest/globals";
import { spawn, type ChildProcess } from "child_process";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import * as path from "path";
import { LlmConfigSchema, type LlmConfig } from "@/node/config";
import { isProcessAlive, type ProcessInfo } from "./processScanner";
import { ServerPidFile } from "./serverPidFile";
import type { ServerProcess } from "./serverProcess";
import { ServerSupervisor } from "./serverSupervisor";
import type { ServerInvocation, ServerState } from "./types";

const PREFIX = "llamakeeper-supervisor-test-";
const PORT = 18080;

interface FakeBehavior {
  /** Probes answered unhealthy before the server reports ready */
  readyAfterProbes: number;
  exitOnSigterm: boolean;
  /** Dies right after launch, as with a corrupt model */
  crashOnLaunch: boolean;
  errorOutput: string;
}

const DEFAULT_BEHAVIOR: FakeBehavior = {
  readyAfterProbes: 0,
  exitOnSigterm: true,
  crashOnLaunch: false,
  errorOutput: "",
};

class FakeServerProcess implements ServerProcess {
  readonly signals: NodeJS.Signals[] = [];
  released = false;
  probes = 0;
  private exited = false;
  private readonly listeners: Array<() => void> = [];

  constructor(
    readonly pid: number,
    readonly behavior: FakeBehavior
  ) {
    if (behavior.crashOnLaunch) {
      this.exit();
    }
  }

  hasExited(): boolean {
    return this.exited;
  }

  /** Marks the process dead without notifying exit listeners */
  exitSilently(): void {
    this.exited = true;
  }

  exit(): void {
    if (this.exited) return;
    this.exited = true;
    for (const listener of this.listeners.splice(0)) {
      listener();
    }
  }

  waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.exited) return Promise.resolve(true);
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      this.onExit(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  kill(signal: NodeJS.Signals): boolean {
    if (this.exited) return false;
    this.signals.push(signal);
    if (signal === "SIGKILL" || this.behavior.exitOnSigterm) {
      this.exit();
    }
    return true;
  }

  onExit(listener: () => void): void {
    if (this.exited) {
      listener();
    } else {
      this.listeners.push(listener);
    }
  }

  readErrorOutput(): Promise<string> {
    return Promise.resolve(this.behavior.errorOutput);
  }

  release(): void {
    this.released = true;
  }
}

describe("ServerSupervisor", () => {
  let tempDir: string;
  let modelPath: string;
  let config: LlmConfig;
  let behavior: FakeBehavior;
  let binaryPath: string | null;
  let launches: ServerInvocation[];
  let servers: FakeServerProcess[];
  /** A server this supervisor never launched answers on the port */
  let externalServer: boolean;
  let scanned: ProcessInfo[];
  let pidFile: ServerPidFile;
  let states: ServerState[];
  let supervisor: ServerSupervisor;

  function createSupervisor(): ServerSupervisor {
    const created = new ServerSupervisor({
      getConfig: () => config,
      configPath: path.join(tempDir, "config.json"),
      logPath: path.join(tempDir, "llama-server.log"),
      pidFile,
      locateBinary: () => Promise.resolve(binaryPath),
      launcher: (invocation) => {
        launches.push(invocation);
        const server = new FakeServerProcess(4001 + servers.length, behavior);
        servers.push(server);
        return Promise.resolve(server);
      },
      probe: () => {
        if (externalServer) return Promise.resolve(true);
        const current = servers.at(-1);
        if (!current || current.hasExited()) return Promise.resolve(false);
        current.probes++;
        return Promise.resolve(current.probes > current.behavior.readyAfterProbes);
      },
      scanner: { list: () => Promise.resolve(scanned) },
      sleep: () => Promise.resolve(),
    });
    created.on("state", (state: ServerState) => states.push(state));
    return created;
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), PREFIX));
    modelPath = path.join(tempDir, "tiny-test.gguf");
    await writeFile(modelPath, "GGUF");
    config = LlmConfigSchema.parse({
      modelPath,
      serverPort: PORT,
      startupTimeoutMs: 50,
      pollIntervalMs: 10,
      stopTimeoutMs: 50,
    });
    behavior = { ...DEFAULT_BEHAVIOR };
    binaryPath = "/opt/llama/llama-server";
    launches = [];
    servers = [];
    externalServer = false;
    scanned = [];
    pidFile = new ServerPidFile(tempDir);
    states = [];
    supervisor = createSupervisor();
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("start", () => {
    test("launches with the configured invocation and reports started", async () => {
      behavior.readyAfterProbes = 1;

      const result = await supervisor.start();

      expect(result).toEqual({
        success: true,
        data: {
          status: "started",
          message: "Server started successfully",
          pid: 4001,
          modelPath,
        },
      });
      expect(launches).toEqual([
        {
          binaryPath: "/opt/llama/llama-server",
          args: ["--model", modelPath, "--port", "18080", "--ctx-size", "4096"],
          logPath: path.join(tempDir, "llama-server.log"),
        },
      ]);
      expect(servers[0].probes).toBe(2);
      expect(supervisor.state).toBe("running");
      expect(states).toEqual(["starting", "running"]);
    });

    test("passes --n-gpu-layers only when offloading", async () => {
      config = { ...config, gpuLayers: 32, contextSize: 2048 };

      await supervisor.start();

      expect(launches[0].args).toEqual([
        "--model",
        modelPath,
        "--port",
        "18080",
        "--ctx-size",
        "2048",
        "--n-gpu-layers",
        "32",
      ]);
    });

    test("records the launched server in the PID file", async () => {
      await supervisor.start();

      const recorded: unknown = JSON.parse(await readFile(pidFile.getPath(), "utf-8"));
      expect(recorded).toMatchObject({
        pid: 4001,
        port: PORT,
        binaryPath: "/opt/llama/llama-server",
        modelPath,
      });
    });

    test("a model override replaces the configured model", async () => {
      const other = path.join(tempDir, "other.gguf");
      await writeFile(other, "GGUF");

      const result = await supervisor.start(other);

      expect(result.success && result.data.modelPath).toBe(other);
      expect(launches[0].args[1]).toBe(other);
    });

    test("second start while running does not spawn again", async () => {
      await supervisor.start();
      const again = await supervisor.start();

      expect(again).toEqual({
        success: true,
        data: { status: "already-running", message: "Server already running", pid: 4001 },
      });
      expect(launches).toHaveLength(1);
    });

    test("concurrent starts are serialized", async () => {
      const [first, second] = await Promise.all([supervisor.start(), supervisor.start()]);

      expect(first.success && first.data.status).toBe("started");
      expect(second.success && second.data.status).toBe("already-running");
      expect(launches).toHaveLength(1);
    });

    test("a server started elsewhere counts as already running", async () => {
      externalServer = true;

      const result = await supervisor.start();

      expect(result.success && result.data.status).toBe("already-running");
      expect(launches).toHaveLength(0);
    });

    test("missing binary fails before spawning", async () => {
      binaryPath = null;

      const result = await supervisor.start();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe("binary_not_found");
        expect(result.error.message).toContain(path.join(tempDir, "config.json"));
      }
      expect(launches).toHaveLength(0);
    });

    test("no configured model fails with model_missing", async () => {
      config = { ...config, modelPath: "" };

      const result = await supervisor.start();

      expect(!result.success && result.error.type).toBe("model_missing");
      expect(launches).toHaveLength(0);
    });

    test("nonexistent model fails with model_not_found naming the path", async () => {
      const missing = path.join(tempDir, "nope.gguf");

      const result = await supervisor.start(missing);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe("model_not_found");
        expect(result.error.message).toBe(
          `Model file not found:\n${missing}\n\nRun \`llamakeeper models\` and select an available model.`
        );
      }
      expect(launches).toHaveLength(0);
      expect(supervisor.state).toBe("stopped");
    });

    test("a process that dies during startup reports its error output", async () => {
      behavior.crashOnLaunch = true;
      behavior.errorOutput = "error: failed to load model\n";

      const result = await supervisor.start();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe("process_start_failed");
        expect(result.error.message).toBe("Server failed to start: error: failed to load model");
      }
      expect(supervisor.hasHandle).toBe(false);
      expect(supervisor.state).toBe("stopped");
      expect(states).toEqual(["starting", "stopped"]);
      await expect(readFile(pidFile.getPath(), "utf-8")).rejects.toThrow();
    });

    test("error output is cut to 200 characters", async () => {
      behavior.crashOnLaunch = true;
      behavior.errorOutput = "x".repeat(500);

      const result = await supervisor.start();

      expect(!result.success && result.error.message).toBe(`Server failed to start: ${"x".repeat(200)}`);
    });

    test("a slow server is a soft success once the window elapses", async () => {
      behavior.readyAfterProbes = Number.POSITIVE_INFINITY;

      const result = await supervisor.start();

      expect(result).toEqual({
        success: true,
        data: {
          status: "starting",
          message: "Server starting (may take a moment to be ready)",
          pid: 4001,
          modelPath,
        },
      });
      // ceil(50 / 10) polls
      expect(servers[0].probes).toBe(5);
      expect(supervisor.state).toBe("running");
    });
  });

  describe("stop", () => {
    test("not running is a no-op success", async () => {
      const result = await supervisor.stop();

      expect(result).toEqual({
        success: true,
        data: { status: "not-running", message: "Server not running" },
      });
    });

    test("SIGTERM stops a cooperative server", async () => {
      await supervisor.start();
      states.length = 0;

      const result = await supervisor.stop();

      expect(result).toEqual({ success: true, data: { status: "stopped", message: "Server stopped" } });
      expect(servers[0].signals).toEqual(["SIGTERM"]);
      expect(supervisor.hasHandle).toBe(false);
      expect(states).toEqual(["stopping", "stopped"]);
      await expect(readFile(pidFile.getPath(), "utf-8")).rejects.toThrow();
    });

    test("escalates to SIGKILL after the stop timeout", async () => {
      behavior.exitOnSigterm = false;
      await supervisor.start();

      const result = await supervisor.stop();

      expect(result).toEqual({
        success: true,
        data: { status: "force-killed", message: "Server stopped (forced)" },
      });
      expect(servers[0].signals).toEqual(["SIGTERM", "SIGKILL"]);
    });

    test("start after stop launches a fresh process", async () => {
      await supervisor.start();
      await supervisor.stop();
      const result = await supervisor.start();

      expect(result.success && result.data.status).toBe("started");
      expect(launches).toHaveLength(2);
      expect(supervisor.pid).toBe(4002);
    });

    test("a handle that died unnoticed is not mistaken for the server on the port", async () => {
      await supervisor.start();
      servers[0].exitSilently();
      externalServer = true;

      const result = await supervisor.stop();

      expect(!result.success && result.error.type).toBe("stop_failed");
      expect(servers[0].signals).toEqual([]);
      expect(supervisor.hasHandle).toBe(false);
    });

    describe("without a handle", () => {
      const IDLE_SCRIPT = "setInterval(() => {}, 1000)";
      let children: ChildProcess[] = [];

      /** A live process the tests can point the PID file or the scan at */
      function spawnIdle(): { pid: number; exited: Promise<void> } {
        const child = spawn(process.execPath, ["-e", IDLE_SCRIPT], { stdio: "ignore" });
        children.push(child);
        if (child.pid === undefined) throw new Error("spawn failed");
        const exited = new Promise<void>((resolve) =>
          child.once("exit", () => {
            // The server on the port goes away with it
            externalServer = false;
            resolve();
          })
        );
        return { pid: child.pid, exited };
      }

      beforeEach(() => {
        config = { ...config, stopTimeoutMs: 2000 };
        externalServer = true;
      });

      afterEach(() => {
        for (const child of children) {
          child.kill("SIGKILL");
        }
        children = [];
      });

      test("terminates a matching process found by the scan", async () => {
        const orphan = spawnIdle();
        scanned = [
          { pid: 999_999_001, command: "vim notes-about-llama-server.txt" },
          { pid: orphan.pid, command: `/opt/llama/llama-server --model /m.gguf --port ${PORT}` },
        ];

        const result = await supervisor.stop();

        expect(result).toEqual({
          success: true,
          data: { status: "orphan-stopped", message: "Server stopped" },
        });
        await orphan.exited;
      });

      test("leaves alone a process that only mentions the binary in its arguments", async () => {
        const bystander = spawnIdle();
        scanned = [{ pid: bystander.pid, command: `tail -f ${path.join(tempDir, "llama-server.log")}` }];

        const result = await supervisor.stop();

        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error.message).toBe(
            `Could not stop server: a server answers on port ${PORT} but no matching "llama-server" process could be terminated`
          );
        }
        expect(isProcessAlive(bystander.pid)).toBe(true);
      });

      test("fails when the port still answers after the match is gone", async () => {
        const orphan = spawnIdle();
        scanned = [{ pid: orphan.pid, command: `llama-server --port ${PORT}` }];
        let probes = 0;
        supervisor = new ServerSupervisor({
          getConfig: () => config,
          configPath: path.join(tempDir, "config.json"),
          logPath: path.join(tempDir, "llama-server.log"),
          scanner: { list: () => Promise.resolve(scanned) },
          probe: () => {
            probes++;
            return Promise.resolve(true);
          },
        });

        const result = await supervisor.stop();

        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error.type).toBe("stop_failed");
          expect(result.error.message).toBe(
            `Could not stop server: port ${PORT} still answers after stopping 1 matching process(es)`
          );
        }
        await orphan.exited;
        // isRunning, then once after the termination
        expect(probes).toBe(2);
      });

      test("stops the process recorded in the PID file", async () => {
        const orphan = spawnIdle();
        await pidFile.write({
          pid: orphan.pid,
          port: PORT,
          binaryPath: process.execPath,
          modelPath,
          startedAt: new Date().toISOString(),
        });
        // The scan alone would find nothing named llama-server
        scanned = [{ pid: orphan.pid, command: `${process.execPath} -e ${IDLE_SCRIPT}` }];

        const result = await supervisor.stop();

        expect(result).toEqual({
          success: true,
          data: { status: "orphan-stopped", message: "Server stopped" },
        });
        await orphan.exited;
        await expect(readFile(pidFile.getPath(), "utf-8")).rejects.toThrow();
      });

      test("skips a PID file recorded for another port", async () => {
        const other = spawnIdle();
        await pidFile.write({
          pid: other.pid,
          port: PORT + 1,
          binaryPath: process.execPath,
          modelPath,
          startedAt: new Date().toISOString(),
        });
        scanned = [{ pid: other.pid, command: `${process.execPath} -e ${IDLE_SCRIPT}` }];

        const result = await supervisor.stop();

        expect(!result.success && result.error.type).toBe("stop_failed");
        expect(isProcessAlive(other.pid)).toBe(true);
        await expect(pidFile.read()).resolves.toMatchObject({ pid: other.pid, port: PORT + 1 });
      });

      test("drops a PID file whose pid now runs something else", async () => {
        const reused = spawnIdle();
        await pidFile.write({
          pid: reused.pid,
          port: PORT,
          binaryPath: "/opt/llama/llama-server",
          modelPath,
          startedAt: new Date().toISOString(),
        });
        scanned = [{ pid: reused.pid, command: `${process.execPath} -e ${IDLE_SCRIPT}` }];

        const result = await supervisor.stop();

        expect(!result.success && result.error.type).toBe("stop_failed");
        expect(isProcessAlive(reused.pid)).toBe(true);
        await expect(readFile(pidFile.getPath(), "utf-8")).rejects.toThrow();
      });

      test("nothing to terminate is stop_failed", async () => {
        const result = await supervisor.stop();

        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error.type).toBe("stop_failed");
          expect(result.error.message).toBe(
            `Could not stop server: a server answers on port ${PORT} but no matching "llama-server" process could be terminated`
          );
        }
        expect(supervisor.state).toBe("stopped");
      });
    });
  });

  describe("process ownership", () => {
    test("an unexpected exit drops the handle and emits exited", async () => {
      await supervisor.start();
      const exitedPids: Array<number | undefined> = [];
      supervisor.on("exited", (pid: number | undefined) => exitedPids.push(pid));

      servers[0].exit();

      expect(exitedPids).toEqual([4001]);
      expect(supervisor.hasHandle).toBe(false);
      expect(supervisor.state).toBe("stopped");
      await expect(supervisor.isRunning()).resolves.toBe(false);
    });

    test("release hands the process to the OS and keeps the PID file", async () => {
      await supervisor.start();

      supervisor.release();

      expect(servers[0].released).toBe(true);
      expect(servers[0].signals).toEqual([]);
      expect(supervisor.hasHandle).toBe(false);
      expect(supervisor.state).toBe("stopped");
      await expect(readFile(pidFile.getPath(), "utf-8")).resolves.toContain('"pid": 4001');
    });

    test("isRunning reflects a held, live handle without probing", async () => {
      await supervisor.start();
      const probesBefore = servers[0].probes;

      await expect(supervisor.isRunning()).resolves.toBe(true);
      expect(servers[0].probes).toBe(probesBefore);
    });
  });
});
