import { afterEach, beforeEach, describe, expect, test } from "@jest/globals";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import * as path from "path";
import { LlmConfigSchema } from "@/node/config";
import { spawnServerProcess, type ServerProcess } from "./serverProcess";
import { ServerSupervisor } from "./serverSupervisor";

const PREFIX = "llamakeeper-process-test-";

describe("spawnServerProcess", () => {
  let tempDir: string;
  let logPath: string;
  let launched: ServerProcess[];

  async function writeStub(name: string, body: string, mode = 0o755): Promise<string> {
    const stubPath = path.join(tempDir, name);
    await writeFile(stubPath, `#!/bin/sh\n${body}\n`, { mode });
    return stubPath;
  }

  async function launch(binaryPath: string, args: string[] = []): Promise<ServerProcess> {
    const handle = await spawnServerProcess({ binaryPath, args, logPath });
    launched.push(handle);
    return handle;
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), PREFIX));
    logPath = path.join(tempDir, "logs", "llama-server.log");
    launched = [];
  });

  afterEach(async () => {
    for (const handle of launched) {
      handle.kill("SIGKILL");
    }
    await rm(tempDir, { recursive: true, force: true });
  });

  test("stderr of a server that exits is read back", async () => {
    const stub = await writeStub("llama-server", 'echo "OOM: cannot allocate" >&2\nexit 1');

    const handle = await launch(stub);

    await expect(handle.waitForExit(5000)).resolves.toBe(true);
    expect(handle.hasExited()).toBe(true);
    await expect(handle.readErrorOutput()).resolves.toBe("OOM: cannot allocate\n");
  });

  test("a later launch reads only its own output from the shared log", async () => {
    const first = await launch(await writeStub("first", 'echo "first failure" >&2'));
    await first.waitForExit(5000);

    const second = await launch(await writeStub("second", 'echo "second failure" >&2'));
    await second.waitForExit(5000);

    await expect(first.readErrorOutput()).resolves.toBe("first failure\nsecond failure\n");
    await expect(second.readErrorOutput()).resolves.toBe("second failure\n");
  });

  test("a binary that cannot be executed reports the spawn error", async () => {
    const notExecutable = await writeStub("llama-server", "exit 0", 0o644);

    const handle = await launch(notExecutable);

    await expect(handle.waitForExit(5000)).resolves.toBe(true);
    expect(handle.pid).toBeUndefined();
    await expect(handle.readErrorOutput()).resolves.toBe(`spawn ${notExecutable} EACCES\n`);
  });

  test("waitForExit times out on a live server and kill ends it", async () => {
    const handle = await launch(process.execPath, ["-e", "setInterval(() => {}, 1000)"]);
    let exitNotified = false;
    handle.onExit(() => {
      exitNotified = true;
    });

    await expect(handle.waitForExit(100)).resolves.toBe(false);
    expect(handle.kill("SIGTERM")).toBe(true);
    await expect(handle.waitForExit(5000)).resolves.toBe(true);

    expect(exitNotified).toBe(true);
    expect(handle.kill("SIGTERM")).toBe(false);
  });

  test("the supervisor surfaces stderr of a server that dies during startup", async () => {
    const stub = await writeStub("llama-server", 'echo "OOM: cannot allocate" >&2\nexit 1');
    const modelPath = path.join(tempDir, "tiny-test.gguf");
    await writeFile(modelPath, "GGUF");
    const supervisor = new ServerSupervisor({
      getConfig: () =>
        LlmConfigSchema.parse({ modelPath, serverPort: 18099, startupTimeoutMs: 5000, pollIntervalMs: 50 }),
      configPath: path.join(tempDir, "config.json"),
      logPath,
      probe: () => Promise.resolve(false),
      locateBinary: () => Promise.resolve(stub),
    });

    const result = await supervisor.start();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe("process_start_failed");
      expect(result.error.message).toBe("Server failed to start: OOM: cannot allocate");
    }
    expect(supervisor.state).toBe("stopped");
  });
});
