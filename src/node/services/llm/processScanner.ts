/**
 * Best-effort discovery of llama-server processes we no longer hold a handle
 * for (spawned by an earlier run of this tool, or released on purpose).
 *
 * A process matches when the executable in its command line is the server
 * binary; arguments that merely mention the name (`tail -f llama-server.log`)
 * do not count. Another install of the same binary still matches, so treat
 * results as candidates, never as proof of ownership.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import { getErrorMessage } from "@/common/utils/errors";
import { log } from "@/node/services/log";

const execFileAsync = promisify(execFile);

export interface ProcessInfo {
  pid: number;
  command: string;
}

export interface ProcessScanner {
  list(): Promise<ProcessInfo[]>;
}

/** Parse `ps -axo pid=,args=` output. */
export function parsePsOutput(output: string): ProcessInfo[] {
  const processes: ProcessInfo[] = [];
  for (const rawLine of output.split("\n")) {
    const match = /^\s*(\d+)\s+(.+)$/.exec(rawLine);
    if (match) {
      processes.push({ pid: Number(match[1]), command: match[2].trim() });
    }
  }
  return processes;
}

/**
 * Lists processes with `ps`. Windows has no `ps`; there the scan finds
 * nothing and orphan reconciliation falls back to the PID file only.
 */
export const psProcessScanner: ProcessScanner = {
  async list() {
    if (process.platform === "win32") {
      return [];
    }
    try {
      const { stdout } = await execFileAsync("ps", ["-axo", "pid=,args="], {
        maxBuffer: 8 * 1024 * 1024,
      });
      return parsePsOutput(stdout);
    } catch (err) {
      log.warn(`[llm/scan] ps failed: ${getErrorMessage(err)}`);
      return [];
    }
  },
};

/** Basename of argv[0], which may be quoted or a Windows path. */
export function executableName(command: string): string {
  const quoted = /^"([^"]+)"/.exec(command);
  const argv0 = quoted ? quoted[1] : command.trim().split(/\s+/, 1)[0];
  return argv0.split(/[\\/]/).pop() ?? "";
}

/**
 * Candidate server processes, excluding ourselves. When any candidate
 * carries `--port <port>`, only those are returned.
 */
export function matchServerProcesses(
  processes: ProcessInfo[],
  binaryName: string,
  port: number,
  selfPid: number = process.pid
): ProcessInfo[] {
  const portPattern = new RegExp(`--port[ =]${port}(\\s|$)`);
  const matches = processes.filter(
    (p) => p.pid !== selfPid && executableName(p.command) === binaryName
  );
  const onPort = matches.filter((p) => portPattern.test(p.command));
  return onPort.length > 0 ? onPort : matches;
}

/**
 * Uses signal 0, which tests existence without delivering anything.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: exists but belongs to someone else
    return (err as NodeJS.ErrnoException).code === "EPERM";
  }
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * SIGTERM, wait up to `timeoutMs`, then SIGKILL. Resolves true when the
 * process is gone afterwards.
 */
export async function terminateProcess(
  pid: number,
  timeoutMs: number,
  pollMs = 100
): Promise<boolean> {
  try {
    process.kill(pid, "SIGTERM");
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    // ESRCH: already gone
    return code === "ESRCH";
  }

  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (!isProcessAlive(pid)) return true;
    await sleep(pollMs);
  }

  log.warn(`[llm/scan] pid ${pid} ignored SIGTERM for ${timeoutMs}ms, sending SIGKILL`);
  try {
    process.kill(pid, "SIGKILL");
  } catch {
    return !isProcessAlive(pid);
  }
  await sleep(pollMs);
  return !isProcessAlive(pid);
}
