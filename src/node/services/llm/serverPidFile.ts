import * as fs from "fs/promises";
import * as path from "path";
import writeFileAtomic from "write-file-atomic";
import { z } from "zod";
import { log } from "@/node/services/log";
import { isProcessAlive } from "./processScanner";

export const ServerPidDataSchema = z.object({
  pid: z.number().int().positive(),
  port: z.number().int().min(1).max(65535),
  binaryPath: z.string(),
  modelPath: z.string(),
  startedAt: z.string(),
});

export type ServerPidData = z.infer<typeof ServerPidDataSchema>;

/**
 * Records the llama-server we spawned at <configDir>/llama-server.pid.json.
 *
 * Lets a later run find its server by PID instead of scanning command lines.
 */
export class ServerPidFile {
  private readonly filePath: string;

  constructor(configDir: string) {
    this.filePath = path.join(configDir, "llama-server.pid.json");
  }

  async write(data: ServerPidData): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFileAtomic(this.filePath, JSON.stringify(data, null, 2), { mode: 0o600 });
  }

  /**
   * Read and validate the PID file.
   * Returns null if it is missing, malformed, or names a dead process
   * (a stale file is removed).
   */
  async read(): Promise<ServerPidData | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch {
      return null;
    }

    const parsed = ServerPidDataSchema.safeParse(safeJsonParse(raw));
    if (!parsed.success) {
      log.warn(`[llm/pidfile] ignoring malformed ${this.filePath}`);
      await this.remove();
      return null;
    }

    if (!isProcessAlive(parsed.data.pid)) {
      await this.remove();
      return null;
    }

    return parsed.data;
  }

  async remove(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }

  getPath(): string {
    return this.filePath;
  }
}

function safeJsonParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
