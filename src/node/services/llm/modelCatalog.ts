/**
 * Model Catalog — discovers GGUF files on disk and imports new ones.
 *
 * Nothing here is cached: directory contents can change between calls, so
 * every listing re-walks the tree and re-stats each file.
 */

import { EventEmitter } from "events";
import * as fs from "fs";
import * as fsp from "fs/promises";
import * as path from "path";
import { getDefaultModelsDir } from "@/common/constants/paths";
import { getErrorMessage } from "@/common/utils/errors";
import { log } from "@/node/services/log";
import { expandTilde, pathExists } from "@/node/utils/pathUtils";
import type { ImportProgress, ModelDescriptor } from "./types";

export const MODEL_FILE_EXTENSION = ".gguf";

/** Copy chunk size for imports (1 MiB) */
const IMPORT_CHUNK_BYTES = 1024 * 1024;

export function isModelFile(fileName: string): boolean {
  return fileName.toLowerCase().endsWith(MODEL_FILE_EXTENSION);
}

export async function describeModel(modelPath: string): Promise<ModelDescriptor> {
  const stats = await fsp.stat(modelPath);
  return {
    path: modelPath,
    name: path.basename(modelPath).slice(0, -MODEL_FILE_EXTENSION.length),
    sizeBytes: stats.size,
  };
}

/**
 * Recursively find model files under `dir`, sorted by case-insensitive name.
 * A missing directory is an empty catalog, not an error.
 */
export async function findModels(dir: string): Promise<ModelDescriptor[]> {
  const root = expandTilde(dir);
  const models: ModelDescriptor[] = [];
  await collectModels(root, models);
  return models.sort((a, b) => {
    const left = a.name.toLowerCase();
    const right = b.name.toLowerCase();
    if (left !== right) return left < right ? -1 : 1;
    return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
  });
}

async function collectModels(dir: string, out: ModelDescriptor[]): Promise<void> {
  let entries: fs.Dirent[];
  try {
    entries = await fsp.readdir(dir, { withFileTypes: true });
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code !== "ENOENT" && code !== "ENOTDIR") {
      log.debug(`[llm/models] skipping unreadable directory ${dir}: ${getErrorMessage(err)}`);
    }
    return;
  }

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await collectModels(fullPath, out);
    } else if (entry.isFile() && isModelFile(entry.name)) {
      try {
        out.push(await describeModel(fullPath));
      } catch (err) {
        // Removed between readdir and stat, or unreadable
        log.debug(`[llm/models] skipping ${fullPath}: ${getErrorMessage(err)}`);
      }
    }
  }
}

/**
 * Resolve the models directory (configured or ~/models) and make sure it exists.
 */
export async function getModelsDir(configuredDir?: string): Promise<string> {
  const dir = configuredDir?.trim() ? expandTilde(configuredDir.trim()) : getDefaultModelsDir();
  await fsp.mkdir(dir, { recursive: true });
  return dir;
}

/**
 * Copies a local .gguf file into the models directory, emitting "progress"
 * (ImportProgress) after each chunk.
 * Partial copies are removed when the import fails or is cancelled.
 */
export class ModelImporter extends EventEmitter {
  constructor(private readonly modelsDir: string) {
    super();
  }

  async import(sourcePath: string, signal?: AbortSignal): Promise<ModelDescriptor> {
    const source = expandTilde(sourcePath);
    const fileName = path.basename(source);
    if (!isModelFile(fileName)) {
      throw new Error(`Not a ${MODEL_FILE_EXTENSION} model file: ${source}`);
    }

    const dest = path.join(this.modelsDir, fileName);
    if (await pathExists(dest)) {
      throw new Error(
        `A model with this name already exists:\n${dest}\n\n` +
          "Rename the file or remove the existing model."
      );
    }

    const totalBytes = (await fsp.stat(source)).size;
    await fsp.mkdir(this.modelsDir, { recursive: true });

    log.info(`[llm/models] importing ${source} → ${dest}`);

    const input = await fsp.open(source, "r");
    let output: fsp.FileHandle | null = null;
    let created = false;
    try {
      output = await fsp.open(dest, "wx");
      created = true;
      const buffer = Buffer.alloc(IMPORT_CHUNK_BYTES);
      let copied = 0;

      for (;;) {
        if (signal?.aborted) {
          throw new Error("Import cancelled");
        }
        const { bytesRead } = await input.read(buffer, 0, buffer.length, copied);
        if (bytesRead === 0) break;
        await output.write(buffer, 0, bytesRead);
        copied += bytesRead;

        this.emit("progress", {
          fileName,
          copiedBytes: copied,
          totalBytes,
          percent: totalBytes > 0 ? Math.floor((copied / totalBytes) * 100) : 100,
        } satisfies ImportProgress);
      }

      await output.close();
      output = null;
      const stats = await fsp.stat(source);
      await fsp.utimes(dest, stats.atime, stats.mtime);
    } catch (err) {
      if (output) {
        await output.close();
      }
      if (created) {
        await fsp.rm(dest, { force: true });
      }
      if (err instanceof Error && err.message === "Import cancelled") {
        throw err;
      }
      const code = (err as NodeJS.ErrnoException).code;
      if (code === "EACCES" || code === "EPERM") {
        throw new Error(`Permission denied writing to:\n${this.modelsDir}`, { cause: err });
      }
      throw new Error(`Failed to copy model file: ${getErrorMessage(err)}`, { cause: err });
    } finally {
      await input.close();
    }

    return describeModel(dest);
  }
}
