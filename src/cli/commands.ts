import chalk from "chalk";
import { parseNumberArg } from "@/common/utils/env";
import { getErrorMessage } from "@/common/utils/errors";
import { listBinaryCandidates } from "@/node/services/llm/binaryLocator";
import type { LlmService } from "@/node/services/llm/llmService";
import { isExecutableFile } from "@/node/utils/pathUtils";

/** Where command output goes; tests capture it. */
export interface CommandOutput {
  out: (line: string) => void;
  err: (line: string) => void;
  /** Unbuffered, no newline (streamed tokens, progress) */
  write: (text: string) => void;
}

export const consoleOutput: CommandOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  write: (text) => {
    process.stdout.write(text);
  },
};

export type ExitCode = 0 | 1;

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}

export async function statusCommand(service: LlmService, io: CommandOutput): Promise<ExitCode> {
  const status = await service.status();
  io.out(`Server:  ${status.running ? chalk.green("running") : chalk.dim("stopped")}`);
  io.out(`Port:    ${status.port}`);
  io.out(`Model:   ${status.modelPath || chalk.dim("(none selected)")}`);
  if (status.running) {
    io.out(`Web UI:  ${status.webUiUrl}`);
  }
  return 0;
}

export async function startCommand(
  service: LlmService,
  io: CommandOutput,
  modelOverride?: string
): Promise<ExitCode> {
  const result = await service.start(modelOverride);
  if (!result.success) {
    io.err(chalk.red(result.error.message));
    return 1;
  }
  io.out(result.data.message);
  if (result.data.pid !== undefined) {
    io.out(chalk.dim(`pid ${result.data.pid}`));
  }
  // The server outlives this command
  service.release();
  return 0;
}

export async function stopCommand(service: LlmService, io: CommandOutput): Promise<ExitCode> {
  const result = await service.stop();
  if (!result.success) {
    io.err(chalk.red(result.error.message));
    return 1;
  }
  io.out(result.data.message);
  return 0;
}

export async function modelsCommand(
  service: LlmService,
  io: CommandOutput,
  dir?: string
): Promise<ExitCode> {
  const models = await service.listModels(dir);
  if (models.length === 0) {
    io.out(`No models found in ${dir ?? (await service.getModelsDir())}`);
    return 0;
  }
  const selected = (await service.getLlmConfig()).modelPath;
  for (const model of models) {
    const marker = model.path === selected ? chalk.green("*") : " ";
    io.out(`${marker} ${model.name}  ${chalk.dim(formatBytes(model.sizeBytes))}  ${model.path}`);
  }
  return 0;
}

export async function selectCommand(
  service: LlmService,
  io: CommandOutput,
  modelPath: string
): Promise<ExitCode> {
  const result = await service.selectModel(modelPath);
  if (!result.success) {
    io.err(chalk.red(result.error.message));
    return 1;
  }
  io.out(`Selected ${result.data.modelPath}`);
  if (result.data.needsRestart) {
    io.out(chalk.yellow("Restart the server to load it: llamakeeper stop && llamakeeper start"));
  }
  return 0;
}

export async function importCommand(
  service: LlmService,
  io: CommandOutput,
  sourcePath: string,
  signal?: AbortSignal
): Promise<ExitCode> {
  try {
    const model = await service.importModel(sourcePath, {
      signal,
      onProgress: (p) => io.write(`\rImporting ${p.fileName}: ${p.percent}%`),
    });
    io.write("\n");
    io.out(`Imported ${model.name} (${formatBytes(model.sizeBytes)})`);
    return 0;
  } catch (err) {
    io.write("\n");
    io.err(chalk.red(getErrorMessage(err)));
    return 1;
  }
}

export interface GenerateOptions {
  stream: boolean;
  maxTokens?: string;
  temperature?: string;
  signal?: AbortSignal;
}

export async function generateCommand(
  service: LlmService,
  io: CommandOutput,
  prompt: string,
  options: GenerateOptions
): Promise<ExitCode> {
  const overrides = {
    maxTokens: parseNumberArg(options.maxTokens),
    temperature: parseNumberArg(options.temperature),
    stream: options.stream,
  };

  if (!options.stream) {
    try {
      io.out(await service.generate(prompt, overrides, options.signal));
      return 0;
    } catch (err) {
      io.err(chalk.red(getErrorMessage(err)));
      return 1;
    }
  }

  const job = await service.runGeneration(prompt, overrides);
  const onAbort = () => job.cancel();
  options.signal?.addEventListener("abort", onAbort, { once: true });
  job.on("token", (chunk: string) => io.write(chunk));

  const result = await job.done;
  options.signal?.removeEventListener("abort", onAbort);
  io.write("\n");

  switch (result.status) {
    case "completed":
      return 0;
    case "cancelled":
      io.err(chalk.dim("(cancelled)"));
      return 1;
    case "failed":
      io.err(chalk.red(result.error ? result.error.message : "Generation failed"));
      return 1;
  }
}

export async function whichCommand(service: LlmService, io: CommandOutput): Promise<ExitCode> {
  const configuredPath = (await service.getLlmConfig()).serverBinary;
  let found: string | null = null;
  for (const candidate of listBinaryCandidates({ configuredPath })) {
    const executable = await isExecutableFile(candidate.path);
    if (executable && !found) {
      found = candidate.path;
    }
    const marker = executable ? chalk.green("✓") : chalk.dim("·");
    io.out(`${marker} ${chalk.dim(`[${candidate.source}]`)} ${candidate.path}`);
  }
  if (!found) {
    io.err(chalk.red("llama-server not found"));
    return 1;
  }
  io.out(`Using ${found}`);
  return 0;
}

export async function configCommand(
  service: LlmService,
  io: CommandOutput,
  args: string[]
): Promise<ExitCode> {
  const [action = "get", key, value] = args;
  const config = await service.config.get();

  if (action === "get") {
    if (!key) {
      io.out(JSON.stringify(config, null, 2));
      io.out(chalk.dim(service.config.configPath));
      return 0;
    }
    const field = key.startsWith("llm.") ? key.slice("llm.".length) : key;
    const entry = Object.entries(config.llm).find(([name]) => name === field);
    if (!entry) {
      io.err(chalk.red(`Unknown config key: ${key}`));
      return 1;
    }
    io.out(String(entry[1]));
    return 0;
  }

  if (action === "set") {
    if (!key || value === undefined) {
      io.err("Usage: llamakeeper config set <key> <value>");
      return 1;
    }
    const dottedKey = key.startsWith("llm.") ? key : `llm.${key}`;
    try {
      await service.config.setValue(dottedKey, value);
    } catch (err) {
      io.err(chalk.red(getErrorMessage(err)));
      return 1;
    }
    io.out(`${dottedKey} = ${value}`);
    return 0;
  }

  io.err(`Unknown config action: ${action}`);
  return 1;
}
