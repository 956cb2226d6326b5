import * as fs from "fs/promises";
import * as path from "path";
import writeFileAtomic from "write-file-atomic";
import { z } from "zod";
import { getConfigDir } from "@/common/constants/paths";
import { getErrorMessage } from "@/common/utils/errors";
import { log } from "@/node/services/log";

export const LlmConfigSchema = z.object({
  /** Path to the model file passed to --model */
  modelPath: z.string().default(""),
  /** Directory scanned for .gguf files; empty means ~/models */
  modelDir: z.string().default(""),
  serverPort: z.number().int().min(1).max(65535).default(8080),
  contextSize: z.number().int().positive().default(4096),
  /** Layers offloaded to the GPU; 0 = CPU only */
  gpuLayers: z.number().int().min(0).default(0),
  /** Explicit llama-server path; empty means auto-detect */
  serverBinary: z.string().default(""),

  // Generation defaults (read per request, no restart needed)
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().default(4096),
  topP: z.number().min(0).max(1).default(1.0),
  topK: z.number().int().min(0).default(40),
  repeatPenalty: z.number().positive().default(1.1),

  // Supervisor / client timing
  startupTimeoutMs: z.number().int().positive().default(15_000),
  pollIntervalMs: z.number().int().positive().default(500),
  stopTimeoutMs: z.number().int().positive().default(5_000),
  requestTimeoutMs: z.number().int().positive().default(120_000),
  healthTimeoutMs: z.number().int().positive().default(5_000),
});

export type LlmConfig = z.infer<typeof LlmConfigSchema>;

export const ConfigFileSchema = z.object({
  llm: LlmConfigSchema.optional(),
});

export interface AppConfig {
  llm: LlmConfig;
}

export function defaultAppConfig(): AppConfig {
  return { llm: LlmConfigSchema.parse({}) };
}

export type LlmConfigKey = keyof LlmConfig;

export function isLlmConfigKey(key: string): key is LlmConfigKey {
  return key in LlmConfigSchema.shape;
}

/**
 * Loads, validates and persists config.json.
 *
 * A missing file means defaults. An unreadable or invalid file also means
 * defaults, with a warning, so a hand-edited typo never blocks startup.
 */
export class ConfigStore {
  readonly configDir: string;
  readonly configPath: string;
  private cached: AppConfig | null = null;

  constructor(configDir: string = getConfigDir()) {
    this.configDir = configDir;
    this.configPath = path.join(configDir, "config.json");
  }

  async load(): Promise<AppConfig> {
    let raw: string;
    try {
      raw = await fs.readFile(this.configPath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
        log.warn(`Failed to read config ${this.configPath}: ${getErrorMessage(err)}`);
      }
      this.cached = defaultAppConfig();
      return this.cached;
    }

    try {
      const parsed = ConfigFileSchema.parse(JSON.parse(raw));
      this.cached = { llm: parsed.llm ?? LlmConfigSchema.parse({}) };
    } catch (err) {
      log.warn(`Failed to load config ${this.configPath}, using defaults: ${getErrorMessage(err)}`);
      this.cached = defaultAppConfig();
    }
    return this.cached;
  }

  /** Current config, loading on first use. */
  async get(): Promise<AppConfig> {
    return this.cached ?? this.load();
  }

  async save(config: AppConfig): Promise<void> {
    const validated: AppConfig = { llm: LlmConfigSchema.parse(config.llm) };
    await fs.mkdir(this.configDir, { recursive: true });
    await writeFileAtomic(this.configPath, JSON.stringify(validated, null, 2) + "\n", "utf-8");
    this.cached = validated;
  }

  /** Merge a partial LLM section, validate, and persist. */
  updateLlm(patch: Partial<LlmConfig>): Promise<LlmConfig> {
    return this.mergeLlm(patch);
  }

  /**
   * Set one value by dotted key ("llm.serverPort") from its string form.
   * Numbers are coerced for numeric fields; validation errors propagate.
   */
  async setValue(dottedKey: string, rawValue: string): Promise<LlmConfig> {
    const [section, key, ...rest] = dottedKey.split(".");
    if (section !== "llm" || !key || rest.length > 0 || !isLlmConfigKey(key)) {
      throw new Error(`Unknown config key: ${dottedKey}`);
    }

    const current = (await this.get()).llm;
    const value = typeof current[key] === "number" ? Number(rawValue) : rawValue;
    return this.mergeLlm({ [key]: value });
  }

  private async mergeLlm(patch: Record<string, unknown>): Promise<LlmConfig> {
    const current = await this.get();
    const next: AppConfig = { llm: LlmConfigSchema.parse({ ...current.llm, ...patch }) };
    await this.save(next);
    return next.llm;
  }
}
