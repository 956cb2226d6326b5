import { homedir } from "os";
import { join } from "path";

export const APP_NAME = "llamakeeper";

/**
 * Get the directory holding llamakeeper's config.json and PID file.
 * Can be overridden with LLAMAKEEPER_ROOT (tests use this for isolation).
 *
 * macOS: ~/Library/Application Support/llamakeeper
 * Linux/WSL: $XDG_CONFIG_HOME/llamakeeper or ~/.config/llamakeeper
 *
 * This is a getter function to support test mocking of os.homedir().
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LLAMAKEEPER_ROOT) {
    return env.LLAMAKEEPER_ROOT;
  }

  if (process.platform === "darwin") {
    return join(homedir(), "Library", "Application Support", APP_NAME);
  }

  const base = env.XDG_CONFIG_HOME ?? join(homedir(), ".config");
  return join(base, APP_NAME);
}

/**
 * Get the directory where llamakeeper's own llama.cpp build lives.
 * Example: ~/.local/share/llamakeeper/llama.cpp/build/bin/llama-server
 */
export function getDataDir(env: NodeJS.ProcessEnv = process.env, home: string = homedir()): string {
  const base = env.XDG_DATA_HOME ?? join(home, ".local", "share");
  return join(base, APP_NAME);
}

/**
 * Directory scanned for .gguf models when none is configured.
 */
export function getDefaultModelsDir(home: string = homedir()): string {
  return join(home, "models");
}
