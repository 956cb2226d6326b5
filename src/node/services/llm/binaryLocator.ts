import * as os from "os";
import * as path from "path";
import { APP_NAME, getDataDir } from "@/common/constants/paths";
import { expandTilde, isExecutableFile } from "@/node/utils/pathUtils";

export type BinaryCandidateSource = "configured" | "app-data" | "path" | "legacy";

export interface BinaryCandidate {
  path: string;
  source: BinaryCandidateSource;
}

export interface BinaryLocatorOptions {
  /** Explicit `llm.serverBinary`; empty or undefined means auto-detect */
  configuredPath?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  homeDir?: string;
}

export function getServerBinaryName(platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? "llama-server.exe" : "llama-server";
}

/**
 * Ordered list of places llama-server may live. Order is the contract:
 * configured path → app data dir → PATH entries → legacy install locations.
 */
export function listBinaryCandidates(options: BinaryLocatorOptions = {}): BinaryCandidate[] {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const home = options.homeDir ?? os.homedir();
  const binaryName = getServerBinaryName(platform);
  const candidates: BinaryCandidate[] = [];

  const configured = options.configuredPath?.trim();
  if (configured) {
    candidates.push({ path: expandTilde(configured, home), source: "configured" });
  }

  candidates.push(
    {
      path: path.join(getDataDir(env, home), "llama.cpp", "build", "bin", binaryName),
      source: "app-data",
    },
    {
      path: path.join(
        home,
        "Library",
        "Application Support",
        APP_NAME,
        "llama.cpp",
        "build",
        "bin",
        binaryName
      ),
      source: "app-data",
    }
  );

  const pathVar = (platform === "win32" ? (env.Path ?? env.PATH) : env.PATH) ?? "";
  const delimiter = platform === "win32" ? ";" : ":";
  for (const dir of pathVar.split(delimiter)) {
    if (dir) {
      candidates.push({ path: path.join(dir, binaryName), source: "path" });
    }
  }

  const legacyDirs = [
    path.join(home, "llama.cpp", "build", "bin"),
    path.join(home, ".local", "bin"),
    "/usr/local/bin",
    "/opt/homebrew/bin", // macOS Apple Silicon
  ];
  for (const dir of legacyDirs) {
    candidates.push({ path: path.join(dir, binaryName), source: "legacy" });
  }

  return candidates;
}

/**
 * Resolve the llama-server executable. First existing executable wins; there
 * is no "best version" heuristic.
 */
export async function findServerBinary(
  options: BinaryLocatorOptions = {}
): Promise<BinaryCandidate | null> {
  for (const candidate of listBinaryCandidates(options)) {
    if (await isExecutableFile(candidate.path)) {
      return candidate;
    }
  }
  return null;
}
