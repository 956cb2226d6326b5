import * as fs from "fs/promises";
import { constants } from "fs";
import * as os from "os";
import * as path from "path";

/**
 * Expand tilde (~) in paths to the user's home directory
 *
 * @example
 * expandTilde("~/models") // => "/home/user/models"
 * expandTilde("~") // => "/home/user"
 * expandTilde("/absolute/path") // => "/absolute/path"
 */
export function expandTilde(inputPath: string, homeDir: string = os.homedir()): string {
  if (inputPath === "~") {
    return homeDir;
  }
  if (inputPath.startsWith("~/") || inputPath.startsWith("~\\")) {
    return path.join(homeDir, inputPath.slice(2));
  }
  return inputPath;
}

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * True for a regular file the current user may execute.
 * On Windows X_OK degrades to an existence check.
 */
export async function isExecutableFile(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    if (!stats.isFile()) {
      return false;
    }
    await fs.access(targetPath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
