import { access } from "fs/promises";
import { constants } from "node:fs";

/**
 * Check if a file or directory exists and is readable
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}
