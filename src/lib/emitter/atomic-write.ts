/**
 * Atomic file replacement: write beside the destination, then rename over it
 */

import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import { FileIOError, OutputWriteError, hasErrorCode } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export function tempPathFor(destination: string): string {
  const suffix = `${process.pid}.${crypto.randomBytes(4).toString("hex")}`;
  return path.join(path.dirname(destination), `.${path.basename(destination)}.${suffix}.tmp`);
}

/**
 * Write data so that readers of `destination` only ever see the old file or the
 * complete new one. The temp file lives in the destination directory so the
 * rename stays on one filesystem.
 */
export async function writeFileAtomic(destination: string, data: string | Uint8Array): Promise<void> {
  const tempPath = tempPathFor(destination);

  try {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, destination);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn("Failed to remove temporary file", { tempPath, error: String(cleanupError) });
    });
    throw new OutputWriteError(`Failed to write ${destination}`, { destination }, { cause: error });
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) return false;
    throw new FileIOError(`Failed to check ${filePath}`, undefined, { cause: error });
  }
}
