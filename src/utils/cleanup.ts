import fs from "node:fs";
import { componentLogger } from "./logger.js";
import { errorMessage } from "../errors.js";

const log = componentLogger("cleanup");

// Removal failures are logged, never thrown
export async function removeQuietly(filePath: string): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true, recursive: true });
    log.debug({ filePath }, "removed temporary file");
  } catch (err) {
    log.warn({ filePath, err: errorMessage(err) }, "failed to remove temporary file");
  }
}
