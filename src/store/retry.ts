import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { v4 as uuidv4 } from "uuid";
import { PersistenceError, errorMessage } from "../errors.js";

/** rw-r----- */
export const RETRY_FILE_MODE = 0o640;

/**
 * Stage a payload that could not be delivered. The file is named by a fresh
 * v4 UUID so concurrent writers never collide, and is left for an external
 * retry process to pick up. Returns the path written.
 */
export async function saveForRetry(retryFolder: string, payload: string | Uint8Array): Promise<string> {
  let id: string;
  try {
    id = uuidv4();
  } catch (err) {
    throw new PersistenceError(`cannot generate retry file name: ${errorMessage(err)}`, { cause: err });
  }
  const path = join(retryFolder, id);
  try {
    await writeFile(path, payload, { mode: RETRY_FILE_MODE, flag: "wx" });
  } catch (err) {
    throw new PersistenceError(`cannot write retry file ${path}: ${errorMessage(err)}`, { cause: err });
  }
  return path;
}
