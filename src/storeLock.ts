import { mkdir, open, rm, type FileHandle } from "fs/promises";
import * as path from "path";
import { StoreLockedError } from "./errors.js";
import { hasErrorCode } from "./utilities.js";

export const LOCK_FILE = ".lock";

/** Releases a lock taken by {@link acquireStoreLock}. */
export type ReleaseStoreLock = () => Promise<void>;

/**
 * Takes the advisory writer lock of a store directory so that two runs never read the
 * same starting size and hand out the same ids. The lock file holds the owner's pid.
 * @throws {StoreLockedError} when another run holds the lock.
 */
export async function acquireStoreLock(dir: string): Promise<ReleaseStoreLock> {
  await mkdir(dir, { recursive: true });
  const lockPath = path.join(dir, LOCK_FILE);

  let handle: FileHandle;
  try {
    handle = await open(lockPath, "wx");
  } catch (error) {
    if (hasErrorCode(error, "EEXIST")) {
      throw new StoreLockedError(lockPath);
    }
    throw error;
  }

  try {
    await handle.writeFile(`${process.pid}\n`);
  } catch (error) {
    await handle.close();
    await rm(lockPath, { force: true });
    throw error;
  }
  await handle.close();

  return async () => {
    await rm(lockPath, { force: true });
  };
}
