import { open, stat } from "fs/promises";

/** Narrows a caught value to a Node system error carrying `code`. */
export const hasErrorCode = (error: unknown, code: string): boolean =>
    error instanceof Error && "code" in error && error.code === code;

/**
 * Checks if a file or directory exists at the given path.
 * @param filePath The path to check.
 * @returns True if the path exists, false if it does not.
 * @throws Errors other than ENOENT (permissions, I/O), which callers must not mistake for absence.
 */
export const fsExists = async (filePath: string): Promise<boolean> => {
    try {
      await stat(filePath);
      return true;
    } catch (error: unknown) {
      if (hasErrorCode(error, "ENOENT")) {
        return false;
      }
      throw error;
    }
  };

/**
 * Flushes a directory's entries to disk, making renames inside it durable.
 */
export const syncDirectory = async (dirPath: string): Promise<void> => {
    const handle = await open(dirPath, "r");
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
  };
