import { promises as fs } from "node:fs";
import { basename, dirname, join } from "node:path";
import { randomBytes } from "node:crypto";

export interface StagedFile {
  path: string;
  data: string | Uint8Array;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Read a file asynchronously
 */
export async function readFile(path: string, encoding: BufferEncoding = "utf8"): Promise<string> {
  return fs.readFile(path, encoding);
}

export async function readBytes(path: string): Promise<Uint8Array> {
  const buffer = await fs.readFile(path);
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}

/**
 * Read a JSON file and parse it
 */
export async function readJSON(path: string): Promise<unknown> {
  const content = await readFile(path);
  return JSON.parse(content);
}

export function toJSON(data: unknown, spaces = 2): string {
  return JSON.stringify(data, (_, value) => (typeof value === "bigint" ? value.toString() : value), spaces);
}

/**
 * Check if a file exists
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Remove a file if it exists
 */
export async function removeFile(path: string): Promise<void> {
  try {
    await fs.unlink(path);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw error;
    }
  }
}

export function tempPathFor(path: string): string {
  return join(dirname(path), `.${basename(path)}.${randomBytes(4).toString("hex")}.tmp`);
}

/**
 * Writes every file under a temporary name beside its target, then renames
 * them into place. A failure before the renames removes the temporaries and
 * leaves the target paths untouched.
 */
export async function writeFilesAtomic(files: readonly StagedFile[]): Promise<string[]> {
  const staged: Array<{ temp: string; path: string }> = [];
  try {
    for (const file of files) {
      await fs.mkdir(dirname(file.path), { recursive: true });
      const temp = tempPathFor(file.path);
      staged.push({ temp, path: file.path });
      const handle = await fs.open(temp, "w");
      try {
        await handle.writeFile(file.data);
        await handle.sync();
      } finally {
        await handle.close();
      }
    }
  } catch (error) {
    await Promise.all(staged.map(({ temp }) => removeFile(temp)));
    throw error;
  }

  for (const [i, { temp, path }] of staged.entries()) {
    try {
      await fs.rename(temp, path);
    } catch (error) {
      await Promise.all(staged.slice(i).map((file) => removeFile(file.temp)));
      throw error;
    }
  }
  return staged.map(({ path }) => path);
}

/**
 * Write a file atomically, creating directories if needed
 */
export async function writeFile(path: string, data: string | Uint8Array): Promise<void> {
  await writeFilesAtomic([{ path, data }]);
}

/**
 * Write a JSON file with pretty formatting
 */
export async function writeJSON(path: string, data: unknown, spaces = 2): Promise<void> {
  await writeFile(path, toJSON(data, spaces));
}

/**
 * Get file stats
 */
export async function getFileStats(path: string) {
  return fs.stat(path);
}
