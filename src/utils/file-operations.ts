import { promises as fs } from "fs";
import { dirname } from "path";

/**
 * Read a file asynchronously
 */
export async function readFile(path: string, encoding: BufferEncoding = "utf8"): Promise<string> {
  return fs.readFile(path, encoding);
}

/**
 * Write a file asynchronously, creating directories if needed
 */
export async function writeFile(path: string, data: string | Buffer): Promise<void> {
  const dir = dirname(path);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(path, data);
}

/**
 * Read a JSON file and parse it. The content is left for the caller to validate.
 */
export async function readJSON(path: string): Promise<unknown> {
  const content = await readFile(path);
  return JSON.parse(content);
}

/**
 * Write a JSON file with pretty formatting
 */
export async function writeJSON(path: string, data: unknown, spaces = 2): Promise<void> {
  const content = JSON.stringify(data, null, spaces);
  await writeFile(path, content);
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
