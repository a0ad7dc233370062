/**
 * File system test utilities
 */

import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join, relative, sep } from "node:path";

/**
 * Relative file path to file content
 */
export type FileTree = Record<string, string>;

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "pathtable-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempRoot(prefix = "pathtable-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Write a tree of files below a directory, creating parents as needed
 * Keys use "/" separators; a leading "/" is ignored.
 */
export async function writeTree(root: string, tree: FileTree): Promise<void> {
  for (const [file, content] of Object.entries(tree)) {
    const target = join(root, ...file.split("/").filter(Boolean));
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, "utf-8");
  }
}

/**
 * Read every file below a directory
 * @returns Relative "/"-separated paths (sorted) to content
 */
export async function readTree(root: string): Promise<FileTree> {
  const tree: FileTree = {};
  for (const file of (await listFiles(root)).sort()) {
    tree[relative(root, file).split(sep).join("/")] = await readFile(file, "utf-8");
  }
  return tree;
}

async function listFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(full)));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files;
}
