/**
 * File System Utilities
 *
 * JSONL reading for corpus and judgment files, and expansion of input paths
 * (a directory stands for the .jsonl files directly inside it).
 */

import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Error class for a missing or unreadable input path
 */
export class PathNotFoundError extends Error {
  code: string;

  constructor(readonly filePath: string, reason: string = 'Path not found') {
    super(`${reason}: ${filePath}`);
    this.name = 'PathNotFoundError';
    this.code = 'PATH_NOT_FOUND';
  }
}

/** One non-blank line of a JSONL file, 1-based */
export type JsonlEntry = { line: number; value: unknown } | { line: number; error: string };

export function isJsonlError(entry: JsonlEntry): entry is { line: number; error: string } {
  return 'error' in entry;
}

/**
 * Read a JSONL file. Blank lines are skipped; a line that is not valid JSON
 * becomes an error entry instead of aborting the read.
 *
 * @throws PathNotFoundError if the file does not exist or is not a regular file
 */
export async function readJsonl(filePath: string): Promise<JsonlEntry[]> {
  const resolved = path.resolve(filePath);
  await assertFile(resolved);

  const content = await fs.readFile(resolved, 'utf-8');
  const entries: JsonlEntry[] = [];

  content.split(/\r?\n/).forEach((text, index) => {
    const trimmed = text.trim();
    if (trimmed.length === 0) return;
    try {
      entries.push({ line: index + 1, value: JSON.parse(trimmed) });
    } catch (error) {
      entries.push({ line: index + 1, error: error instanceof Error ? error.message : String(error) });
    }
  });

  return entries;
}

/**
 * Expand input paths: files are kept, directories contribute their *.jsonl
 * files in name order.
 *
 * @throws PathNotFoundError for a path that does not exist
 */
export async function expandInputPaths(inputPaths: readonly string[]): Promise<string[]> {
  const files: string[] = [];
  for (const inputPath of inputPaths) {
    const resolved = path.resolve(inputPath);
    const stat = await statOrNull(resolved);
    if (!stat) {
      throw new PathNotFoundError(resolved);
    }
    if (stat.isDirectory()) {
      const names = (await fs.readdir(resolved)).filter((name) => name.endsWith('.jsonl')).sort();
      files.push(...names.map((name) => path.join(resolved, name)));
    } else {
      files.push(resolved);
    }
  }
  return files;
}

async function assertFile(filePath: string): Promise<void> {
  const stat = await statOrNull(filePath);
  if (!stat) {
    throw new PathNotFoundError(filePath);
  }
  if (!stat.isFile()) {
    throw new PathNotFoundError(filePath, 'Not a regular file');
  }
}

async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await fs.stat(filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}
