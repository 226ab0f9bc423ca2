// Filesystem and in-memory implementations of BundleReader and BundleWriter.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { BundleReader, BundleWriter } from './types.js';

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a BundleWriter that writes to the local filesystem.
 */
export function createFilesystemWriter(): BundleWriter {
  return {
    async writeFile(filePath: string, content: string): Promise<void> {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, content, 'utf-8');
    },

    exists: pathExists,
  };
}

/**
 * Create a BundleReader that reads from the local filesystem.
 */
export function createFilesystemReader(): BundleReader {
  return {
    exists: pathExists,

    async readFile(filePath: string): Promise<string> {
      return fs.readFile(filePath, 'utf-8');
    },
  };
}

/**
 * Create an in-memory BundleWriter for testing.
 * Returns the writer and a Map of all written files.
 */
export function createInMemoryWriter(): {
  writer: BundleWriter;
  files: Map<string, string>;
} {
  const files = new Map<string, string>();

  const writer: BundleWriter = {
    async writeFile(filePath: string, content: string): Promise<void> {
      files.set(filePath, content);
    },

    async exists(filePath: string): Promise<boolean> {
      return files.has(filePath);
    },
  };

  return { writer, files };
}

/**
 * Create an in-memory BundleReader from a Map of files.
 */
export function createInMemoryReader(files: Map<string, string>): BundleReader {
  return {
    async exists(filePath: string): Promise<boolean> {
      return files.has(filePath);
    },

    async readFile(filePath: string): Promise<string> {
      const content = files.get(filePath);
      if (content === undefined) {
        throw new Error(`File not found: ${filePath}`);
      }
      return content;
    },
  };
}
