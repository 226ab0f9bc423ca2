// Bundle file abstractions for saving and loading snapshots.
// Lets tests swap the filesystem for memory.

/**
 * Abstraction for writing bundle files.
 */
export interface BundleWriter {
  /**
   * Write a file with the given content.
   * Creates parent directories as needed.
   */
  writeFile(path: string, content: string): Promise<void>;

  exists(path: string): Promise<boolean>;
}

/**
 * Abstraction for reading bundle files.
 */
export interface BundleReader {
  exists(path: string): Promise<boolean>;

  /**
   * Read a file as text.
   */
  readFile(path: string): Promise<string>;
}
