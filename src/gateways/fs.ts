import { writeFile } from "node:fs/promises";

/** Filesystem writes performed by the run index, injectable in tests. */
export interface FileSystemGateway {
  /** Persists UTF-8 encoded text at the provided path. */
  writeFileUtf8(path: string, data: string): Promise<void>;
}

export const defaultFileSystemGateway: FileSystemGateway = {
  async writeFileUtf8(path: string, data: string): Promise<void> {
    await writeFile(path, data, "utf8");
  },
};
