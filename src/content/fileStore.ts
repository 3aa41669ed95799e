import fs from "node:fs";
import path from "node:path";

const SAFE_FILE_ID = /^[A-Za-z0-9_-]+$/;

/** Raw downloaded files, one per file id, no extension. */
export interface FileStore {
  has(fileId: string): boolean;
  pathFor(fileId: string): string;
  read(fileId: string): Promise<Buffer>;
  write(fileId: string, bytes: Buffer): Promise<void>;
}

export function createDiskFileStore(rootDir: string): FileStore {
  fs.mkdirSync(rootDir, { recursive: true });

  const pathFor = (fileId: string): string => {
    if (!SAFE_FILE_ID.test(fileId)) {
      throw new Error(`Refusing unsafe file id: ${fileId}`);
    }
    return path.join(rootDir, fileId);
  };

  return {
    has(fileId) {
      return fs.existsSync(pathFor(fileId));
    },

    pathFor,

    async read(fileId) {
      return fs.promises.readFile(pathFor(fileId));
    },

    async write(fileId, bytes) {
      const target = pathFor(fileId);
      // Readers only ever see a complete file.
      const tmp = `${target}.${process.pid}.tmp`;
      await fs.promises.writeFile(tmp, bytes);
      await fs.promises.rename(tmp, target);
    }
  };
}
