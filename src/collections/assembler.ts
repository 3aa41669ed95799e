import fs from "node:fs";
import path from "node:path";
import execa from "execa";

import type { FileStore } from "../content/fileStore";
import type { EntityCache } from "../entities/cache";
import type { CollectionRecord, EntityRecord } from "../entities/types";
import { logger } from "../logger";

const SAFE_COLLECTION_NAME = /^[A-Za-z0-9_]+$/;

export interface ArchiveBundler {
  /** Packs `sourceDir` into `archivePath`; the archive must not exist beforehand. */
  bundle(sourceDir: string, archivePath: string): Promise<void>;
}

export function createZipBundler(): ArchiveBundler {
  return {
    async bundle(sourceDir, archivePath) {
      // zip runs inside the parent of sourceDir, so a relative archive path would resolve from there.
      await execa("zip", ["-9", "-r", path.resolve(archivePath), path.basename(sourceDir)], {
        cwd: path.dirname(sourceDir)
      });
    }
  };
}

export function isValidCollectionName(name: string): boolean {
  return SAFE_COLLECTION_NAME.test(name);
}

export function archivePathFor(collectionsDir: string, name: string): string {
  if (!isValidCollectionName(name)) {
    throw new Error(`Invalid sticker set name: ${name}`);
  }
  return path.join(collectionsDir, `${name}.zip`);
}

export function stickerExtension(file: EntityRecord | null): "webp" | "tgs" | "webm" {
  if (file?.is_video === "true") return "webm";
  if (file?.is_animated === "true") return "tgs";
  return "webp";
}

export function memberFileName(index: number, file: EntityRecord | null): string {
  return `Sticker_${String(index + 1).padStart(3, "0")}.${stickerExtension(file)}`;
}

/**
 * Copies every member into `<collectionsDir>/<name>/` in list order and bundles
 * the directory into `<collectionsDir>/<name>.zip`. Returns the archive path.
 */
export async function assembleCollection(params: {
  collection: CollectionRecord;
  cache: EntityCache;
  fileStore: FileStore;
  collectionsDir: string;
  bundler: ArchiveBundler;
}): Promise<string> {
  const { collection, cache, fileStore, collectionsDir, bundler } = params;
  const archivePath = archivePathFor(collectionsDir, collection.name);
  const outputDir = path.join(collectionsDir, collection.name);

  await fs.promises.rm(outputDir, { recursive: true, force: true });
  await fs.promises.mkdir(outputDir, { recursive: true });

  for (const [index, fileId] of collection.fileIds.entries()) {
    const target = path.join(outputDir, memberFileName(index, cache.get("file", fileId)));
    await fs.promises.copyFile(fileStore.pathFor(fileId), target);
  }

  await fs.promises.rm(archivePath, { force: true });
  await bundler.bundle(outputDir, archivePath);

  logger.info({ name: collection.name, files: collection.fileIds.length, archivePath }, "Sticker set assembled");
  return archivePath;
}
