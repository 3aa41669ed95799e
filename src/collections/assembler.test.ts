import fs from "node:fs";
import path from "node:path";
import execa from "execa";
import { afterEach, describe, expect, it } from "vitest";

import { createDiskFileStore } from "../content/fileStore";
import { EntityCache } from "../entities/cache";
import { createFakeBundler, makeTempDir } from "../testing/fakes";
import {
  archivePathFor,
  assembleCollection,
  createZipBundler,
  isValidCollectionName,
  memberFileName,
  stickerExtension
} from "./assembler";

const tempDirs: string[] = [];

const hasZip = execa.sync("zip", ["-v"], { reject: false }).exitCode === 0;

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("member naming", () => {
  it("picks the extension from the sticker format", () => {
    expect(stickerExtension({ id: "a", is_video: "true", is_animated: "false" })).toBe("webm");
    expect(stickerExtension({ id: "b", is_animated: "true" })).toBe("tgs");
    expect(stickerExtension({ id: "c" })).toBe("webp");
    expect(stickerExtension(null)).toBe("webp");
  });

  it("numbers members from one with three digits", () => {
    expect(memberFileName(0, null)).toBe("Sticker_001.webp");
    expect(memberFileName(41, { id: "x", is_animated: "true" })).toBe("Sticker_042.tgs");
  });

  it("only accepts plain set names", () => {
    expect(isValidCollectionName("Cats_2024")).toBe(true);
    expect(isValidCollectionName("../etc")).toBe(false);
    expect(isValidCollectionName("")).toBe(false);
    expect(() => archivePathFor("/out", "a/b")).toThrow("Invalid sticker set name: a/b");
    expect(archivePathFor("/out", "cats")).toBe(path.join("/out", "cats.zip"));
  });
});

describe("assembleCollection", () => {
  it("copies members in list order and bundles them", async () => {
    const root = makeTempDir();
    tempDirs.push(root);
    const fileStore = createDiskFileStore(path.join(root, "files"));
    const collectionsDir = path.join(root, "collections");
    const cache = new EntityCache();
    cache.set("file", { id: "b", is_animated: "true" });
    await fileStore.write("a", Buffer.from("first"));
    await fileStore.write("b", Buffer.from("second"));
    const { bundler, calls } = createFakeBundler();

    const archivePath = await assembleCollection({
      collection: { name: "mixed", info: { id: "mixed", name: "mixed" }, fileIds: ["b", "a"] },
      cache,
      fileStore,
      collectionsDir,
      bundler
    });

    const outputDir = path.join(collectionsDir, "mixed");
    expect(archivePath).toBe(path.join(collectionsDir, "mixed.zip"));
    expect(calls).toEqual([{ sourceDir: outputDir, archivePath, files: ["Sticker_001.tgs", "Sticker_002.webp"] }]);
    expect(fs.readFileSync(path.join(outputDir, "Sticker_001.tgs"), "utf8")).toBe("second");
    expect(fs.readFileSync(path.join(outputDir, "Sticker_002.webp"), "utf8")).toBe("first");
  });

  it("clears leftovers from a previous assembly", async () => {
    const root = makeTempDir();
    tempDirs.push(root);
    const fileStore = createDiskFileStore(path.join(root, "files"));
    const collectionsDir = path.join(root, "collections");
    const outputDir = path.join(collectionsDir, "cats");
    fs.mkdirSync(outputDir, { recursive: true });
    fs.writeFileSync(path.join(outputDir, "Sticker_009.webp"), "stale");
    fs.writeFileSync(path.join(collectionsDir, "cats.zip"), "old archive");
    await fileStore.write("a", Buffer.from("fresh"));
    const { bundler, calls } = createFakeBundler();

    await assembleCollection({
      collection: { name: "cats", info: { id: "cats", name: "cats" }, fileIds: ["a"] },
      cache: new EntityCache(),
      fileStore,
      collectionsDir,
      bundler
    });

    expect(calls[0].files).toEqual(["Sticker_001.webp"]);
    expect(fs.readFileSync(path.join(collectionsDir, "cats.zip"), "utf8")).toBe("zip");
  });

  it("fails when a member is missing from the file store", async () => {
    const root = makeTempDir();
    tempDirs.push(root);
    const { bundler, calls } = createFakeBundler();

    await expect(
      assembleCollection({
        collection: { name: "gone", info: { id: "gone", name: "gone" }, fileIds: ["missing"] },
        cache: new EntityCache(),
        fileStore: createDiskFileStore(path.join(root, "files")),
        collectionsDir: path.join(root, "collections"),
        bundler
      })
    ).rejects.toThrow();
    expect(calls).toEqual([]);
  });

  it.skipIf(!hasZip)("zips into a collections dir given relative to the working directory", async () => {
    const root = makeTempDir();
    tempDirs.push(root);
    const fileStore = createDiskFileStore(path.join(root, "files"));
    await fileStore.write("a", Buffer.from("sticker bytes"));
    const collectionsDir = path.relative(process.cwd(), path.join(root, "collections"));

    const archivePath = await assembleCollection({
      collection: { name: "foo", info: { id: "foo", name: "foo" }, fileIds: ["a"] },
      cache: new EntityCache(),
      fileStore,
      collectionsDir,
      bundler: createZipBundler()
    });

    expect(archivePath).toBe(path.join(collectionsDir, "foo.zip"));
    const archive = fs.readFileSync(path.join(root, "collections", "foo.zip"));
    expect(archive.subarray(0, 2).toString("latin1")).toBe("PK");
    expect(archive.includes("foo/Sticker_001.webp")).toBe(true);
  });
});
