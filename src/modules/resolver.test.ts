import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { resolve } from "./resolver";
import { ManifestError } from "../utils";
import { createTestContext } from "../testing/context";

describe("resolve", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "minegraph-resolve-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("takes the manifest column in file order", async () => {
    const metadata = path.join(dir, "list.csv");
    await writeFile(metadata, "fasta_files\nz.fasta\na.fasta\nm.fasta\n");
    const ctx = createTestContext({ dataDir: dir, metadata });

    await resolve(ctx);

    expect(ctx.files).toEqual(["z.fasta", "a.fasta", "m.fasta"]);
    expect(ctx.manifest).toBe("fasta_files");
    expect(ctx.tracker.getSummary().files).toEqual([
      "z.fasta",
      "a.fasta",
      "m.fasta",
    ]);
  });

  it("accepts a single column with another header", async () => {
    const metadata = path.join(dir, "list.csv");
    await writeFile(metadata, "samples\na.fasta\n");
    const ctx = createTestContext({ dataDir: dir, metadata });

    await resolve(ctx);

    expect(ctx.files).toEqual(["a.fasta"]);
    expect(ctx.manifest).toBe("samples");
  });

  it("aborts on a manifest with two columns", async () => {
    const metadata = path.join(dir, "list.csv");
    await writeFile(metadata, "fasta_files,species\na.fasta,oryza\n");
    const ctx = createTestContext({ dataDir: dir, metadata });

    await expect(resolve(ctx)).rejects.toThrow(ManifestError);
    expect(ctx.files).toBeUndefined();
  });

  it("aborts on a manifest that lists no files", async () => {
    const metadata = path.join(dir, "list.csv");
    await writeFile(metadata, "fasta_files\n");
    const ctx = createTestContext({ dataDir: dir, metadata });

    await expect(resolve(ctx)).rejects.toThrow(
      `Manifest ${metadata} lists no files`,
    );
  });

  it("lists FASTA files in the data directory without a manifest", async () => {
    await writeFile(path.join(dir, "b.fasta"), "");
    await writeFile(path.join(dir, "a.fasta"), "");
    await writeFile(path.join(dir, "readme.md"), "");
    const ctx = createTestContext({ dataDir: dir });

    await resolve(ctx);

    expect(ctx.files).toEqual(["a.fasta", "b.fasta"]);
    expect(ctx.manifest).toBeUndefined();
  });

  it("aborts when the data directory has no FASTA files", async () => {
    const ctx = createTestContext({ dataDir: dir });

    await expect(resolve(ctx)).rejects.toThrow(
      `No files ending in .fasta found in ${dir}`,
    );
  });
});
