import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { listFastaFiles } from "./list-fasta-files";

describe("listFastaFiles", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "minegraph-data-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("lists files ending with the extension, sorted by name", async () => {
    for (const name of ["b.fasta", "a.fasta", "notes.txt", "c.fa"]) {
      await writeFile(path.join(dir, name), ">seq\nACGT\n");
    }

    expect(await listFastaFiles(dir, ".fasta")).toEqual(["a.fasta", "b.fasta"]);
  });

  it("includes files whose name starts with a dot", async () => {
    await writeFile(path.join(dir, ".h.fasta"), ">seq\nACGT\n");
    await writeFile(path.join(dir, "a.fasta"), ">seq\nACGT\n");

    expect(await listFastaFiles(dir, ".fasta")).toEqual([".h.fasta", "a.fasta"]);
  });

  it("orders by code unit, placing uppercase before lowercase", async () => {
    for (const name of ["b.fasta", "a.fasta", "Z.fasta"]) {
      await writeFile(path.join(dir, name), ">seq\nACGT\n");
    }

    expect(await listFastaFiles(dir, ".fasta")).toEqual([
      "Z.fasta",
      "a.fasta",
      "b.fasta",
    ]);
  });

  it("does not descend into subdirectories", async () => {
    await writeFile(path.join(dir, "top.fasta"), ">seq\nACGT\n");
    await mkdir(path.join(dir, "nested"));
    await writeFile(path.join(dir, "nested", "inner.fasta"), ">seq\nACGT\n");

    expect(await listFastaFiles(dir, ".fasta")).toEqual(["top.fasta"]);
  });

  it("ignores directories whose name ends with the extension", async () => {
    await mkdir(path.join(dir, "folder.fasta"));

    expect(await listFastaFiles(dir, ".fasta")).toEqual([]);
  });

  it("honours a configured extension", async () => {
    await writeFile(path.join(dir, "a.fasta"), "");
    await writeFile(path.join(dir, "b.fa"), "");

    expect(await listFastaFiles(dir, ".fa")).toEqual(["b.fa"]);
  });
});
