import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { CorpusLoadError, loadCorpus } from "../src/corpus";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "lm-corpus-"));
  await fs.writeFile(path.join(dir, "b.txt"), "<s> b </s>\n", "utf8");
  await fs.writeFile(path.join(dir, "a.txt"), "<s> a </s>\r\n<s> a a </s>", "utf8");
  await fs.writeFile(path.join(dir, "notes.md"), "ignored", "utf8");
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("corpus loading", () => {
  it("reads matched files in sorted order", async () => {
    const { files, lines } = await loadCorpus([path.join(dir, "*.txt")]);
    expect(files.map((f) => path.basename(f))).toEqual(["a.txt", "b.txt"]);
    expect(lines).toEqual(["<s> a </s>", "<s> a a </s>", "<s> b </s>", ""]);
  });

  it("reads each file once across patterns", async () => {
    const { files } = await loadCorpus([path.join(dir, "a.txt"), path.join(dir, "*.txt")]);
    expect(files.map((f) => path.basename(f))).toEqual(["a.txt", "b.txt"]);
  });

  it("fails when a pattern matches nothing", async () => {
    await expect(loadCorpus([path.join(dir, "*.csv")])).rejects.toBeInstanceOf(CorpusLoadError);
  });
});
