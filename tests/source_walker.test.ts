import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SourceWalker } from "../core/source_walker";

describe("SourceWalker", () => {
  let dir: string;

  function touch(relPath: string, text = ""): void {
    const file = path.join(dir, relPath);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, text, "utf8");
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "hdldoc-walk-"));
    touch(".gitignore", "ignored/\n# generated netlists\n*.bak.v\n");
    touch("rtl/a.v");
    touch("rtl/b.sv");
    touch("rtl/old.bak.v");
    touch("rtl/x.vhd");
    touch("build/c.v");
    touch("ignored/d.v");
    touch("notes.txt");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("lists accepted files that no ignore rule excludes", async () => {
    const walker = new SourceWalker({ rootDir: dir, extraIgnorePatterns: ["build/"], extensions: [".v", ".sv"] });
    expect(await walker.walk()).toEqual([path.join(dir, "rtl", "a.v"), path.join(dir, "rtl", "b.sv")]);
  });

  it("accepts every extension when none is given", async () => {
    const walker = new SourceWalker({ rootDir: dir, ignoreFiles: [] });
    const files = (await walker.walk()).map((f) => path.relative(dir, f).split(path.sep).join("/"));
    expect(files).toEqual([
      ".gitignore",
      "build/c.v",
      "ignored/d.v",
      "notes.txt",
      "rtl/a.v",
      "rtl/b.sv",
      "rtl/old.bak.v",
      "rtl/x.vhd",
    ]);
  });

  it("applies directory-only patterns to directories", () => {
    const walker = new SourceWalker({ rootDir: dir, ignoreFiles: [], extraIgnorePatterns: ["build/"] });
    expect(walker.isIgnored("build", true)).toBe(true);
    expect(walker.isIgnored("build", false)).toBe(false);
    expect(walker.isIgnored(path.join("rtl", "a.v"))).toBe(false);
  });
});
