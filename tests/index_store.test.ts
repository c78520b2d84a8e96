import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_INDEX_FILE, isParsedFile, loadIndex, writeIndex } from "../core/index_store";
import { ParsedFile } from "../types/hdl";

function entry(filePath: string, name: string): ParsedFile {
  return {
    filePath,
    language: "verilog",
    mtimeMs: 1000,
    modules: [{ kind: "module", name, ports: [], parameters: [], sections: {}, submodules: [] }],
  };
}

describe("index store", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "hdldoc-index-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("writes entries sorted by path and reads them back", () => {
    const written = writeIndex(dir, [entry("/src/b.v", "b"), entry("/src/a.v", "a")]);
    expect(written).toBe(path.join(dir, DEFAULT_INDEX_FILE));
    expect(loadIndex(dir)).toEqual([entry("/src/a.v", "a"), entry("/src/b.v", "b")]);
  });

  it("honours a custom file name", () => {
    writeIndex(dir, [entry("/src/a.v", "a")], "custom.json");
    expect(fs.existsSync(path.join(dir, "custom.json"))).toBe(true);
    expect(loadIndex(dir, "custom.json")).toHaveLength(1);
  });

  it("returns an empty index when the file is missing", () => {
    expect(loadIndex(dir)).toEqual([]);
  });

  it("warns and starts empty on invalid JSON", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    fs.writeFileSync(path.join(dir, DEFAULT_INDEX_FILE), "{ not json", "utf8");
    expect(loadIndex(dir)).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("warns and starts empty when the file is not a list", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    fs.writeFileSync(path.join(dir, DEFAULT_INDEX_FILE), '{"files": []}', "utf8");
    expect(loadIndex(dir)).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("drops malformed entries", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const good = entry("/src/a.v", "a");
    fs.writeFileSync(path.join(dir, DEFAULT_INDEX_FILE), JSON.stringify([good, { filePath: 3 }]), "utf8");
    expect(loadIndex(dir)).toEqual([good]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("checks the shape of an entry", () => {
    expect(isParsedFile(entry("/x.v", "x"))).toBe(true);
    expect(isParsedFile({ ...entry("/x.v", "x"), modules: [{ name: "x" }] })).toBe(false);
    expect(isParsedFile(null)).toBe(false);
  });
});
