// core/module_cache.ts

import * as fs from "fs";
import * as path from "path";
import { LanguageParser, ParsedFile, VerilogModule } from "../types/hdl";

interface CacheEntry {
  mtimeMs: number;
  modules: VerilogModule[];
}

/**
 * ModuleExtractor: parses files through a LanguageParser and remembers the result per
 * file.
 *
 * - The cache key is the absolute path; an entry is reused only while the file's mtime
 *   is unchanged.
 * - Only whole files are cached. A file that fails to parse is never stored.
 * - extractModulesFromSource() never touches the cache.
 */
export class ModuleExtractor {
  private readonly cache = new Map<string, CacheEntry>();

  constructor(
    readonly parser: LanguageParser,
    private readonly encoding: BufferEncoding = "utf8"
  ) {}

  /**
   * extractModules(filePath):
   *   Return the modules of `filePath`, from the cache when the file has not changed
   *   since it was parsed, otherwise by parsing it and storing the result.
   */
  async extractModules(filePath: string): Promise<VerilogModule[]> {
    return (await this.extractFile(filePath)).modules;
  }

  /**
   * extractFile(filePath):
   *   Same as extractModules() but returns the index entry for the file.
   */
  async extractFile(filePath: string): Promise<ParsedFile> {
    const absPath = path.resolve(filePath);
    const { mtimeMs } = await fs.promises.stat(absPath);

    const cached = this.cache.get(absPath);
    if (cached && cached.mtimeMs === mtimeMs) {
      return { filePath: absPath, language: this.parser.language, mtimeMs, modules: cached.modules };
    }

    const modules = await this.parser.extractModules(absPath, this.encoding);
    this.cache.set(absPath, { mtimeMs, modules });
    return { filePath: absPath, language: this.parser.language, mtimeMs, modules };
  }

  /** Parse a text buffer directly, bypassing the cache. */
  extractModulesFromSource(text: string): VerilogModule[] {
    return this.parser.parseSource(text);
  }

  /**
   * seed(entries):
   *   Prime the cache from a previously written index. Entries for another language
   *   are ignored.
   */
  seed(entries: readonly ParsedFile[]): void {
    for (const entry of entries) {
      if (entry.language !== this.parser.language) continue;
      this.cache.set(path.resolve(entry.filePath), { mtimeMs: entry.mtimeMs, modules: entry.modules });
    }
  }

  has(filePath: string): boolean {
    return this.cache.has(path.resolve(filePath));
  }

  invalidate(filePath: string): boolean {
    return this.cache.delete(path.resolve(filePath));
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  /** True when the type string carries array dimensions, e.g. "reg [7:0]". */
  isArrayType(dataType: string): boolean {
    return dataType.includes("[");
  }
}
