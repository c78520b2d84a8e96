// core/source_walker.ts

import * as fs from "fs";
import * as path from "path";
import ignore, { Ignore } from "ignore";

///
// WalkerOptions: configuration for the source tree walker.
//
// - rootDir: directory to walk.
// - ignoreFiles: files under rootDir (like ".gitignore") to read ignore patterns from.
// - extraIgnorePatterns: additional gitignore-style patterns (e.g. "build/", "**/*.vcd").
// - extensions: if non-empty, only files whose lowercased extension appears here are returned.
///
export interface WalkerOptions {
  rootDir: string;
  ignoreFiles?: string[];
  extraIgnorePatterns?: string[];
  extensions?: string[];
}

export const DEFAULT_IGNORE_FILES = [".gitignore", ".ignore", ".hdldocignore"];

/**
 * SourceWalker: recursively lists HDL source files under a root directory.
 *
 * Ignore rules use the "ignore" package, which follows git's matching rules; paths are
 * handed to it relative to rootDir in POSIX form, with a trailing slash for directories
 * so that patterns like "build/" prune whole subtrees.
 */
export class SourceWalker {
  private readonly ig: Ignore = ignore();
  private readonly extensions: Set<string>;

  constructor(private readonly opts: WalkerOptions) {
    for (const name of opts.ignoreFiles ?? DEFAULT_IGNORE_FILES) {
      const fullPath = path.join(opts.rootDir, name);
      if (!fs.existsSync(fullPath) || !fs.statSync(fullPath).isFile()) continue;
      const lines = fs
        .readFileSync(fullPath, "utf8")
        .split(/\r?\n/)
        .map((l) => l.trim())
        .filter((l) => l && !l.startsWith("#"));
      this.ig.add(lines);
    }
    if (opts.extraIgnorePatterns?.length) {
      this.ig.add(opts.extraIgnorePatterns);
    }
    this.extensions = new Set((opts.extensions ?? []).map((e) => e.toLowerCase()));
  }

  /**
   * walk():
   *   Absolute paths of every non-ignored file with an accepted extension, sorted so
   *   that repeated runs list files in the same order.
   */
  async walk(): Promise<string[]> {
    const out: string[] = [];
    await this.visit(this.opts.rootDir, out);
    return out.sort();
  }

  /** Whether a path relative to rootDir is excluded by the ignore rules. */
  isIgnored(relPath: string, isDirectory = false): boolean {
    const posix = relPath.split(path.sep).join("/");
    return this.ig.ignores(isDirectory ? `${posix}/` : posix);
  }

  private async visit(dir: string, out: string[]): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (e) {
      console.warn(`⚠️  Cannot read directory ${dir}: ${(e as Error).message}`);
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      const relPath = path.relative(this.opts.rootDir, fullPath);

      if (entry.isDirectory()) {
        if (!this.isIgnored(relPath, true)) await this.visit(fullPath, out);
      } else if (entry.isFile() && !this.isIgnored(relPath) && this.accepts(entry.name)) {
        out.push(fullPath);
      }
      // symbolic links, sockets, etc. are skipped
    }
  }

  private accepts(fileName: string): boolean {
    return this.extensions.size === 0 || this.extensions.has(path.extname(fileName).toLowerCase());
  }
}
