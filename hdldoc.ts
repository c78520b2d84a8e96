#!/usr/bin/env node
// hdldoc.ts

/**
 * Entry-point for the HDL documentation extractor.
 *
 * - Parses CLI flags:
 *   [positional rootDir]: e.g. `hdldoc /path/to/rtl --lang auto`
 *   --root <path>       : explicitly specify project root
 *   --lang <list>       : comma-separated list of languages to activate (e.g. "verilog")
 *   --lang=auto         : shorthand for auto-detect mode
 *   --detect            : alias for auto-detect mode
 *   --update <file>     : paths (relative to root) to re-parse into the existing index
 *   --output <name>     : index file name under root (default "hdl-modules.json")
 *   --force             : re-parse every file even if the index has it up to date
 *   --dump <file>       : print a detailed report of one file instead of indexing
 *   --tokens            : with --dump, print the lexer token stream first
 *
 * A full scan reuses index entries whose file mtime has not changed, so re-running
 * it after editing a few files only re-parses those files.
 */

import * as fs from "fs";
import * as path from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { HdlParseError } from "./core/errors";
import { DEFAULT_INDEX_FILE, loadIndex, writeIndex } from "./core/index_store";
import { ModuleExtractor } from "./core/module_cache";
import { SourceWalker } from "./core/source_walker";
import { collectExtensions, getActiveParsers, languagesForFiles, parserForFile } from "./language";
import { VerilogLexer } from "./language/verilog_rules";
import { errorContext, formatModule, formatToken } from "./report/module_report";
import { LanguageParser, ParsedFile, VerilogModule } from "./types/hdl";

const EXTRA_IGNORE_PATTERNS = [
  "dist/",
  "build/",
  "node_modules/",
  ".git/",
  "work/",
  "xsim.dir/",
  "obj_dir/",
  "**/*.vcd",
  "**/*.fst",
  "**/*.log",
];

interface RunOptions {
  rootDir: string;
  indexFile: string;
  encoding: BufferEncoding;
}

function makeExtractors(parsers: LanguageParser[], encoding: BufferEncoding): ModuleExtractor[] {
  return parsers.map((p) => new ModuleExtractor(p, encoding));
}

function extractorFor(filePath: string, extractors: ModuleExtractor[]): ModuleExtractor | undefined {
  const parser = parserForFile(
    filePath,
    extractors.map((e) => e.parser)
  );
  return extractors.find((e) => e.parser === parser);
}

/**
 * extractOne(filePath, extractors):
 *   Parse a file with the extractor matching its extension. Failures are reported
 *   with the file position and yield undefined.
 */
async function extractOne(filePath: string, extractors: ModuleExtractor[]): Promise<ParsedFile | undefined> {
  const extractor = extractorFor(filePath, extractors);
  if (!extractor) return undefined;
  try {
    return await extractor.extractFile(filePath);
  } catch (err) {
    if (err instanceof HdlParseError) {
      console.warn(`⚠️  ${err.message}`);
    } else {
      console.warn(`⚠️  Error extracting modules from ${filePath} with ${extractor.parser.language}: ${(err as Error).message}`);
    }
    return undefined;
  }
}

/**
 * runFullScan(opts, parsers, force):
 *   1. Collect the extensions of the active parsers and walk the tree.
 *   2. Unless forced, seed the per-language caches from the existing index.
 *   3. Parse every file (cache hits are skipped) and write the new index.
 */
async function runFullScan(opts: RunOptions, parsers: LanguageParser[], force: boolean): Promise<void> {
  console.log("🔍 Full scan: traversing source tree…");

  const walker = new SourceWalker({
    rootDir: opts.rootDir,
    extraIgnorePatterns: EXTRA_IGNORE_PATTERNS,
    extensions: collectExtensions(parsers),
  });

  const t0 = process.hrtime.bigint();
  const files = await walker.walk();
  const t1 = process.hrtime.bigint();
  console.log(`➡️  Found ${files.length} source file(s) in ${(Number(t1 - t0) / 1_000_000).toFixed(2)} ms`);

  const extractors = makeExtractors(parsers, opts.encoding);
  if (!force) {
    const previous = loadIndex(opts.rootDir, opts.indexFile);
    extractors.forEach((e) => e.seed(previous));
  }
  const seeded = extractors.reduce((n, e) => n + e.size, 0);

  const results: ParsedFile[] = [];
  let failed = 0;
  for (const [i, filePath] of files.entries()) {
    const parsed = await extractOne(filePath, extractors);
    if (parsed) {
      results.push(parsed);
    } else {
      failed++;
    }
    if ((i + 1) % 50 === 0) {
      console.log(`   • Processed ${i + 1}/${files.length} files…`);
    }
  }

  const jsonPath = writeIndex(opts.rootDir, results, opts.indexFile);
  const moduleCount = results.reduce((n, f) => n + f.modules.length, 0);
  console.log(`✅ ${opts.indexFile} updated (${results.length} file(s), ${moduleCount} module(s)).`);
  console.log(`   ↳ File path: ${jsonPath}`);
  if (seeded > 0) console.log(`   ↳ ${seeded} cached entr(y/ies) available from the previous index`);
  if (failed > 0) console.warn(`⚠️  ${failed} file(s) could not be parsed and were left out.`);
}

/**
 * runIncrementalUpdate(opts, parsers, updatePaths):
 *   Re-parse the listed files and replace (or drop) their entries in the existing index.
 */
async function runIncrementalUpdate(opts: RunOptions, parsers: LanguageParser[], updatePaths: string[]): Promise<void> {
  console.log("🔄 Incremental update mode for file(s):");
  updatePaths.forEach((p) => console.log("   -", p));

  const index = new Map(loadIndex(opts.rootDir, opts.indexFile).map((f) => [f.filePath, f]));
  const extractors = makeExtractors(parsers, opts.encoding);
  const allExts = collectExtensions(parsers);

  for (const rawPath of updatePaths) {
    const absPath = path.resolve(opts.rootDir, rawPath);

    if (!fs.existsSync(absPath) || !fs.statSync(absPath).isFile()) {
      console.warn(`⚠️  Path does not exist or is not a file: ${absPath}. Removing it from the index.`);
      index.delete(absPath);
      continue;
    }

    const ext = path.extname(absPath).toLowerCase();
    if (!allExts.includes(ext)) {
      console.warn(`⚠️  ${absPath}: unsupported extension "${ext}". Skipping.`);
      continue;
    }

    const parsed = await extractOne(absPath, extractors);
    if (parsed) {
      index.set(absPath, parsed);
    } else {
      // a stale entry would describe code that no longer parses
      index.delete(absPath);
    }
  }

  const jsonPath = writeIndex(opts.rootDir, Array.from(index.values()), opts.indexFile);
  console.log(`✅ ${opts.indexFile} updated (${index.size} file entries).`);
  console.log(`   ↳ File path: ${jsonPath}`);
}

/**
 * runDump(filePath, parsers, showTokens, encoding):
 *   Print the token stream (optionally) and the detailed report of every module in one file.
 *   Returns false when the file could not be parsed.
 */
async function runDump(
  filePath: string,
  parsers: LanguageParser[],
  showTokens: boolean,
  encoding: BufferEncoding
): Promise<boolean> {
  const parser = parserForFile(filePath, parsers);
  if (!parser) {
    console.error(`❌ No active parser handles ${filePath}.`);
    return false;
  }

  const text = await fs.promises.readFile(filePath, encoding);
  console.log(`\nFile: ${filePath} (${text.length} characters)`);

  if (showTokens && parser.language === "verilog") {
    console.log("\n=== Tokens ===");
    try {
      for (const token of VerilogLexer.run(text)) console.log(formatToken(token));
    } catch (err) {
      if (!(err instanceof HdlParseError)) throw err;
      console.error(`❌ ${err.message}`);
      if (err.offset !== undefined) console.error(`   ${JSON.stringify(errorContext(text, err.offset))}`);
    }
  }

  let modules: VerilogModule[];
  try {
    modules = parser.parseSource(text);
  } catch (err) {
    if (!(err instanceof HdlParseError)) throw err;
    console.error(`❌ ${err.inFile(filePath).message}`);
    return false;
  }

  console.log(`\nFound ${modules.length} module(s)\n`);
  for (const module of modules) {
    console.log(formatModule(module));
    console.log();
  }
  return true;
}

/**
 * detectLanguages(rootDir):
 *   Walk the tree once with the union of all known extensions and return the language
 *   keys for which at least one file was found.
 */
async function detectLanguages(rootDir: string): Promise<string[]> {
  const walker = new SourceWalker({
    rootDir,
    extraIgnorePatterns: EXTRA_IGNORE_PATTERNS,
    extensions: collectExtensions(getActiveParsers(null)),
  });
  try {
    return languagesForFiles(await walker.walk());
  } catch (err) {
    console.warn(`⚠️  detectLanguages: failed to scan files: ${(err as Error).message}`);
    return [];
  }
}

/**
 * main():
 *  1) Root directory from --root, else the positional argument, else the cwd.
 *  2) Languages from auto-detection or --lang (default: all).
 *  3) --dump prints one file; --update patches the index; otherwise a full scan.
 */
async function main(): Promise<void> {
  const argv = yargs(hideBin(process.argv))
    .scriptName("hdldoc")
    .usage("$0 [rootDir] [options]")
    .option("lang", {
      alias: "l",
      type: "string",
      description: 'Comma-separated list of languages (e.g. "verilog"). Use "auto" to detect.',
    })
    .option("detect", {
      alias: "d",
      type: "boolean",
      description: "Auto-detect which languages are present in the project.",
    })
    .option("root", {
      alias: "r",
      type: "string",
      description: "Project root directory (defaults to current working directory).",
    })
    .option("update", {
      alias: "u",
      type: "string",
      array: true,
      description: "File(s) to re-parse into the existing index (relative to root). Repeatable.",
    })
    .option("output", {
      alias: "o",
      type: "string",
      default: DEFAULT_INDEX_FILE,
      description: "Index file name, written under the root directory.",
    })
    .option("force", {
      alias: "f",
      type: "boolean",
      default: false,
      description: "Ignore the existing index and re-parse every file.",
    })
    .option("dump", {
      type: "string",
      description: "Print a detailed report of the modules in one file.",
    })
    .option("tokens", {
      type: "boolean",
      default: false,
      description: "With --dump, print the lexer token stream as well.",
    })
    .option("encoding", {
      type: "string",
      default: "utf8",
      description: "Text encoding of the source files.",
    })
    .help()
    .alias("help", "h")
    .parseSync();

  const encoding = argv.encoding;
  if (!Buffer.isEncoding(encoding)) {
    console.error(`❌ Unknown encoding "${encoding}".`);
    process.exit(1);
  }

  const positional = argv._.length > 0 ? String(argv._[0]) : "";
  const rootDir = argv.root ? path.resolve(argv.root) : positional ? path.resolve(positional) : process.cwd();

  let requestedLangs: string[] | null = null;
  const wantsAuto = argv.detect || argv.lang?.toLowerCase() === "auto";
  if (wantsAuto) {
    console.log("🔎 Auto-detecting languages…");
    const detected = await detectLanguages(rootDir);
    if (detected.length === 0) {
      console.warn("⚠️  No supported HDL files found in the project.");
      process.exit(1);
    }
    console.log(`✅ Detected languages: ${detected.join(", ")}`);
    requestedLangs = detected;
  } else if (argv.lang) {
    requestedLangs = argv.lang
      .split(",")
      .map((s) => s.trim().toLowerCase())
      .filter((s) => s.length > 0);
  }

  const parsers = getActiveParsers(requestedLangs);
  if (parsers.length === 0) {
    console.error("❌ No active language parsers found. Exiting.");
    process.exit(1);
  }
  console.log(`🔧 Active parsers: ${parsers.map((p) => p.language).join(", ")}`);

  const opts: RunOptions = { rootDir, indexFile: argv.output, encoding };

  if (argv.dump) {
    const ok = await runDump(path.resolve(argv.dump), parsers, argv.tokens, encoding);
    if (!ok) process.exit(1);
  } else if (argv.update && argv.update.length > 0) {
    await runIncrementalUpdate(opts, parsers, argv.update.map(String));
  } else {
    await runFullScan(opts, parsers, argv.force);
  }
}

main().catch((err) => {
  console.error("❌ Uncaught error in hdldoc:", err);
  process.exit(1);
});
