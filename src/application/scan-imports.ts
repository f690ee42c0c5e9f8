import { extname, relative, resolve } from "node:path";
import ignore from "ignore";
import type {
  FileSystem,
  HeaderParser,
  Logger,
  ModuleResolver,
  ScanImports,
  ScanOptions,
} from "../domain/ports.js";
import type { ModuleImports, ScanFailure, ScanReport } from "../domain/types.js";
import { FileSet } from "../domain/file-set.js";
import { ImportsParser, mergeImports } from "../domain/imports-parser.js";
import { ImportDepsError } from "../domain/errors.js";
import type { Module } from "../domain/module.js";

const ALWAYS_IGNORED = ["vendor", "testdata", ".git", "node_modules"];

export interface ScanImportsSettings {
  includeTests: boolean;
  ignore: string[];
}

export class ScanImportsService implements ScanImports {
  constructor(
    private readonly fs: FileSystem,
    private readonly parser: HeaderParser,
    private readonly modules: ModuleResolver,
    private readonly logger: Logger,
    private readonly settings: ScanImportsSettings = { includeTests: false, ignore: [] },
  ) {}

  /**
   * Scan files and directories, one ImportsParser per owning module.
   * A file that fails to parse is logged and reported; the scan goes on.
   */
  async scan(paths: string[], options: ScanOptions = {}): Promise<ScanReport> {
    const fset = new FileSet();
    const parsers = new Map<string, { parser: ImportsParser; mod: Module; files: string[] }>();
    const failures: ScanFailure[] = [];
    let filesScanned = 0;

    for (const file of await this.expand(paths, options)) {
      filesScanned++;
      try {
        const mod = this.modules.resolve(file);
        let entry = parsers.get(mod.dir);
        if (!entry) {
          const parser = new ImportsParser(fset, mod, { parser: this.parser, fs: this.fs });
          entry = { parser, mod, files: [] };
          parsers.set(mod.dir, entry);
        }
        entry.parser.parseImports(file);
        entry.files.push(file);
        this.logger.debug(`Scanned ${file}`);
      } catch (err) {
        if (!(err instanceof ImportDepsError)) throw err;
        this.logger.error(err.message);
        failures.push({ filePath: file, message: err.message });
      }
    }

    const modules: ModuleImports[] = [...parsers.values()]
      .map(({ parser, mod, files }) => ({
        module: mod.path(),
        dir: mod.dir,
        files,
        imports: [...parser.imports()].sort(),
      }))
      .sort((a, b) => a.module.localeCompare(b.module));

    return {
      modules,
      imports: [...mergeImports([...parsers.values()].map((e) => e.parser))].sort(),
      filesScanned,
      failures,
    };
  }

  async collectFiles(dirPath: string, options: ScanOptions = {}): Promise<string[]> {
    const patterns = this.parser.supportedExtensions.map((ext) => `**/*${ext}`);

    // Load .gitignore if present
    const ig = ignore.default();
    const gitignorePath = resolve(dirPath, ".gitignore");
    if (this.fs.exists(gitignorePath)) {
      ig.add(this.fs.readFile(gitignorePath));
    }
    ig.add([...ALWAYS_IGNORED, ...this.settings.ignore]);

    const files = await this.fs.glob(patterns, {
      cwd: dirPath,
      absolute: true,
      ignore: ALWAYS_IGNORED.map((d) => `**/${d}/**`),
    });

    return files
      .filter((f) => !ig.ignores(relative(dirPath, f)))
      .filter((f) => this.includeTests(options) || !f.endsWith("_test.go"))
      .sort();
  }

  private async expand(paths: string[], options: ScanOptions): Promise<string[]> {
    const seen = new Set<string>();
    for (const p of paths) {
      const abs = resolve(p);
      if (this.fs.isDirectory(abs)) {
        for (const f of await this.collectFiles(abs, options)) seen.add(f);
      } else if (this.parser.supportedExtensions.includes(extname(abs).toLowerCase())) {
        // named explicitly: scanned even when it is a test file
        seen.add(abs);
      } else {
        this.logger.warn(`Skipping ${abs}: not a ${this.parser.languageName} file`);
      }
    }
    return [...seen];
  }

  private includeTests(options: ScanOptions): boolean {
    return options.includeTests ?? this.settings.includeTests;
  }
}
