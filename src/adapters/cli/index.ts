#!/usr/bin/env node

import { Command } from "commander";
import { loadConfig } from "../../config.js";
import { createAppServices } from "../../composition-root.js";
import { formatReport, type ReportFormat } from "../../application/format-report.js";

const program = new Command();

program
  .name("importdeps")
  .description("List the canonical package imports of Go source files")
  .version("0.1.0")
  .argument("[paths...]", "Files or directories to scan", ["."])
  .option("--by-module", "Group imports by owning module")
  .option("--json", "Print the full scan report as JSON")
  .option("--tests", "Include _test.go files found in directories")
  .option("--module-file <name>", "Module marker file name")
  .option("-v, --verbose", "Log every scanned file")
  .action(
    async (
      paths: string[],
      opts: { byModule?: boolean; json?: boolean; tests?: boolean; moduleFile?: string; verbose?: boolean },
    ) => {
      const config = loadConfig();
      if (opts.moduleFile) config.moduleFile = opts.moduleFile;
      if (opts.verbose) config.logLevel = "debug";
      const { scanImports, logger } = createAppServices(config);

      try {
        const report = await scanImports.scan(paths, { includeTests: opts.tests });
        const format: ReportFormat = opts.json ? "json" : opts.byModule ? "modules" : "list";
        const output = formatReport(report, format);
        if (output) console.log(output);

        logger.info(`${report.filesScanned} files, ${report.imports.length} imports, ${report.failures.length} failures`);
        if (report.failures.length > 0) process.exitCode = 2;
      } catch (err) {
        console.error("Error:", err);
        process.exitCode = 1;
      }
    },
  );

await program.parseAsync();
