import { relative } from "node:path";
import type { ScanReport } from "../domain/types.js";

export type ReportFormat = "list" | "modules" | "json";

export function formatReport(report: ScanReport, format: ReportFormat, cwd = process.cwd()): string {
  switch (format) {
    case "json":
      return JSON.stringify(report, null, 2);
    case "modules": {
      const blocks = report.modules.map((m) => {
        const header = `${m.module} (${relative(cwd, m.dir) || "."}, ${m.files.length} files)`;
        return [header, ...m.imports.map((i) => `  ${i}`)].join("\n");
      });
      return blocks.join("\n\n");
    }
    case "list":
      return report.imports.join("\n");
  }
}
