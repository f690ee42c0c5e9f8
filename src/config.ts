import { homedir } from "node:os";
import { join } from "node:path";
import dotenv from "dotenv";
import { DEFAULT_MODULE_FILE } from "./domain/module.js";
import { isLogLevel, type LogLevel } from "./infrastructure/console-logger.js";

export interface AppConfig {
  moduleFile: string;
  ignore: string[];
  includeTests: boolean;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) {
    // Local .env first: dotenv never overwrites a key that is already set
    dotenv.config();
    dotenv.config({ path: join(homedir(), ".importdeps", ".env") });
  }

  const logLevel = env.IMPORTDEPS_LOG_LEVEL ?? "info";

  return {
    moduleFile: env.IMPORTDEPS_MODULE_FILE || DEFAULT_MODULE_FILE,
    ignore: (env.IMPORTDEPS_IGNORE ?? "")
      .split(",")
      .map((p) => p.trim())
      .filter(Boolean),
    includeTests: env.IMPORTDEPS_INCLUDE_TESTS === "true",
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
  };
}
