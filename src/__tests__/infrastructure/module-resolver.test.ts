import { describe, it, expect, vi } from "vitest";
import { NearestModuleResolver } from "../../infrastructure/module-resolver.js";
import { ModuleResolutionError } from "../../domain/errors.js";
import type { FileSystem, Logger } from "../../domain/ports.js";

function createMockFs(files: Record<string, string>): FileSystem {
  return {
    readFile: vi.fn((path: string) => files[path] ?? ""),
    exists: vi.fn((path: string) => path in files),
    isDirectory: vi.fn((path: string) => Object.keys(files).some((f) => f.startsWith(`${path}/`))),
    glob: vi.fn().mockResolvedValue([]),
  };
}

function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
  };
}

const files = {
  "/work/app/go.mod": "module example.com/app\n",
  "/work/app/main.go": "package main\n",
  "/work/app/internal/db/db.go": "package db\n",
  "/work/app/tools/go.mod": "module example.com/app/tools\n",
  "/work/app/tools/gen.go": "package tools\n",
};

describe("NearestModuleResolver", () => {
  it("finds the module file next to the file", () => {
    const resolver = new NearestModuleResolver(createMockFs(files), createMockLogger());
    const mod = resolver.resolve("/work/app/main.go");
    expect(mod.path()).toBe("example.com/app");
    expect(mod.dir).toBe("/work/app");
  });

  it("walks up to the nearest ancestor", () => {
    const resolver = new NearestModuleResolver(createMockFs(files), createMockLogger());
    expect(resolver.resolve("/work/app/internal/db/db.go").path()).toBe("example.com/app");
    expect(resolver.resolve("/work/app/internal").path()).toBe("example.com/app");
  });

  it("prefers a nested module", () => {
    const resolver = new NearestModuleResolver(createMockFs(files), createMockLogger());
    expect(resolver.resolve("/work/app/tools/gen.go").path()).toBe("example.com/app/tools");
  });

  it("reads each module file once", () => {
    const fs = createMockFs(files);
    const resolver = new NearestModuleResolver(fs, createMockLogger());
    const first = resolver.resolve("/work/app/main.go");
    const second = resolver.resolve("/work/app/main.go");
    expect(second).toBe(first);
    expect(fs.readFile).toHaveBeenCalledTimes(1);
  });

  it("honours a custom module file name", () => {
    const fs = createMockFs({ "/w/gop.mod": "module example.com/gop\n", "/w/a.go": "" });
    const resolver = new NearestModuleResolver(fs, createMockLogger(), "gop.mod");
    expect(resolver.resolve("/w/a.go").path()).toBe("example.com/gop");
  });

  it("fails outside any module", () => {
    const resolver = new NearestModuleResolver(createMockFs(files), createMockLogger());
    expect(() => resolver.resolve("/tmp/orphan.go")).toThrow(
      new ModuleResolutionError("/tmp/orphan.go", "no go.mod found in any parent directory"),
    );
  });
});
