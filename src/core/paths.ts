import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const CONFIG_DIR_NAME = ".autodeploy";
export const CONFIG_FILE_NAME = "config.yaml";

let cachedPackageRoot: string | null = null;

// Walk upward until package.json so compiled builds find templates/ and data/ too.
export function packageRoot(): string {
  if (cachedPackageRoot) return cachedPackageRoot;

  const startDir = path.dirname(fileURLToPath(import.meta.url));
  let current = startDir;
  while (true) {
    if (fs.existsSync(path.join(current, "package.json"))) {
      cachedPackageRoot = current;
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      throw new Error(`package.json not found above ${startDir}.`);
    }
    current = parent;
  }
}

export function templatesDir(): string {
  return path.join(packageRoot(), "templates");
}

export function dataDir(): string {
  return path.join(packageRoot(), "data");
}

export function engineLogPath(outputDir: string): string {
  return path.join(outputDir, "logs", "engine.jsonl");
}

export function conflictReportPath(outputDir: string): string {
  return path.join(outputDir, "conflict-report.json");
}
