import fs from "node:fs";
import path from "node:path";

import { CONFIG_DIR_NAME, CONFIG_FILE_NAME } from "./paths.js";

export type ConfigSource = "explicit" | "discovered" | "default";

export type ConfigResolution = {
  configPath: string;
  source: ConfigSource;
};

export type InitResult = {
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

export function resolveProjectConfigPath(args: { explicitPath?: string; cwd?: string } = {}): ConfigResolution {
  const cwd = args.cwd ?? process.cwd();

  if (args.explicitPath) {
    return { configPath: path.resolve(cwd, args.explicitPath), source: "explicit" };
  }

  const discovered = findConfigPath(cwd);
  if (discovered) {
    return { configPath: discovered, source: "discovered" };
  }

  return { configPath: projectConfigPath(cwd), source: "default" };
}

export function findConfigPath(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    const candidate = projectConfigPath(current);
    if (fs.existsSync(candidate)) return candidate;

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function initProjectConfig(args: { cwd?: string; force?: boolean } = {}): InitResult {
  const cwd = path.resolve(args.cwd ?? process.cwd());
  const configPath = projectConfigPath(cwd);
  const hasConfig = fs.existsSync(configPath);
  const force = args.force ?? false;

  if (hasConfig && !force) {
    return { configPath, status: "exists" };
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, buildDefaultConfig(path.basename(cwd)), "utf8");
  return { configPath, status: hasConfig ? "overwritten" : "created" };
}

function projectConfigPath(dir: string): string {
  return path.join(dir, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

function buildDefaultConfig(projectName: string): string {
  return [
    "# Auto-generated AutoDeploy config. Paths are relative to this file.",
    "repositories:",
    `  - id: ${JSON.stringify(projectName || "main")}`,
    "    path: ..",
    "    trust_rank: 1",
    '    include: ["**/*.ts", "**/*.tsx", "**/*.js"]',
    '    exclude: ["**/*.test.*", "**/*.spec.*"]',
    "",
    "# Omit to use the bundled policy table, or point at a JSON file.",
    "# license_policy: ./license-policy.json",
    "",
    "engine:",
    "  near_duplicate_threshold: 0.1",
    "  auto_merge_confidence_floor: 0.95",
    "  enabled_optimization_passes:",
    "    - dead-code",
    "    - simplify-expressions",
    "    - substitute-data-structures",
    "    - profile",
    "  pass_timeout_seconds: 30",
    "  fingerprint_concurrency: 4",
    "  allow_incompatible_cycles: false",
    "  export_roots: []",
    "",
    "output:",
    "  dir: merged",
    "  file: index.ts",
    "",
  ].join("\n");
}
