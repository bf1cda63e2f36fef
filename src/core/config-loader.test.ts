import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { initProjectConfig, resolveProjectConfigPath } from "./config-discovery.js";
import { loadProjectConfig } from "./config-loader.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

function writeConfig(dir: string, body: string): string {
  const configPath = path.join(dir, ".autodeploy", "config.yaml");
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, body, "utf8");
  return configPath;
}

function loadError(configPath: string): UserFacingError {
  try {
    loadProjectConfig(configPath);
  } catch (err) {
    if (err instanceof UserFacingError) return err;
    throw err;
  }
  throw new Error("expected loadProjectConfig to fail");
}

// =============================================================================
// TESTS
// =============================================================================

describe("loadProjectConfig", () => {
  it("applies defaults and resolves paths against the config directory", () => {
    const dir = makeTempDir("config-loader-");
    const configPath = writeConfig(
      dir,
      [
        "repositories:",
        "  - id: alpha",
        "    path: ../alpha",
        "    license:",
        "      id: MIT",
        "      text_file: ./LICENSE.alpha",
        "license_policy: ./policy.json",
        "engine:",
        "  near_duplicate_threshold: 0.2",
        "output:",
        "  dir: out",
        "",
      ].join("\n"),
    );
    const configDir = path.dirname(configPath);

    const config = loadProjectConfig(configPath);

    expect(config.repositories).toEqual([
      {
        id: "alpha",
        path: path.join(dir, "alpha"),
        trust_rank: 0,
        license: { id: "MIT", text_file: path.join(configDir, "LICENSE.alpha") },
        include: ["**/*"],
        exclude: [],
      },
    ]);
    expect(config.license_policy).toBe(path.join(configDir, "policy.json"));
    expect(config.engine).toEqual({
      near_duplicate_threshold: 0.2,
      auto_merge_confidence_floor: 0.95,
      enabled_optimization_passes: ["dead-code", "simplify-expressions", "substitute-data-structures", "profile"],
      pass_timeout_seconds: 30,
      fingerprint_concurrency: 4,
      allow_incompatible_cycles: false,
      export_roots: [],
    });
    expect(config.output).toEqual({ dir: path.join(configDir, "out"), file: "index.ts" });
  });

  it("keeps an inline license policy table", () => {
    const dir = makeTempDir("config-loader-");
    const configPath = writeConfig(
      dir,
      [
        "repositories:",
        "  - id: alpha",
        "    path: .",
        "license_policy:",
        "  MIT:",
        "    permissiveness_rank: 3",
        "",
      ].join("\n"),
    );

    expect(loadProjectConfig(configPath).license_policy).toEqual({
      MIT: { permissiveness_rank: 3, combinable_with: [] },
    });
  });

  it("maps missing config paths to a user-facing config error", () => {
    const dir = makeTempDir("config-loader-");
    const configPath = path.join(dir, "missing.yaml");

    const error = loadError(configPath);

    expect(error.code).toBe(USER_FACING_ERROR_CODES.config);
    expect(error.title).toBe("Project config missing.");
    expect(error.message).toBe(`No config file found at ${configPath}.`);
    expect(error.hint).toContain("autodeploy init");
  });

  it("rejects optimization passes listed out of order", () => {
    const dir = makeTempDir("config-loader-");
    const configPath = writeConfig(
      dir,
      [
        "repositories:",
        "  - id: alpha",
        "    path: .",
        "engine:",
        "  enabled_optimization_passes: [profile, dead-code]",
        "",
      ].join("\n"),
    );

    const error = loadError(configPath);

    expect(error.title).toBe("Project config invalid.");
    expect(error.message).toContain("engine.enabled_optimization_passes: Optimization passes must be listed once each");
  });

  it("rejects duplicate repository ids and unknown keys", () => {
    const dir = makeTempDir("config-loader-");
    const duplicate = writeConfig(
      dir,
      ["repositories:", "  - id: alpha", "    path: a", "  - id: alpha", "    path: b", ""].join("\n"),
    );
    expect(loadError(duplicate).message).toContain('repositories.1.id: Duplicate repository id "alpha".');

    const unknownKey = writeConfig(dir, ["repositories:", "  - id: alpha", "    path: a", "threshold: 1", ""].join("\n"));
    expect(loadError(unknownKey).title).toBe("Project config invalid.");
  });

  it("reports unreadable YAML", () => {
    const dir = makeTempDir("config-loader-");
    const configPath = writeConfig(dir, "repositories: [\n");

    expect(loadError(configPath).title).toBe("Project config unreadable.");
  });
});

describe("config discovery", () => {
  it("creates a default config that loads", () => {
    const dir = makeTempDir("config-init-");

    const created = initProjectConfig({ cwd: dir });
    const config = loadProjectConfig(created.configPath);

    expect(created.status).toBe("created");
    expect(config.repositories[0]?.path).toBe(dir);
    expect(config.output.dir).toBe(path.join(dir, ".autodeploy", "merged"));
    expect(initProjectConfig({ cwd: dir }).status).toBe("exists");
    expect(initProjectConfig({ cwd: dir, force: true }).status).toBe("overwritten");
  });

  it("finds the nearest config from a nested directory", () => {
    const dir = makeTempDir("config-discovery-");
    const configPath = writeConfig(dir, "repositories: []\n");
    const nested = path.join(dir, "packages", "core");
    fs.mkdirSync(nested, { recursive: true });

    expect(resolveProjectConfigPath({ cwd: nested })).toEqual({ configPath, source: "discovered" });
    expect(resolveProjectConfigPath({ cwd: nested, explicitPath: "custom.yaml" })).toEqual({
      configPath: path.join(nested, "custom.yaml"),
      source: "explicit",
    });
  });
});
