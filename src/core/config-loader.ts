import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";
import type { ZodError } from "zod";

import { ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { ConfigError, USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

const CONFIG_INIT_HINT = "Run `autodeploy init` to create a default config, or pass --config <path>.";
const CONFIG_FIX_HINT = "Fix the listed fields in the config file and re-run.";

// Relative paths inside the config resolve against the directory that holds the config file.
export function loadProjectConfig(configPath: string): ProjectConfig {
  const resolvedPath = path.resolve(configPath);
  if (!fs.existsSync(resolvedPath)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config missing.",
      message: `No config file found at ${resolvedPath}.`,
      hint: CONFIG_INIT_HINT,
    });
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(resolvedPath, "utf8"));
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config unreadable.",
      message: `Failed to read YAML from ${resolvedPath}.`,
      hint: CONFIG_FIX_HINT,
      cause: new ConfigError(`Invalid YAML in ${resolvedPath}.`, err),
    });
  }

  return parseProjectConfig(raw ?? {}, path.dirname(resolvedPath), resolvedPath);
}

export function parseProjectConfig(raw: unknown, baseDir: string, source = "<inline>"): ProjectConfig {
  const parsed = ProjectConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = formatIssues(parsed.error);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config invalid.",
      message: `Config at ${source} is invalid: ${details}`,
      hint: CONFIG_FIX_HINT,
      cause: new ConfigError(details, parsed.error),
    });
  }

  const config = parsed.data;
  return {
    ...config,
    repositories: config.repositories.map((repository) => ({
      ...repository,
      path: path.resolve(baseDir, repository.path),
      license: repository.license
        ? {
            ...repository.license,
            text_file: repository.license.text_file
              ? path.resolve(baseDir, repository.license.text_file)
              : undefined,
          }
        : undefined,
    })),
    license_policy:
      typeof config.license_policy === "string"
        ? path.resolve(baseDir, config.license_policy)
        : config.license_policy,
    output: { ...config.output, dir: path.resolve(baseDir, config.output.dir) },
  };
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}
