// License lookup port.
// Purpose: find a repository's license id and boilerplate before fingerprinting starts.
// Assumes adapters are tried in order and the first hit wins; nothing here decides compatibility.

import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import type { RepositoryLicenseConfig } from "../core/config.js";
import { ConfigError } from "../core/errors.js";
import { dataDir } from "../core/paths.js";
import { readJsonFile } from "../core/utils.js";
import type { LicenseInfo } from "../engine/model/schema.js";

export type LicenseLookupRequest = {
  repositoryId: string;
  rootPath: string;
  declared?: RepositoryLicenseConfig;
};

export interface LicenseLookup {
  readonly name: string;
  lookup(request: LicenseLookupRequest): Promise<LicenseInfo | null>;
}

export const UNKNOWN_LICENSE_ID = "NOASSERTION";

export const LICENSE_FILE_NAMES = [
  "LICENSE",
  "LICENSE.md",
  "LICENSE.txt",
  "LICENCE",
  "LICENCE.md",
  "COPYING",
  "COPYING.md",
];

// =============================================================================
// ADAPTERS
// =============================================================================

export class ConfigLicenseLookup implements LicenseLookup {
  readonly name = "config";

  async lookup(request: LicenseLookupRequest): Promise<LicenseInfo | null> {
    const declared = request.declared;
    if (!declared) return null;

    if (declared.text !== undefined) {
      return { id: declared.id, text: declared.text };
    }
    if (declared.text_file) {
      try {
        return { id: declared.id, text: await fse.readFile(declared.text_file, "utf8") };
      } catch (err) {
        throw new ConfigError(
          `License text for repository "${request.repositoryId}" is unreadable at ${declared.text_file}.`,
          err,
        );
      }
    }

    const detected = await readLicenseFile(request.rootPath);
    return { id: declared.id, text: detected?.text ?? "" };
  }
}

export const LicenseSignatureSchema = z.array(
  z.object({
    id: z.string().min(1),
    patterns: z.array(z.string().min(1)).min(1),
  }),
);

export type LicenseSignature = z.infer<typeof LicenseSignatureSchema>[number];

export class FileLicenseLookup implements LicenseLookup {
  readonly name = "license-file";

  constructor(private readonly signatures: readonly LicenseSignature[]) {}

  static async load(filePath: string = defaultSignaturesPath()): Promise<FileLicenseLookup> {
    const parsed = LicenseSignatureSchema.safeParse(await readJsonFile(filePath));
    if (!parsed.success) {
      throw new ConfigError(`Invalid license signatures in ${filePath}.`, parsed.error);
    }
    return new FileLicenseLookup(parsed.data);
  }

  async lookup(request: LicenseLookupRequest): Promise<LicenseInfo | null> {
    const found = await readLicenseFile(request.rootPath);
    if (!found) return null;
    const id = this.identify(found.text);
    return id ? { id, text: found.text } : null;
  }

  identify(text: string): string | null {
    const haystack = text.replace(/\s+/g, " ").toLowerCase();
    const match = this.signatures.find((signature) =>
      signature.patterns.every((pattern) => haystack.includes(pattern.toLowerCase())),
    );
    return match?.id ?? null;
  }
}

// =============================================================================
// RESOLUTION
// =============================================================================

export async function resolveLicense(
  lookups: readonly LicenseLookup[],
  request: LicenseLookupRequest,
): Promise<LicenseInfo> {
  for (const lookup of lookups) {
    const license = await lookup.lookup(request);
    if (license) return license;
  }
  const fallback = await readLicenseFile(request.rootPath);
  return { id: UNKNOWN_LICENSE_ID, text: fallback?.text ?? "" };
}

export async function createDefaultLicenseLookups(): Promise<LicenseLookup[]> {
  return [new ConfigLicenseLookup(), await FileLicenseLookup.load()];
}

function defaultSignaturesPath(): string {
  return path.join(dataDir(), "license-signatures.json");
}

async function readLicenseFile(rootPath: string): Promise<{ path: string; text: string } | null> {
  for (const name of LICENSE_FILE_NAMES) {
    const candidate = path.join(rootPath, name);
    if (await fse.pathExists(candidate)) {
      return { path: candidate, text: await fse.readFile(candidate, "utf8") };
    }
  }
  return null;
}
