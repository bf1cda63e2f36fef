import crypto from "node:crypto";

import fse from "fs-extra";

export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\..+$/, "");
  return `${stamp}-${crypto.randomBytes(3).toString("hex")}`;
}

export function toPosixPath(value: string): string {
  return value.replace(/\\/g, "/");
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const parsed: unknown = await fse.readJson(filePath);
  return parsed;
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fse.outputFile(filePath, content, "utf8");
}

export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await fse.outputFile(filePath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
}

// Code-unit comparison; stable across locales, unlike localeCompare.
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareDescending(a: number, b: number): number {
  if (a > b) return -1;
  if (a < b) return 1;
  return 0;
}
