import { execa } from "execa";

// HEAD commit of a repository checkout, or null when the directory is not a git work tree.
export async function readRevision(rootPath: string): Promise<string | null> {
  const result = await execa("git", ["rev-parse", "HEAD"], { cwd: rootPath, reject: false });
  if (result.exitCode !== 0) return null;
  const revision = result.stdout.trim();
  return /^[0-9a-f]{7,64}$/i.test(revision) ? revision : null;
}
