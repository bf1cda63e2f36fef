import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, describe, expect, it } from "vitest";

import { UserFacingError } from "../../core/errors.js";
import { makeRepository } from "../engine.test-helpers.js";

import { AttributionAnnotator, collectNotices, escapeComment } from "./annotator.js";

const tempDirs: string[] = [];

afterEach(async () => {
  for (const dir of tempDirs) {
    await fse.remove(dir);
  }
  tempDirs.length = 0;
});

describe("AttributionAnnotator", () => {
  it("lists every contributing repository", async () => {
    const annotator = await AttributionAnnotator.load();

    const block = annotator.annotate({ name: "add", rejected: [] }, [
      { repositoryId: "alpha", trustRank: 2, licenseId: "MIT", revision: "abc1234", paths: ["src/math.ts"] },
      { repositoryId: "beta", trustRank: 1, licenseId: "ISC", revision: null, paths: ["lib/a.ts", "lib/b.ts"] },
    ]);

    expect(block).toBe(
      [
        "/*",
        " * Merged declaration: add",
        " * - alpha (MIT @ abc1234): src/math.ts",
        " * - beta (ISC): lib/a.ts, lib/b.ts",
        " */",
      ].join("\n"),
    );
  });

  it("flags near duplicates kept separate for review", async () => {
    const annotator = await AttributionAnnotator.load();

    const block = annotator.annotate(
      {
        name: "scale",
        rejected: [{ repositoryId: "gamma", unitPath: "src/x.ts", name: "scale", entry: 3, confidence: 0.9444 }],
      },
      [{ repositoryId: "alpha", trustRank: 0, licenseId: "MIT", revision: null, paths: ["src/scale.ts"] }],
    );

    expect(block.split("\n").slice(-3)).toEqual([
      " * Review: near-duplicates kept separate",
      " * - gamma:src/x.ts#scale (confidence 0.94)",
      " */",
    ]);
  });

  it("renders license notices with their full text", async () => {
    const annotator = await AttributionAnnotator.load();

    const header = annotator.renderNotices([
      { repositoryId: "alpha", licenseId: "MIT", revision: null, text: "MIT License\n\nCopyright (c) test\n" },
    ]);

    expect(header).toBe(
      [
        "/*",
        " * Third-party notices for the merged library.",
        " *",
        " * alpha (MIT)",
        " * MIT License",
        " *",
        " * Copyright (c) test",
        " */",
      ].join("\n"),
    );
    expect(annotator.renderNotices([])).toBe("");
  });

  it("lists imported libraries with the repositories that bring them in", async () => {
    const annotator = await AttributionAnnotator.load();

    const header = annotator.renderNotices(
      [{ repositoryId: "alpha", licenseId: "MIT", revision: "abc1234", text: "MIT text" }],
      [
        { name: "@scope/kit", specifiers: ["@scope/kit/io"], repositories: ["beta"] },
        { name: "zod", specifiers: ["zod"], repositories: ["alpha", "beta"] },
      ],
    );

    expect(header).toBe(
      [
        "/*",
        " * Third-party notices for the merged library.",
        " *",
        " * alpha (MIT @ abc1234)",
        " * MIT text",
        " *",
        " * Libraries imported by the merged code:",
        " * - @scope/kit: beta",
        " * - zod: alpha, beta",
        " */",
      ].join("\n"),
    );
  });

  it("keeps comment terminators in rendered values from closing the block", async () => {
    const annotator = await AttributionAnnotator.load();

    const block = annotator.annotate({ name: "add", rejected: [] }, [
      { repositoryId: "alpha", trustRank: 0, licenseId: "MIT", revision: null, paths: ["src/*/index.ts"] },
    ]);
    const header = annotator.renderNotices([
      { repositoryId: "alpha", licenseId: "MIT", revision: null, text: "Ends */ here" },
    ]);

    expect(block.split("\n")[2]).toBe(" * - alpha (MIT): src/*\\/index.ts");
    expect(header.split("\n")[4]).toBe(" * Ends *\\/ here");
    expect(escapeComment("a */ b */")).toBe("a *\\/ b *\\/");
  });

  it("raises a user-facing error when templates are missing", async () => {
    const dir = await fse.mkdtemp(path.join(os.tmpdir(), "annotator-"));
    tempDirs.push(dir);

    await expect(AttributionAnnotator.load(dir)).rejects.toBeInstanceOf(UserFacingError);
  });
});

describe("collectNotices", () => {
  it("covers credited repositories, most trusted first", () => {
    const repositories = [
      makeRepository("beta", {}, { trustRank: 1, licenseId: "ISC", licenseText: "ISC text" }),
      makeRepository("alpha", {}, { trustRank: 2, licenseId: "MIT", licenseText: "MIT text" }),
      makeRepository("gamma", {}, { trustRank: 3, licenseId: "MIT", licenseText: "unused" }),
    ];
    const credited = (repositoryId: string) => ({
      repositoryId,
      trustRank: 0,
      licenseId: "",
      revision: null,
      paths: [],
    });

    const notices = collectNotices([{ attribution: [credited("beta")] }, { attribution: [credited("alpha")] }], repositories);

    expect(notices).toEqual([
      { repositoryId: "alpha", licenseId: "MIT", revision: null, text: "MIT text" },
      { repositoryId: "beta", licenseId: "ISC", revision: null, text: "ISC text" },
    ]);
  });
});
