import { describe, expect, it } from "vitest";

import { AutoDeployError, ConfigError, IngestError, OutputError, UserFacingError } from "./errors.js";

describe("run errors", () => {
  it("name themselves after their class and keep the standard cause", () => {
    const cause = new Error("ENOENT");
    const err = new IngestError("Repository missing.", "alpha", cause);

    expect(err).toBeInstanceOf(AutoDeployError);
    expect(err.name).toBe("IngestError");
    expect(err.repositoryId).toBe("alpha");
    expect(err.cause).toBe(cause);
    expect(new ConfigError("bad").name).toBe("ConfigError");
    expect(new OutputError("no write", "/out/index.ts").path).toBe("/out/index.ts");
  });

  it("leaves cause unset when none is given", () => {
    expect("cause" in new ConfigError("bad")).toBe(false);
  });
});

describe("UserFacingError", () => {
  it("carries display fields and the cause", () => {
    const cause = new ConfigError("bad");
    const err = new UserFacingError({
      code: "CONFIG_ERROR",
      title: "Project config invalid.",
      message: "threshold must be at most 1",
      hint: "Edit .autodeploy/config.yaml.",
      cause,
    });

    expect(err.name).toBe("UserFacingError");
    expect([err.code, err.title, err.message, err.hint, err.next]).toEqual([
      "CONFIG_ERROR",
      "Project config invalid.",
      "threshold must be at most 1",
      "Edit .autodeploy/config.yaml.",
      undefined,
    ]);
    expect(err.cause).toBe(cause);
  });
});
