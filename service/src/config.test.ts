import { describe, it, expect } from "vitest";
import { getAppConfig } from "./config.js";

describe("getAppConfig", () => {
  it("should apply defaults", () => {
    expect(getAppConfig({})).toEqual({
      port: 8080,
      version: "local-dev",
      claimType: "insurance claim",
      rules: { bucket: "rule-documents", key: "rules.pdf" },
      uploads: { maxFiles: 5, maxFileSizeBytes: 10 * 1024 * 1024 },
    });
  });

  it("should read overrides from the environment", () => {
    expect(
      getAppConfig({
        PORT: "3000",
        SERVICE_VERSION: "v42",
        CLAIM_TYPE: "export credit insurance claim",
        RULES_BUCKET: "rules",
        RULES_OBJECT_KEY: "2026/rules.pdf",
        MAX_FILES: "3",
        MAX_FILE_SIZE_MB: "2",
      }),
    ).toEqual({
      port: 3000,
      version: "v42",
      claimType: "export credit insurance claim",
      rules: { bucket: "rules", key: "2026/rules.pdf" },
      uploads: { maxFiles: 3, maxFileSizeBytes: 2 * 1024 * 1024 },
    });
  });

  it("should ignore non-positive or unparseable limits", () => {
    const config = getAppConfig({ MAX_FILES: "0", MAX_FILE_SIZE_MB: "ten", PORT: "-1" });

    expect(config.uploads).toEqual({ maxFiles: 5, maxFileSizeBytes: 10 * 1024 * 1024 });
    expect(config.port).toBe(8080);
  });
});
