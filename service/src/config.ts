/**
 * Application configuration read from the environment.
 */

export interface AppConfig {
  port: number;
  version: string;
  claimType: string;
  rules: {
    bucket: string;
    key: string;
  };
  uploads: {
    maxFiles: number;
    maxFileSizeBytes: number;
  };
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

export function getAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parsePositiveInt(env.PORT, 8080),
    version: env.SERVICE_VERSION || "local-dev",
    claimType: env.CLAIM_TYPE || "insurance claim",
    rules: {
      bucket: env.RULES_BUCKET || "rule-documents",
      key: env.RULES_OBJECT_KEY || "rules.pdf",
    },
    uploads: {
      maxFiles: parsePositiveInt(env.MAX_FILES, 5),
      maxFileSizeBytes: parsePositiveInt(env.MAX_FILE_SIZE_MB, 10) * 1024 * 1024,
    },
  };
}
