/**
 * HTTP surface
 *
 * POST /submit-claim, GET /test-connection and GET /health.
 * Built by a factory so tests can run it against in-process doubles.
 */

import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type Response,
} from "express";
import { AppError, getErrorMessage } from "./errors.js";
import { parseMultipartFiles } from "./uploads.js";
import { submitClaim, type RulesProvider } from "./pipeline/submit-claim.js";
import type { ClaimValidator } from "./pipeline/claim-validator.js";
import type { TextExtractor } from "./pdf-extract.js";
import type { AppConfig } from "./config.js";

/** Rules source that can also tell whether it already holds the text. */
export interface CachedRules extends RulesProvider {
  isLoaded(): boolean;
}

export interface AppDeps {
  config: AppConfig;
  validator: ClaimValidator;
  rules: CachedRules;
  extractor: TextExtractor;
}

export interface ErrorResponse {
  error: string;
  code: string;
}

type ServiceHealth = { status: "healthy" | "unhealthy" } & Record<
  string,
  unknown
>;

export interface HealthResponse {
  status: "healthy" | "degraded" | "unhealthy";
  version: string;
  timestamp: string;
  services: {
    reasoning?: ServiceHealth;
    storage?: ServiceHealth;
  };
}

// Multipart framing on top of the file payloads
const MULTIPART_OVERHEAD_BYTES = 1024 * 1024;

function httpStatusOf(error: unknown): number | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  ) {
    return error.status;
  }
  return undefined;
}

function sendError(res: Response, error: unknown): void {
  if (error instanceof AppError) {
    const body: ErrorResponse = { error: error.message, code: error.code };
    res.status(error.statusCode).json(body);
    return;
  }

  const status = httpStatusOf(error);
  if (status !== undefined && status >= 400 && status < 500) {
    const body: ErrorResponse = {
      error: getErrorMessage(error),
      code: "INVALID_INPUT",
    };
    res.status(status).json(body);
    return;
  }

  const body: ErrorResponse = {
    error: `Processing error: ${getErrorMessage(error)}`,
    code: "INTERNAL_ERROR",
  };
  res.status(500).json(body);
}

export function createApp(deps: AppDeps): Express {
  const { config, validator, rules, extractor } = deps;
  const app = express();

  const rawMultipart = express.raw({
    type: "multipart/form-data",
    limit:
      config.uploads.maxFiles * config.uploads.maxFileSizeBytes +
      MULTIPART_OVERHEAD_BYTES,
  });

  /**
   * Submit a claim: up to `maxFiles` PDFs under the repeated `files` field.
   * Reasoning failures still answer 200 with an error-shaped body.
   */
  app.post("/submit-claim", rawMultipart, async (req: Request, res: Response) => {
    try {
      const contentType = req.headers["content-type"] ?? "";
      const files = Buffer.isBuffer(req.body)
        ? await parseMultipartFiles(contentType, req.body)
        : [];

      const response = await submitClaim(files, {
        validator,
        rules,
        extractor,
        claimType: config.claimType,
        limits: config.uploads,
      });
      res.json(response);
    } catch (error) {
      if (!(error instanceof AppError)) {
        console.error("[Server] Claim submission failed:", error);
      }
      sendError(res, error);
    }
  });

  app.get("/test-connection", async (_req: Request, res: Response) => {
    const result = await validator.testConnection();
    res.json({
      status: result.status,
      model: validator.model,
      provider: validator.provider,
      test_response: result.status === "connected" ? result.response : "",
      error: result.status === "error" ? result.error : null,
    });
  });

  /**
   * Health check
   *
   * Probes the reasoning service and the rules document. Any unhealthy service makes the
   * whole service unhealthy. `rules_cached` reports whether the rules were already in
   * memory before the probe.
   */
  app.get("/health", async (_req: Request, res: Response) => {
    const health: HealthResponse = {
      status: "healthy",
      version: config.version,
      timestamp: new Date().toISOString(),
      services: {},
    };

    try {
      const test = await validator.testConnection();
      health.services.reasoning = {
        status: test.status === "connected" ? "healthy" : "unhealthy",
        model: validator.model,
        provider: validator.provider,
        details: test.status === "connected" ? test.response : test.error,
      };
    } catch (error) {
      health.services.reasoning = {
        status: "unhealthy",
        error: getErrorMessage(error),
      };
      health.status = "degraded";
    }

    // Whether this probe found the rules cached or had to fetch them
    const rulesCached = rules.isLoaded();
    try {
      const rulesText = await rules.get();
      health.services.storage = {
        status: "healthy",
        rules_length: rulesText.length,
        rules_cached: rulesCached,
        bucket: config.rules.bucket,
        key: config.rules.key,
      };
    } catch (error) {
      health.services.storage = {
        status: "unhealthy",
        rules_cached: rulesCached,
        error: getErrorMessage(error),
      };
      health.status = "degraded";
    }

    const services = [health.services.reasoning, health.services.storage];
    if (services.some((service) => service?.status === "unhealthy")) {
      health.status = "unhealthy";
    }

    res.json(health);
  });

  // Body parser failures (oversized or unreadable bodies)
  const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    console.error("[Server] Request failed:", getErrorMessage(err));
    sendError(res, err);
  };
  app.use(errorHandler);

  return app;
}
