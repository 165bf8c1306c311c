/**
 * Validation orchestration: prompt → single reasoning call → parse.
 *
 * Reasoning-stage failures never unwind from here; they come back as ERROR-shaped results
 * so the caller always receives a well-formed report.
 */

import type { ReasoningClient } from "../llm/types.js";
import {
  buildMultiDocumentPrompt,
  buildSingleDocumentPrompt,
} from "../llm/prompts/validate.js";
import {
  invocationErrorResult,
  parseSingleDocumentResponse,
  parseValidationResponse,
  singleDocumentInvocationError,
} from "./response-parser.js";
import { getErrorMessage } from "../errors.js";
import type {
  ConnectionTestResult,
  DocumentSet,
  SingleDocumentResult,
  ValidationResult,
} from "../types.js";

export interface ClaimValidatorOptions {
  maxTokens: number;
  temperature: number;
}

const CONNECTION_TEST_PROMPT =
  "Hello, please respond with 'Connection successful'";

export class ClaimValidator {
  constructor(
    private readonly client: ReasoningClient,
    private readonly options: ClaimValidatorOptions = {
      maxTokens: 4000,
      temperature: 0.1,
    },
  ) {}

  get model(): string {
    return this.client.model;
  }

  get provider(): string {
    return this.client.provider;
  }

  async validateMultiple(
    claimType: string,
    rulesText: string,
    documents: DocumentSet,
  ): Promise<ValidationResult> {
    const prompt = buildMultiDocumentPrompt(claimType, rulesText, documents);

    console.log(
      `[ClaimValidator] Validating ${documents.size} document(s) as ${claimType}`,
    );

    let raw: string;
    try {
      raw = await this.client.invoke(prompt, {
        maxTokens: this.options.maxTokens,
        temperature: this.options.temperature,
        cachePrefix: "validate",
        responseFormat: { type: "json_object" },
      });
    } catch (error) {
      console.error(
        `[ClaimValidator] Reasoning call failed: ${getErrorMessage(error)}`,
      );
      return invocationErrorResult(error);
    }

    return parseValidationResponse(raw);
  }

  /**
   * Legacy single-document validation. Fields of the report live at top level.
   */
  async validateSingle(
    claimType: string,
    rulesText: string,
    documentText: string,
  ): Promise<SingleDocumentResult> {
    const prompt = buildSingleDocumentPrompt(claimType, rulesText, documentText);

    let raw: string;
    try {
      raw = await this.client.invoke(prompt, {
        maxTokens: this.options.maxTokens,
        temperature: this.options.temperature,
        cachePrefix: "validate-single",
        responseFormat: { type: "json_object" },
      });
    } catch (error) {
      console.error(
        `[ClaimValidator] Reasoning call failed: ${getErrorMessage(error)}`,
      );
      return singleDocumentInvocationError(error);
    }

    return parseSingleDocumentResponse(raw);
  }

  async testConnection(): Promise<ConnectionTestResult> {
    try {
      const response = await this.client.invoke(CONNECTION_TEST_PROMPT, {
        maxTokens: 50,
        temperature: this.options.temperature,
        skipCache: true,
      });
      return { status: "connected", model: this.client.model, response };
    } catch (error) {
      return { status: "error", error: getErrorMessage(error) };
    }
  }
}
