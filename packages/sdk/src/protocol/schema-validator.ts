// =============================================================================
// Schema Validator Interface
// =============================================================================
/**
 * Interface for a schema validator.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { ValidationIssue } from "./types";

export type JsonSchema<TInput = unknown, TOutput = TInput> = StandardSchemaV1<TInput, TOutput>;

export type SchemaValidationResult<TOutput> =
  | { readonly success: true; readonly value: TOutput }
  | { readonly success: false; readonly issues: readonly ValidationIssue[] };

export interface SchemaValidator {
  /**
   * Validates a value against the schema.
   * Never throws for invalid values; the caller decides which error to raise.
   */
  validate<TOutput>(value: unknown, schema: JsonSchema<unknown, TOutput>): Promise<SchemaValidationResult<TOutput>>;
}

export class StandardSchemaValidator implements SchemaValidator {
  public async validate<TOutput>(value: unknown, schema: JsonSchema<unknown, TOutput>): Promise<SchemaValidationResult<TOutput>> {
    let result = schema["~standard"].validate(value);
    if (result instanceof Promise) {
      result = await result;
    }

    if (result.issues) {
      const issues = result.issues.map((issue: StandardSchemaV1.Issue): ValidationIssue => {
        const path = issue.path
          ?.map((segment: PropertyKey | StandardSchemaV1.PathSegment) =>
            typeof segment === "object" && segment && "key" in segment ? segment.key : segment
          )
          .map((segment: PropertyKey) => String(segment))
          .join(".");
        return { path: path ?? "", message: issue.message };
      });
      return { success: false, issues };
    }

    return { success: true, value: result.value };
  }
}

/**
 * Renders issues the way they appear in error messages: `path: message`, one per line.
 */
export function formatIssues(issues: readonly ValidationIssue[]): string {
  return issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join("\n") || "Schema validation failed";
}
