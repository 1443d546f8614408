import type { JsonSchema } from "./schema-validator";
import type { MethodName, MethodParams, MethodResult } from "./types";

export type MethodSchemaRegistryEntry<M extends MethodName = MethodName> = {
  /** Schema for the ordered params of a request with this method name. */
  readonly params: JsonSchema<unknown, MethodParams<M>>;

  /** Schema for the `result` the server returns for this method. */
  readonly result: JsonSchema<unknown, MethodResult<M>>;
};

export type InlineErrors = {
  readonly errors: readonly unknown[];
};

export type SchemaRegistry = {
  /**
   * Method-keyed schemas, one entry per webservice method.
   */
  readonly methods: { readonly [M in MethodName]: MethodSchemaRegistryEntry<M> };

  /** Schema every response body must satisfy before it is unwrapped. */
  readonly envelope: JsonSchema;

  /** Matches a result that reports failures in an `errors` list. */
  readonly resultErrors: JsonSchema<unknown, InlineErrors>;
};

export type SchemaResolver = {
  params<M extends MethodName>(method: M): JsonSchema<unknown, MethodParams<M>>;
  result<M extends MethodName>(method: M): JsonSchema<unknown, MethodResult<M>>;
  envelope(): JsonSchema;
  resultErrors(): JsonSchema<unknown, InlineErrors>;
};

/**
 * Creates a SchemaResolver from a declarative schema registry.
 *
 * Any Standard Schema implementation (Zod, Valibot, ArkType) can be plugged in.
 */
export function createSchemaResolver(registry: SchemaRegistry): SchemaResolver {
  return {
    params<M extends MethodName>(method: M): JsonSchema<unknown, MethodParams<M>> {
      const entry: MethodSchemaRegistryEntry<M> = registry.methods[method];
      return entry.params;
    },
    result<M extends MethodName>(method: M): JsonSchema<unknown, MethodResult<M>> {
      const entry: MethodSchemaRegistryEntry<M> = registry.methods[method];
      return entry.result;
    },
    envelope(): JsonSchema {
      return registry.envelope;
    },
    resultErrors(): JsonSchema<unknown, InlineErrors> {
      return registry.resultErrors;
    }
  };
}
