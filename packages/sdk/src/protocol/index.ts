/**
 * Protocol Module Index
 *
 * Envelope handling, transports, schemas and the error taxonomy shared by the client.
 */

export * from "./types";
export { RpcProtocol, type ProtocolOptions } from "./protocol";
export type { Transport, TransportSendOptions } from "./transport";
export { HttpTransport, type HttpTransportOptions } from "./http-transport";
export { ClientSession, resolveEndpoint } from "./session";
export { NoopLogger, ConsoleLogger, isLogLevel, type ConsoleLoggerOptions, type LogLevel } from "./logger";
export { StandardSchemaValidator, formatIssues, type JsonSchema, type SchemaValidator, type SchemaValidationResult } from "./schema-validator";
export { createSchemaResolver, type SchemaRegistry, type SchemaResolver, type MethodSchemaRegistryEntry, type InlineErrors } from "./schema-registry";
export { defaultSchemaRegistry, defaultSchemaResolver } from "./default-schemas";
export { splitDn, type SplitDn } from "./dn";
export {
  allAttributes,
  singleAttribute,
  attributeSpec,
  encodeAttributes,
  attributeNames,
  type AttributeMode,
  type AttributeSelection,
  type AllAttributes,
  type SingleAttribute,
  type AttributeSpec
} from "./attributes";
export { isObject, isAttributeValue, isEmptyResult, describePayload } from "./assertions";
export { RPC_ENDPOINT_PATH, DEFAULT_CLIENT_TAG, UNCOUNTABLE, UNCOUNTABLE_OBJECT_TYPES } from "./constants";
