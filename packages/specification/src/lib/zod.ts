import { z } from "zod";

/**
 * Zod v4 schemas for the directory webservice's JSON-RPC envelopes and method payloads.
 *
 * These schemas implement the Standard Schema interface automatically (via Zod v4),
 * so they can be consumed by the SDK's StandardSchemaValidator.
 */

export const SessionIdSchema = z.string().min(1);

export const DnSchema = z.string();

export const ClientTagSchema = z.string();

// -----------------------------------------------------------------------------
// Envelopes
// -----------------------------------------------------------------------------

export const RpcRequestSchema = z.object({
  method: z.string().min(1),
  params: z.array(z.unknown()),
  id: ClientTagSchema
});

/**
 * The webservice answers `{ result, error }`; either key may be missing on older servers.
 */
export const RpcResponseSchema = z
  .object({
    result: z.unknown().optional(),
    error: z.unknown().optional(),
    id: z.union([z.string(), z.number(), z.null()]).optional()
  })
  .passthrough();

/**
 * A result that reports failures inline instead of through `error`.
 */
export const ResultErrorsSchema = z
  .object({
    errors: z.array(z.unknown()).min(1)
  })
  .passthrough();

// -----------------------------------------------------------------------------
// Shared payload shapes
// -----------------------------------------------------------------------------

export const AttributeValueSchema = z.union([z.string(), z.array(z.string())]);

export const AttributeMapSchema = z.record(z.string(), AttributeValueSchema);

export const DirectoryEntrySchema = z.union([AttributeValueSchema, AttributeMapSchema]);

export const WireAttributeModeSchema = z.union([z.literal(1), z.literal("*"), z.literal("b64"), z.literal("raw")]);

export const WireAttributesSchema = z.union([z.null(), z.string().min(1), z.record(z.string(), WireAttributeModeSchema)]);

/** tab → field → value */
export const TabValuesSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

export const LockModeSchema = z.union([z.literal("lock"), z.literal("unlock")]);

const OptionalStringSchema = z.string().nullable();

// -----------------------------------------------------------------------------
// Method params (ordered, as sent on the wire)
// -----------------------------------------------------------------------------

export const LoginParamsSchema = z.tuple([z.string().min(1), z.string().min(1), z.string()]);
export const SessionOnlyParamsSchema = z.tuple([SessionIdSchema]);
export const InfosParamsSchema = z.tuple([SessionIdSchema, z.string().min(1)]);
export const ListTabsParamsSchema = z.tuple([SessionIdSchema, z.string().min(1), OptionalStringSchema]);
export const CountParamsSchema = z.tuple([SessionIdSchema, z.string().min(1), OptionalStringSchema, OptionalStringSchema]);
export const LsParamsSchema = z.tuple([SessionIdSchema, z.string().min(1), WireAttributesSchema, OptionalStringSchema, OptionalStringSchema]);
export const ListLdapsParamsSchema = z.tuple([]);
export const GetFieldsParamsSchema = z.tuple([SessionIdSchema, z.string().min(1), OptionalStringSchema, OptionalStringSchema]);
export const GetTemplateParamsSchema = z.tuple([SessionIdSchema, z.string().min(1), DnSchema.min(1)]);
export const SetFieldsParamsSchema = z.tuple([SessionIdSchema, z.string().min(1), OptionalStringSchema, TabValuesSchema]);
export const UseTemplateParamsSchema = z.tuple([SessionIdSchema, z.string().min(1), DnSchema.min(1), TabValuesSchema]);
export const DeleteParamsSchema = z.tuple([SessionIdSchema, z.string().min(1), DnSchema.min(1)]);
export const RemoveTabParamsSchema = z.tuple([SessionIdSchema, z.string().min(1), DnSchema.min(1), z.string().min(1)]);
export const LockUserParamsSchema = z.tuple([SessionIdSchema, DnSchema.min(1), LockModeSchema]);
export const IsUserLockedParamsSchema = z.tuple([SessionIdSchema, DnSchema.min(1)]);
export const RecoveryGenTokenParamsSchema = z.tuple([SessionIdSchema, z.string().min(1)]);
export const RecoveryConfirmParamsSchema = z.tuple([SessionIdSchema, z.string().min(1), z.string(), z.string(), z.string().min(1)]);

// -----------------------------------------------------------------------------
// Method results
// -----------------------------------------------------------------------------

/** For methods whose result carries no information. */
export const UnknownResultSchema = z.unknown();

export const SessionIdResultSchema = SessionIdSchema;

export const BaseResultSchema = z.string();

/** type → display name */
export const ObjectTypesResultSchema = z.record(z.string(), z.string());

export const ObjectTypeInfoResultSchema = z.record(z.string(), z.unknown());

export const TabInfoSchema = z
  .object({
    name: z.string(),
    active: z.boolean()
  })
  .passthrough();

export const TabsResultSchema = z.record(z.string(), TabInfoSchema);

/** `null` for types the server refuses to count. */
export const CountResultSchema = z.union([z.number().int(), z.null()]);

/** An empty listing arrives as `[]` instead of `{}`. */
export const LsResultSchema = z.union([z.array(z.unknown()).length(0), z.record(z.string(), DirectoryEntrySchema)]);

export const FieldsResultSchema = z.record(z.string(), z.unknown());

export const DnResultSchema = DnSchema.min(1);

export const LockStateResultSchema = z.record(z.string(), z.union([z.number(), z.boolean()]));

export const RecoveryTokenResultSchema = z
  .object({
    token: z.string()
  })
  .passthrough();

/** database id → display name */
export const DatabasesResultSchema = z.record(z.string(), z.string());

// -----------------------------------------------------------------------------
// Inferred types
// -----------------------------------------------------------------------------

export type RpcRequest = z.infer<typeof RpcRequestSchema>;
export type RpcResponse = z.infer<typeof RpcResponseSchema>;
export type AttributeValue = z.infer<typeof AttributeValueSchema>;
export type AttributeMap = z.infer<typeof AttributeMapSchema>;
export type DirectoryEntry = z.infer<typeof DirectoryEntrySchema>;
export type WireAttributeMode = z.infer<typeof WireAttributeModeSchema>;
export type WireAttributes = z.infer<typeof WireAttributesSchema>;
export type TabValues = z.infer<typeof TabValuesSchema>;
export type LockMode = z.infer<typeof LockModeSchema>;
export type TabInfo = z.infer<typeof TabInfoSchema>;
