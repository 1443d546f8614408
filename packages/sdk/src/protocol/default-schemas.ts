import type { SchemaRegistry } from "./schema-registry";
import { createSchemaResolver } from "./schema-registry";

import {
  BaseResultSchema,
  CountParamsSchema,
  CountResultSchema,
  DatabasesResultSchema,
  DeleteParamsSchema,
  DnResultSchema,
  FieldsResultSchema,
  GetFieldsParamsSchema,
  GetTemplateParamsSchema,
  InfosParamsSchema,
  IsUserLockedParamsSchema,
  ListLdapsParamsSchema,
  ListTabsParamsSchema,
  LockStateResultSchema,
  LockUserParamsSchema,
  LoginParamsSchema,
  LsParamsSchema,
  LsResultSchema,
  ObjectTypeInfoResultSchema,
  ObjectTypesResultSchema,
  RecoveryConfirmParamsSchema,
  RecoveryGenTokenParamsSchema,
  RecoveryTokenResultSchema,
  RemoveTabParamsSchema,
  ResultErrorsSchema,
  RpcResponseSchema,
  SessionIdResultSchema,
  SessionOnlyParamsSchema,
  SetFieldsParamsSchema,
  TabsResultSchema,
  UnknownResultSchema,
  UseTemplateParamsSchema
} from "directory-rpc-specification";

/**
 * Default Standard-Schema-compatible runtime schemas for every webservice method.
 *
 * Methods whose result carries no information (logout, delete, lockUser,
 * recoveryConfirmPasswordChange) accept any result.
 */
export const defaultSchemaRegistry: SchemaRegistry = {
  methods: {
    login: { params: LoginParamsSchema, result: SessionIdResultSchema },
    logout: { params: SessionOnlyParamsSchema, result: UnknownResultSchema },
    getId: { params: SessionOnlyParamsSchema, result: SessionIdResultSchema },
    getBase: { params: SessionOnlyParamsSchema, result: BaseResultSchema },
    listTypes: { params: SessionOnlyParamsSchema, result: ObjectTypesResultSchema },
    infos: { params: InfosParamsSchema, result: ObjectTypeInfoResultSchema },
    listTabs: { params: ListTabsParamsSchema, result: TabsResultSchema },
    count: { params: CountParamsSchema, result: CountResultSchema },
    ls: { params: LsParamsSchema, result: LsResultSchema },
    listLdaps: { params: ListLdapsParamsSchema, result: DatabasesResultSchema },
    getFields: { params: GetFieldsParamsSchema, result: FieldsResultSchema },
    gettemplate: { params: GetTemplateParamsSchema, result: FieldsResultSchema },
    setFields: { params: SetFieldsParamsSchema, result: DnResultSchema },
    usetemplate: { params: UseTemplateParamsSchema, result: DnResultSchema },
    delete: { params: DeleteParamsSchema, result: UnknownResultSchema },
    removetab: { params: RemoveTabParamsSchema, result: DnResultSchema },
    lockUser: { params: LockUserParamsSchema, result: UnknownResultSchema },
    isUserLocked: { params: IsUserLockedParamsSchema, result: LockStateResultSchema },
    recoveryGenToken: { params: RecoveryGenTokenParamsSchema, result: RecoveryTokenResultSchema },
    recoveryConfirmPasswordChange: { params: RecoveryConfirmParamsSchema, result: UnknownResultSchema }
  },
  envelope: RpcResponseSchema,
  resultErrors: ResultErrorsSchema
};

/**
 * Convenience SchemaResolver built from `defaultSchemaRegistry`.
 */
export const defaultSchemaResolver = createSchemaResolver(defaultSchemaRegistry);
