import type { z } from "zod";
import type * as wire from "directory-rpc-specification";

/**
 * Ordered params and result of every webservice method.
 */
export type MethodCatalogue = {
  login: { params: z.infer<typeof wire.LoginParamsSchema>; result: z.infer<typeof wire.SessionIdResultSchema> };
  logout: { params: z.infer<typeof wire.SessionOnlyParamsSchema>; result: unknown };
  getId: { params: z.infer<typeof wire.SessionOnlyParamsSchema>; result: z.infer<typeof wire.SessionIdResultSchema> };
  getBase: { params: z.infer<typeof wire.SessionOnlyParamsSchema>; result: z.infer<typeof wire.BaseResultSchema> };
  listTypes: { params: z.infer<typeof wire.SessionOnlyParamsSchema>; result: z.infer<typeof wire.ObjectTypesResultSchema> };
  infos: { params: z.infer<typeof wire.InfosParamsSchema>; result: z.infer<typeof wire.ObjectTypeInfoResultSchema> };
  listTabs: { params: z.infer<typeof wire.ListTabsParamsSchema>; result: z.infer<typeof wire.TabsResultSchema> };
  count: { params: z.infer<typeof wire.CountParamsSchema>; result: z.infer<typeof wire.CountResultSchema> };
  ls: { params: z.infer<typeof wire.LsParamsSchema>; result: z.infer<typeof wire.LsResultSchema> };
  listLdaps: { params: z.infer<typeof wire.ListLdapsParamsSchema>; result: z.infer<typeof wire.DatabasesResultSchema> };
  getFields: { params: z.infer<typeof wire.GetFieldsParamsSchema>; result: z.infer<typeof wire.FieldsResultSchema> };
  gettemplate: { params: z.infer<typeof wire.GetTemplateParamsSchema>; result: z.infer<typeof wire.FieldsResultSchema> };
  setFields: { params: z.infer<typeof wire.SetFieldsParamsSchema>; result: z.infer<typeof wire.DnResultSchema> };
  usetemplate: { params: z.infer<typeof wire.UseTemplateParamsSchema>; result: z.infer<typeof wire.DnResultSchema> };
  delete: { params: z.infer<typeof wire.DeleteParamsSchema>; result: unknown };
  removetab: { params: z.infer<typeof wire.RemoveTabParamsSchema>; result: z.infer<typeof wire.DnResultSchema> };
  lockUser: { params: z.infer<typeof wire.LockUserParamsSchema>; result: unknown };
  isUserLocked: { params: z.infer<typeof wire.IsUserLockedParamsSchema>; result: z.infer<typeof wire.LockStateResultSchema> };
  recoveryGenToken: { params: z.infer<typeof wire.RecoveryGenTokenParamsSchema>; result: z.infer<typeof wire.RecoveryTokenResultSchema> };
  recoveryConfirmPasswordChange: { params: z.infer<typeof wire.RecoveryConfirmParamsSchema>; result: unknown };
};

export type MethodName = keyof MethodCatalogue;
export type MethodParams<M extends MethodName> = MethodCatalogue[M]["params"];
export type MethodResult<M extends MethodName> = MethodCatalogue[M]["result"];

/**
 * Per-call options.
 */
export interface RequestOptions {
  readonly signal?: AbortSignal;
  readonly timeout?: number;
}
