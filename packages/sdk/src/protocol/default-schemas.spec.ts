import { StandardSchemaValidator, defaultSchemaRegistry, defaultSchemaResolver, createSchemaResolver } from "./index";
import { LsParamsSchema, LsResultSchema } from "directory-rpc-specification";

describe("defaultSchemaResolver", () => {
  const validator = new StandardSchemaValidator();

  it("resolves the wire schemas by method", () => {
    expect(defaultSchemaResolver.params("ls")).toBe(LsParamsSchema);
    expect(defaultSchemaResolver.result("ls")).toBe(LsResultSchema);
  });

  it("resolves through a registry built by hand", () => {
    const resolver = createSchemaResolver(defaultSchemaRegistry);

    expect(resolver.params("count")).toBe(defaultSchemaRegistry.methods.count.params);
    expect(resolver.envelope()).toBe(defaultSchemaRegistry.envelope);
  });

  it("validates ls params and results", async () => {
    await expect(validator.validate(["session-1", "USER", { uid: 1 }, null, "(uid=jdoe)"], defaultSchemaResolver.params("ls"))).resolves.toMatchObject({
      success: true
    });
    await expect(validator.validate([], defaultSchemaResolver.result("ls"))).resolves.toEqual({ success: true, value: [] });
    await expect(validator.validate(["uid=jdoe"], defaultSchemaResolver.result("ls"))).resolves.toMatchObject({ success: false });
  });

  it("reports issue paths for invalid params", async () => {
    const result = await validator.validate(["session-1", ""], defaultSchemaResolver.params("infos"));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues[0].path).toBe("1");
    }
  });

  it("accepts a null count", async () => {
    await expect(validator.validate(null, defaultSchemaResolver.result("count"))).resolves.toEqual({ success: true, value: null });
  });

  it("only matches a non-empty errors list", async () => {
    const resultErrors = defaultSchemaResolver.resultErrors();

    await expect(validator.validate({ errors: ["uid is mandatory"] }, resultErrors)).resolves.toMatchObject({ success: true });
    await expect(validator.validate({ errors: [] }, resultErrors)).resolves.toMatchObject({ success: false });
    await expect(validator.validate("uid=jdoe,dc=example,dc=org", resultErrors)).resolves.toMatchObject({ success: false });
  });

  it("rejects a body that is not an object", async () => {
    await expect(validator.validate("oops", defaultSchemaResolver.envelope())).resolves.toMatchObject({ success: false });
  });
});
