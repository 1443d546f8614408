import { AuthenticationError, DirectoryError, TransportError, ValidationError, isDirectoryRpcError, toError } from "./errors";

describe("errors", () => {
  it("tags each kind", () => {
    expect(new TransportError("down", undefined, 502).kind).toBe("transport");
    expect(new AuthenticationError("rejected").kind).toBe("authentication");
    expect(new DirectoryError("failed", { errors: ["x"] }, "delete")).toMatchObject({ kind: "directory", method: "delete", payload: { errors: ["x"] } });
    expect(new ValidationError("bad", [{ path: "dn", message: "Expected string" }]).issues).toHaveLength(1);
  });

  it("keeps the cause", () => {
    const cause = new Error("socket hang up");

    expect(new TransportError("down", undefined, undefined, cause).cause).toBe(cause);
  });

  it("recognises its own errors only", () => {
    expect(isDirectoryRpcError(new DirectoryError("failed"))).toBe(true);
    expect(isDirectoryRpcError(new Error("failed"))).toBe(false);
  });

  it("normalises thrown values", () => {
    expect(toError("boom").message).toBe("boom");
    expect(toError({ message: "boom", name: "RemoteError" })).toMatchObject({ message: "boom", name: "RemoteError" });
    expect(toError({ code: 1 }).message).toBe('Non-Error object thrown: {"code":1}');
    expect(toError(undefined).message).toBe("Null or undefined thrown");
  });
});
