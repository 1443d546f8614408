/**
 * Protocol Tests
 *
 * Envelope building and result unwrapping against canned response bodies.
 */

import { RpcProtocol } from "./protocol";
import { StubTransport } from "../testing/stub-transport";
import { DirectoryError, TransportError, ValidationError, type Logger } from "./types";

// =============================================================================
// Test Helpers
// =============================================================================

function createMockLogger(): Logger & { [K in keyof Logger]: jest.Mock } {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn()
  };
}

function createProtocol(bodies: unknown[], clientTag?: string) {
  const transport = new StubTransport(bodies);
  const logger = createMockLogger();
  const protocol = new RpcProtocol({ transport, logger, clientTag });
  return { transport, logger, protocol };
}

// =============================================================================
// Requests
// =============================================================================

describe("RpcProtocol", () => {
  describe("requests", () => {
    it("sends method, ordered params and the client tag as id", async () => {
      const { protocol, transport } = createProtocol([{ result: "dc=example,dc=org", error: null }]);

      await protocol.call("getBase", ["session-1"]);

      expect(transport.requests).toEqual([{ method: "getBase", params: ["session-1"], id: "directory-rpc-client" }]);
    });

    it("uses a custom client tag", async () => {
      const { protocol, transport } = createProtocol([{ result: {}, error: null }], "nightly-sync");

      await protocol.call("listLdaps", []);

      expect(transport.requests[0].id).toBe("nightly-sync");
    });

    it("rejects invalid params without sending anything", async () => {
      const { protocol, transport } = createProtocol([]);

      const call = protocol.call("infos", ["session-1", ""]);

      await expect(call).rejects.toBeInstanceOf(ValidationError);
      await expect(call).rejects.toThrow(/^Invalid params for infos: /);
      expect(transport.requests).toHaveLength(0);
    });

    it("logs the method but not the params", async () => {
      const { protocol, logger } = createProtocol([{ result: "session-1", error: null }]);

      await protocol.call("login", ["default", "admin", "test-secret"]);

      expect(logger.debug).toHaveBeenCalledWith("Sending request", {
        method: "login",
        endpoint: "https://directory.example.org/jsonrpc.php",
        clientTag: "directory-rpc-client"
      });
    });
  });

  // ===========================================================================
  // Responses
  // ===========================================================================

  describe("responses", () => {
    it("returns the result", async () => {
      const { protocol } = createProtocol([{ result: "dc=example,dc=org", error: null }]);

      await expect(protocol.call("getBase", ["session-1"])).resolves.toBe("dc=example,dc=org");
    });

    it("accepts a body without an error key", async () => {
      const { protocol } = createProtocol([{ result: 4 }]);

      await expect(protocol.call("count", ["session-1", "USER", null, null])).resolves.toBe(4);
    });

    it("raises DirectoryError for a non-null error", async () => {
      const { protocol } = createProtocol([{ result: null, error: { message: "Invalid session id" } }]);

      const call = protocol.call("getBase", ["session-1"]);

      await expect(call).rejects.toBeInstanceOf(DirectoryError);
      await expect(call).rejects.toMatchObject({
        message: "Server returned an error for getBase: Invalid session id",
        payload: { message: "Invalid session id" },
        method: "getBase",
        kind: "directory"
      });
    });

    it("renders a string error as is", async () => {
      const { protocol } = createProtocol([{ result: null, error: "boom" }]);

      await expect(protocol.call("getBase", ["session-1"])).rejects.toThrow("Server returned an error for getBase: boom");
    });

    it("raises DirectoryError for an errors list inside the result, one line per entry", async () => {
      const { protocol } = createProtocol([{ result: { errors: ["uid is mandatory", { message: "sn is mandatory" }] }, error: null }]);

      const call = protocol.call("setFields", ["session-1", "USER", null, { user: {} }]);

      await expect(call).rejects.toBeInstanceOf(DirectoryError);
      await expect(call).rejects.toThrow("uid is mandatory\nsn is mandatory");
    });

    it("does not treat an empty errors list as a failure", async () => {
      const { protocol } = createProtocol([{ result: { errors: [] }, error: null }]);

      await expect(protocol.call("logout", ["session-1"])).resolves.toEqual({ errors: [] });
    });

    it("raises DirectoryError for a result of the wrong shape", async () => {
      const { protocol } = createProtocol([{ result: "three", error: null }]);

      const call = protocol.call("count", ["session-1", "USER", null, null]);

      await expect(call).rejects.toBeInstanceOf(DirectoryError);
      await expect(call).rejects.toThrow(/^Unexpected result for count: /);
    });

    it.each([["not json-rpc"], [[1, 2]], [null]])("raises TransportError for a body that is not an object: %p", async (body) => {
      const { protocol } = createProtocol([body]);

      const call = protocol.call("getBase", ["session-1"]);

      await expect(call).rejects.toBeInstanceOf(TransportError);
      await expect(call).rejects.toThrow(/^Malformed response to getBase: /);
    });
  });

  // ===========================================================================
  // Failures and lifecycle
  // ===========================================================================

  describe("failures", () => {
    it("logs and rethrows transport errors unchanged", async () => {
      const { protocol, logger } = createProtocol([]);

      const call = protocol.call("getBase", ["session-1"]);

      await expect(call).rejects.toThrow("No response queued for getBase");
      expect(logger.error).toHaveBeenCalledWith(
        "Call to getBase failed",
        expect.any(TransportError),
        expect.objectContaining({ method: "getBase", errorKind: "transport", errorName: "TransportError" })
      );
    });

    it("closes the transport on disconnect", async () => {
      const { protocol, transport } = createProtocol([]);

      await protocol.disconnect();

      expect(transport.closed).toBe(true);
    });
  });
});
