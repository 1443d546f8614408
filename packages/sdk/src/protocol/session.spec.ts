import { ClientSession, resolveEndpoint } from "./session";
import { AuthenticationError, ConfigurationError } from "./types";

describe("resolveEndpoint", () => {
  it.each([
    ["https://directory.example.org/fusiondirectory", "https://directory.example.org/fusiondirectory/jsonrpc.php"],
    ["https://directory.example.org/fusiondirectory/", "https://directory.example.org/fusiondirectory/jsonrpc.php"],
    ["https://directory.example.org", "https://directory.example.org/jsonrpc.php"],
    ["https://directory.example.org:8443/fd", "https://directory.example.org:8443/fd/jsonrpc.php"]
  ])("resolves %s", (host, endpoint) => {
    expect(resolveEndpoint(host, true).href).toBe(endpoint);
  });

  it("refuses plain http when encryption is enforced", () => {
    expect(() => resolveEndpoint("http://directory.example.org", true)).toThrow(ConfigurationError);
    expect(resolveEndpoint("http://directory.example.org", false).href).toBe("http://directory.example.org/jsonrpc.php");
  });

  it.each(["directory.example.org", "ftp://directory.example.org", ""])("refuses %p", (host) => {
    expect(() => resolveEndpoint(host, false)).toThrow(`Invalid host (expected an http:// or https:// URL): ${host}`);
  });
});

describe("ClientSession", () => {
  const endpoint = new URL("https://directory.example.org/jsonrpc.php");

  it("requires a login before handing out the id", () => {
    const session = new ClientSession(endpoint, true, "directory-rpc-client");

    expect(session.active).toBe(false);
    expect(() => session.requireId()).toThrow(AuthenticationError);

    session.open("session-1");
    expect(session.requireId()).toBe("session-1");

    session.clear();
    expect(session.id).toBeUndefined();
  });

  it("snapshots without sharing the endpoint", () => {
    const session = new ClientSession(endpoint, false, "nightly-sync");
    session.open("session-1");

    const snapshot = session.snapshot();

    expect(snapshot).toMatchObject({ id: "session-1", verifyCertificate: false, clientTag: "nightly-sync" });
    expect(snapshot.endpoint).not.toBe(endpoint);
    expect(snapshot.endpoint.href).toBe(endpoint.href);
  });
});
