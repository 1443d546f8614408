import { loadClientOptionsFromEnv } from "./config";
import { ConfigurationError } from "../protocol/types";

const REQUIRED = {
  FD_HOST: "https://directory.example.org/fusiondirectory",
  FD_USER: "admin",
  FD_PASSWORD: "test-secret",
  FD_DATABASE: "default"
};

describe("loadClientOptionsFromEnv", () => {
  it("reads the required variables and applies defaults", () => {
    expect(loadClientOptionsFromEnv(REQUIRED)).toEqual({
      host: "https://directory.example.org/fusiondirectory",
      user: "admin",
      password: "test-secret",
      database: "default",
      verifyCertificate: true,
      enforceEncryption: true,
      autoLogin: true,
      clientTag: undefined,
      timeoutMs: undefined
    });
  });

  it("reads the optional variables", () => {
    const options = loadClientOptionsFromEnv({
      ...REQUIRED,
      FD_VERIFY_CERT: "false",
      FD_ENFORCE_ENCRYPTION: "0",
      FD_AUTO_LOGIN: "TRUE",
      FD_CLIENT_ID: "nightly-sync",
      FD_TIMEOUT_MS: "5000"
    });

    expect(options).toMatchObject({
      verifyCertificate: false,
      enforceEncryption: false,
      autoLogin: true,
      clientTag: "nightly-sync",
      timeoutMs: 5000
    });
  });

  it("ignores unreadable values", () => {
    const options = loadClientOptionsFromEnv({ ...REQUIRED, FD_VERIFY_CERT: "maybe", FD_TIMEOUT_MS: "-1" });

    expect(options.verifyCertificate).toBe(true);
    expect(options.timeoutMs).toBeUndefined();
  });

  it("lists every missing required variable", () => {
    const load = () => loadClientOptionsFromEnv({ FD_HOST: REQUIRED.FD_HOST, FD_USER: "admin", FD_PASSWORD: "" });

    expect(load).toThrow(ConfigurationError);
    expect(load).toThrow("Missing environment variables: FD_PASSWORD, FD_DATABASE");
  });
});
