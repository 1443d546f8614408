import { ConfigurationError } from "../protocol/types";
import type { ClientOptions } from "./types";

/**
 * Client options that can come from the environment. Logger and transport are code-only.
 */
export type EnvClientOptions = Pick<
  ClientOptions,
  "host" | "user" | "password" | "database" | "verifyCertificate" | "enforceEncryption" | "autoLogin" | "clientTag" | "timeoutMs"
>;

export type Env = Readonly<Record<string, string | undefined>>;

const REQUIRED_VARIABLES = ["FD_HOST", "FD_USER", "FD_PASSWORD", "FD_DATABASE"] as const;

const readBoolean = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  if (value === "1" || value.toLowerCase() === "true") return true;
  if (value === "0" || value.toLowerCase() === "false") return false;
  return defaultValue;
};

const readNumber = (value: string | undefined): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
};

/**
 * Reads client options from `FD_*` variables.
 *
 * | Variable | Option |
 * |---|---|
 * | `FD_HOST`, `FD_USER`, `FD_PASSWORD`, `FD_DATABASE` | required |
 * | `FD_VERIFY_CERT` | `verifyCertificate` (default true) |
 * | `FD_ENFORCE_ENCRYPTION` | `enforceEncryption` (default true) |
 * | `FD_AUTO_LOGIN` | `autoLogin` (default true) |
 * | `FD_CLIENT_ID` | `clientTag` |
 * | `FD_TIMEOUT_MS` | `timeoutMs` |
 *
 * @throws ConfigurationError listing every missing required variable
 */
export const loadClientOptionsFromEnv = (env: Env = process.env): EnvClientOptions => {
  const missing = REQUIRED_VARIABLES.filter((name) => !env[name]);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing environment variables: ${missing.join(", ")}`, { missing });
  }

  return {
    host: env["FD_HOST"] ?? "",
    user: env["FD_USER"] ?? "",
    password: env["FD_PASSWORD"] ?? "",
    database: env["FD_DATABASE"] ?? "",
    verifyCertificate: readBoolean(env["FD_VERIFY_CERT"], true),
    enforceEncryption: readBoolean(env["FD_ENFORCE_ENCRYPTION"], true),
    autoLogin: readBoolean(env["FD_AUTO_LOGIN"], true),
    clientTag: env["FD_CLIENT_ID"] || undefined,
    timeoutMs: readNumber(env["FD_TIMEOUT_MS"])
  };
};
