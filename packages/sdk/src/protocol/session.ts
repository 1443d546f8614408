/**
 * Session
 *
 * Holds the identifier obtained at login. One per client instance, in memory only.
 */

import { RPC_ENDPOINT_PATH } from "./constants";
import { AuthenticationError, ConfigurationError, type Session, type SessionId } from "./types";

const isValidHttpUrl = (value: string): boolean => {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
};

/**
 * Builds the JSON-RPC endpoint URL from the server's base URL.
 *
 * @throws ConfigurationError when the host is not an http(s) URL, or is plain http while encryption is enforced
 */
export function resolveEndpoint(host: string, enforceEncryption: boolean): URL {
  if (!isValidHttpUrl(host)) {
    throw new ConfigurationError(`Invalid host (expected an http:// or https:// URL): ${host}`, { host });
  }

  const base = new URL(host);
  if (enforceEncryption && base.protocol !== "https:") {
    throw new ConfigurationError(`Unencrypted host not allowed: ${host}`, { host });
  }

  const path = base.pathname.replace(/\/+$/, "");
  return new URL(`${path}${RPC_ENDPOINT_PATH}${base.search}`, base);
}

export class ClientSession implements Session {
  private _id: SessionId | undefined;

  constructor(
    public readonly endpoint: URL,
    public readonly verifyCertificate: boolean,
    public readonly clientTag: string
  ) {}

  get id(): SessionId | undefined {
    return this._id;
  }

  get active(): boolean {
    return this._id !== undefined;
  }

  open(id: SessionId): void {
    this._id = id;
  }

  clear(): void {
    this._id = undefined;
  }

  /**
   * @throws AuthenticationError when no login happened yet
   */
  requireId(): SessionId {
    if (this._id === undefined) {
      throw new AuthenticationError("Not logged in: call login() first");
    }
    return this._id;
  }

  snapshot(): Session {
    return {
      id: this._id,
      endpoint: new URL(this.endpoint.href),
      verifyCertificate: this.verifyCertificate,
      clientTag: this.clientTag
    };
  }
}
