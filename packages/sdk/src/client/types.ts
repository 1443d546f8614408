/**
 * Client Types
 *
 * Type definitions specific to the directory client.
 */

import type { AttributeMap, Dn, Logger, TabInfo } from "../protocol/types";
import type { Transport } from "../protocol/transport";
import type { HttpTransportOptions } from "../protocol/http-transport";
import type { SchemaValidator } from "../protocol/schema-validator";
import type { AttributeSelection } from "../protocol/attributes";

// =============================================================================
// Client Options
// =============================================================================

/**
 * Builds the transport for a client. Receives the resolved endpoint and the TLS and timeout settings.
 */
export type TransportFactory = (options: HttpTransportOptions) => Transport;

/**
 * Configuration options for the DirectoryClient.
 */
export type ClientOptions = {
  /**
   * Base URL of the server including the scheme, e.g. `https://directory.example.org/fusiondirectory`.
   */
  readonly host: string;

  readonly user: string;
  readonly password: string;

  /**
   * Directory (LDAP server) to log in to, as listed by `listDatabases()`.
   */
  readonly database: string;

  /**
   * Verify the server's TLS certificate.
   * @default true
   */
  readonly verifyCertificate?: boolean;

  /**
   * Log in from `DirectoryClient.connect()`.
   * @default true
   */
  readonly autoLogin?: boolean;

  /**
   * Refuse hosts that are not https.
   * @default true
   */
  readonly enforceEncryption?: boolean;

  /**
   * Sent as the RPC `id` with every request.
   * @default "directory-rpc-client"
   */
  readonly clientTag?: string;

  /**
   * Abort each request after this many milliseconds.
   */
  readonly timeoutMs?: number;

  readonly logger?: Logger;

  readonly schemaValidator?: SchemaValidator;

  /**
   * Replaces the default undici-based HttpTransport.
   */
  readonly createTransport?: TransportFactory;
};

// =============================================================================
// Operation Options
// =============================================================================

export interface CountOptions {
  /** Branch to count in; the directory base when unset */
  readonly ou?: string;
  /** Additional LDAP filter */
  readonly filter?: string;
}

export interface ListObjectsOptions extends CountOptions {
  /** @default allAttributes() */
  readonly attributes?: AttributeSelection;
}

// =============================================================================
// Results
// =============================================================================

/** object type → display name */
export type ObjectTypes = Readonly<Record<string, string>>;

/** tab class → tab description */
export type Tabs = Readonly<Record<string, TabInfo>>;

/** DN → attributes */
export type ObjectListing = Record<Dn, AttributeMap>;

/** section → fields, as the server's forms describe them */
export type FieldSections = Readonly<Record<string, unknown>>;

/** database id → display name */
export type Databases = Readonly<Record<string, string>>;
