/**
 * Client
 *
 * Session client for the directory webservice. Every operation is one RPC call.
 */

import {
  AuthenticationError,
  DirectoryError,
  ValidationError,
  toError,
  type AttributeMap,
  type DirectoryEntry,
  type Dn,
  type MethodResult,
  type Session,
  type SessionId,
  type TabValues
} from "../protocol/types";
import { RpcProtocol } from "../protocol/protocol";
import { HttpTransport } from "../protocol/http-transport";
import { ClientSession, resolveEndpoint } from "../protocol/session";
import { splitDn } from "../protocol/dn";
import { allAttributes, attributeNames, attributeSpec, encodeAttributes, type AttributeSelection } from "../protocol/attributes";
import { describePayload, isAttributeValue, isEmptyResult } from "../protocol/assertions";
import { UNCOUNTABLE } from "../protocol/constants";
import type {
  ClientOptions,
  CountOptions,
  Databases,
  FieldSections,
  ListObjectsOptions,
  ObjectListing,
  ObjectTypes,
  Tabs
} from "./types";

type Credentials = {
  readonly user: string;
  readonly password: string;
  readonly database: string;
};

/**
 * Normalises one `ls` entry to an attribute map.
 *
 * With a single-attribute or an all-attributes selection the server answers `dn → value`
 * instead of `dn → { attr: value }`. An entry without attributes arrives as `[]`.
 *
 * @throws DirectoryError for a bare value under an attribute spec
 */
function toAttributeMap(dn: Dn, entry: DirectoryEntry, selection: AttributeSelection): AttributeMap {
  if (Array.isArray(entry) && entry.length === 0) {
    return {};
  }
  if (!isAttributeValue(entry)) {
    return entry;
  }
  switch (selection.kind) {
    case "single":
      return { [selection.name]: entry };
    case "all":
      return { dn: entry };
    case "spec":
      throw new DirectoryError(`Unexpected entry for ${dn}: ${describePayload(entry)}`, entry, "ls");
  }
}

function toListing(result: MethodResult<"ls">, selection: AttributeSelection): ObjectListing {
  // No matches come back as [] rather than {}
  if (Array.isArray(result)) {
    return {};
  }

  const listing: ObjectListing = {};
  for (const [dn, entry] of Object.entries(result)) {
    listing[dn] = toAttributeMap(dn, entry, selection);
  }
  return listing;
}

// =============================================================================
// Client Class
// =============================================================================

/**
 * Directory webservice client.
 *
 * @example
 * ```typescript
 * const client = await DirectoryClient.connect({
 *   host: "https://directory.example.org/fusiondirectory",
 *   user: "admin",
 *   password: "test-secret",
 *   database: "default"
 * });
 * const users = await client.listObjects("USER", { attributes: attributeSpec({ uid: "single" }) });
 * await client.close();
 * ```
 */
export class DirectoryClient extends RpcProtocol {
  private readonly _session: ClientSession;
  private readonly credentials: Credentials;
  readonly autoLogin: boolean;

  /**
   * Validates the configuration and prepares the transport. Does not log in; see `connect()`.
   *
   * @throws ConfigurationError when the host is not an http(s) URL, or is plain http with `enforceEncryption` on
   */
  constructor(options: ClientOptions) {
    const verifyCertificate = options.verifyCertificate ?? true;
    const endpoint = resolveEndpoint(options.host, options.enforceEncryption ?? true);
    const createTransport = options.createTransport ?? ((transportOptions) => new HttpTransport(transportOptions));

    super({
      transport: createTransport({ endpoint, verifyCertificate, timeoutMs: options.timeoutMs }),
      clientTag: options.clientTag,
      logger: options.logger,
      schemaValidator: options.schemaValidator
    });

    this._session = new ClientSession(endpoint, verifyCertificate, this.clientTag);
    this.credentials = { user: options.user, password: options.password, database: options.database };
    this.autoLogin = options.autoLogin ?? true;
  }

  /**
   * Creates a client and, unless `autoLogin` is off, logs in.
   */
  static async connect(options: ClientOptions): Promise<DirectoryClient> {
    const client = new DirectoryClient(options);
    if (client.autoLogin) {
      try {
        await client.login();
      } catch (err) {
        const error = toError(err);
        await client.disconnect();
        throw error;
      }
    }
    return client;
  }

  get isLoggedIn(): boolean {
    return this._session.active;
  }

  /**
   * A copy of the current session state.
   */
  get session(): Session {
    return this._session.snapshot();
  }

  // ===========================================================================
  // Session
  // ===========================================================================

  /**
   * Logs in and keeps the returned session id for the following calls.
   * Arguments default to the credentials given at construction.
   *
   * @throws AuthenticationError when the server rejects the login
   */
  async login(
    user: string = this.credentials.user,
    password: string = this.credentials.password,
    database: string = this.credentials.database
  ): Promise<SessionId> {
    let sessionId: SessionId;
    try {
      sessionId = await this.call("login", [database, user, password]);
    } catch (err) {
      const error = toError(err);
      if (error instanceof DirectoryError) {
        throw new AuthenticationError(`Login as ${user} on ${database} rejected: ${error.message}`, error.payload, error);
      }
      throw error;
    }

    this._session.open(sessionId);
    this.logger.info("Logged in", { database, component: "client" });
    return sessionId;
  }

  /**
   * Ends the session. The local session id is cleared even when the server call fails.
   * Resolves with `undefined` without contacting the server when not logged in.
   */
  async logout(): Promise<unknown> {
    const sessionId = this._session.id;
    if (sessionId === undefined) {
      return undefined;
    }

    try {
      return await this.call("logout", [sessionId]);
    } finally {
      this._session.clear();
      this.logger.info("Logged out", { component: "client" });
    }
  }

  /**
   * Asks the server for the current session id, which also proves the session is still alive.
   * `undefined` when not logged in; the server is not contacted then.
   */
  async getSessionId(): Promise<SessionId | undefined> {
    const sessionId = this._session.id;
    if (sessionId === undefined) {
      return undefined;
    }
    return this.call("getId", [sessionId]);
  }

  /**
   * The LDAP base of the directory selected at login.
   */
  async getBase(): Promise<Dn> {
    return this.call("getBase", [this._session.requireId()]);
  }

  // ===========================================================================
  // Object types
  // ===========================================================================

  async listObjectTypes(): Promise<ObjectTypes> {
    return this.call("listTypes", [this._session.requireId()]);
  }

  async getObjectTypeInfo(objectType: string): Promise<Readonly<Record<string, unknown>>> {
    return this.call("infos", [this._session.requireId(), objectType]);
  }

  /**
   * Tabs of an object type. With a DN, `active` tells whether the tab is enabled on that object.
   */
  async listTabs(objectType: string, dn?: Dn): Promise<Tabs> {
    return this.call("listTabs", [this._session.requireId(), objectType, dn ?? null]);
  }

  // ===========================================================================
  // Objects
  // ===========================================================================

  /**
   * Number of objects of a type. Types the server will not count (DASHBOARD, SPECIAL,
   * LDAPMANAGER, ...) give -1, so 0 always means an empty result.
   */
  async count(objectType: string, options: CountOptions = {}): Promise<number> {
    const result = await this.call("count", [this._session.requireId(), objectType, options.ou ?? null, options.filter ?? null]);
    return result ?? UNCOUNTABLE;
  }

  async listObjects(objectType: string, options: ListObjectsOptions = {}): Promise<ObjectListing> {
    const selection = options.attributes ?? allAttributes();
    this.logger.debug("Listing objects", { objectType, attributes: attributeNames(selection), component: "client" });
    const result = await this.call("ls", [
      this._session.requireId(),
      objectType,
      encodeAttributes(selection),
      options.ou ?? null,
      options.filter ?? null
    ]);
    return toListing(result, selection);
  }

  /**
   * Attributes of one object, or `{}` when nothing matches.
   *
   * The server has no lookup by DN: this searches the DN's parent with its first RDN as filter.
   *
   * @throws ValidationError when the DN has no parent or a malformed first RDN
   */
  async getObject(
    objectType: string,
    dn: Dn,
    attributes: AttributeSelection = attributeSpec({ objectClass: "all" })
  ): Promise<AttributeMap> {
    const split = splitDn(dn);
    const listing = await this.listObjects(objectType, { attributes, ou: split.base, filter: split.filter });
    if (Object.hasOwn(listing, dn)) {
      return listing[dn];
    }
    return Object.hasOwn(listing, split.dn) ? listing[split.dn] : {};
  }

  /**
   * Form fields of an object type, filled from `dn` when given, or the creation defaults.
   */
  async getFields(objectType: string, dn?: Dn, tab?: string): Promise<FieldSections> {
    return this.call("getFields", [this._session.requireId(), objectType, dn ?? null, tab ?? null]);
  }

  async getTemplate(objectType: string, templateDn: Dn): Promise<FieldSections> {
    return this.call("gettemplate", [this._session.requireId(), objectType, templateDn]);
  }

  /**
   * Creates an object, from a template when `templateDn` is given.
   *
   * @param values - tab → field → value
   * @returns the DN of the new object
   */
  async createObject(objectType: string, values: TabValues, templateDn?: Dn): Promise<Dn> {
    const sessionId = this._session.requireId();
    if (templateDn) {
      return this.call("usetemplate", [sessionId, objectType, templateDn, values]);
    }
    return this.call("setFields", [sessionId, objectType, null, values]);
  }

  /**
   * @param values - tab → field → value
   * @returns the DN of the object
   */
  async updateObject(objectType: string, dn: Dn, values: TabValues): Promise<Dn> {
    return this.call("setFields", [this._session.requireId(), objectType, dn, values]);
  }

  /**
   * @throws DirectoryError when the server answers with anything, since success returns nothing
   */
  async deleteObject(objectType: string, dn: Dn): Promise<true> {
    const result = await this.call("delete", [this._session.requireId(), objectType, dn]);
    if (!isEmptyResult(result)) {
      throw new DirectoryError(`Deleting ${dn} failed: ${describePayload(result)}`, result, "delete");
    }
    return true;
  }

  /**
   * Removes a tab, and the attributes it holds, from an object.
   * @returns the DN of the object
   */
  async deleteTab(objectType: string, dn: Dn, tab: string): Promise<Dn> {
    return this.call("removetab", [this._session.requireId(), objectType, dn, tab]);
  }

  // ===========================================================================
  // Users
  // ===========================================================================

  async lockUser(dn: Dn): Promise<true> {
    await this.call("lockUser", [this._session.requireId(), dn, "lock"]);
    return true;
  }

  async unlockUser(dn: Dn): Promise<true> {
    await this.call("lockUser", [this._session.requireId(), dn, "unlock"]);
    return true;
  }

  /**
   * The server also takes a list of DNs; that form is refused here since the answer would not be a single state.
   *
   * @throws ValidationError for a list, before contacting the server
   */
  async userIsLocked(dn: Dn | readonly Dn[]): Promise<boolean> {
    if (typeof dn !== "string") {
      throw new ValidationError("userIsLocked takes a single DN string", [{ path: "dn", message: "Expected string, received list" }], dn);
    }

    const result = await this.call("isUserLocked", [this._session.requireId(), dn]);
    const states = Object.entries(result);
    if (states.length === 0) {
      throw new DirectoryError(`No lock state returned for ${dn}`, result, "isUserLocked");
    }

    const state = Object.hasOwn(result, dn) ? result[dn] : states[0][1];
    return Boolean(state);
  }

  /**
   * Generates a password recovery token for the user owning `email`.
   */
  async getRecoveryToken(email: string): Promise<string> {
    const result = await this.call("recoveryGenToken", [this._session.requireId(), email]);
    return result.token;
  }

  /**
   * Sets a new password using a token from `getRecoveryToken()`.
   */
  async setPassword(uid: string, newPassword: string, token: string): Promise<true> {
    // The webservice wants the password twice, as a form confirmation would.
    await this.call("recoveryConfirmPasswordChange", [this._session.requireId(), uid, newPassword, newPassword, token]);
    return true;
  }

  // ===========================================================================
  // Server
  // ===========================================================================

  /**
   * Directories the server manages; valid `database` values for `login()`. Needs no session.
   */
  async listDatabases(): Promise<Databases> {
    return this.call("listLdaps", []);
  }

  /**
   * Logs out when a session is open, then releases the transport.
   */
  async close(): Promise<void> {
    try {
      await this.logout();
    } finally {
      await this.disconnect();
    }
  }
}
