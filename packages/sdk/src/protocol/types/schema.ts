export type {
  AttributeMap,
  AttributeValue,
  DirectoryEntry,
  LockMode,
  RpcRequest,
  RpcResponse,
  TabInfo,
  TabValues,
  WireAttributeMode,
  WireAttributes
} from "directory-rpc-specification";

export type SessionId = string;
export type Dn = string;

/**
 * The client's view of its login state. Lives in memory only.
 */
export interface Session {
  /** Identifier obtained at login; `undefined` when logged out */
  readonly id: SessionId | undefined;
  /** The JSON-RPC endpoint the session talks to */
  readonly endpoint: URL;
  readonly verifyCertificate: boolean;
  /** Sent as the RPC `id` on every request */
  readonly clientTag: string;
}
