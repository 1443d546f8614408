/**
 * Path of the JSON-RPC entry point below the server's base URL.
 */
export const RPC_ENDPOINT_PATH = "/jsonrpc.php";

/**
 * Tag sent as the RPC `id` when the caller does not choose one.
 * Shows up in the server's logs.
 */
export const DEFAULT_CLIENT_TAG = "directory-rpc-client";

/**
 * Object types the server refuses to count; `count` reports -1 for these.
 */
export const UNCOUNTABLE_OBJECT_TYPES: readonly string[] = ["DASHBOARD", "SPECIAL", "LDAPMANAGER"];

/**
 * Count reported when the server returns `null`.
 */
export const UNCOUNTABLE = -1;
