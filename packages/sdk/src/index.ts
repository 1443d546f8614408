/**
 * directory-rpc-sdk
 *
 * Client for a directory-management JSON-RPC webservice: session handling,
 * typed operations and a typed error taxonomy.
 *
 * @packageDocumentation
 */

export * from "./protocol";
export * from "./client";
