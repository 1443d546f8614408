/**
 * Client Module Index
 *
 * Re-exports client components.
 *
 * @example
 * ```typescript
 * import { DirectoryClient, loadClientOptionsFromEnv } from "directory-rpc-sdk";
 *
 * const client = await DirectoryClient.connect(loadClientOptionsFromEnv());
 * ```
 */

// Client class
export { DirectoryClient } from "./client";

// Configuration
export { loadClientOptionsFromEnv, type EnvClientOptions, type Env } from "./config";

// Client types
export type {
  ClientOptions,
  TransportFactory,
  CountOptions,
  ListObjectsOptions,
  ObjectTypes,
  Tabs,
  ObjectListing,
  FieldSections,
  Databases
} from "./types";
