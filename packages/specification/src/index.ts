/**
 * directory-rpc-specification
 *
 * Runtime schemas for the directory webservice wire format.
 *
 * @packageDocumentation
 */

export * from "./lib/zod";
