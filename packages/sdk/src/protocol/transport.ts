/**
 * Protocol Transport
 *
 * Carries one request envelope to the server and hands back the decoded response body.
 */

import type { RpcRequest } from "./types";

/**
 * Send options.
 */
export interface TransportSendOptions {
  readonly signal?: AbortSignal;
  /** Overrides the transport's own timeout, in milliseconds */
  readonly timeout?: number;
}

export interface Transport {
  /** Where requests go; used for logging */
  readonly endpoint: URL;

  /**
   * Posts the envelope and resolves with the parsed JSON body.
   * @throws TransportError on network failure, timeout, non-2xx status or a body that is not JSON
   */
  send(request: RpcRequest, options?: TransportSendOptions): Promise<unknown>;

  /**
   * Releases pooled connections.
   */
  close(): Promise<void>;
}
