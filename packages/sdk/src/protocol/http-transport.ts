import { Agent, fetch, type Dispatcher, type Response } from "undici";

import type { Transport, TransportSendOptions } from "./transport";
import { TransportError, toError, type RpcRequest } from "./types";

export type HttpTransportOptions = {
  readonly endpoint: URL;

  /**
   * Verify the server's TLS certificate.
   * @default true
   */
  readonly verifyCertificate?: boolean;

  /**
   * Abort requests after this many milliseconds. No timeout when unset.
   */
  readonly timeoutMs?: number;

  /**
   * Dispatcher to send through instead of a private connection pool (e.g. a proxy agent or a MockAgent).
   * It is not closed by `close()`.
   */
  readonly dispatcher?: Dispatcher;
};

/**
 * JSON-over-HTTP POST transport built on undici.
 */
export class HttpTransport implements Transport {
  public readonly endpoint: URL;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly timeoutMs?: number;

  public constructor(options: HttpTransportOptions) {
    this.endpoint = options.endpoint;
    this.timeoutMs = options.timeoutMs;
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher =
      options.dispatcher ??
      new Agent({
        connect: { rejectUnauthorized: options.verifyCertificate ?? true }
      });
  }

  public async send(request: RpcRequest, options?: TransportSendOptions): Promise<unknown> {
    const timeout = options?.timeout ?? this.timeoutMs;
    const signal = options?.signal ?? (timeout !== undefined ? AbortSignal.timeout(timeout) : undefined);

    let response: Response;
    let body: string;
    try {
      response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          accept: "application/json"
        },
        body: JSON.stringify(request),
        dispatcher: this.dispatcher,
        signal
      });
      body = await response.text();
    } catch (err) {
      const error = toError(err);
      throw new TransportError(`Request to ${this.endpoint.href} failed: ${error.message}`, undefined, undefined, error);
    }

    if (!response.ok) {
      const statusText = response.statusText ? ` ${response.statusText}` : "";
      throw new TransportError(`HTTP ${response.status}${statusText}`, body, response.status);
    }

    if (body.trim().length === 0) {
      throw new TransportError("Server returned an empty body", body, response.status);
    }

    try {
      const payload: unknown = JSON.parse(body);
      return payload;
    } catch (err) {
      throw new TransportError("Server returned a body that is not JSON", body, response.status, toError(err));
    }
  }

  public async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
