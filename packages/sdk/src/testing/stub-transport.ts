import type { Transport } from "../protocol/transport";
import { TransportError, type RpcRequest } from "../protocol/types";

/**
 * Transport that answers with canned response bodies, in order.
 */
export class StubTransport implements Transport {
  readonly endpoint: URL;
  readonly requests: RpcRequest[] = [];
  closed = false;

  private readonly bodies: unknown[];

  constructor(bodies: unknown[] = [], endpoint = new URL("https://directory.example.org/jsonrpc.php")) {
    this.bodies = [...bodies];
    this.endpoint = endpoint;
  }

  /**
   * Queues a `{ result, error: null }` body.
   */
  reply(result: unknown): this {
    this.bodies.push({ result, error: null });
    return this;
  }

  async send(request: RpcRequest): Promise<unknown> {
    this.requests.push(request);
    if (this.bodies.length === 0) {
      throw new TransportError(`No response queued for ${request.method}`);
    }
    return this.bodies.shift();
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
