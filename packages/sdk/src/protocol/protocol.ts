import type { Logger, MethodName, MethodParams, MethodResult, RequestOptions, RpcRequest } from "./types";
import { DirectoryError, TransportError, ValidationError, isDirectoryRpcError, toError } from "./types";

import type { Transport } from "./transport";
import { formatIssues, StandardSchemaValidator, type SchemaValidator } from "./schema-validator";
import type { SchemaResolver } from "./schema-registry";
import { defaultSchemaResolver } from "./default-schemas";
import { NoopLogger } from "./logger";
import { describePayload, isObject } from "./assertions";
import { DEFAULT_CLIENT_TAG } from "./constants";

// =============================================================================
// Protocol Options
// =============================================================================

/**
 * Configuration options for the Protocol.
 */
export type ProtocolOptions = {
  /**
   * Carries the envelopes to the server.
   */
  readonly transport: Transport;

  /**
   * Sent as the RPC `id` of every request, so calls can be told apart in server logs.
   * @default "directory-rpc-client"
   */
  readonly clientTag?: string;

  /**
   * Logger for protocol-level logging.
   * If not provided, NoopLogger will be used.
   */
  readonly logger?: Logger;

  /**
   * Validator for outgoing params and incoming responses.
   * If not provided, StandardSchemaValidator will be used.
   */
  readonly schemaValidator?: SchemaValidator;

  /**
   * Where the schemas for each method come from.
   * If not provided, the zod schemas of directory-rpc-specification are used.
   */
  readonly schemas?: SchemaResolver;
};

// =============================================================================
// Protocol Class
// =============================================================================

/**
 * Base class for the webservice's JSON-RPC dialect.
 *
 * One call is one POST: `{ method, params, id }` out, `{ result, error }` back.
 * A non-null `error`, or a result carrying an `errors` list, rejects with DirectoryError.
 */
export class RpcProtocol {
  protected readonly logger: Logger;
  protected readonly transport: Transport;
  protected readonly clientTag: string;
  protected readonly schemaValidator: SchemaValidator;
  protected readonly schemas: SchemaResolver;

  constructor(options: ProtocolOptions) {
    this.transport = options.transport;
    this.clientTag = options.clientTag ?? DEFAULT_CLIENT_TAG;
    this.logger = options.logger ?? new NoopLogger();
    this.schemaValidator = options.schemaValidator ?? new StandardSchemaValidator();
    this.schemas = options.schemas ?? defaultSchemaResolver;
  }

  /**
   * Sends one request and resolves with its unwrapped `result`.
   *
   * Params are never logged: `login` and `recoveryConfirmPasswordChange` carry passwords.
   */
  async call<M extends MethodName>(method: M, params: MethodParams<M>, options?: RequestOptions): Promise<MethodResult<M>> {
    const paramsCheck = await this.schemaValidator.validate(params, this.schemas.params(method));
    if (!paramsCheck.success) {
      throw new ValidationError(`Invalid params for ${method}: ${formatIssues(paramsCheck.issues)}`, paramsCheck.issues);
    }

    const request: RpcRequest = { method, params: [...paramsCheck.value], id: this.clientTag };
    const endpoint = this.transport.endpoint.href;
    const startedAt = Date.now();

    this.logger.debug("Sending request", { method, endpoint, clientTag: this.clientTag });

    try {
      const body = await this.transport.send(request, options);
      const result = await this.unwrap(method, body);
      this.logger.debug("Received result", { method, endpoint, durationMs: Date.now() - startedAt });
      return result;
    } catch (err) {
      const error = toError(err);
      this.logger.error(`Call to ${method} failed`, error, {
        method,
        endpoint,
        durationMs: Date.now() - startedAt,
        errorName: error.name,
        errorKind: isDirectoryRpcError(error) ? error.kind : undefined
      });
      throw error;
    }
  }

  /**
   * Extracts `result` from a response body, checking `error` first and the inline `errors` list second.
   */
  protected async unwrap<M extends MethodName>(method: M, body: unknown): Promise<MethodResult<M>> {
    const envelopeCheck = await this.schemaValidator.validate(body, this.schemas.envelope());
    if (!envelopeCheck.success || !isObject(body)) {
      const reason = envelopeCheck.success ? "expected an object" : formatIssues(envelopeCheck.issues);
      throw new TransportError(`Malformed response to ${method}: ${reason}`, body);
    }

    const error = body["error"];
    if (error !== null && error !== undefined) {
      throw new DirectoryError(`Server returned an error for ${method}: ${describePayload(error)}`, error, method);
    }

    const result = body["result"];
    const inlineErrors = await this.schemaValidator.validate(result, this.schemas.resultErrors());
    if (inlineErrors.success) {
      throw new DirectoryError(inlineErrors.value.errors.map(describePayload).join("\n"), result, method);
    }

    const resultCheck = await this.schemaValidator.validate(result, this.schemas.result(method));
    if (!resultCheck.success) {
      throw new DirectoryError(`Unexpected result for ${method}: ${formatIssues(resultCheck.issues)}`, result, method);
    }
    return resultCheck.value;
  }

  /**
   * Releases the transport's connections.
   */
  async disconnect(): Promise<void> {
    await this.transport.close();
  }
}
