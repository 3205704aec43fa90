import type { OrderStatus } from "../db/types.js";

export type EngineErrorCode =
  | "TRANSIENT_NETWORK"
  | "RATE_LIMITED"
  | "UPSTREAM"
  | "MALFORMED_RESPONSE"
  | "ALREADY_PROCESSED"
  | "RESOURCE_EXHAUSTED"
  | "INVALID_STATE"
  | "ORDER_NOT_FOUND"
  | "CATALOG"
  | "TRANSACTION_CLAIMED";

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Network failure or timeout talking to an external service. Safe to retry. */
export class TransientNetworkError extends EngineError {
  constructor(
    readonly service: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("TRANSIENT_NETWORK", `${service}: ${message}`, options);
  }
}

export class RateLimitedError extends EngineError {
  constructor(
    readonly service: string,
    readonly retryAfterMs: number | null
  ) {
    super("RATE_LIMITED", `${service}: rate limited${retryAfterMs === null ? "" : ` (retry after ${retryAfterMs}ms)`}`);
  }
}

/** Non-retryable HTTP status from an external service. */
export class UpstreamError extends EngineError {
  constructor(
    readonly service: string,
    readonly status: number,
    details: string
  ) {
    super("UPSTREAM", `${service}: HTTP ${status} (${details})`);
  }
}

export class MalformedResponseError extends EngineError {
  constructor(message: string) {
    super("MALFORMED_RESPONSE", message);
  }
}

export class AlreadyProcessedError extends EngineError {
  constructor(
    readonly orderId: string,
    readonly status: OrderStatus
  ) {
    super("ALREADY_PROCESSED", `Order ${orderId} is already ${status}`);
  }
}

/** No content link left for a location. The order stays pending until an admin restocks. */
export class ResourceExhaustedError extends EngineError {
  constructor(readonly locationId: string) {
    super("RESOURCE_EXHAUSTED", `No content links left for location ${locationId}`);
  }
}

export class InvalidStateError extends EngineError {
  constructor(
    readonly orderId: string,
    readonly from: OrderStatus,
    readonly to: OrderStatus
  ) {
    super("INVALID_STATE", `Order ${orderId} cannot move from ${from} to ${to}`);
  }
}

export class OrderNotFoundError extends EngineError {
  constructor(readonly orderId: string) {
    super("ORDER_NOT_FOUND", `Order ${orderId} not found`);
  }
}

export class CatalogError extends EngineError {
  constructor(message: string) {
    super("CATALOG", message);
  }
}

/** The matched transaction was claimed by another order between match and claim. */
export class TransactionClaimedError extends EngineError {
  constructor(readonly txHash: string) {
    super("TRANSACTION_CLAIMED", `Transaction ${txHash} is already used by another order`);
  }
}

export function isRetryable(e: unknown): boolean {
  return e instanceof TransientNetworkError || e instanceof RateLimitedError;
}
