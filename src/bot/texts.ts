import type { OrderRow, OrderStatus } from "../db/types.js";
import { EngineError } from "../core/errors.js";

export const texts = {
  paymentInstructions: (order: OrderRow) =>
    `Order #${order.id}\n\n` +
    `Send exactly ${order.payment_amount} BTC to:\n${order.bitcoin_address}\n\n` +
    `The amount is unique to this order, so send it in one transaction without rounding.\n` +
    `Pay before ${order.expires_at.toISOString().slice(0, 16).replace("T", " ")} UTC.`,
  paymentNotFound: "Payment not found yet. Try again in a few minutes.",
  orderCompleted: (orderId: string, contentLink: string) =>
    `Payment received, order #${orderId} is complete.\n\nYour link:\n${contentLink}`,
  orderCancelled: (orderId: string) => `Order #${orderId} cancelled.`,
  orderExpired: (orderId: string) =>
    `Order #${orderId} expired: no payment arrived in time. If you already paid, contact support.`,
  alreadyProcessed: (orderId: string, status: OrderStatus) => `Order #${orderId} is already ${status}.`,
  outOfStock: "This item is out of stock right now. Please choose another one.",
  paidButOutOfStock: "Payment received, but the item ran out of stock. Support has been notified and will contact you.",
  orderNotFound: "Order not found.",
  unavailable: "This item is not available.",
  serviceBusy: "Service is temporarily unavailable. Try again in a few minutes.",
  genericError: "Something went wrong. Please try again later."
} as const;

/** Maps an engine error to a message safe to show a buyer. Raw error text never reaches users. */
export function describeForUser(e: unknown): string {
  if (!(e instanceof EngineError)) return texts.genericError;
  switch (e.code) {
    case "ORDER_NOT_FOUND":
      return texts.orderNotFound;
    case "RESOURCE_EXHAUSTED":
      return texts.outOfStock;
    case "CATALOG":
      return texts.unavailable;
    case "TRANSIENT_NETWORK":
    case "RATE_LIMITED":
    case "UPSTREAM":
    case "MALFORMED_RESPONSE":
      return texts.serviceBusy;
    case "TRANSACTION_CLAIMED":
      return texts.paymentNotFound;
    case "ALREADY_PROCESSED":
    case "INVALID_STATE":
      return texts.genericError;
  }
}
