import type { InvoiceStatus } from "@shared/sales";

/** Gateway event name to the invoice status it drives. */
export const EVENT_STATUS_MAP: Readonly<Record<string, InvoiceStatus>> = {
  PAYMENT_RECEIVED: "paid",
  PAYMENT_CONFIRMED: "paid",
  PAYMENT_DUNNING_RECEIVED: "paid",
  PAYMENT_OVERDUE: "overdue",
  PAYMENT_CHARGEBACK_REQUESTED: "overdue",
  PAYMENT_CHARGEBACK_DISPUTE: "overdue",
  PAYMENT_AWAITING_CHARGEBACK_REVERSAL: "overdue",
  PAYMENT_DUNNING_REQUESTED: "overdue",
  PAYMENT_DELETED: "cancelled",
  PAYMENT_REFUNDED: "cancelled",
  PAYMENT_RESTORED: "pending",
  PAYMENT_RECEIVED_IN_CASH_UNDONE: "pending",
};

const ALLOWED_TRANSITIONS: Readonly<Record<InvoiceStatus, readonly InvoiceStatus[]>> = {
  pending: ["paid", "overdue", "cancelled"],
  overdue: ["paid", "pending", "cancelled"],
  // chargebacks reopen a settled payment
  paid: ["pending", "overdue", "cancelled"],
  // a restored payment is charged again from scratch
  cancelled: ["pending"],
};

export function statusForEvent(event: string): InvoiceStatus | null {
  return Object.prototype.hasOwnProperty.call(EVENT_STATUS_MAP, event)
    ? EVENT_STATUS_MAP[event]
    : null;
}

/** Self-transitions are always accepted and leave the status as is. */
export function canTransition(from: InvoiceStatus, to: InvoiceStatus): boolean {
  return from === to || ALLOWED_TRANSITIONS[from].includes(to);
}

const INVOICE_STATUSES: readonly InvoiceStatus[] = ["pending", "paid", "overdue", "cancelled"];

export function isInvoiceStatus(value: unknown): value is InvoiceStatus {
  return typeof value === "string" && INVOICE_STATUSES.some((status) => status === value);
}
