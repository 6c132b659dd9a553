import type { RowDataPacket } from "mysql2/promise";
import type { InvoiceStatus, WebhookPayload, WebhookResult } from "@shared/sales";
import { type DatabaseExecutor, isUniqueViolation, requirePool } from "../lib/database";
import { isISODate } from "../lib/installments";
import { canTransition, statusForEvent } from "../lib/invoice-status";
import { asNumber, formatDate, toSqlTimestamp } from "./mappers";
import { createNotification } from "./notifications";

interface InvoiceForWebhookRow extends RowDataPacket {
  id: string;
  status: InvoiceStatus;
  amount: number | string;
  due_date: string | Date;
  paid_at: string | Date | null;
  user_id: string | null;
}

const MAX_UPDATE_ATTEMPTS = 3;

function nonEmpty(value: string | null | undefined): string | null {
  return typeof value === "string" && value.trim() !== "" ? value : null;
}

function resolvePaidAt(paymentDate: string | null | undefined, now: Date): string {
  const value = nonEmpty(paymentDate);
  if (value && isISODate(value)) return `${value} 00:00:00`;
  if (value) {
    const parsed = Date.parse(value);
    if (!Number.isNaN(parsed)) return toSqlTimestamp(new Date(parsed));
  }
  return toSqlTimestamp(now);
}

/**
 * Delivery id used to recognise redeliveries. Events without one have no
 * stable identity: two genuine transitions into the same status look alike.
 */
export function webhookEventKey(payload: WebhookPayload): string | null {
  return nonEmpty(payload.id);
}

async function findInvoiceForPayment(db: DatabaseExecutor, remotePaymentId: string) {
  const rows = await db.select<InvoiceForWebhookRow>(
    `SELECT i.id, i.status, i.amount, i.due_date, i.paid_at, c.user_id
     FROM invoices i
     LEFT JOIN client_lots cl ON cl.id = i.client_lot_id
     LEFT JOIN clients c ON c.id = cl.client_id
     WHERE i.asaas_payment_id = ?
     LIMIT 1`,
    [remotePaymentId],
  );
  return rows[0] ?? null;
}

async function hasProcessedEvent(db: DatabaseExecutor, eventKey: string) {
  const rows = await db.select<RowDataPacket>(
    `SELECT event_key FROM webhook_events WHERE event_key = ? LIMIT 1`,
    [eventKey],
  );
  return rows.length > 0;
}

/** Returns false when the key was already stored by an earlier delivery. */
async function recordProcessedEvent(
  db: DatabaseExecutor,
  entry: { eventKey: string; event: string; remotePaymentId: string; invoiceId: string },
): Promise<boolean> {
  try {
    await db.execute(
      `INSERT INTO webhook_events (event_key, event, asaas_payment_id, invoice_id)
       VALUES (?, ?, ?, ?)`,
      [entry.eventKey, entry.event, entry.remotePaymentId, entry.invoiceId],
    );
    return true;
  } catch (error) {
    if (isUniqueViolation(error)) return false;
    throw error;
  }
}

async function notifyOverdue(
  invoice: InvoiceForWebhookRow,
  eventKey: string | null,
) {
  if (!invoice.user_id) return;
  const amount = asNumber(invoice.amount).toFixed(2);
  try {
    await createNotification({
      userId: invoice.user_id,
      type: "payment_overdue",
      title: "Pagamento em Atraso",
      message: `Sua fatura de R$ ${amount} com vencimento em ${formatDate(invoice.due_date)} está em atraso.`,
      dedupeKey: eventKey ? `payment_overdue:${eventKey}` : null,
    });
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error(`[webhook] overdue notification for invoice ${invoice.id} failed`, error);
  }
}

/**
 * Applies one gateway event to the invoice it references.
 *
 * Redelivering an event re-applies the same state and never raises a second
 * notification: deliveries with an id are recorded, and the overdue notice only
 * fires on the write that actually moves the invoice into overdue. Status writes
 * are conditional on the status that was read, so two deliveries racing on one
 * invoice cannot both win.
 */
export async function applyWebhookEvent(
  payload: WebhookPayload,
  now: Date = new Date(),
): Promise<WebhookResult> {
  const { event } = payload;
  const target = statusForEvent(event);
  if (!target) {
    return { status: "ignored", event, reason: "unrecognized event" };
  }
  const remotePaymentId = nonEmpty(payload.payment.id);
  if (!remotePaymentId) {
    return { status: "ignored", event, reason: "missing payment id" };
  }

  const pool = await requirePool();
  const eventKey = webhookEventKey(payload);
  const barcode = nonEmpty(payload.payment.bankSlipUrl);
  const paymentUrl = nonEmpty(payload.payment.invoiceUrl);
  const timestamp = toSqlTimestamp(now);

  for (let attempt = 1; attempt <= MAX_UPDATE_ATTEMPTS; attempt++) {
    const invoice = await findInvoiceForPayment(pool, remotePaymentId);
    if (!invoice) {
      // eslint-disable-next-line no-console
      console.warn(`[webhook] ${event} for unknown payment ${remotePaymentId}`);
      return { status: "ignored", event, reason: "not found" };
    }
    const previous = invoice.status;

    const sets: string[] = [];
    const params: unknown[] = [];
    if (barcode) {
      sets.push("barcode = ?");
      params.push(barcode);
    }
    if (paymentUrl) {
      sets.push("payment_url = ?");
      params.push(paymentUrl);
    }

    if (!canTransition(previous, target)) {
      if (sets.length) {
        await pool.execute(
          `UPDATE invoices SET ${sets.join(", ")}, updated_at = ? WHERE id = ?`,
          [...params, timestamp, invoice.id],
        );
      }
      // eslint-disable-next-line no-console
      console.warn(
        `[webhook] ${event} rejected for invoice ${invoice.id}: ${previous} -> ${target}`,
      );
      return {
        status: "ignored",
        event,
        reason: `invalid transition ${previous} -> ${target}`,
      };
    }

    const duplicate = eventKey ? await hasProcessedEvent(pool, eventKey) : false;

    sets.push("status = ?");
    params.push(target);
    if (target === "paid" && (previous !== "paid" || !invoice.paid_at)) {
      sets.push("paid_at = ?");
      params.push(resolvePaidAt(payload.payment.paymentDate, now));
    } else if (target === "pending") {
      sets.push("paid_at = NULL");
    }

    const result = await pool.execute(
      `UPDATE invoices SET ${sets.join(", ")}, updated_at = ? WHERE id = ? AND status = ?`,
      [...params, timestamp, invoice.id, previous],
    );
    if (result.affectedRows === 0) {
      // eslint-disable-next-line no-console
      console.warn(
        `[webhook] invoice ${invoice.id} changed while applying ${event}, retrying (${attempt}/${MAX_UPDATE_ATTEMPTS})`,
      );
      continue;
    }

    const firstDelivery = eventKey
      ? !duplicate &&
        (await recordProcessedEvent(pool, {
          eventKey,
          event,
          remotePaymentId,
          invoiceId: invoice.id,
        }))
      : true;

    if (target === "overdue" && previous !== "overdue" && firstDelivery) {
      await notifyOverdue(invoice, eventKey);
    }

    // eslint-disable-next-line no-console
    console.log(`[webhook] ${event} invoice ${invoice.id} ${previous} -> ${target}`);
    return {
      status: "processed",
      event,
      invoice_id: invoice.id,
      previous_status: previous,
      new_status: target,
      duplicate: !firstDelivery,
    };
  }

  throw new Error(
    `Invoice for payment ${remotePaymentId} kept changing while applying ${event}`,
  );
}
