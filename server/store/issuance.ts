import crypto from "node:crypto";
import type { RowDataPacket } from "mysql2/promise";
import type {
  InstallmentSpec,
  Invoice,
  IssuanceFailure,
  IssuanceQueueEntry,
  IssuanceQueueStatus,
  IssuanceRetryResult,
  IssuanceSummary,
} from "@shared/sales";
import { type BillingGateway, type RemotePayment, getBillingGateway } from "../lib/asaas";
import { isUniqueViolation, requirePool } from "../lib/database";
import { errorMessage } from "../lib/errors";
import { findInvoiceByInstallment, insertPendingInvoice } from "./invoices";
import { asNumber, formatDate, formatTimestamp, toSqlTimestamp } from "./mappers";

interface OutboxRow extends RowDataPacket {
  id: string;
  client_lot_id: string;
  installment_number: number | string;
  due_date: string | Date;
  amount: number | string;
  description: string;
  asaas_payment_id: string | null;
  bank_slip_url: string | null;
  invoice_url: string | null;
  status: IssuanceQueueStatus;
  attempts: number | string;
  last_error: string | null;
  updated_at: string | Date | null;
}

interface OutboxWithCustomerRow extends OutboxRow {
  asaas_customer_id: string | null;
}

const NO_CUSTOMER_REASON = "client has no billing customer";

export function installmentDescription(
  developmentName: string,
  lotNumber: string,
  installmentNumber: number,
  total: number,
) {
  return `${developmentName} - Lote ${lotNumber} - Parcela ${installmentNumber}/${total}`;
}

function mapOutboxRow(row: OutboxRow): IssuanceQueueEntry {
  return {
    id: row.id,
    clientLotId: row.client_lot_id,
    installmentNumber: asNumber(row.installment_number),
    dueDate: formatDate(row.due_date),
    amount: asNumber(row.amount),
    description: row.description,
    remotePaymentId: row.asaas_payment_id,
    status: row.status,
    attempts: asNumber(row.attempts),
    lastError: row.last_error,
    updatedAt: formatTimestamp(row.updated_at),
  };
}

/** Links of a boleto the gateway already created for a queued installment. */
type IssuedPayment = Pick<RemotePayment, "id" | "bankSlipUrl" | "invoiceUrl">;

async function recordOutboxEntry(entry: {
  clientLotId: string;
  installment: InstallmentSpec;
  description: string;
  remotePayment: IssuedPayment | null;
  reason: string;
}) {
  const pool = await requirePool();
  await pool.execute(
    `INSERT INTO issuance_outbox
       (id, client_lot_id, installment_number, due_date, amount, description,
        asaas_payment_id, bank_slip_url, invoice_url, status, attempts, last_error)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 'pending', 1, ?)`,
    [
      crypto.randomUUID(),
      entry.clientLotId,
      entry.installment.number,
      entry.installment.dueDate,
      entry.installment.amount,
      entry.description,
      entry.remotePayment?.id ?? null,
      entry.remotePayment?.bankSlipUrl ?? null,
      entry.remotePayment?.invoiceUrl ?? null,
      entry.reason,
    ],
  );
}

export interface IssuanceContext {
  clientLotId: string;
  developmentName: string;
  lotNumber: string;
  remoteCustomerId: string | null;
}

/**
 * Issues one boleto and one pending invoice per installment, in order.
 * Gateway or storage failures on one installment are queued for retry and
 * never stop the remaining installments.
 */
export async function issueInstallmentPayments(
  context: IssuanceContext,
  installments: InstallmentSpec[],
  gateway: BillingGateway = getBillingGateway(),
): Promise<{ summary: IssuanceSummary; invoices: Invoice[] }> {
  const invoices: Invoice[] = [];
  const failed: IssuanceFailure[] = [];
  const total = installments.length;

  for (const installment of installments) {
    const description = installmentDescription(
      context.developmentName,
      context.lotNumber,
      installment.number,
      total,
    );
    let remotePayment: IssuedPayment | null = null;
    let reason = NO_CUSTOMER_REASON;
    if (context.remoteCustomerId) {
      try {
        const payment = await gateway.createPayment({
          customer: context.remoteCustomerId,
          value: installment.amount,
          dueDate: installment.dueDate,
          description,
          externalReference: context.clientLotId,
        });
        remotePayment = payment;
        invoices.push(
          await insertPendingInvoice({
            clientLotId: context.clientLotId,
            remotePaymentId: payment.id,
            installmentNumber: installment.number,
            dueDate: installment.dueDate,
            amount: installment.amount,
            barcode: payment.bankSlipUrl,
            paymentUrl: payment.invoiceUrl,
          }),
        );
        continue;
      } catch (error) {
        reason = errorMessage(error);
      }
    }
    // eslint-disable-next-line no-console
    console.error(
      `[issuance] installment ${installment.number}/${total} of ${context.clientLotId} not issued${
        remotePayment ? ` (remote payment ${remotePayment.id} exists)` : ""
      }: ${reason}`,
    );

    failed.push({
      installmentNumber: installment.number,
      dueDate: installment.dueDate,
      amount: installment.amount,
      reason,
      remotePaymentId: remotePayment?.id ?? null,
    });
    try {
      await recordOutboxEntry({
        clientLotId: context.clientLotId,
        installment,
        description,
        remotePayment,
        reason,
      });
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error(
        `[issuance] could not queue installment ${installment.number} of ${context.clientLotId}`,
        error,
      );
    }
  }

  return {
    summary: { requested: total, issued: invoices.length, failed },
    invoices,
  };
}

export async function listIssuanceQueue(
  status: IssuanceQueueStatus = "pending",
): Promise<IssuanceQueueEntry[]> {
  const pool = await requirePool();
  const rows = await pool.select<OutboxRow>(
    `SELECT id, client_lot_id, installment_number, due_date, amount, description,
            asaas_payment_id, bank_slip_url, invoice_url, status, attempts, last_error, updated_at
     FROM issuance_outbox
     WHERE status = ?
     ORDER BY created_at ASC, installment_number ASC`,
    [status],
  );
  return rows.map(mapOutboxRow);
}

export async function countPendingIssuances(): Promise<number> {
  const pool = await requirePool();
  const rows = await pool.select<RowDataPacket & { total: number | string }>(
    `SELECT COUNT(*) AS total FROM issuance_outbox WHERE status = 'pending'`,
  );
  return asNumber(rows[0]?.total);
}

async function markOutbox(
  id: string,
  patch: {
    done: boolean;
    remotePaymentId: string | null;
    error: string | null;
    bankSlipUrl?: string | null;
    invoiceUrl?: string | null;
  },
) {
  const pool = await requirePool();
  await pool.execute(
    `UPDATE issuance_outbox
     SET status = ?, asaas_payment_id = ?,
         bank_slip_url = COALESCE(?, bank_slip_url), invoice_url = COALESCE(?, invoice_url),
         attempts = attempts + 1, last_error = ?, updated_at = ?
     WHERE id = ?`,
    [
      patch.done ? "done" : "pending",
      patch.remotePaymentId,
      patch.bankSlipUrl ?? null,
      patch.invoiceUrl ?? null,
      patch.error,
      toSqlTimestamp(new Date()),
      id,
    ],
  );
}

/**
 * Works through queued installments. Entries that already carry a remote
 * payment id only need their invoice stored, so the gateway is never asked
 * to charge the same installment twice.
 */
export async function retryPendingIssuances(
  gateway: BillingGateway = getBillingGateway(),
): Promise<IssuanceRetryResult> {
  const pool = await requirePool();
  const rows = await pool.select<OutboxWithCustomerRow>(
    `SELECT o.id, o.client_lot_id, o.installment_number, o.due_date, o.amount, o.description,
            o.asaas_payment_id, o.bank_slip_url, o.invoice_url, o.status, o.attempts, o.last_error, o.updated_at,
            c.asaas_customer_id
     FROM issuance_outbox o
     INNER JOIN client_lots cl ON cl.id = o.client_lot_id
     INNER JOIN clients c ON c.id = cl.client_id
     WHERE o.status = 'pending'
     ORDER BY o.created_at ASC, o.installment_number ASC`,
  );

  let issued = 0;
  for (const row of rows) {
    const entry = mapOutboxRow(row);
    const existing = await findInvoiceByInstallment(
      entry.clientLotId,
      entry.installmentNumber,
    );
    if (existing) {
      await markOutbox(entry.id, {
        done: true,
        remotePaymentId: existing.remotePaymentId,
        error: null,
      });
      continue;
    }

    let remotePaymentId = entry.remotePaymentId;
    let barcode = row.bank_slip_url;
    let paymentUrl = row.invoice_url;
    try {
      if (!remotePaymentId) {
        if (!row.asaas_customer_id) {
          await markOutbox(entry.id, {
            done: false,
            remotePaymentId: null,
            error: NO_CUSTOMER_REASON,
          });
          continue;
        }
        const payment = await gateway.createPayment({
          customer: row.asaas_customer_id,
          value: entry.amount,
          dueDate: entry.dueDate,
          description: entry.description,
          externalReference: entry.clientLotId,
        });
        remotePaymentId = payment.id;
        barcode = payment.bankSlipUrl;
        paymentUrl = payment.invoiceUrl;
      }
      await insertPendingInvoice({
        clientLotId: entry.clientLotId,
        remotePaymentId,
        installmentNumber: entry.installmentNumber,
        dueDate: entry.dueDate,
        amount: entry.amount,
        barcode,
        paymentUrl,
      });
      await markOutbox(entry.id, { done: true, remotePaymentId, error: null });
      issued += 1;
    } catch (error) {
      const done = isUniqueViolation(error) && (await findInvoiceByInstallment(
        entry.clientLotId,
        entry.installmentNumber,
      )) !== null;
      // eslint-disable-next-line no-console
      console.error(
        `[issuance] retry of installment ${entry.installmentNumber} of ${entry.clientLotId} failed`,
        errorMessage(error),
      );
      await markOutbox(entry.id, {
        done,
        remotePaymentId,
        error: errorMessage(error),
        bankSlipUrl: barcode,
        invoiceUrl: paymentUrl,
      });
    }
  }

  const stillPending = await countPendingIssuances();
  if (rows.length > 0) {
    // eslint-disable-next-line no-console
    console.log(
      `[issuance] retried ${rows.length} queued installment(s), issued ${issued}, ${stillPending} pending`,
    );
  }
  return { attempted: rows.length, issued, stillPending };
}
