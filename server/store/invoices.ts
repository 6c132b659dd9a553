import crypto from "node:crypto";
import type { RowDataPacket } from "mysql2/promise";
import type { ClientInvoicesResponse, Invoice, InvoiceStatus } from "@shared/sales";
import { type DatabaseExecutor, requirePool } from "../lib/database";
import { toCents } from "../lib/installments";
import { asNumber, formatDate, formatTimestamp } from "./mappers";

export interface InvoiceRow extends RowDataPacket {
  id: string;
  client_lot_id: string;
  asaas_payment_id: string | null;
  installment_number: number | string;
  due_date: string | Date;
  amount: number | string;
  status: InvoiceStatus;
  barcode: string | null;
  payment_url: string | null;
  paid_at: string | Date | null;
  created_at: string | Date | null;
  updated_at: string | Date | null;
}

export const INVOICE_COLUMNS = `id, client_lot_id, asaas_payment_id, installment_number, due_date,
  amount, status, barcode, payment_url, paid_at, created_at, updated_at`;

export function mapInvoiceRow(row: InvoiceRow): Invoice {
  return {
    id: row.id,
    clientLotId: row.client_lot_id,
    remotePaymentId: row.asaas_payment_id,
    installmentNumber: asNumber(row.installment_number),
    dueDate: formatDate(row.due_date),
    amount: asNumber(row.amount),
    status: row.status,
    barcode: row.barcode,
    paymentUrl: row.payment_url,
    paidAt: formatTimestamp(row.paid_at),
    createdAt: formatTimestamp(row.created_at),
    updatedAt: formatTimestamp(row.updated_at),
  };
}

export async function insertPendingInvoice(
  input: {
    clientLotId: string;
    remotePaymentId: string;
    installmentNumber: number;
    dueDate: string;
    amount: number;
    barcode: string | null;
    paymentUrl: string | null;
  },
  executor?: DatabaseExecutor,
): Promise<Invoice> {
  const db = executor ?? (await requirePool());
  const id = crypto.randomUUID();
  await db.execute(
    `INSERT INTO invoices (id, client_lot_id, asaas_payment_id, installment_number, due_date,
       amount, status, barcode, payment_url)
     VALUES (?, ?, ?, ?, ?, ?, 'pending', ?, ?)`,
    [
      id,
      input.clientLotId,
      input.remotePaymentId,
      input.installmentNumber,
      input.dueDate,
      input.amount,
      input.barcode,
      input.paymentUrl,
    ],
  );
  const rows = await db.select<InvoiceRow>(
    `SELECT ${INVOICE_COLUMNS} FROM invoices WHERE id = ? LIMIT 1`,
    [id],
  );
  return mapInvoiceRow(rows[0]);
}

export async function findInvoiceByInstallment(
  clientLotId: string,
  installmentNumber: number,
): Promise<Invoice | null> {
  const pool = await requirePool();
  const rows = await pool.select<InvoiceRow>(
    `SELECT ${INVOICE_COLUMNS} FROM invoices
     WHERE client_lot_id = ? AND installment_number = ?
     LIMIT 1`,
    [clientLotId, installmentNumber],
  );
  return rows[0] ? mapInvoiceRow(rows[0]) : null;
}

export async function listInvoicesForClientLot(clientLotId: string): Promise<Invoice[]> {
  const pool = await requirePool();
  const rows = await pool.select<InvoiceRow>(
    `SELECT ${INVOICE_COLUMNS} FROM invoices
     WHERE client_lot_id = ?
     ORDER BY installment_number ASC`,
    [clientLotId],
  );
  return rows.map(mapInvoiceRow);
}

/** Invoices across every purchase of a client, optionally filtered by status. */
export async function listClientInvoices(
  clientId: string,
  status?: InvoiceStatus,
): Promise<ClientInvoicesResponse> {
  const pool = await requirePool();
  const params: unknown[] = [clientId];
  let filter = "";
  if (status) {
    filter = " AND i.status = ?";
    params.push(status);
  }
  const rows = await pool.select<InvoiceRow>(
    `SELECT i.id, i.client_lot_id, i.asaas_payment_id, i.installment_number, i.due_date,
            i.amount, i.status, i.barcode, i.payment_url, i.paid_at, i.created_at, i.updated_at
     FROM invoices i
     INNER JOIN client_lots cl ON cl.id = i.client_lot_id
     WHERE cl.client_id = ?${filter}
     ORDER BY i.due_date ASC, i.installment_number ASC`,
    params,
  );
  const invoices = rows.map(mapInvoiceRow);
  const cents = { pending: 0, paid: 0, overdue: 0 };
  for (const invoice of invoices) {
    if (invoice.status === "cancelled") continue;
    cents[invoice.status] += toCents(invoice.amount);
  }
  return {
    invoices,
    totals: {
      pending: cents.pending / 100,
      paid: cents.paid / 100,
      overdue: cents.overdue / 100,
    },
  };
}
