import crypto from "node:crypto";
import type { RowDataPacket } from "mysql2/promise";
import type {
  ClientLot,
  ClientLotStatus,
  PaymentPlan,
  SaleCreateInput,
  SaleCreateResult,
} from "@shared/sales";
import { type BillingGateway, getBillingGateway } from "../lib/asaas";
import { requirePool, withTransaction } from "../lib/database";
import {
  ConflictError,
  NotFoundError,
  ValidationError,
} from "../lib/errors";
import {
  generateInstallmentPlan,
  isISODate,
  roundingDrift,
  toCents,
} from "../lib/installments";
import { getClientById } from "./clients";
import { getLotWithDevelopment, markLotSold } from "./inventory";
import { issueInstallmentPayments } from "./issuance";
import {
  asNumber,
  formatDate,
  formatTimestamp,
  parseJsonColumn,
  todayISO,
} from "./mappers";

interface ClientLotRow extends RowDataPacket {
  id: string;
  client_id: string;
  lot_id: string;
  purchase_date: string | Date;
  total_value: number | string;
  payment_plan: unknown;
  status: ClientLotStatus;
  created_at: string | Date | null;
}

function mapPaymentPlan(value: unknown): PaymentPlan {
  const raw = parseJsonColumn(value);
  const read = (key: keyof PaymentPlan): unknown =>
    raw && typeof raw === "object" ? Reflect.get(raw, key) : undefined;
  const firstDueDate = read("firstDueDate");
  return {
    totalInstallments: asNumber(read("totalInstallments")),
    installmentValue: asNumber(read("installmentValue")),
    firstDueDate: typeof firstDueDate === "string" ? firstDueDate : "",
    downPayment: asNumber(read("downPayment")),
    roundingDrift: asNumber(read("roundingDrift")),
  };
}

function mapClientLotRow(row: ClientLotRow): ClientLot {
  return {
    id: row.id,
    clientId: row.client_id,
    lotId: row.lot_id,
    purchaseDate: formatDate(row.purchase_date),
    totalValue: asNumber(row.total_value),
    paymentPlan: mapPaymentPlan(row.payment_plan),
    status: row.status,
    createdAt: formatTimestamp(row.created_at),
  };
}

export async function getClientLotById(id: string): Promise<ClientLot | null> {
  const pool = await requirePool();
  const rows = await pool.select<ClientLotRow>(
    `SELECT id, client_id, lot_id, purchase_date, total_value, payment_plan, status, created_at
     FROM client_lots WHERE id = ? LIMIT 1`,
    [id],
  );
  return rows[0] ? mapClientLotRow(rows[0]) : null;
}

/**
 * Records a sale of an available lot and bills its installments.
 *
 * The lot is flipped to sold with a conditional update inside the same
 * transaction that inserts the sale, so concurrent sales of one lot leave
 * exactly one winner. Boletos are issued after the commit; installments the
 * gateway could not take are queued and reported in `issuance.failed`.
 */
export async function createSale(
  input: SaleCreateInput,
  gateway: BillingGateway = getBillingGateway(),
): Promise<SaleCreateResult> {
  const { paymentPlan } = input;
  const downPayment = paymentPlan.downPayment ?? 0;
  if (downPayment < 0) {
    throw new ValidationError("Down payment cannot be negative");
  }
  if (toCents(downPayment) >= toCents(input.totalValue)) {
    throw new ValidationError("Down payment must be lower than the total value");
  }
  const purchaseDate = input.purchaseDate ?? todayISO();
  if (!isISODate(purchaseDate)) {
    throw new ValidationError(`Invalid purchase date: ${purchaseDate}`);
  }

  const financed = (toCents(input.totalValue) - toCents(downPayment)) / 100;
  const installments = generateInstallmentPlan(
    financed,
    paymentPlan.totalInstallments,
    paymentPlan.firstDueDate,
  );
  const installmentValue = installments[0].amount;
  if (
    paymentPlan.installmentValue !== undefined &&
    Math.abs(toCents(paymentPlan.installmentValue) - toCents(installmentValue)) > 1
  ) {
    throw new ValidationError(
      `Installment value ${paymentPlan.installmentValue} does not match ${installmentValue} computed from the financed amount`,
    );
  }
  const plan: PaymentPlan = {
    totalInstallments: paymentPlan.totalInstallments,
    installmentValue,
    firstDueDate: paymentPlan.firstDueDate,
    downPayment,
    roundingDrift: roundingDrift(financed, installments),
  };

  const client = await getClientById(input.clientId);
  if (!client) throw new NotFoundError("Client", input.clientId);
  const lot = await getLotWithDevelopment(input.lotId);
  if (!lot) throw new NotFoundError("Lot", input.lotId);

  const pool = await requirePool();
  const sale = await withTransaction(pool, async (conn) => {
    const sold = await markLotSold(lot.id, conn);
    if (!sold) {
      throw new ConflictError("Lot is not available for sale");
    }
    const id = crypto.randomUUID();
    await conn.execute(
      `INSERT INTO client_lots (id, client_id, lot_id, purchase_date, total_value, payment_plan, status)
       VALUES (?, ?, ?, ?, ?, ?, 'active')`,
      [id, client.id, lot.id, purchaseDate, input.totalValue, JSON.stringify(plan)],
    );
    const rows = await conn.select<ClientLotRow>(
      `SELECT id, client_id, lot_id, purchase_date, total_value, payment_plan, status, created_at
       FROM client_lots WHERE id = ? LIMIT 1`,
      [id],
    );
    return mapClientLotRow(rows[0]);
  });

  // eslint-disable-next-line no-console
  console.log(
    `[sales] lot ${lot.lotNumber} of ${lot.developmentName} sold to client ${client.id} as ${sale.id}`,
  );

  const { summary, invoices } = await issueInstallmentPayments(
    {
      clientLotId: sale.id,
      developmentName: lot.developmentName,
      lotNumber: lot.lotNumber,
      remoteCustomerId: client.remoteCustomerId,
    },
    installments,
    gateway,
  );

  return { sale, invoices, issuance: summary };
}
