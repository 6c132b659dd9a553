import type { RowDataPacket } from "mysql2/promise";
import type {
  AdminDashboardStats,
  ClientDashboard,
  ClientDashboardLot,
  ClientLotStatus,
  Defaulter,
  FinancialDashboard,
} from "@shared/sales";
import { OPEN_SERVICE_ORDER_STATUSES } from "@shared/services";
import { daysOverdue } from "@shared/validators";
import { type DatabaseExecutor, requirePool } from "../lib/database";
import { NotFoundError } from "../lib/errors";
import { fromCents, toCents } from "../lib/installments";
import { getClientById } from "./clients";
import { countPendingIssuances } from "./issuance";
import { asNumber, formatDate, todayISO } from "./mappers";
import { listNotifications } from "./notifications";
import { getCompletedServiceTotals } from "./service-orders";

interface StatusTotalRow extends RowDataPacket {
  status: string;
  total: number | string | null;
}

interface DefaulterRow extends RowDataPacket {
  client_lot_id: string;
  client_id: string;
  client_name: string;
  overdue_amount: number | string;
  overdue_count: number | string;
  oldest_due_date: string | Date;
}

const DEFAULTER_LIMIT = 10;

export async function getFinancialDashboard(
  now: Date = new Date(),
): Promise<FinancialDashboard> {
  const pool = await requirePool();
  const totals = await pool.select<StatusTotalRow>(
    `SELECT status, SUM(amount) AS total FROM invoices GROUP BY status`,
  );
  const byStatus = new Map<string, number>();
  for (const row of totals) {
    byStatus.set(row.status, toCents(asNumber(row.total)) / 100);
  }

  const rows = await pool.select<DefaulterRow>(
    `SELECT cl.id AS client_lot_id, c.id AS client_id, c.full_name AS client_name,
            SUM(i.amount) AS overdue_amount, COUNT(*) AS overdue_count,
            MIN(i.due_date) AS oldest_due_date
     FROM invoices i
     INNER JOIN client_lots cl ON cl.id = i.client_lot_id
     INNER JOIN clients c ON c.id = cl.client_id
     WHERE i.status = 'overdue'
     GROUP BY cl.id, c.id, c.full_name
     ORDER BY overdue_amount DESC, oldest_due_date ASC
     LIMIT ${DEFAULTER_LIMIT}`,
  );
  const today = todayISO(now);
  const defaulters: Defaulter[] = rows.map((row) => {
    const oldestDueDate = formatDate(row.oldest_due_date);
    return {
      clientLotId: row.client_lot_id,
      clientId: row.client_id,
      clientName: row.client_name,
      overdueAmount: toCents(asNumber(row.overdue_amount)) / 100,
      overdueCount: asNumber(row.overdue_count),
      oldestDueDate,
      daysOverdue: daysOverdue(oldestDueDate, today),
    };
  });

  const services = await getCompletedServiceTotals();
  return {
    receivables: byStatus.get("pending") ?? 0,
    received: byStatus.get("paid") ?? 0,
    overdue: byStatus.get("overdue") ?? 0,
    pendingIssuances: await countPendingIssuances(),
    defaulters,
    serviceRevenue: services.revenue,
    serviceCosts: services.costs,
    serviceProfit: fromCents(toCents(services.revenue) - toCents(services.costs)),
  };
}

interface StatusCountRow extends RowDataPacket {
  status: string;
  total: number | string;
}

async function countByStatus(db: DatabaseExecutor, table: "clients" | "lots" | "service_orders") {
  const rows = await db.select<StatusCountRow>(
    `SELECT status, COUNT(*) AS total FROM ${table} GROUP BY status`,
  );
  const counts = new Map<string, number>();
  let total = 0;
  for (const row of rows) {
    const count = asNumber(row.total);
    counts.set(row.status, count);
    total += count;
  }
  return { total, of: (status: string) => counts.get(status) ?? 0 };
}

export async function getAdminDashboardStats(): Promise<AdminDashboardStats> {
  const pool = await requirePool();
  const clients = await countByStatus(pool, "clients");
  const lots = await countByStatus(pool, "lots");
  const orders = await countByStatus(pool, "service_orders");
  return {
    totalClients: clients.total,
    activeClients: clients.of("active"),
    defaulterClients: clients.of("defaulter"),
    totalLots: lots.total,
    availableLots: lots.of("available"),
    soldLots: lots.of("sold"),
    openServiceOrders: OPEN_SERVICE_ORDER_STATUSES.reduce((sum, status) => sum + orders.of(status), 0),
    completedServiceOrders: orders.of("completed"),
  };
}

interface ClientDashboardLotRow extends RowDataPacket {
  client_lot_id: string;
  lot_number: string;
  area_m2: number | string;
  development_name: string;
  total_value: number | string;
  status: ClientLotStatus;
}

const RECENT_NOTIFICATIONS = 5;

/** Summary of the client's active purchases, open invoices and open service orders. */
export async function getClientDashboard(clientId: string): Promise<ClientDashboard> {
  const client = await getClientById(clientId);
  if (!client) throw new NotFoundError("Client", clientId);
  const pool = await requirePool();

  const lotRows = await pool.select<ClientDashboardLotRow>(
    `SELECT cl.id AS client_lot_id, l.lot_number, l.area_m2, d.name AS development_name,
            cl.total_value, cl.status
     FROM client_lots cl
     INNER JOIN lots l ON l.id = cl.lot_id
     INNER JOIN developments d ON d.id = l.development_id
     WHERE cl.client_id = ? AND cl.status = 'active'
     ORDER BY cl.purchase_date ASC, l.lot_number ASC`,
    [clientId],
  );
  const lots: ClientDashboardLot[] = lotRows.map((row) => ({
    clientLotId: row.client_lot_id,
    lotNumber: row.lot_number,
    areaM2: asNumber(row.area_m2),
    developmentName: row.development_name,
    totalValue: asNumber(row.total_value),
    status: row.status,
  }));

  const invoiceRows = await pool.select<RowDataPacket & { amount: number | string; due_date: string | Date }>(
    `SELECT i.amount, i.due_date
     FROM invoices i
     INNER JOIN client_lots cl ON cl.id = i.client_lot_id
     WHERE cl.client_id = ? AND cl.status = 'active' AND i.status IN ('pending', 'overdue')
     ORDER BY i.due_date ASC`,
    [clientId],
  );
  const openCents = invoiceRows.reduce((sum, row) => sum + toCents(asNumber(row.amount)), 0);

  const placeholders = OPEN_SERVICE_ORDER_STATUSES.map(() => "?").join(", ");
  const orderRows = await pool.select<RowDataPacket & { total: number | string }>(
    `SELECT COUNT(*) AS total FROM service_orders WHERE client_id = ? AND status IN (${placeholders})`,
    [clientId, ...OPEN_SERVICE_ORDER_STATUSES],
  );

  return {
    clientName: client.fullName,
    totalLots: lots.length,
    lots,
    openInvoices: invoiceRows.length,
    openAmount: fromCents(openCents),
    nextDueDate: invoiceRows[0] ? formatDate(invoiceRows[0].due_date) : null,
    openServiceOrders: asNumber(orderRows[0]?.total),
    recentNotifications: await listNotifications(client.userId, {
      unreadOnly: true,
      limit: RECENT_NOTIFICATIONS,
    }),
  };
}
