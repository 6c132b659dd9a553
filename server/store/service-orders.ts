import crypto from "node:crypto";
import fs from "node:fs";
import type { RowDataPacket } from "mysql2/promise";
import { z } from "zod";
import {
  type ServiceAnalytics,
  type ServiceOrder,
  type ServiceOrderCreateInput,
  type ServiceOrderFilters,
  type ServiceOrderStatus,
  type ServiceOrderUpdateInput,
  type ServiceType,
  type ServiceTypeCreateInput,
  SERVICE_ORDER_STATUS_LABELS,
} from "@shared/services";
import { requirePool } from "../lib/database";
import { ForbiddenError, NotFoundError } from "../lib/errors";
import { fromCents, toCents } from "../lib/installments";
import { asBoolean, asNumber, formatDate, formatTimestamp, toSqlTimestamp } from "./mappers";
import { createNotification } from "./notifications";

interface ServiceTypeRow extends RowDataPacket {
  id: string;
  name: string;
  description: string | null;
  base_price: number | string;
  is_active: number | boolean;
  created_at: string | Date | null;
}

interface ServiceOrderRow extends RowDataPacket {
  id: string;
  client_id: string;
  client_name: string | null;
  client_user_id: string | null;
  lot_id: string | null;
  lot_number: string | null;
  service_type_id: string;
  service_type_name: string | null;
  requested_date: string | Date;
  execution_date: string | Date | null;
  status: ServiceOrderStatus;
  cost: number | string;
  revenue: number | string | null;
  notes: string | null;
  created_at: string | Date | null;
  updated_at: string | Date | null;
}

const SERVICE_TYPE_COLUMNS = `id, name, description, base_price, is_active, created_at`;

const SERVICE_ORDER_SELECT = `
  SELECT so.id, so.client_id, c.full_name AS client_name, c.user_id AS client_user_id,
         so.lot_id, l.lot_number, so.service_type_id, st.name AS service_type_name,
         so.requested_date, so.execution_date, so.status, so.cost, so.revenue, so.notes,
         so.created_at, so.updated_at
  FROM service_orders so
  LEFT JOIN clients c ON c.id = so.client_id
  LEFT JOIN lots l ON l.id = so.lot_id
  LEFT JOIN service_types st ON st.id = so.service_type_id`;

const DEFAULT_PAGE_SIZE = 20;
const MAX_PAGE_SIZE = 100;

function mapServiceTypeRow(row: ServiceTypeRow): ServiceType {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    basePrice: asNumber(row.base_price),
    isActive: asBoolean(row.is_active),
    createdAt: formatTimestamp(row.created_at),
  };
}

function mapServiceOrderRow(row: ServiceOrderRow): ServiceOrder {
  return {
    id: row.id,
    clientId: row.client_id,
    clientName: row.client_name,
    lotId: row.lot_id,
    lotNumber: row.lot_number,
    serviceTypeId: row.service_type_id,
    serviceTypeName: row.service_type_name,
    requestedDate: formatDate(row.requested_date),
    executionDate: row.execution_date ? formatDate(row.execution_date) : null,
    status: row.status,
    cost: asNumber(row.cost),
    revenue: row.revenue === null ? null : asNumber(row.revenue),
    notes: row.notes,
    createdAt: formatTimestamp(row.created_at),
    updatedAt: formatTimestamp(row.updated_at),
  };
}

// Service types

export async function listServiceTypes(
  options: { activeOnly?: boolean } = {},
): Promise<ServiceType[]> {
  const pool = await requirePool();
  const rows = await pool.select<ServiceTypeRow>(
    `SELECT ${SERVICE_TYPE_COLUMNS} FROM service_types
     ${options.activeOnly ? "WHERE is_active = 1" : ""}
     ORDER BY name ASC, id ASC`,
  );
  return rows.map(mapServiceTypeRow);
}

export async function getServiceType(id: string): Promise<ServiceType | null> {
  const pool = await requirePool();
  const rows = await pool.select<ServiceTypeRow>(
    `SELECT ${SERVICE_TYPE_COLUMNS} FROM service_types WHERE id = ? LIMIT 1`,
    [id],
  );
  const row = rows[0];
  return row ? mapServiceTypeRow(row) : null;
}

export async function createServiceType(input: ServiceTypeCreateInput): Promise<ServiceType> {
  const pool = await requirePool();
  const id = crypto.randomUUID();
  await pool.execute(
    `INSERT INTO service_types (id, name, description, base_price, is_active)
     VALUES (?, ?, ?, ?, ?)`,
    [id, input.name, input.description ?? null, input.basePrice, input.isActive === false ? 0 : 1],
  );
  const created = await getServiceType(id);
  if (!created) throw new NotFoundError("Service type", id);
  return created;
}

const catalogSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().nullish(),
    basePrice: z.number().min(0),
  })
  .array();

const CATALOG_URL = new URL("../data/service-types.json", import.meta.url);

export function loadServiceCatalog(): ServiceTypeCreateInput[] {
  return catalogSchema.parse(JSON.parse(fs.readFileSync(CATALOG_URL, "utf8")));
}

/** Fills an empty service_types table with the catalog. Returns how many types were added. */
export async function seedServiceTypes(
  catalog: ServiceTypeCreateInput[] = loadServiceCatalog(),
): Promise<number> {
  const pool = await requirePool();
  const existing = await pool.select<RowDataPacket & { total: number | string }>(
    `SELECT COUNT(*) AS total FROM service_types`,
  );
  if (asNumber(existing[0]?.total) > 0) return 0;

  for (const entry of catalog) {
    await createServiceType(entry);
  }
  // eslint-disable-next-line no-console
  console.log(`[services] seeded ${catalog.length} service types`);
  return catalog.length;
}

// Service orders

async function findServiceOrderRow(id: string) {
  const pool = await requirePool();
  const rows = await pool.select<ServiceOrderRow>(`${SERVICE_ORDER_SELECT} WHERE so.id = ? LIMIT 1`, [
    id,
  ]);
  return rows[0] ?? null;
}

export async function getServiceOrder(id: string): Promise<ServiceOrder | null> {
  const row = await findServiceOrderRow(id);
  return row ? mapServiceOrderRow(row) : null;
}

/** A client only ever sees its own orders. */
export async function getClientServiceOrder(clientId: string, id: string): Promise<ServiceOrder> {
  const order = await getServiceOrder(id);
  if (!order) throw new NotFoundError("Service order", id);
  if (order.clientId !== clientId) throw new ForbiddenError("Access denied");
  return order;
}

/**
 * Opens a `requested` order priced at the service type's base price. A lot,
 * when given, must belong to one of the client's purchases.
 */
export async function createServiceOrder(
  clientId: string,
  input: ServiceOrderCreateInput,
  now: Date = new Date(),
): Promise<ServiceOrder> {
  const pool = await requirePool();
  const lotId = input.lotId ?? null;
  if (lotId) {
    const owned = await pool.select<RowDataPacket>(
      `SELECT id FROM client_lots WHERE client_id = ? AND lot_id = ? LIMIT 1`,
      [clientId, lotId],
    );
    if (owned.length === 0) throw new ForbiddenError("Access denied to this lot");
  }

  const type = await getServiceType(input.serviceTypeId);
  if (!type || !type.isActive) {
    throw new NotFoundError("Service type", input.serviceTypeId);
  }

  const id = crypto.randomUUID();
  const timestamp = toSqlTimestamp(now);
  await pool.execute(
    `INSERT INTO service_orders
       (id, client_id, lot_id, service_type_id, requested_date, status, cost, notes, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, 'requested', ?, ?, ?, ?)`,
    [
      id,
      clientId,
      lotId,
      type.id,
      input.requestedDate,
      type.basePrice,
      input.notes ?? null,
      timestamp,
      timestamp,
    ],
  );
  // eslint-disable-next-line no-console
  console.log(`[services] order ${id} (${type.name}) requested by client ${clientId}`);

  const created = await getServiceOrder(id);
  if (!created) throw new NotFoundError("Service order", id);
  return created;
}

export async function listServiceOrders(filters: ServiceOrderFilters = {}): Promise<ServiceOrder[]> {
  const where: string[] = [];
  const params: unknown[] = [];
  if (filters.status) {
    where.push("so.status = ?");
    params.push(filters.status);
  }
  if (filters.clientId) {
    where.push("so.client_id = ?");
    params.push(filters.clientId);
  }
  const pageSize = Math.min(Math.max(filters.pageSize ?? DEFAULT_PAGE_SIZE, 1), MAX_PAGE_SIZE);
  const page = Math.max(filters.page ?? 1, 1);

  const pool = await requirePool();
  const rows = await pool.select<ServiceOrderRow>(
    `${SERVICE_ORDER_SELECT}
     ${where.length ? `WHERE ${where.join(" AND ")}` : ""}
     ORDER BY so.created_at DESC, so.id ASC
     LIMIT ${pageSize} OFFSET ${(page - 1) * pageSize}`,
    params,
  );
  return rows.map(mapServiceOrderRow);
}

/**
 * Applies an admin update. A status change notifies the client who
 * requested the order.
 */
export async function updateServiceOrder(
  id: string,
  patch: ServiceOrderUpdateInput,
  now: Date = new Date(),
): Promise<ServiceOrder> {
  const existing = await findServiceOrderRow(id);
  if (!existing) throw new NotFoundError("Service order", id);

  const sets: string[] = [];
  const params: unknown[] = [];
  if (patch.executionDate !== undefined) {
    sets.push("execution_date = ?");
    params.push(patch.executionDate);
  }
  if (patch.status !== undefined) {
    sets.push("status = ?");
    params.push(patch.status);
  }
  if (patch.cost !== undefined) {
    sets.push("cost = ?");
    params.push(patch.cost);
  }
  if (patch.revenue !== undefined) {
    sets.push("revenue = ?");
    params.push(patch.revenue);
  }
  if (patch.notes !== undefined) {
    sets.push("notes = ?");
    params.push(patch.notes);
  }
  sets.push("updated_at = ?");
  params.push(toSqlTimestamp(now));

  const pool = await requirePool();
  await pool.execute(`UPDATE service_orders SET ${sets.join(", ")} WHERE id = ?`, [...params, id]);

  if (patch.status && patch.status !== existing.status && existing.client_user_id) {
    await createNotification({
      userId: existing.client_user_id,
      type: "service_update",
      title: "Ordem de Serviço Atualizada",
      message: `Sua ordem de serviço de ${existing.service_type_name ?? "serviço"} agora está: ${
        SERVICE_ORDER_STATUS_LABELS[patch.status]
      }.`,
    });
  }

  const updated = await getServiceOrder(id);
  if (!updated) throw new NotFoundError("Service order", id);
  return updated;
}

/** Cost and revenue over orders created within the inclusive date range. */
export async function getServiceAnalytics(
  range: { dateFrom?: string; dateTo?: string } = {},
): Promise<ServiceAnalytics> {
  const where: string[] = [];
  const params: unknown[] = [];
  if (range.dateFrom) {
    where.push("so.created_at >= ?");
    params.push(`${range.dateFrom} 00:00:00`);
  }
  if (range.dateTo) {
    where.push("so.created_at <= ?");
    params.push(`${range.dateTo} 23:59:59`);
  }

  const pool = await requirePool();
  const rows = await pool.select<
    RowDataPacket & {
      status: ServiceOrderStatus;
      cost: number | string;
      revenue: number | string | null;
      service_type_name: string | null;
    }
  >(
    `SELECT so.status, so.cost, so.revenue, st.name AS service_type_name
     FROM service_orders so
     LEFT JOIN service_types st ON st.id = so.service_type_id
     ${where.length ? `WHERE ${where.join(" AND ")}` : ""}`,
    params,
  );

  let costCents = 0;
  let revenueCents = 0;
  const ordersByStatus: Partial<Record<ServiceOrderStatus, number>> = {};
  const ordersByType: Record<string, number> = {};
  for (const row of rows) {
    costCents += toCents(asNumber(row.cost));
    revenueCents += toCents(asNumber(row.revenue));
    ordersByStatus[row.status] = (ordersByStatus[row.status] ?? 0) + 1;
    const typeName = row.service_type_name ?? "Unknown";
    ordersByType[typeName] = (ordersByType[typeName] ?? 0) + 1;
  }

  return {
    totalOrders: rows.length,
    totalCost: fromCents(costCents),
    totalRevenue: fromCents(revenueCents),
    profit: fromCents(revenueCents - costCents),
    ordersByStatus,
    ordersByType,
  };
}

/** Cost and revenue of completed orders, for the financial dashboard. */
export async function getCompletedServiceTotals(): Promise<{ costs: number; revenue: number }> {
  const pool = await requirePool();
  const rows = await pool.select<
    RowDataPacket & { costs: number | string | null; revenue: number | string | null }
  >(
    `SELECT SUM(cost) AS costs, SUM(revenue) AS revenue
     FROM service_orders WHERE status = 'completed'`,
  );
  return {
    costs: fromCents(toCents(asNumber(rows[0]?.costs))),
    revenue: fromCents(toCents(asNumber(rows[0]?.revenue))),
  };
}
