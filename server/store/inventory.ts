import crypto from "node:crypto";
import type { RowDataPacket } from "mysql2/promise";
import type { Development, Lot, LotStatus } from "@shared/sales";
import { type DatabaseExecutor, requirePool } from "../lib/database";
import { asNumber } from "./mappers";

interface LotRow extends RowDataPacket {
  id: string;
  development_id: string;
  lot_number: string;
  block: string | null;
  area_m2: number | string;
  price: number | string;
  status: LotStatus;
}

interface LotWithDevelopmentRow extends LotRow {
  development_name: string;
}

function mapLotRow(row: LotRow): Lot {
  return {
    id: row.id,
    developmentId: row.development_id,
    lotNumber: row.lot_number,
    block: row.block,
    areaM2: asNumber(row.area_m2),
    price: asNumber(row.price),
    status: row.status,
  };
}

export async function createDevelopment(input: {
  name: string;
  location: string;
  description?: string | null;
}): Promise<Development> {
  const pool = await requirePool();
  const id = crypto.randomUUID();
  await pool.execute(
    `INSERT INTO developments (id, name, location, description) VALUES (?, ?, ?, ?)`,
    [id, input.name, input.location, input.description ?? null],
  );
  return {
    id,
    name: input.name,
    location: input.location,
    description: input.description ?? null,
  };
}

export async function createLot(input: {
  developmentId: string;
  lotNumber: string;
  block?: string | null;
  areaM2: number;
  price: number;
  status?: LotStatus;
}): Promise<Lot> {
  const pool = await requirePool();
  const id = crypto.randomUUID();
  const status = input.status ?? "available";
  await pool.execute(
    `INSERT INTO lots (id, development_id, lot_number, block, area_m2, price, status)
     VALUES (?, ?, ?, ?, ?, ?, ?)`,
    [
      id,
      input.developmentId,
      input.lotNumber,
      input.block ?? null,
      input.areaM2,
      input.price,
      status,
    ],
  );
  return {
    id,
    developmentId: input.developmentId,
    lotNumber: input.lotNumber,
    block: input.block ?? null,
    areaM2: input.areaM2,
    price: input.price,
    status,
  };
}

export async function getLotWithDevelopment(
  id: string,
  executor?: DatabaseExecutor,
): Promise<(Lot & { developmentName: string }) | null> {
  const db = executor ?? (await requirePool());
  const rows = await db.select<LotWithDevelopmentRow>(
    `SELECT l.id, l.development_id, l.lot_number, l.block, l.area_m2, l.price, l.status,
            d.name AS development_name
     FROM lots l
     INNER JOIN developments d ON d.id = l.development_id
     WHERE l.id = ?
     LIMIT 1`,
    [id],
  );
  const row = rows[0];
  if (!row) return null;
  return { ...mapLotRow(row), developmentName: row.development_name };
}

/**
 * Flips an available lot to sold. Returns false when another sale got there
 * first or the lot is reserved, in which case nothing changed.
 */
export async function markLotSold(
  id: string,
  executor: DatabaseExecutor,
): Promise<boolean> {
  const result = await executor.execute(
    `UPDATE lots SET status = 'sold', updated_at = CURRENT_TIMESTAMP
     WHERE id = ? AND status = 'available'`,
    [id],
  );
  return result.affectedRows === 1;
}
