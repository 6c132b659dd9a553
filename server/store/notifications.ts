import crypto from "node:crypto";
import type { RowDataPacket } from "mysql2/promise";
import type { Notification, NotificationType } from "@shared/sales";
import { type DatabaseExecutor, isUniqueViolation, requirePool } from "../lib/database";
import { asBoolean, formatTimestamp } from "./mappers";

interface NotificationRow extends RowDataPacket {
  id: string;
  user_id: string;
  type: NotificationType;
  title: string;
  message: string;
  is_read: number | boolean;
  created_at: string | Date | null;
}

function mapNotificationRow(row: NotificationRow): Notification {
  return {
    id: row.id,
    userId: row.user_id,
    type: row.type,
    title: row.title,
    message: row.message,
    isRead: asBoolean(row.is_read),
    createdAt: formatTimestamp(row.created_at),
  };
}

/**
 * Inserts a notification. With a `dedupeKey`, a second insert for the same
 * key is dropped and `false` is returned.
 */
export async function createNotification(
  input: {
    userId: string;
    type: NotificationType;
    title: string;
    message: string;
    dedupeKey?: string | null;
  },
  executor?: DatabaseExecutor,
): Promise<boolean> {
  const db = executor ?? (await requirePool());
  try {
    await db.execute(
      `INSERT INTO notifications (id, user_id, type, title, message, is_read, dedupe_key)
       VALUES (?, ?, ?, ?, ?, 0, ?)`,
      [
        crypto.randomUUID(),
        input.userId,
        input.type,
        input.title,
        input.message,
        input.dedupeKey ?? null,
      ],
    );
    return true;
  } catch (error) {
    if (input.dedupeKey && isUniqueViolation(error)) return false;
    throw error;
  }
}

export async function listNotifications(
  userId: string,
  options: { unreadOnly?: boolean; limit?: number } = {},
): Promise<Notification[]> {
  const pool = await requirePool();
  const rows = await pool.select<NotificationRow>(
    `SELECT id, user_id, type, title, message, is_read, created_at
     FROM notifications
     WHERE user_id = ? ${options.unreadOnly ? "AND is_read = 0" : ""}
     ORDER BY created_at DESC, id ASC
     ${options.limit ? `LIMIT ${Math.max(1, Math.floor(options.limit))}` : ""}`,
    [userId],
  );
  return rows.map(mapNotificationRow);
}

export async function markNotificationRead(
  id: string,
  userId: string,
): Promise<boolean> {
  const pool = await requirePool();
  const result = await pool.execute(
    `UPDATE notifications SET is_read = 1 WHERE id = ? AND user_id = ?`,
    [id, userId],
  );
  return result.affectedRows > 0;
}
