import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import mysql, {
  type Pool,
  type PoolConnection,
  type ResultSetHeader,
  type RowDataPacket,
} from "mysql2/promise";
import bcrypt from "bcryptjs";
import Database from "better-sqlite3";
import type { Database as SqliteDatabase } from "better-sqlite3";
import { getEnv } from "./env";

const DEFAULT_DB_FILENAME = "app.db";
const MEMORY_DB = ":memory:";

export type Dialect = "mysql" | "sqlite";

export interface QueryResultHeader {
  affectedRows: number;
  insertId: number;
}

/** Common query surface over mysql2 and better-sqlite3. */
export interface DatabaseExecutor {
  readonly dialect: Dialect;
  select<T extends RowDataPacket>(sql: string, params?: unknown[]): Promise<T[]>;
  execute(sql: string, params?: unknown[]): Promise<QueryResultHeader>;
}

export interface DatabaseConnection extends DatabaseExecutor {
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  release(): void;
}

export interface DatabasePool extends DatabaseExecutor {
  getConnection(): Promise<DatabaseConnection>;
  close(): Promise<void>;
}

let pool: DatabasePool | null = null;
let initializationPromise: Promise<boolean> | null = null;

function hasMysqlConfig() {
  const env = getEnv();
  return Boolean(env.MYSQL_HOST && env.MYSQL_DATABASE && env.MYSQL_USER);
}

function resolveDefaultDataDir() {
  const env = getEnv();
  if (env.LOCAL_DB_DIR) {
    return path.resolve(env.LOCAL_DB_DIR);
  }
  if (env.PORTABLE_EXECUTABLE_DIR) {
    return path.resolve(env.PORTABLE_EXECUTABLE_DIR, "data");
  }
  return path.resolve(process.cwd(), "data");
}

function resolveLocalDbPath() {
  const explicit = getEnv().LOCAL_DB_PATH;
  if (explicit === MEMORY_DB) return MEMORY_DB;
  if (explicit) return path.resolve(explicit);
  return path.join(resolveDefaultDataDir(), DEFAULT_DB_FILENAME);
}

function ensureDirectoryExists(filePath: string) {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function isReadStatement(sql: string) {
  const trimmed = sql.trim().toUpperCase();
  return (
    trimmed.startsWith("SELECT") ||
    trimmed.startsWith("WITH") ||
    trimmed.startsWith("PRAGMA")
  );
}

// better-sqlite3 binds booleans as errors and has no Date type.
function toSqliteParams(params: unknown[]): unknown[] {
  return params.map((value) => {
    if (typeof value === "boolean") return value ? 1 : 0;
    if (value instanceof Date) return value.toISOString();
    if (value === undefined) return null;
    return value;
  });
}

function runSqlite<T extends RowDataPacket>(
  db: SqliteDatabase,
  sql: string,
  params: unknown[],
): T[] | QueryResultHeader {
  const statement = db.prepare(sql);
  const bound = toSqliteParams(params);
  if (isReadStatement(sql)) {
    return statement.all(bound) as T[];
  }
  const result = statement.run(bound);
  return {
    affectedRows: result.changes,
    insertId: Number(result.lastInsertRowid),
  };
}

class BetterSqliteConnection implements DatabaseConnection {
  readonly dialect = "sqlite" as const;
  private inTransaction = false;
  private released = false;

  constructor(
    private readonly db: SqliteDatabase,
    private readonly unlock: () => void,
  ) {}

  async beginTransaction(): Promise<void> {
    if (this.inTransaction) return;
    this.db.prepare("BEGIN IMMEDIATE").run();
    this.inTransaction = true;
  }

  async commit(): Promise<void> {
    if (!this.inTransaction) return;
    this.db.prepare("COMMIT").run();
    this.inTransaction = false;
  }

  async rollback(): Promise<void> {
    if (!this.inTransaction) return;
    try {
      this.db.prepare("ROLLBACK").run();
    } finally {
      this.inTransaction = false;
    }
  }

  async select<T extends RowDataPacket>(sql: string, params: unknown[] = []) {
    const rows = runSqlite<T>(this.db, sql, params);
    return Array.isArray(rows) ? rows : [];
  }

  async execute(sql: string, params: unknown[] = []) {
    const result = runSqlite(this.db, sql, params);
    return Array.isArray(result) ? { affectedRows: 0, insertId: 0 } : result;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    if (this.inTransaction) {
      this.inTransaction = false;
      try {
        this.db.prepare("ROLLBACK").run();
      } catch (error) {
        // eslint-disable-next-line no-console
        console.error("[sqlite] rollback on release failed", error);
      }
    }
    this.unlock();
  }
}

/**
 * One file handle shared by every request. Connections are handed out one
 * at a time so two transactions never interleave on the same handle, and
 * pool-level statements wait until no connection is held.
 */
class BetterSqlitePool implements DatabasePool {
  readonly dialect = "sqlite" as const;
  private lock: Promise<void> = Promise.resolve();

  constructor(readonly db: SqliteDatabase) {}

  private async whenIdle() {
    let current = this.lock;
    await current;
    while (current !== this.lock) {
      current = this.lock;
      await current;
    }
  }

  async select<T extends RowDataPacket>(sql: string, params: unknown[] = []) {
    await this.whenIdle();
    const rows = runSqlite<T>(this.db, sql, params);
    return Array.isArray(rows) ? rows : [];
  }

  async execute(sql: string, params: unknown[] = []) {
    await this.whenIdle();
    const result = runSqlite(this.db, sql, params);
    return Array.isArray(result) ? { affectedRows: 0, insertId: 0 } : result;
  }

  async getConnection(): Promise<DatabaseConnection> {
    const previous = this.lock;
    let unlock: () => void = () => undefined;
    this.lock = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    await previous;
    return new BetterSqliteConnection(this.db, unlock);
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

class MysqlConnection implements DatabaseConnection {
  readonly dialect = "mysql" as const;

  constructor(private readonly conn: PoolConnection) {}

  async select<T extends RowDataPacket>(sql: string, params: unknown[] = []) {
    const [rows] = await this.conn.query<T[]>(sql, params);
    return rows;
  }

  async execute(sql: string, params: unknown[] = []) {
    const [header] = await this.conn.query<ResultSetHeader>(sql, params);
    return { affectedRows: header.affectedRows, insertId: header.insertId };
  }

  beginTransaction() {
    return this.conn.beginTransaction();
  }

  commit() {
    return this.conn.commit();
  }

  rollback() {
    return this.conn.rollback();
  }

  release() {
    this.conn.release();
  }
}

class MysqlPool implements DatabasePool {
  readonly dialect = "mysql" as const;

  constructor(readonly pool: Pool) {}

  async select<T extends RowDataPacket>(sql: string, params: unknown[] = []) {
    const [rows] = await this.pool.query<T[]>(sql, params);
    return rows;
  }

  async execute(sql: string, params: unknown[] = []) {
    const [header] = await this.pool.query<ResultSetHeader>(sql, params);
    return { affectedRows: header.affectedRows, insertId: header.insertId };
  }

  async getConnection(): Promise<DatabaseConnection> {
    return new MysqlConnection(await this.pool.getConnection());
  }

  close() {
    return this.pool.end();
  }
}

function createSqlitePool(): BetterSqlitePool {
  const dbPath = resolveLocalDbPath();
  if (dbPath !== MEMORY_DB) ensureDirectoryExists(dbPath);
  const db = new Database(dbPath);
  if (dbPath !== MEMORY_DB) db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  return new BetterSqlitePool(db);
}

function createMysqlPool(): MysqlPool {
  const env = getEnv();
  return new MysqlPool(
    mysql.createPool({
      host: env.MYSQL_HOST,
      port: env.MYSQL_PORT,
      database: env.MYSQL_DATABASE,
      user: env.MYSQL_USER,
      password: env.MYSQL_PASSWORD,
      waitForConnections: true,
      connectionLimit: 10,
      charset: "utf8mb4_general_ci",
      dateStrings: true,
    }),
  );
}

function ensureSqliteSchema(db: SqliteDatabase) {
  const statements = [
    `CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      username TEXT NOT NULL UNIQUE,
      name TEXT NOT NULL,
      email TEXT NOT NULL,
      role TEXT NOT NULL CHECK (role IN ('admin','client')),
      active INTEGER NOT NULL DEFAULT 1,
      password_hash TEXT NOT NULL,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    )`,
    `CREATE TABLE IF NOT EXISTS sessions (
      token TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
    )`,
    `CREATE TABLE IF NOT EXISTS clients (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL UNIQUE,
      full_name TEXT NOT NULL,
      email TEXT NOT NULL,
      cpf_cnpj TEXT NOT NULL UNIQUE,
      phone TEXT NULL,
      address TEXT NULL,
      status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active','inactive','defaulter')),
      asaas_customer_id TEXT NULL,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
    )`,
    `CREATE TABLE IF NOT EXISTS developments (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      location TEXT NOT NULL,
      description TEXT NULL,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    )`,
    `CREATE TABLE IF NOT EXISTS lots (
      id TEXT PRIMARY KEY,
      development_id TEXT NOT NULL,
      lot_number TEXT NOT NULL,
      block TEXT NULL,
      area_m2 REAL NOT NULL,
      price REAL NOT NULL,
      status TEXT NOT NULL DEFAULT 'available' CHECK (status IN ('available','reserved','sold')),
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY (development_id) REFERENCES developments(id) ON DELETE CASCADE
    )`,
    `CREATE TABLE IF NOT EXISTS client_lots (
      id TEXT PRIMARY KEY,
      client_id TEXT NOT NULL,
      lot_id TEXT NOT NULL,
      purchase_date TEXT NOT NULL,
      total_value REAL NOT NULL,
      payment_plan TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active','completed','cancelled')),
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY (client_id) REFERENCES clients(id),
      FOREIGN KEY (lot_id) REFERENCES lots(id)
    )`,
    `CREATE TABLE IF NOT EXISTS invoices (
      id TEXT PRIMARY KEY,
      client_lot_id TEXT NOT NULL,
      asaas_payment_id TEXT NULL UNIQUE,
      installment_number INTEGER NOT NULL,
      due_date TEXT NOT NULL,
      amount REAL NOT NULL,
      status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending','paid','overdue','cancelled')),
      barcode TEXT NULL,
      payment_url TEXT NULL,
      paid_at TEXT NULL,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      UNIQUE (client_lot_id, installment_number),
      FOREIGN KEY (client_lot_id) REFERENCES client_lots(id)
    )`,
    `CREATE TABLE IF NOT EXISTS issuance_outbox (
      id TEXT PRIMARY KEY,
      client_lot_id TEXT NOT NULL,
      installment_number INTEGER NOT NULL,
      due_date TEXT NOT NULL,
      amount REAL NOT NULL,
      description TEXT NOT NULL,
      asaas_payment_id TEXT NULL,
      bank_slip_url TEXT NULL,
      invoice_url TEXT NULL,
      status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending','done')),
      attempts INTEGER NOT NULL DEFAULT 1,
      last_error TEXT NULL,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      UNIQUE (client_lot_id, installment_number),
      FOREIGN KEY (client_lot_id) REFERENCES client_lots(id)
    )`,
    `CREATE TABLE IF NOT EXISTS webhook_events (
      event_key TEXT PRIMARY KEY,
      event TEXT NOT NULL,
      asaas_payment_id TEXT NOT NULL,
      invoice_id TEXT NOT NULL,
      processed_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    )`,
    `CREATE TABLE IF NOT EXISTS notifications (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      type TEXT NOT NULL CHECK (type IN ('payment_overdue','service_update','general')),
      title TEXT NOT NULL,
      message TEXT NOT NULL,
      is_read INTEGER NOT NULL DEFAULT 0,
      dedupe_key TEXT NULL UNIQUE,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
    )`,
    `CREATE TABLE IF NOT EXISTS service_types (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      description TEXT NULL,
      base_price REAL NOT NULL DEFAULT 0 CHECK (base_price >= 0),
      is_active INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    )`,
    `CREATE TABLE IF NOT EXISTS service_orders (
      id TEXT PRIMARY KEY,
      client_id TEXT NOT NULL,
      lot_id TEXT NULL,
      service_type_id TEXT NOT NULL,
      requested_date TEXT NOT NULL,
      execution_date TEXT NULL,
      status TEXT NOT NULL DEFAULT 'requested'
        CHECK (status IN ('requested','approved','in_progress','completed','cancelled')),
      cost REAL NOT NULL DEFAULT 0 CHECK (cost >= 0),
      revenue REAL NULL CHECK (revenue >= 0),
      notes TEXT NULL,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY (client_id) REFERENCES clients(id) ON DELETE CASCADE,
      FOREIGN KEY (lot_id) REFERENCES lots(id) ON DELETE SET NULL,
      FOREIGN KEY (service_type_id) REFERENCES service_types(id)
    )`,
    `CREATE INDEX IF NOT EXISTS idx_lots_development ON lots(development_id, status)`,
    `CREATE INDEX IF NOT EXISTS idx_service_orders_client ON service_orders(client_id, status)`,
    `CREATE INDEX IF NOT EXISTS idx_client_lots_client ON client_lots(client_id)`,
    `CREATE INDEX IF NOT EXISTS idx_invoices_status_due ON invoices(status, due_date)`,
    `CREATE INDEX IF NOT EXISTS idx_issuance_outbox_status ON issuance_outbox(status, created_at)`,
    `CREATE INDEX IF NOT EXISTS idx_notifications_user ON notifications(user_id, created_at)`,
  ];

  for (const statement of statements) {
    db.prepare(statement).run();
  }
}

async function ensureMysqlSchema(pool: Pool) {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS users (
      id CHAR(36) NOT NULL PRIMARY KEY,
      username VARCHAR(191) NOT NULL UNIQUE,
      name VARCHAR(191) NOT NULL,
      email VARCHAR(191) NOT NULL,
      role ENUM('admin','client') NOT NULL DEFAULT 'client',
      active TINYINT(1) NOT NULL DEFAULT 1,
      password_hash VARCHAR(191) NOT NULL,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP ON UPDATE CURRENT_TIMESTAMP
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS sessions (
      token CHAR(36) NOT NULL PRIMARY KEY,
      user_id CHAR(36) NOT NULL,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      CONSTRAINT fk_sessions_user FOREIGN KEY (user_id)
        REFERENCES users(id) ON DELETE CASCADE
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS clients (
      id CHAR(36) NOT NULL PRIMARY KEY,
      user_id CHAR(36) NOT NULL UNIQUE,
      full_name VARCHAR(191) NOT NULL,
      email VARCHAR(191) NOT NULL,
      cpf_cnpj VARCHAR(32) NOT NULL UNIQUE,
      phone VARCHAR(32) NULL,
      address TEXT NULL,
      status ENUM('active','inactive','defaulter') NOT NULL DEFAULT 'active',
      asaas_customer_id VARCHAR(64) NULL,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      CONSTRAINT fk_clients_user FOREIGN KEY (user_id)
        REFERENCES users(id) ON DELETE CASCADE
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS developments (
      id CHAR(36) NOT NULL PRIMARY KEY,
      name VARCHAR(191) NOT NULL,
      location VARCHAR(191) NOT NULL,
      description TEXT NULL,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS lots (
      id CHAR(36) NOT NULL PRIMARY KEY,
      development_id CHAR(36) NOT NULL,
      lot_number VARCHAR(32) NOT NULL,
      block VARCHAR(32) NULL,
      area_m2 DECIMAL(12,2) NOT NULL,
      price DECIMAL(12,2) NOT NULL,
      status ENUM('available','reserved','sold') NOT NULL DEFAULT 'available',
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP ON UPDATE CURRENT_TIMESTAMP,
      INDEX idx_lots_development (development_id, status),
      CONSTRAINT fk_lots_development FOREIGN KEY (development_id)
        REFERENCES developments(id) ON DELETE CASCADE
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS client_lots (
      id CHAR(36) NOT NULL PRIMARY KEY,
      client_id CHAR(36) NOT NULL,
      lot_id CHAR(36) NOT NULL,
      purchase_date DATE NOT NULL,
      total_value DECIMAL(12,2) NOT NULL,
      payment_plan JSON NOT NULL,
      status ENUM('active','completed','cancelled') NOT NULL DEFAULT 'active',
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      INDEX idx_client_lots_client (client_id),
      CONSTRAINT fk_client_lots_client FOREIGN KEY (client_id) REFERENCES clients(id),
      CONSTRAINT fk_client_lots_lot FOREIGN KEY (lot_id) REFERENCES lots(id)
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS invoices (
      id CHAR(36) NOT NULL PRIMARY KEY,
      client_lot_id CHAR(36) NOT NULL,
      asaas_payment_id VARCHAR(64) NULL UNIQUE,
      installment_number INT NOT NULL,
      due_date DATE NOT NULL,
      amount DECIMAL(12,2) NOT NULL,
      status ENUM('pending','paid','overdue','cancelled') NOT NULL DEFAULT 'pending',
      barcode TEXT NULL,
      payment_url TEXT NULL,
      paid_at DATETIME NULL,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP ON UPDATE CURRENT_TIMESTAMP,
      UNIQUE KEY uq_invoices_installment (client_lot_id, installment_number),
      INDEX idx_invoices_status_due (status, due_date),
      CONSTRAINT fk_invoices_client_lot FOREIGN KEY (client_lot_id)
        REFERENCES client_lots(id)
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS issuance_outbox (
      id CHAR(36) NOT NULL PRIMARY KEY,
      client_lot_id CHAR(36) NOT NULL,
      installment_number INT NOT NULL,
      due_date DATE NOT NULL,
      amount DECIMAL(12,2) NOT NULL,
      description VARCHAR(255) NOT NULL,
      asaas_payment_id VARCHAR(64) NULL,
      bank_slip_url TEXT NULL,
      invoice_url TEXT NULL,
      status ENUM('pending','done') NOT NULL DEFAULT 'pending',
      attempts INT NOT NULL DEFAULT 1,
      last_error TEXT NULL,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP ON UPDATE CURRENT_TIMESTAMP,
      UNIQUE KEY uq_issuance_outbox_installment (client_lot_id, installment_number),
      INDEX idx_issuance_outbox_status (status, created_at),
      CONSTRAINT fk_issuance_outbox_client_lot FOREIGN KEY (client_lot_id)
        REFERENCES client_lots(id)
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS webhook_events (
      event_key VARCHAR(191) NOT NULL PRIMARY KEY,
      event VARCHAR(64) NOT NULL,
      asaas_payment_id VARCHAR(64) NOT NULL,
      invoice_id CHAR(36) NOT NULL,
      processed_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS notifications (
      id CHAR(36) NOT NULL PRIMARY KEY,
      user_id CHAR(36) NOT NULL,
      type ENUM('payment_overdue','service_update','general') NOT NULL,
      title VARCHAR(191) NOT NULL,
      message TEXT NOT NULL,
      is_read TINYINT(1) NOT NULL DEFAULT 0,
      dedupe_key VARCHAR(191) NULL UNIQUE,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      INDEX idx_notifications_user (user_id, created_at),
      CONSTRAINT fk_notifications_user FOREIGN KEY (user_id)
        REFERENCES users(id) ON DELETE CASCADE
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS service_types (
      id CHAR(36) NOT NULL PRIMARY KEY,
      name VARCHAR(100) NOT NULL,
      description TEXT NULL,
      base_price DECIMAL(12,2) NOT NULL DEFAULT 0,
      is_active TINYINT(1) NOT NULL DEFAULT 1,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS service_orders (
      id CHAR(36) NOT NULL PRIMARY KEY,
      client_id CHAR(36) NOT NULL,
      lot_id CHAR(36) NULL,
      service_type_id CHAR(36) NOT NULL,
      requested_date DATE NOT NULL,
      execution_date DATE NULL,
      status ENUM('requested','approved','in_progress','completed','cancelled') NOT NULL DEFAULT 'requested',
      cost DECIMAL(12,2) NOT NULL DEFAULT 0,
      revenue DECIMAL(12,2) NULL,
      notes TEXT NULL,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP ON UPDATE CURRENT_TIMESTAMP,
      INDEX idx_service_orders_client (client_id, status),
      CONSTRAINT fk_service_orders_client FOREIGN KEY (client_id)
        REFERENCES clients(id) ON DELETE CASCADE,
      CONSTRAINT fk_service_orders_lot FOREIGN KEY (lot_id)
        REFERENCES lots(id) ON DELETE SET NULL,
      CONSTRAINT fk_service_orders_type FOREIGN KEY (service_type_id)
        REFERENCES service_types(id)
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);
}

async function seedAdmin(executor: DatabaseExecutor) {
  const env = getEnv();
  const rows = await executor.select<RowDataPacket>(
    `SELECT id FROM users WHERE username = ? LIMIT 1`,
    [env.ADMIN_USERNAME],
  );
  if (rows.length > 0) return;

  const passwordHash = await bcrypt.hash(env.ADMIN_PASSWORD, 10);
  await executor.execute(
    `INSERT INTO users (id, username, name, email, role, active, password_hash)
     VALUES (?, ?, ?, ?, ?, ?, ?)`,
    [
      crypto.randomUUID(),
      env.ADMIN_USERNAME,
      "Administrator",
      env.ADMIN_EMAIL,
      "admin",
      1,
      passwordHash,
    ],
  );
}

export function getDatabasePool(): DatabasePool | null {
  if (pool) return pool;
  try {
    pool = hasMysqlConfig() ? createMysqlPool() : createSqlitePool();
    return pool;
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error("[database] failed to create pool", error);
    return null;
  }
}

export async function initializeDatabase() {
  if (!initializationPromise) {
    initializationPromise = (async () => {
      const current = getDatabasePool();
      if (!current) return false;
      try {
        if (current instanceof MysqlPool) {
          await ensureMysqlSchema(current.pool);
        } else if (current instanceof BetterSqlitePool) {
          ensureSqliteSchema(current.db);
        }
        await seedAdmin(current);
        return true;
      } catch (error) {
        // eslint-disable-next-line no-console
        console.error(`[${current.dialect}] initialization failed`, error);
        return false;
      }
    })();
  }
  return initializationPromise;
}

export async function getInitializedPool(): Promise<DatabasePool | null> {
  const ready = await initializeDatabase();
  if (!ready) return null;
  return getDatabasePool();
}

/** Like `getInitializedPool` but fails the caller when storage is down. */
export async function requirePool(): Promise<DatabasePool> {
  const current = await getInitializedPool();
  if (!current) throw new Error("Database unavailable");
  return current;
}

export async function withTransaction<T>(
  executor: DatabasePool,
  work: (conn: DatabaseConnection) => Promise<T>,
): Promise<T> {
  const conn = await executor.getConnection();
  try {
    await conn.beginTransaction();
    const result = await work(conn);
    await conn.commit();
    return result;
  } catch (error) {
    await conn.rollback();
    throw error;
  } finally {
    conn.release();
  }
}

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  const { code } = error;
  return (
    code === "ER_DUP_ENTRY" ||
    code === "SQLITE_CONSTRAINT_UNIQUE" ||
    code === "SQLITE_CONSTRAINT_PRIMARYKEY"
  );
}

export async function closeDatabase() {
  const current = pool;
  pool = null;
  initializationPromise = null;
  if (current) await current.close();
}
