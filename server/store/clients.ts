import crypto from "node:crypto";
import type { RowDataPacket } from "mysql2/promise";
import type {
  Address,
  Client,
  ClientCreateInput,
  ClientCreateResult,
  ClientStatus,
} from "@shared/sales";
import { isValidCpfCnpj, onlyDigits } from "@shared/validators";
import { type BillingGateway, getBillingGateway } from "../lib/asaas";
import {
  type DatabaseExecutor,
  isUniqueViolation,
  requirePool,
  withTransaction,
} from "../lib/database";
import { ConflictError, ValidationError, errorMessage } from "../lib/errors";
import { createUser, hashPassword, isUsernameTaken } from "./auth";
import { formatTimestamp, parseJsonColumn } from "./mappers";

interface ClientRow extends RowDataPacket {
  id: string;
  user_id: string;
  full_name: string;
  email: string;
  cpf_cnpj: string;
  phone: string | null;
  address: unknown;
  status: ClientStatus;
  asaas_customer_id: string | null;
  created_at: string | Date | null;
}

const CLIENT_COLUMNS = `id, user_id, full_name, email, cpf_cnpj, phone, address, status,
  asaas_customer_id, created_at`;

function mapAddress(value: unknown): Address | null {
  const parsed = parseJsonColumn(value);
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) return null;
  const address: Address = {};
  for (const key of [
    "street",
    "number",
    "complement",
    "neighborhood",
    "city",
    "state",
    "postalCode",
  ] as const) {
    const field: unknown = Reflect.get(parsed, key);
    if (typeof field === "string") address[key] = field;
  }
  return address;
}

function mapClientRow(row: ClientRow): Client {
  return {
    id: row.id,
    userId: row.user_id,
    fullName: row.full_name,
    email: row.email,
    cpfCnpj: row.cpf_cnpj,
    phone: row.phone,
    address: mapAddress(row.address),
    status: row.status,
    remoteCustomerId: row.asaas_customer_id,
    createdAt: formatTimestamp(row.created_at),
  };
}

export async function getClientById(
  id: string,
  executor?: DatabaseExecutor,
): Promise<Client | null> {
  const db = executor ?? (await requirePool());
  const rows = await db.select<ClientRow>(
    `SELECT ${CLIENT_COLUMNS} FROM clients WHERE id = ? LIMIT 1`,
    [id],
  );
  return rows[0] ? mapClientRow(rows[0]) : null;
}

export async function setRemoteCustomerId(clientId: string, customerId: string) {
  const pool = await requirePool();
  await pool.execute(`UPDATE clients SET asaas_customer_id = ? WHERE id = ?`, [
    customerId,
    clientId,
  ]);
}

/**
 * Creates the login user and the client record together, then registers the
 * client as a billing customer. A gateway failure is reported back as a
 * warning; the client can still be sold to and billed once the customer id is
 * filled in.
 */
export async function createClient(
  input: ClientCreateInput,
  gateway: BillingGateway = getBillingGateway(),
): Promise<ClientCreateResult> {
  if (!isValidCpfCnpj(input.cpfCnpj)) {
    throw new ValidationError("Invalid CPF/CNPJ");
  }
  const document = onlyDigits(input.cpfCnpj);
  const passwordHash = await hashPassword(input.password);
  const pool = await requirePool();

  const client = await withTransaction(pool, async (conn) => {
    if (await isUsernameTaken(input.username, conn)) {
      throw new ConflictError("Username already in use");
    }
    const existing = await conn.select<RowDataPacket>(
      `SELECT id FROM clients WHERE cpf_cnpj = ? LIMIT 1`,
      [document],
    );
    if (existing.length > 0) {
      throw new ConflictError("A client with this CPF/CNPJ already exists");
    }

    const user = await createUser(
      {
        username: input.username,
        name: input.fullName,
        email: input.email,
        role: "client",
        passwordHash,
      },
      conn,
    );
    const id = crypto.randomUUID();
    try {
      await conn.execute(
        `INSERT INTO clients (id, user_id, full_name, email, cpf_cnpj, phone, address, status)
         VALUES (?, ?, ?, ?, ?, ?, ?, 'active')`,
        [
          id,
          user.id,
          input.fullName,
          input.email,
          document,
          input.phone ?? null,
          input.address ? JSON.stringify(input.address) : null,
        ],
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError("A client with this CPF/CNPJ already exists");
      }
      throw error;
    }
    const rows = await conn.select<ClientRow>(
      `SELECT ${CLIENT_COLUMNS} FROM clients WHERE id = ? LIMIT 1`,
      [id],
    );
    return mapClientRow(rows[0]);
  });

  try {
    const customer = await gateway.createCustomer({
      name: client.fullName,
      cpfCnpj: client.cpfCnpj,
      email: client.email,
      phone: client.phone,
      address: client.address,
      externalReference: client.id,
    });
    await setRemoteCustomerId(client.id, customer.id);
    return {
      client: { ...client, remoteCustomerId: customer.id },
      billingWarning: null,
    };
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error(`[clients] billing customer for ${client.id} not created`, error);
    return { client, billingWarning: errorMessage(error) };
  }
}
