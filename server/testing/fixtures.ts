import type { RowDataPacket } from "mysql2/promise";
import { type Mock, vi } from "vitest";
import type {
  BillingGateway,
  CreateCustomerInput,
  CreatePaymentInput,
  RemoteCustomer,
  RemotePayment,
} from "../lib/asaas";
import { closeDatabase, requirePool } from "../lib/database";
import { resetEnv } from "../lib/env";
import { GatewayUnavailableError } from "../lib/errors";
import type { Client, Lot } from "@shared/sales";
import { createClient } from "../store/clients";
import { createDevelopment, createLot } from "../store/inventory";

export interface FakeGateway extends BillingGateway {
  createCustomer: Mock<(input: CreateCustomerInput) => Promise<RemoteCustomer>>;
  createPayment: Mock<(input: CreatePaymentInput) => Promise<RemotePayment>>;
}

export const TIMEOUT_MESSAGE = "Asaas request failed: timeout of 30000ms exceeded";

/**
 * Gateway double that accepts every call. Payment ids are `pay_<n>` where n
 * counts createPayment calls from 1; `failingCalls` lists calls that time
 * out after the client's retries.
 */
export function createFakeGateway(options: { failingCalls?: number[] } = {}): FakeGateway {
  const failing = new Set(options.failingCalls ?? []);
  let customers = 0;
  let payments = 0;
  return {
    createCustomer: vi.fn(async (_input: CreateCustomerInput): Promise<RemoteCustomer> => {
      customers += 1;
      return { id: `cus_${customers}` };
    }),
    createPayment: vi.fn(async (_input: CreatePaymentInput): Promise<RemotePayment> => {
      payments += 1;
      if (failing.has(payments)) {
        throw new GatewayUnavailableError(TIMEOUT_MESSAGE);
      }
      return {
        id: `pay_${payments}`,
        status: "PENDING",
        bankSlipUrl: `https://boleto.test/${payments}`,
        invoiceUrl: `https://invoice.test/${payments}`,
      };
    }),
  };
}

export async function resetDatabase() {
  await closeDatabase();
  resetEnv();
}

let clientSequence = 0;

export async function seedClient(
  gateway: BillingGateway = createFakeGateway(),
  cpfCnpj = "529.982.247-25",
): Promise<Client> {
  clientSequence += 1;
  const { client } = await createClient(
    {
      fullName: `Cliente ${clientSequence}`,
      email: `cliente${clientSequence}@example.com`,
      cpfCnpj,
      phone: "(11) 98888-7777",
      username: `cliente${clientSequence}`,
      password: "test-password",
    },
    gateway,
  );
  return client;
}

export async function seedLot(
  overrides: { lotNumber?: string; price?: number; developmentName?: string } = {},
): Promise<Lot> {
  const development = await createDevelopment({
    name: overrides.developmentName ?? "Residencial Vale Verde",
    location: "Campinas - SP",
  });
  return createLot({
    developmentId: development.id,
    lotNumber: overrides.lotNumber ?? "12",
    block: "A",
    areaM2: 300,
    price: overrides.price ?? 12000,
  });
}

export async function lotStatus(lotId: string): Promise<string | null> {
  const pool = await requirePool();
  const rows = await pool.select<RowDataPacket & { status: string }>(
    `SELECT status FROM lots WHERE id = ?`,
    [lotId],
  );
  return rows[0]?.status ?? null;
}
