import type { Server } from "node:http";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { createServer } from "./index";
import { setBillingGateway } from "./lib/asaas";
import { resetEnv } from "./lib/env";
import { createServiceType } from "./store/service-orders";
import {
  type FakeGateway,
  TIMEOUT_MESSAGE,
  createFakeGateway,
  resetDatabase,
  seedLot,
} from "./testing/fixtures";

const tokenSchema = z.object({ token: z.string() });
const idListSchema = z.object({ id: z.string() }).array();

let server: Server;
let baseUrl: string;
let gateway: FakeGateway;

function request(path: string, init: { method?: string; token?: string; body?: unknown; raw?: string } = {}) {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (init.token) headers.Authorization = `Bearer ${init.token}`;
  const body = init.raw ?? (init.body === undefined ? undefined : JSON.stringify(init.body));
  return fetch(`${baseUrl}${path}`, {
    method: init.method ?? (body === undefined ? "GET" : "POST"),
    headers,
    body,
  });
}

async function login(username: string, password: string) {
  const response = await request("/api/auth/login", { body: { username, password } });
  expect(response.status).toBe(200);
  return tokenSchema.parse(await response.json()).token;
}

async function onboardClient(adminToken: string) {
  const response = await request("/api/admin/clients", {
    token: adminToken,
    body: {
      fullName: "Maria Souza",
      email: "maria@example.com",
      cpfCnpj: "529.982.247-25",
      phone: "(11) 98888-7777",
      username: "maria",
      password: "test-password",
    },
  });
  expect(response.status).toBe(201);
  return z
    .object({ client: z.object({ id: z.string(), remoteCustomerId: z.string().nullable() }) })
    .parse(await response.json()).client;
}

beforeAll(async () => {
  gateway = createFakeGateway();
  const app = createServer({ gateway });
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server has no port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  setBillingGateway(null);
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  await resetDatabase();
});

beforeEach(async () => {
  await resetDatabase();
  gateway = createFakeGateway();
  setBillingGateway(gateway);
});

afterEach(() => {
  vi.unstubAllEnvs();
  resetEnv();
});

describe("health and auth", () => {
  it("reports health", async () => {
    const response = await request("/health");
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok" });
  });

  it("logs the seeded admin in and out", async () => {
    const token = await login("admin", "password123");

    const me = await request("/api/auth/me", { token });
    expect(await me.json()).toMatchObject({ user: { username: "admin", role: "admin" }, clientId: null });

    const logout = await request("/api/auth/logout", { method: "POST", token });
    expect(logout.status).toBe(204);
    const after = await request("/api/auth/me", { token });
    expect(await after.json()).toEqual({ user: null, clientId: null });
  });

  it("rejects bad credentials", async () => {
    const response = await request("/api/auth/login", { body: { username: "admin", password: "nope" } });
    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({ error: "Invalid credentials or inactive user" });
  });

  it("rejects a login without a password", async () => {
    const response = await request("/api/auth/login", { body: { username: "admin" } });
    expect(response.status).toBe(400);
  });
});

describe("access control", () => {
  it("requires a session for admin routes", async () => {
    const response = await request("/api/admin/dashboard/financial");
    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({ error: "Unauthorized" });
  });

  it("keeps clients out of admin routes and admins out of client routes", async () => {
    const adminToken = await login("admin", "password123");
    await onboardClient(adminToken);
    const clientToken = await login("maria", "test-password");

    const adminOnly = await request("/api/admin/issuance-queue", { token: clientToken });
    expect(adminOnly.status).toBe(403);
    expect(await adminOnly.json()).toEqual({ error: "Admin access required" });

    const clientOnly = await request("/api/client/invoices", { token: adminToken });
    expect(clientOnly.status).toBe(403);
    expect(await clientOnly.json()).toEqual({ error: "Client access required" });
  });
});

describe("sales flow", () => {
  it("onboards a client, sells a lot and retries the failed installment", async () => {
    gateway = createFakeGateway({ failingCalls: [5] });
    setBillingGateway(gateway);
    const adminToken = await login("admin", "password123");
    const client = await onboardClient(adminToken);
    expect(client.remoteCustomerId).toBe("cus_1");
    const lot = await seedLot();

    const sale = await request("/api/admin/client-lots", {
      token: adminToken,
      body: {
        clientId: client.id,
        lotId: lot.id,
        totalValue: 12000,
        paymentPlan: { totalInstallments: 12, firstDueDate: "2024-01-15" },
      },
    });
    expect(sale.status).toBe(201);
    expect(await sale.json()).toMatchObject({
      sale: { clientId: client.id, lotId: lot.id, status: "active" },
      issuance: {
        requested: 12,
        issued: 11,
        failed: [{ installmentNumber: 5, reason: TIMEOUT_MESSAGE }],
      },
    });

    const queue = await request("/api/admin/issuance-queue", { token: adminToken });
    expect(await queue.json()).toMatchObject({ entries: [{ installmentNumber: 5, status: "pending" }] });

    const retry = await request("/api/admin/issuance-queue/retry", { method: "POST", token: adminToken });
    expect(await retry.json()).toEqual({ attempted: 1, issued: 1, stillPending: 0 });

    const clientToken = await login("maria", "test-password");
    const invoices = await request("/api/client/invoices", { token: clientToken });
    const body = z
      .object({ invoices: idListSchema, totals: z.object({ pending: z.number() }) })
      .parse(await invoices.json());
    expect(body.invoices).toHaveLength(12);
    expect(body.totals.pending).toBe(12000);
  });

  it("answers 409 when the lot is already sold", async () => {
    const adminToken = await login("admin", "password123");
    const client = await onboardClient(adminToken);
    const lot = await seedLot();
    const body = {
      clientId: client.id,
      lotId: lot.id,
      totalValue: 1000,
      paymentPlan: { totalInstallments: 1, firstDueDate: "2024-01-15" },
    };

    expect((await request("/api/admin/client-lots", { token: adminToken, body })).status).toBe(201);
    const second = await request("/api/admin/client-lots", { token: adminToken, body });

    expect(second.status).toBe(409);
    expect(await second.json()).toEqual({ error: "Lot is not available for sale" });
  });

  it("validates the sale payload", async () => {
    const adminToken = await login("admin", "password123");

    const response = await request("/api/admin/client-lots", {
      token: adminToken,
      body: {
        clientId: "c",
        lotId: "l",
        totalValue: 1000,
        paymentPlan: { totalInstallments: 361, firstDueDate: "2024-01-15" },
      },
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      error: "paymentPlan.totalInstallments: Number must be less than or equal to 360",
    });
  });

  it("answers 404 for an unknown lot", async () => {
    const adminToken = await login("admin", "password123");
    const client = await onboardClient(adminToken);

    const response = await request("/api/admin/client-lots", {
      token: adminToken,
      body: {
        clientId: client.id,
        lotId: "missing",
        totalValue: 1000,
        paymentPlan: { totalInstallments: 1, firstDueDate: "2024-01-15" },
      },
    });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: "Lot missing not found" });
  });

  it("rejects an invalid invoice status filter", async () => {
    const adminToken = await login("admin", "password123");
    await onboardClient(adminToken);
    const clientToken = await login("maria", "test-password");

    const response = await request("/api/client/invoices?status=late", { token: clientToken });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Invalid status filter" });
  });
});

describe("gateway webhooks", () => {
  async function soldInstallment() {
    const adminToken = await login("admin", "password123");
    const client = await onboardClient(adminToken);
    const lot = await seedLot();
    await request("/api/admin/client-lots", {
      token: adminToken,
      body: {
        clientId: client.id,
        lotId: lot.id,
        totalValue: 1000,
        paymentPlan: { totalInstallments: 1, firstDueDate: "2024-01-15" },
      },
    });
    return { adminToken, client };
  }

  it("rejects malformed JSON", async () => {
    const response = await request("/api/webhooks/asaas", { raw: "{not json" });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Invalid JSON payload" });
  });

  it("requires an event name", async () => {
    const response = await request("/api/webhooks/asaas", { body: { payment: { id: "pay_1" } } });
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: "event: Missing event" });
  });

  it("requires a payment object", async () => {
    const response = await request("/api/webhooks/asaas", { body: { event: "PAYMENT_RECEIVED" } });
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: "payment: Missing payment" });
  });

  it("rejects an empty payment object", async () => {
    const response = await request("/api/webhooks/asaas", {
      body: { event: "PAYMENT_RECEIVED", payment: {} },
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: "payment: Missing payment" });
  });

  it("answers 200 for payments it does not know", async () => {
    const response = await request("/api/webhooks/asaas", {
      body: { event: "PAYMENT_RECEIVED", payment: { id: "pay_unknown" } },
    });
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      status: "ignored",
      event: "PAYMENT_RECEIVED",
      reason: "not found",
    });
  });

  it("marks an invoice overdue and lets the client read the notification", async () => {
    await soldInstallment();

    const webhook = await request("/api/webhooks/asaas", {
      body: { event: "PAYMENT_OVERDUE", payment: { id: "pay_1" } },
    });
    expect(await webhook.json()).toMatchObject({
      status: "processed",
      previous_status: "pending",
      new_status: "overdue",
      duplicate: false,
    });

    const clientToken = await login("maria", "test-password");
    const overdue = await request("/api/client/invoices?status=overdue", { token: clientToken });
    expect(await overdue.json()).toMatchObject({ totals: { pending: 0, paid: 0, overdue: 1000 } });

    const listed = await request("/api/client/notifications", { token: clientToken });
    const { notifications } = z.object({ notifications: idListSchema }).parse(await listed.json());
    expect(notifications).toHaveLength(1);

    const read = await request(`/api/client/notifications/${notifications[0].id}/read`, {
      method: "POST",
      token: clientToken,
    });
    expect(read.status).toBe(204);
    const missing = await request("/api/client/notifications/missing/read", {
      method: "POST",
      token: clientToken,
    });
    expect(missing.status).toBe(404);
  });

  it("shows overdue invoices on the financial dashboard", async () => {
    const { adminToken, client } = await soldInstallment();
    await request("/api/webhooks/asaas", { body: { event: "PAYMENT_OVERDUE", payment: { id: "pay_1" } } });

    const response = await request("/api/admin/dashboard/financial", { token: adminToken });

    expect(await response.json()).toMatchObject({
      receivables: 0,
      received: 0,
      overdue: 1000,
      pendingIssuances: 0,
      defaulters: [{ clientId: client.id, clientName: "Maria Souza", overdueAmount: 1000, overdueCount: 1 }],
    });
  });

  it("checks the webhook token when one is configured", async () => {
    vi.stubEnv("ASAAS_WEBHOOK_TOKEN", "test-secret");
    resetEnv();
    const payload = JSON.stringify({ event: "PAYMENT_RECEIVED", payment: { id: "pay_unknown" } });

    const denied = await fetch(`${baseUrl}/api/webhooks/asaas`, {
      method: "POST",
      headers: { "Content-Type": "application/json", "asaas-access-token": "wrong" },
      body: payload,
    });
    expect(denied.status).toBe(401);
    expect(await denied.json()).toEqual({ error: "Invalid webhook token" });

    const accepted = await fetch(`${baseUrl}/api/webhooks/asaas`, {
      method: "POST",
      headers: { "Content-Type": "application/json", "asaas-access-token": "test-secret" },
      body: payload,
    });
    expect(accepted.status).toBe(200);
  });

  it("acknowledges billing events", async () => {
    const response = await request("/api/webhooks/asaas/billing", { body: { event: "PAYMENT_CREATED" } });
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "received", event: "PAYMENT_CREATED" });
  });
});

describe("service orders and dashboards", () => {
  const orderSchema = z.object({ id: z.string(), status: z.string(), cost: z.number() });

  async function clientWithLot() {
    const adminToken = await login("admin", "password123");
    const client = await onboardClient(adminToken);
    const lot = await seedLot();
    await request("/api/admin/client-lots", {
      token: adminToken,
      body: {
        clientId: client.id,
        lotId: lot.id,
        totalValue: 2000,
        paymentPlan: { totalInstallments: 2, firstDueDate: "2024-01-15" },
      },
    });
    const clientToken = await login("maria", "test-password");
    const type = await createServiceType({
      name: "Limpeza de Terreno",
      description: "Limpeza e capina",
      basePrice: 500,
    });
    const serviceTypeId = type.id;
    return { adminToken, clientToken, lot, serviceTypeId };
  }

  it("takes a client request through to completion", async () => {
    const { adminToken, clientToken, lot, serviceTypeId } = await clientWithLot();

    const types = await request("/api/client/service-types", { token: clientToken });
    expect(await types.json()).toMatchObject({ serviceTypes: [{ id: serviceTypeId, basePrice: 500 }] });

    const created = await request("/api/client/service-orders", {
      token: clientToken,
      body: { lotId: lot.id, serviceTypeId, requestedDate: "2024-03-10" },
    });
    expect(created.status).toBe(201);
    const order = orderSchema.parse(await created.json());
    expect(order).toMatchObject({ status: "requested", cost: 500 });

    const updated = await request(`/api/admin/service-orders/${order.id}`, {
      method: "PUT",
      token: adminToken,
      body: { status: "completed", executionDate: "2024-03-12", revenue: 750 },
    });
    expect(updated.status).toBe(200);
    expect(await updated.json()).toMatchObject({ status: "completed", revenue: 750, lotNumber: "12" });

    const mine = await request(`/api/client/service-orders/${order.id}`, { token: clientToken });
    expect(await mine.json()).toMatchObject({ id: order.id, status: "completed" });

    const notifications = await request("/api/client/notifications", { token: clientToken });
    expect(await notifications.json()).toMatchObject({
      notifications: [{ type: "service_update", message: "Sua ordem de serviço de Limpeza de Terreno agora está: Concluída." }],
    });

    const analytics = await request("/api/admin/service-orders/analytics", { token: adminToken });
    expect(await analytics.json()).toEqual({
      totalOrders: 1,
      totalCost: 500,
      totalRevenue: 750,
      profit: 250,
      ordersByStatus: { completed: 1 },
      ordersByType: { "Limpeza de Terreno": 1 },
    });

    const listed = await request("/api/admin/service-orders?status=completed", { token: adminToken });
    expect(z.object({ orders: idListSchema }).parse(await listed.json()).orders).toEqual([{ id: order.id }]);
  });

  it("answers 403 for a lot the client does not own", async () => {
    const { clientToken, serviceTypeId } = await clientWithLot();
    const other = await seedLot({ lotNumber: "99" });

    const response = await request("/api/client/service-orders", {
      token: clientToken,
      body: { lotId: other.id, serviceTypeId, requestedDate: "2024-03-10" },
    });

    expect(response.status).toBe(403);
    expect(await response.json()).toEqual({ error: "Access denied to this lot" });
  });

  it("validates service order input", async () => {
    const { adminToken, clientToken, serviceTypeId } = await clientWithLot();

    const badDate = await request("/api/client/service-orders", {
      token: clientToken,
      body: { serviceTypeId, requestedDate: "10/03/2024" },
    });
    expect(badDate.status).toBe(400);
    expect(await badDate.json()).toMatchObject({ error: "requestedDate: Expected a date as YYYY-MM-DD" });

    const badStatus = await request("/api/admin/service-orders?status=done", { token: adminToken });
    expect(badStatus.status).toBe(400);
    expect(await badStatus.json()).toMatchObject({ error: "status: Invalid status" });

    const badFilter = await request("/api/client/service-orders?status=done", { token: clientToken });
    expect(badFilter.status).toBe(400);
    expect(await badFilter.json()).toEqual({ error: "Invalid status filter" });
  });

  it("serves the admin stats and the client dashboard", async () => {
    const { adminToken, clientToken, serviceTypeId } = await clientWithLot();
    await request("/api/client/service-orders", {
      token: clientToken,
      body: { serviceTypeId, requestedDate: "2024-03-10" },
    });

    const stats = await request("/api/admin/dashboard/stats", { token: adminToken });
    expect(await stats.json()).toEqual({
      totalClients: 1,
      activeClients: 1,
      defaulterClients: 0,
      totalLots: 1,
      availableLots: 0,
      soldLots: 1,
      openServiceOrders: 1,
      completedServiceOrders: 0,
    });

    const dashboard = await request("/api/client/dashboard", { token: clientToken });
    expect(await dashboard.json()).toMatchObject({
      clientName: "Maria Souza",
      totalLots: 1,
      openInvoices: 2,
      openAmount: 2000,
      nextDueDate: "2024-01-15",
      openServiceOrders: 1,
      recentNotifications: [],
    });
  });
});
