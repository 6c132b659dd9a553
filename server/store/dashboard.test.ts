import { beforeEach, describe, expect, it } from "vitest";
import { NotFoundError } from "../lib/errors";
import { createFakeGateway, resetDatabase, seedClient, seedLot } from "../testing/fixtures";
import { getAdminDashboardStats, getClientDashboard, getFinancialDashboard } from "./dashboard";
import { createSale } from "./sales";
import { createServiceOrder, createServiceType, updateServiceOrder } from "./service-orders";
import { applyWebhookEvent } from "./webhooks";

describe("getFinancialDashboard", () => {
  beforeEach(async () => {
    await resetDatabase();
  });

  it("is empty without sales", async () => {
    await expect(getFinancialDashboard(new Date("2024-03-01T00:00:00Z"))).resolves.toEqual({
      receivables: 0,
      received: 0,
      overdue: 0,
      pendingIssuances: 0,
      defaulters: [],
      serviceRevenue: 0,
      serviceCosts: 0,
      serviceProfit: 0,
    });
  });

  it("totals invoices by status and lists defaulters", async () => {
    const gateway = createFakeGateway({ failingCalls: [4] });
    const client = await seedClient(gateway);
    const lot = await seedLot();
    const { sale } = await createSale(
      {
        clientId: client.id,
        lotId: lot.id,
        totalValue: 4000,
        paymentPlan: { totalInstallments: 4, firstDueDate: "2024-01-15" },
      },
      gateway,
    );
    const now = new Date("2024-03-01T10:00:00Z");
    await applyWebhookEvent({ event: "PAYMENT_OVERDUE", payment: { id: "pay_1" } }, now);
    await applyWebhookEvent({ event: "PAYMENT_OVERDUE", payment: { id: "pay_2" } }, now);
    await applyWebhookEvent({ event: "PAYMENT_RECEIVED", payment: { id: "pay_3" } }, now);

    const dashboard = await getFinancialDashboard(now);

    expect(dashboard).toEqual({
      receivables: 0,
      received: 1000,
      overdue: 2000,
      pendingIssuances: 1,
      defaulters: [
        {
          clientLotId: sale.id,
          clientId: client.id,
          clientName: client.fullName,
          overdueAmount: 2000,
          overdueCount: 2,
          oldestDueDate: "2024-01-15",
          daysOverdue: 46,
        },
      ],
      serviceRevenue: 0,
      serviceCosts: 0,
      serviceProfit: 0,
    });
  });
});

describe("service totals on the financial dashboard", () => {
  beforeEach(async () => {
    await resetDatabase();
  });

  it("counts completed orders only", async () => {
    const client = await seedClient();
    const type = await createServiceType({ name: "Muro de Divisa", basePrice: 5000 });
    const done = await createServiceOrder(client.id, { serviceTypeId: type.id, requestedDate: "2024-03-01" });
    await updateServiceOrder(done.id, { status: "completed", revenue: 6500.5 });
    await createServiceOrder(client.id, { serviceTypeId: type.id, requestedDate: "2024-03-02" });

    const dashboard = await getFinancialDashboard(new Date("2024-03-10T00:00:00Z"));

    expect(dashboard).toMatchObject({ serviceRevenue: 6500.5, serviceCosts: 5000, serviceProfit: 1500.5 });
  });
});

describe("getAdminDashboardStats", () => {
  beforeEach(async () => {
    await resetDatabase();
  });

  it("is all zeros on an empty database", async () => {
    await expect(getAdminDashboardStats()).resolves.toEqual({
      totalClients: 0,
      activeClients: 0,
      defaulterClients: 0,
      totalLots: 0,
      availableLots: 0,
      soldLots: 0,
      openServiceOrders: 0,
      completedServiceOrders: 0,
    });
  });

  it("counts clients, lots and service orders by status", async () => {
    const gateway = createFakeGateway();
    const client = await seedClient(gateway);
    const sold = await seedLot();
    await seedLot({ lotNumber: "13" });
    await createSale(
      {
        clientId: client.id,
        lotId: sold.id,
        totalValue: 1000,
        paymentPlan: { totalInstallments: 1, firstDueDate: "2024-01-15" },
      },
      gateway,
    );
    const type = await createServiceType({ name: "Terraplanagem", basePrice: 3000 });
    await createServiceOrder(client.id, { serviceTypeId: type.id, requestedDate: "2024-03-01" });
    const approved = await createServiceOrder(client.id, { serviceTypeId: type.id, requestedDate: "2024-03-02" });
    await updateServiceOrder(approved.id, { status: "approved" });
    const completed = await createServiceOrder(client.id, { serviceTypeId: type.id, requestedDate: "2024-03-03" });
    await updateServiceOrder(completed.id, { status: "completed" });

    await expect(getAdminDashboardStats()).resolves.toEqual({
      totalClients: 1,
      activeClients: 1,
      defaulterClients: 0,
      totalLots: 2,
      availableLots: 1,
      soldLots: 1,
      openServiceOrders: 2,
      completedServiceOrders: 1,
    });
  });
});

describe("getClientDashboard", () => {
  beforeEach(async () => {
    await resetDatabase();
  });

  it("summarises purchases, open invoices, service orders and unread notifications", async () => {
    const gateway = createFakeGateway();
    const client = await seedClient(gateway);
    const lot = await seedLot();
    const { sale } = await createSale(
      {
        clientId: client.id,
        lotId: lot.id,
        totalValue: 3000,
        paymentPlan: { totalInstallments: 3, firstDueDate: "2024-01-15" },
      },
      gateway,
    );
    const now = new Date("2024-03-01T10:00:00Z");
    await applyWebhookEvent({ event: "PAYMENT_RECEIVED", payment: { id: "pay_1" } }, now);
    await applyWebhookEvent({ event: "PAYMENT_OVERDUE", payment: { id: "pay_2" } }, now);
    const type = await createServiceType({ name: "Instalação de Água", basePrice: 800 });
    await createServiceOrder(client.id, { lotId: lot.id, serviceTypeId: type.id, requestedDate: "2024-03-05" });

    const dashboard = await getClientDashboard(client.id);

    expect(dashboard).toMatchObject({
      clientName: client.fullName,
      totalLots: 1,
      lots: [
        {
          clientLotId: sale.id,
          lotNumber: "12",
          areaM2: 300,
          developmentName: "Residencial Vale Verde",
          totalValue: 3000,
          status: "active",
        },
      ],
      openInvoices: 2,
      openAmount: 2000,
      nextDueDate: "2024-02-15",
      openServiceOrders: 1,
    });
    expect(dashboard.recentNotifications.map((notification) => notification.type)).toEqual([
      "payment_overdue",
    ]);
  });

  it("fails for an unknown client", async () => {
    await expect(getClientDashboard("missing")).rejects.toBeInstanceOf(NotFoundError);
  });
});
