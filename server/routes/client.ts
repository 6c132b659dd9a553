import type { RequestHandler } from "express";
import { z } from "zod";
import type { ClientDashboard, ClientInvoicesResponse, Notification } from "@shared/sales";
import { type ServiceOrder, type ServiceType, isServiceOrderStatus } from "@shared/services";
import { isISODate } from "../lib/installments";
import { isInvoiceStatus } from "../lib/invoice-status";
import { getClientDashboard } from "../store/dashboard";
import { listClientInvoices } from "../store/invoices";
import { listNotifications, markNotificationRead } from "../store/notifications";
import {
  createServiceOrder,
  getClientServiceOrder,
  listServiceOrders,
  listServiceTypes,
} from "../store/service-orders";
import { parseBody } from "../utils/parse-body";
import { respondError, route } from "../utils/respond";
import { requireClient } from "./auth";

const serviceOrderCreateSchema = z.object({
  lotId: z.string().min(1).nullish(),
  serviceTypeId: z.string().min(1),
  requestedDate: z.string().refine(isISODate, "Expected a date as YYYY-MM-DD"),
  notes: z.string().nullish(),
});

export const clientDashboardHandler: RequestHandler = route("client", async (req, res) => {
  const principal = await requireClient(req, res);
  if (!principal) return;
  const dashboard: ClientDashboard = await getClientDashboard(principal.clientId);
  res.json(dashboard);
});

export const clientInvoicesHandler: RequestHandler = route("client", async (req, res) => {
  const principal = await requireClient(req, res);
  if (!principal) return;
  const { status } = req.query;
  if (status !== undefined && !isInvoiceStatus(status)) {
    respondError(res, 400, "Invalid status filter");
    return;
  }
  const body: ClientInvoicesResponse = await listClientInvoices(principal.clientId, status);
  res.json(body);
});

export const clientNotificationsHandler: RequestHandler = route("client", async (req, res) => {
  const principal = await requireClient(req, res);
  if (!principal) return;
  const notifications: Notification[] = await listNotifications(principal.user.id);
  res.json({ notifications });
});

export const markNotificationReadHandler: RequestHandler = route("client", async (req, res) => {
  const principal = await requireClient(req, res);
  if (!principal) return;
  const updated = await markNotificationRead(req.params.id, principal.user.id);
  if (!updated) {
    respondError(res, 404, "Notification not found");
    return;
  }
  res.status(204).end();
});

export const clientServiceTypesHandler: RequestHandler = route("services", async (req, res) => {
  if (!(await requireClient(req, res))) return;
  const serviceTypes: ServiceType[] = await listServiceTypes({ activeOnly: true });
  res.json({ serviceTypes });
});

export const createServiceOrderHandler: RequestHandler = route("services", async (req, res) => {
  const principal = await requireClient(req, res);
  if (!principal) return;
  const input = parseBody(serviceOrderCreateSchema, req.body);
  const order: ServiceOrder = await createServiceOrder(principal.clientId, input);
  res.status(201).json(order);
});

export const clientServiceOrdersHandler: RequestHandler = route("services", async (req, res) => {
  const principal = await requireClient(req, res);
  if (!principal) return;
  const { status } = req.query;
  if (status !== undefined && !isServiceOrderStatus(status)) {
    respondError(res, 400, "Invalid status filter");
    return;
  }
  const orders: ServiceOrder[] = await listServiceOrders({
    clientId: principal.clientId,
    status,
    pageSize: 100,
  });
  res.json({ orders });
});

export const clientServiceOrderHandler: RequestHandler = route("services", async (req, res) => {
  const principal = await requireClient(req, res);
  if (!principal) return;
  const order: ServiceOrder = await getClientServiceOrder(principal.clientId, req.params.id);
  res.json(order);
});
