import type { RequestHandler } from "express";
import { z } from "zod";
import type {
  AdminDashboardStats,
  ClientCreateResult,
  FinancialDashboard,
  IssuanceQueueEntry,
  IssuanceRetryResult,
  SaleCreateResult,
} from "@shared/sales";
import type { ServiceAnalytics, ServiceOrder } from "@shared/services";
import { isValidCpfCnpj } from "@shared/validators";
import { MAX_INSTALLMENTS, isISODate } from "../lib/installments";
import { createClient } from "../store/clients";
import { getAdminDashboardStats, getFinancialDashboard } from "../store/dashboard";
import { listIssuanceQueue, retryPendingIssuances } from "../store/issuance";
import { createSale } from "../store/sales";
import { getServiceAnalytics, listServiceOrders, updateServiceOrder } from "../store/service-orders";
import { parseBody } from "../utils/parse-body";
import { route } from "../utils/respond";
import { requireAdmin } from "./auth";

const isoDate = z.string().refine(isISODate, "Expected a date as YYYY-MM-DD");

const addressSchema = z.object({
  street: z.string().optional(),
  number: z.string().optional(),
  complement: z.string().optional(),
  neighborhood: z.string().optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  postalCode: z.string().optional(),
});

const clientCreateSchema = z.object({
  fullName: z.string().trim().min(1),
  email: z.string().trim().email(),
  cpfCnpj: z.string().refine(isValidCpfCnpj, "Invalid CPF/CNPJ"),
  phone: z.string().trim().min(1).optional(),
  address: addressSchema.optional(),
  username: z.string().trim().min(3),
  password: z.string().min(6),
});

const saleCreateSchema = z.object({
  clientId: z.string().min(1),
  lotId: z.string().min(1),
  totalValue: z.number().positive(),
  purchaseDate: isoDate.optional(),
  paymentPlan: z.object({
    totalInstallments: z.number().int().min(1).max(MAX_INSTALLMENTS),
    firstDueDate: isoDate,
    installmentValue: z.number().positive().optional(),
    downPayment: z.number().min(0).optional(),
  }),
});

const serviceOrderStatusSchema = z.enum(["requested", "approved", "in_progress", "completed", "cancelled"], {
  errorMap: () => ({ message: "Invalid status" }),
});

const serviceOrderUpdateSchema = z.object({
  executionDate: isoDate.optional(),
  status: serviceOrderStatusSchema.optional(),
  cost: z.number().min(0).optional(),
  revenue: z.number().min(0).optional(),
  notes: z.string().optional(),
});

const serviceOrderQuerySchema = z.object({
  status: serviceOrderStatusSchema.optional(),
  clientId: z.string().min(1).optional(),
  page: z.coerce.number().int().min(1).optional(),
  pageSize: z.coerce.number().int().min(1).max(100).optional(),
});

const analyticsQuerySchema = z.object({
  dateFrom: isoDate.optional(),
  dateTo: isoDate.optional(),
});

export const createClientHandler: RequestHandler = route("admin", async (req, res) => {
  if (!(await requireAdmin(req, res))) return;
  const input = parseBody(clientCreateSchema, req.body);
  const result: ClientCreateResult = await createClient(input);
  res.status(201).json(result);
});

export const createSaleHandler: RequestHandler = route("sales", async (req, res) => {
  if (!(await requireAdmin(req, res))) return;
  const input = parseBody(saleCreateSchema, req.body);
  const result: SaleCreateResult = await createSale(input);
  res.status(201).json(result);
});

export const financialDashboardHandler: RequestHandler = route("dashboard", async (req, res) => {
  if (!(await requireAdmin(req, res))) return;
  const dashboard: FinancialDashboard = await getFinancialDashboard();
  res.json(dashboard);
});

export const issuanceQueueHandler: RequestHandler = route("issuance", async (req, res) => {
  if (!(await requireAdmin(req, res))) return;
  const status = req.query.status === "done" ? "done" : "pending";
  const entries: IssuanceQueueEntry[] = await listIssuanceQueue(status);
  res.json({ entries });
});

export const retryIssuanceHandler: RequestHandler = route("issuance", async (req, res) => {
  if (!(await requireAdmin(req, res))) return;
  const result: IssuanceRetryResult = await retryPendingIssuances();
  res.json(result);
});

export const dashboardStatsHandler: RequestHandler = route("dashboard", async (req, res) => {
  if (!(await requireAdmin(req, res))) return;
  const stats: AdminDashboardStats = await getAdminDashboardStats();
  res.json(stats);
});

export const listServiceOrdersHandler: RequestHandler = route("services", async (req, res) => {
  if (!(await requireAdmin(req, res))) return;
  const filters = parseBody(serviceOrderQuerySchema, req.query);
  const orders: ServiceOrder[] = await listServiceOrders(filters);
  res.json({ orders });
});

export const updateServiceOrderHandler: RequestHandler = route("services", async (req, res) => {
  if (!(await requireAdmin(req, res))) return;
  const patch = parseBody(serviceOrderUpdateSchema, req.body);
  const order: ServiceOrder = await updateServiceOrder(req.params.id, patch);
  res.json(order);
});

export const serviceAnalyticsHandler: RequestHandler = route("services", async (req, res) => {
  if (!(await requireAdmin(req, res))) return;
  const range = parseBody(analyticsQuerySchema, req.query);
  const analytics: ServiceAnalytics = await getServiceAnalytics(range);
  res.json(analytics);
});
