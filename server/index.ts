import "dotenv/config";
import express from "express";
import cors from "cors";
import { loginHandler, logoutHandler, meHandler } from "./routes/auth";
import {
  createClientHandler,
  createSaleHandler,
  dashboardStatsHandler,
  financialDashboardHandler,
  issuanceQueueHandler,
  listServiceOrdersHandler,
  retryIssuanceHandler,
  serviceAnalyticsHandler,
  updateServiceOrderHandler,
} from "./routes/admin";
import {
  clientDashboardHandler,
  clientInvoicesHandler,
  clientNotificationsHandler,
  clientServiceOrderHandler,
  clientServiceOrdersHandler,
  clientServiceTypesHandler,
  createServiceOrderHandler,
  markNotificationReadHandler,
} from "./routes/client";
import { asaasBillingWebhookHandler, asaasWebhookHandler } from "./routes/webhooks";
import { type BillingGateway, setBillingGateway } from "./lib/asaas";
import { initializeDatabase } from "./lib/database";
import { getEnv } from "./lib/env";
import { retryPendingIssuances } from "./store/issuance";
import { errorMiddleware } from "./utils/respond";

export interface ServerOptions {
  /** Billing gateway used by every handler; defaults to the configured Asaas client. */
  gateway?: BillingGateway;
}

export function createServer(options: ServerOptions = {}) {
  const app = express();

  if (options.gateway) setBillingGateway(options.gateway);
  void initializeDatabase();

  // Middleware
  const origins = getEnv().CORS_ORIGINS?.split(",").map((origin) => origin.trim());
  app.use(cors(origins ? { origin: origins } : undefined));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health
  app.get("/health", (_req, res) => res.status(200).json({ status: "ok" }));

  // Auth
  app.post("/api/auth/login", loginHandler);
  app.get("/api/auth/me", meHandler);
  app.post("/api/auth/logout", logoutHandler);

  // Admin
  app.post("/api/admin/clients", createClientHandler);
  app.post("/api/admin/client-lots", createSaleHandler);
  app.get("/api/admin/dashboard/stats", dashboardStatsHandler);
  app.get("/api/admin/dashboard/financial", financialDashboardHandler);
  app.get("/api/admin/issuance-queue", issuanceQueueHandler);
  app.post("/api/admin/issuance-queue/retry", retryIssuanceHandler);
  app.get("/api/admin/service-orders", listServiceOrdersHandler);
  app.get("/api/admin/service-orders/analytics", serviceAnalyticsHandler);
  app.put("/api/admin/service-orders/:id", updateServiceOrderHandler);

  // Client portal
  app.get("/api/client/dashboard", clientDashboardHandler);
  app.get("/api/client/invoices", clientInvoicesHandler);
  app.get("/api/client/notifications", clientNotificationsHandler);
  app.post("/api/client/notifications/:id/read", markNotificationReadHandler);
  app.get("/api/client/service-types", clientServiceTypesHandler);
  app.get("/api/client/service-orders", clientServiceOrdersHandler);
  app.post("/api/client/service-orders", createServiceOrderHandler);
  app.get("/api/client/service-orders/:id", clientServiceOrderHandler);

  // Gateway webhooks
  app.post("/api/webhooks/asaas", asaasWebhookHandler);
  app.post("/api/webhooks/asaas/billing", asaasBillingWebhookHandler);

  app.use(errorMiddleware);

  return app;
}

/**
 * Retries queued installment issuances on an interval, in-process.
 * Returns a stop function; an interval of 0 disables the scheduler.
 */
export function scheduleIssuanceRetries(
  intervalMinutes = getEnv().ISSUANCE_RETRY_INTERVAL_MINUTES,
): () => void {
  if (intervalMinutes <= 0) return () => undefined;
  let running = false;
  async function runOnce() {
    if (running) return;
    running = true;
    try {
      await retryPendingIssuances();
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error("[issuance] scheduled retry failed", err);
    } finally {
      running = false;
    }
  }
  const timer = setInterval(() => void runOnce(), intervalMinutes * 60 * 1000);
  timer.unref();
  void runOnce();
  return () => clearInterval(timer);
}
