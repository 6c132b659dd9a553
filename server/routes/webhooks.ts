import crypto from "node:crypto";
import type { Request, RequestHandler } from "express";
import { z } from "zod";
import type { WebhookResult } from "@shared/sales";
import { getEnv } from "../lib/env";
import { applyWebhookEvent } from "../store/webhooks";
import { parseBody } from "../utils/parse-body";
import { respondError, route } from "../utils/respond";

const webhookSchema = z.object({
  id: z.string().optional(),
  event: z.string({ required_error: "Missing event" }).min(1, "Missing event"),
  payment: z
    .object(
      {
        id: z.string().optional(),
        paymentDate: z.string().nullish(),
        bankSlipUrl: z.string().nullish(),
        invoiceUrl: z.string().nullish(),
      },
      { required_error: "Missing payment", invalid_type_error: "Missing payment" },
    )
    .refine((payment) => Object.values(payment).some((value) => value !== undefined), "Missing payment"),
});

const billingSchema = z.object({
  event: z.string().optional(),
});

function hasValidToken(req: Request): boolean {
  const expected = getEnv().ASAAS_WEBHOOK_TOKEN;
  if (!expected) return true;
  const received = req.headers["asaas-access-token"];
  if (typeof received !== "string") return false;
  const a = Buffer.from(received);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export const asaasWebhookHandler: RequestHandler = route("webhook", async (req, res) => {
  if (!hasValidToken(req)) {
    respondError(res, 401, "Invalid webhook token");
    return;
  }
  const payload = parseBody(webhookSchema, req.body);
  const result: WebhookResult = await applyWebhookEvent(payload);
  res.json(result);
});

export const asaasBillingWebhookHandler: RequestHandler = route("webhook", async (req, res) => {
  if (!hasValidToken(req)) {
    respondError(res, 401, "Invalid webhook token");
    return;
  }
  const { event } = parseBody(billingSchema, req.body);
  // eslint-disable-next-line no-console
  console.log(`[webhook] billing event ${event ?? "(none)"} received`);
  res.json({ status: "received", event: event ?? null });
});
