import axios, { type AxiosAdapter, type AxiosInstance, type Method } from "axios";
import { z } from "zod";
import type { Address } from "@shared/sales";
import { onlyDigits } from "@shared/validators";
import { getEnv } from "./env";
import {
  GatewayError,
  GatewayRejectedError,
  GatewayUnavailableError,
  errorMessage,
} from "./errors";

export const ASAAS_BASE_URLS = {
  sandbox: "https://sandbox.asaas.com/api/v3",
  production: "https://api.asaas.com/v3",
} as const;

export type AsaasEnvironment = keyof typeof ASAAS_BASE_URLS;

export interface CreateCustomerInput {
  name: string;
  cpfCnpj: string;
  email?: string;
  phone?: string | null;
  address?: Address | null;
  externalReference?: string;
}

export interface CreatePaymentInput {
  customer: string;
  value: number;
  dueDate: string;
  description: string;
  externalReference: string;
}

export interface RemoteCustomer {
  id: string;
}

export interface RemotePayment {
  id: string;
  status: string | null;
  bankSlipUrl: string | null;
  invoiceUrl: string | null;
}

/** What the sale flow needs from a boleto provider. */
export interface BillingGateway {
  createCustomer(input: CreateCustomerInput): Promise<RemoteCustomer>;
  createPayment(input: CreatePaymentInput): Promise<RemotePayment>;
}

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface AsaasGatewayOptions {
  apiKey?: string;
  environment?: AsaasEnvironment;
  baseURL?: string;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  adapter?: AxiosAdapter;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_RETRY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 2_000,
  maxDelayMs: 10_000,
};

const customerResponseSchema = z.object({ id: z.string().min(1) });

const paymentResponseSchema = z.object({
  id: z.string().min(1),
  status: z.string().nullish(),
  bankSlipUrl: z.string().nullish(),
  invoiceUrl: z.string().nullish(),
});

const asaasErrorBodySchema = z.object({
  errors: z.array(
    z.object({
      code: z.string().optional(),
      description: z.string().optional(),
    }),
  ),
});

function describeErrorBody(data: unknown): string | null {
  const parsed = asaasErrorBodySchema.safeParse(data);
  if (!parsed.success) return null;
  const descriptions = parsed.data.errors
    .map((item) => item.description ?? item.code)
    .filter((value): value is string => Boolean(value));
  return descriptions.length ? descriptions.join("; ") : null;
}

export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) return error;
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      return new GatewayUnavailableError(`Asaas request failed: ${error.message}`, {
        cause: error,
      });
    }
    const detail = describeErrorBody(error.response?.data) ?? error.message;
    if (status >= 500 || status === 429) {
      return new GatewayUnavailableError(`Asaas returned ${status}: ${detail}`, {
        upstreamStatus: status,
        cause: error,
      });
    }
    return new GatewayRejectedError(`Asaas returned ${status}: ${detail}`, status, error);
  }
  return new GatewayUnavailableError(`Asaas request failed: ${errorMessage(error)}`, {
    cause: error,
  });
}

function defaultSleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export class AsaasGateway implements BillingGateway {
  private readonly http: AxiosInstance;
  private readonly retry: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly configured: boolean;

  constructor(options: AsaasGatewayOptions = {}) {
    const environment = options.environment ?? "sandbox";
    this.configured = Boolean(options.apiKey);
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.sleep = options.sleep ?? defaultSleep;
    this.http = axios.create({
      baseURL: options.baseURL ?? ASAAS_BASE_URLS[environment],
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        access_token: options.apiKey ?? "",
      },
      timeout: options.timeoutMs ?? 30_000,
      adapter: options.adapter,
    });
  }

  async createCustomer(input: CreateCustomerInput): Promise<RemoteCustomer> {
    const address = input.address ?? null;
    const payload = {
      name: input.name,
      cpfCnpj: onlyDigits(input.cpfCnpj),
      email: input.email,
      mobilePhone: input.phone ? onlyDigits(input.phone) : undefined,
      address: address?.street,
      addressNumber: address?.number,
      complement: address?.complement,
      province: address?.neighborhood,
      postalCode: address?.postalCode ? onlyDigits(address.postalCode) : undefined,
      externalReference: input.externalReference,
    };
    const data = await this.request("post", "/customers", payload);
    const parsed = customerResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new GatewayRejectedError("Asaas customer response has no id", null);
    }
    return { id: parsed.data.id };
  }

  async createPayment(input: CreatePaymentInput): Promise<RemotePayment> {
    const data = await this.request("post", "/payments", {
      customer: input.customer,
      billingType: "BOLETO",
      value: input.value,
      dueDate: input.dueDate,
      description: input.description,
      externalReference: input.externalReference,
    });
    const parsed = paymentResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new GatewayRejectedError("Asaas payment response has no id", null);
    }
    return {
      id: parsed.data.id,
      status: parsed.data.status ?? null,
      bankSlipUrl: parsed.data.bankSlipUrl ?? null,
      invoiceUrl: parsed.data.invoiceUrl ?? null,
    };
  }

  private async request(method: Method, url: string, data: unknown): Promise<unknown> {
    if (!this.configured) {
      throw new GatewayUnavailableError("Asaas API key is not configured", {
        retryable: false,
      });
    }
    for (let attempt = 1; ; attempt++) {
      try {
        const response = await this.http.request<unknown>({ method, url, data });
        return response.data;
      } catch (error) {
        const failure = toGatewayError(error);
        if (!failure.retryable || attempt >= this.retry.attempts) {
          // eslint-disable-next-line no-console
          console.error(`[asaas] ${method.toUpperCase()} ${url} failed`, failure.message);
          throw failure;
        }
        const delay = Math.min(
          this.retry.maxDelayMs,
          this.retry.baseDelayMs * 2 ** (attempt - 1),
        );
        // eslint-disable-next-line no-console
        console.warn(
          `[asaas] ${method.toUpperCase()} ${url} attempt ${attempt} failed, retrying in ${delay}ms: ${failure.message}`,
        );
        await this.sleep(delay);
      }
    }
  }
}

let gateway: BillingGateway | null = null;

export function getBillingGateway(): BillingGateway {
  if (!gateway) {
    const env = getEnv();
    gateway = new AsaasGateway({
      apiKey: env.ASAAS_API_KEY,
      environment: env.ASAAS_ENVIRONMENT,
    });
  }
  return gateway;
}

/** Replaces the process-wide gateway; `null` goes back to the configured Asaas client. */
export function setBillingGateway(next: BillingGateway | null) {
  gateway = next;
}
