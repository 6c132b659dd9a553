export type ClientStatus = "active" | "inactive" | "defaulter";
export type LotStatus = "available" | "reserved" | "sold";
export type ClientLotStatus = "active" | "completed" | "cancelled";
export type InvoiceStatus = "pending" | "paid" | "overdue" | "cancelled";
export type NotificationType = "payment_overdue" | "service_update" | "general";

export interface Address {
  street?: string;
  number?: string;
  complement?: string;
  neighborhood?: string;
  city?: string;
  state?: string;
  postalCode?: string;
}

export interface Client {
  id: string;
  userId: string;
  fullName: string;
  email: string;
  cpfCnpj: string;
  phone: string | null;
  address: Address | null;
  status: ClientStatus;
  remoteCustomerId: string | null;
  createdAt: string | null;
}

export interface ClientCreateInput {
  fullName: string;
  email: string;
  cpfCnpj: string;
  phone?: string;
  address?: Address;
  username: string;
  password: string;
}

export interface ClientCreateResult {
  client: Client;
  /** Set when the billing customer could not be created; the client row exists regardless. */
  billingWarning: string | null;
}

export interface Development {
  id: string;
  name: string;
  location: string;
  description: string | null;
}

export interface Lot {
  id: string;
  developmentId: string;
  lotNumber: string;
  block: string | null;
  areaM2: number;
  price: number;
  status: LotStatus;
}

export interface PaymentPlan {
  totalInstallments: number;
  installmentValue: number;
  firstDueDate: string;
  downPayment: number;
  /** totalValue - downPayment - installmentValue * totalInstallments, in currency units. */
  roundingDrift: number;
}

export interface InstallmentSpec {
  number: number;
  dueDate: string;
  amount: number;
}

export interface ClientLot {
  id: string;
  clientId: string;
  lotId: string;
  purchaseDate: string;
  totalValue: number;
  paymentPlan: PaymentPlan;
  status: ClientLotStatus;
  createdAt: string | null;
}

export interface SaleCreateInput {
  clientId: string;
  lotId: string;
  totalValue: number;
  purchaseDate?: string;
  paymentPlan: {
    totalInstallments: number;
    firstDueDate: string;
    installmentValue?: number;
    downPayment?: number;
  };
}

export interface Invoice {
  id: string;
  clientLotId: string;
  remotePaymentId: string | null;
  installmentNumber: number;
  dueDate: string;
  amount: number;
  status: InvoiceStatus;
  barcode: string | null;
  paymentUrl: string | null;
  paidAt: string | null;
  createdAt: string | null;
  updatedAt: string | null;
}

export interface IssuanceFailure {
  installmentNumber: number;
  dueDate: string;
  amount: number;
  reason: string;
  /** Present when the remote payment exists but the local invoice could not be stored. */
  remotePaymentId: string | null;
}

export interface IssuanceSummary {
  requested: number;
  issued: number;
  failed: IssuanceFailure[];
}

export interface SaleCreateResult {
  sale: ClientLot;
  invoices: Invoice[];
  issuance: IssuanceSummary;
}

export type IssuanceQueueStatus = "pending" | "done";

export interface IssuanceQueueEntry {
  id: string;
  clientLotId: string;
  installmentNumber: number;
  dueDate: string;
  amount: number;
  description: string;
  remotePaymentId: string | null;
  status: IssuanceQueueStatus;
  attempts: number;
  lastError: string | null;
  updatedAt: string | null;
}

export interface IssuanceRetryResult {
  attempted: number;
  issued: number;
  stillPending: number;
}

export interface Notification {
  id: string;
  userId: string;
  type: NotificationType;
  title: string;
  message: string;
  isRead: boolean;
  createdAt: string | null;
}

export interface WebhookPayment {
  id?: string;
  paymentDate?: string | null;
  bankSlipUrl?: string | null;
  invoiceUrl?: string | null;
}

export interface WebhookPayload {
  id?: string;
  event: string;
  payment: WebhookPayment;
}

export type WebhookResult =
  | {
      status: "processed";
      event: string;
      invoice_id: string;
      previous_status: InvoiceStatus;
      new_status: InvoiceStatus;
      duplicate: boolean;
    }
  | {
      status: "ignored";
      event: string;
      reason: string;
    };

export interface Defaulter {
  clientLotId: string;
  clientId: string;
  clientName: string;
  overdueAmount: number;
  overdueCount: number;
  oldestDueDate: string;
  daysOverdue: number;
}

export interface FinancialDashboard {
  receivables: number;
  received: number;
  overdue: number;
  pendingIssuances: number;
  defaulters: Defaulter[];
  /** Completed service orders only. */
  serviceRevenue: number;
  serviceCosts: number;
  serviceProfit: number;
}

export interface AdminDashboardStats {
  totalClients: number;
  activeClients: number;
  defaulterClients: number;
  totalLots: number;
  availableLots: number;
  soldLots: number;
  openServiceOrders: number;
  completedServiceOrders: number;
}

export interface ClientDashboardLot {
  clientLotId: string;
  lotNumber: string;
  areaM2: number;
  developmentName: string;
  totalValue: number;
  status: ClientLotStatus;
}

export interface ClientDashboard {
  clientName: string;
  totalLots: number;
  lots: ClientDashboardLot[];
  /** Pending and overdue invoices of active purchases. */
  openInvoices: number;
  openAmount: number;
  nextDueDate: string | null;
  openServiceOrders: number;
  recentNotifications: Notification[];
}

export interface ClientInvoicesResponse {
  invoices: Invoice[];
  totals: {
    pending: number;
    paid: number;
    overdue: number;
  };
}
