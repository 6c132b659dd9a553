export type ServiceOrderStatus = "requested" | "approved" | "in_progress" | "completed" | "cancelled";

export const SERVICE_ORDER_STATUSES: readonly ServiceOrderStatus[] = [
  "requested",
  "approved",
  "in_progress",
  "completed",
  "cancelled",
];

/** Statuses counted as open work on the dashboards. */
export const OPEN_SERVICE_ORDER_STATUSES: readonly ServiceOrderStatus[] = [
  "requested",
  "approved",
  "in_progress",
];

export const SERVICE_ORDER_STATUS_LABELS: Readonly<Record<ServiceOrderStatus, string>> = {
  requested: "Solicitada",
  approved: "Aprovada",
  in_progress: "Em andamento",
  completed: "Concluída",
  cancelled: "Cancelada",
};

export function isServiceOrderStatus(value: unknown): value is ServiceOrderStatus {
  return typeof value === "string" && SERVICE_ORDER_STATUSES.some((status) => status === value);
}

export interface ServiceType {
  id: string;
  name: string;
  description: string | null;
  basePrice: number;
  isActive: boolean;
  createdAt: string | null;
}

export interface ServiceTypeCreateInput {
  name: string;
  description?: string | null;
  basePrice: number;
  isActive?: boolean;
}

export interface ServiceOrder {
  id: string;
  clientId: string;
  clientName: string | null;
  lotId: string | null;
  lotNumber: string | null;
  serviceTypeId: string;
  serviceTypeName: string | null;
  requestedDate: string;
  executionDate: string | null;
  status: ServiceOrderStatus;
  cost: number;
  revenue: number | null;
  notes: string | null;
  createdAt: string | null;
  updatedAt: string | null;
}

export interface ServiceOrderCreateInput {
  lotId?: string | null;
  serviceTypeId: string;
  requestedDate: string;
  notes?: string | null;
}

export interface ServiceOrderUpdateInput {
  executionDate?: string;
  status?: ServiceOrderStatus;
  cost?: number;
  revenue?: number;
  notes?: string;
}

export interface ServiceOrderFilters {
  status?: ServiceOrderStatus;
  clientId?: string;
  page?: number;
  pageSize?: number;
}

export interface ServiceAnalytics {
  totalOrders: number;
  totalCost: number;
  totalRevenue: number;
  profit: number;
  ordersByStatus: Partial<Record<ServiceOrderStatus, number>>;
  ordersByType: Record<string, number>;
}
