export interface Item {
  id: number;
  name: string;
  description: string | null;
  created_at: string;
}

export interface ItemCreate {
  name: string;
  description?: string | null;
}

export interface DeleteConfirmation {
  message: string;
}

export type HealthStatus = "healthy" | "degraded";
export type DatabaseStatus = "connected" | "disconnected";

export interface HealthReport {
  status: HealthStatus;
  database: DatabaseStatus;
  environment: string;
  timestamp: string;
}

export interface ServiceBanner {
  message: string;
  version: string;
  health: string;
  metrics: string;
}

export interface ErrorIssue {
  path: string;
  message: string;
}

export interface ErrorBody {
  detail: string;
  errors?: ErrorIssue[];
}
