import { ErrorResponse } from '../errors';

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ErrorResponse;
  correlationId: string;
}

export interface PaginatedResponse<T> extends ApiResponse<T[]> {
  pagination: {
    limit: number;
    offset: number;
    count: number;
  };
}

export type ServiceStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthCheckResponse {
  status: ServiceStatus;
  service: string;
  timestamp: string;
  checks: {
    database: boolean;
    messaging?: boolean;
  };
}
