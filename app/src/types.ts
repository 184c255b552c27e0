/**
 * Shared API type definitions.
 */

export interface ErrorResponse {
  error: string;
  message: string;
}

export type ServiceStatus = 'healthy' | 'degraded' | 'unreachable';

export interface ServiceHealth {
  status: ServiceStatus;
  latency_ms?: number;
  error?: string;
}

export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  uptime_seconds: number;
  policy: {
    status: 'loaded' | 'unavailable';
    version: string | null;
    loaded_at: string | null;
  };
  monitor: {
    running: boolean;
    cycle_count: number;
    last_cycle_ms: number;
    errors: number;
  } | null;
  services: {
    postgres?: ServiceHealth;
    nats?: ServiceHealth;
  };
  timestamp: string;
}
