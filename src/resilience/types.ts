import { RetailOperation } from '../retail/errors';

export type DependencyName = RetailOperation | 'redis';

export type DependencyStatus = 'healthy' | 'degraded' | 'down';

export interface DependencyHealth {
  name: DependencyName;
  status: DependencyStatus;
  consecutiveFailures: number;
  calls: number;
  failures: number;
  lastSuccessAt?: number;
  lastFailureAt?: number;
  lastError?: string;
}

/** What /ready shows for one dependency */
export interface DependencyReport {
  status: DependencyStatus;
  failures: number;
  lastError?: string;
}
