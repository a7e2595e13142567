/**
 * Dependency Health Tracker
 *
 * Counts outcomes of calls to the commerce service and Redis. Tracking only:
 * a dependency marked down is still called, /ready reports it.
 */

import { DependencyHealth, DependencyName, DependencyReport, DependencyStatus } from './types';
import { logger } from '../observability/logger';

const DEFAULT_FAILURE_THRESHOLD = 5;

const TRACKED: readonly DependencyName[] = [
  'search',
  'predict',
  'getProduct',
  'completeQuery',
  'writeUserEvent',
  'conversationalSearch',
  'redis',
];

export class DependencyHealthTracker {
  private readonly entries: Map<DependencyName, DependencyHealth>;
  private readonly log = logger.child({ component: 'dep-health' });

  /** `failureThreshold` consecutive failures mark a dependency down; half of it, degraded */
  constructor(private readonly failureThreshold = DEFAULT_FAILURE_THRESHOLD) {
    this.entries = new Map(
      TRACKED.map((name): [DependencyName, DependencyHealth] => [
        name,
        { name, status: 'healthy', consecutiveFailures: 0, calls: 0, failures: 0 },
      ]),
    );
  }

  recordSuccess(name: DependencyName): void {
    const entry = this.entries.get(name);
    if (!entry) return;
    if (entry.status !== 'healthy') {
      this.log.info({ dependency: name, after: entry.consecutiveFailures }, 'Dependency recovered');
    }
    entry.calls++;
    entry.consecutiveFailures = 0;
    entry.status = 'healthy';
    entry.lastSuccessAt = Date.now();
    entry.lastError = undefined;
  }

  recordFailure(name: DependencyName, error: string): void {
    const entry = this.entries.get(name);
    if (!entry) return;
    entry.calls++;
    entry.failures++;
    entry.consecutiveFailures++;
    entry.lastFailureAt = Date.now();
    entry.lastError = error;

    const next = this.statusFor(entry.consecutiveFailures);
    if (next === 'down' && entry.status !== 'down') {
      this.log.warn({ dependency: name, failures: entry.consecutiveFailures, error }, 'Dependency marked down');
    }
    entry.status = next;
  }

  getStatus(name: DependencyName): DependencyHealth | undefined {
    return this.entries.get(name);
  }

  report(): Record<string, DependencyReport> {
    const out: Record<string, DependencyReport> = {};
    for (const entry of this.entries.values()) {
      out[entry.name] = {
        status: entry.status,
        failures: entry.consecutiveFailures,
        ...(entry.lastError ? { lastError: entry.lastError } : {}),
      };
    }
    return out;
  }

  private statusFor(consecutiveFailures: number): DependencyStatus {
    if (consecutiveFailures >= this.failureThreshold) return 'down';
    if (consecutiveFailures >= Math.floor(this.failureThreshold / 2)) return 'degraded';
    return 'healthy';
  }
}
