import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { FailureReason, LedgerMetrics, PoolStatus } from '../engine/ledger/types.js';

/**
 * Prometheus view of the ledger. Each instance owns its registry, so several
 * apps in one process (tests) never collide on metric names.
 */
export class LicenseMetrics implements LedgerMetrics {
  readonly registry = new Registry();

  private readonly attempts = new Counter({
    name: 'license_borrow_attempts_total',
    help: 'Total borrow attempts',
    labelNames: ['tool', 'user'] as const,
    registers: [this.registry],
  });
  private readonly successes = new Counter({
    name: 'license_borrow_success_total',
    help: 'Total successful borrows',
    labelNames: ['tool', 'user'] as const,
    registers: [this.registry],
  });
  private readonly failures = new Counter({
    name: 'license_borrow_failure_total',
    help: 'Total failed borrow attempts',
    labelNames: ['tool', 'reason'] as const,
    registers: [this.registry],
  });
  private readonly overageCheckouts = new Counter({
    name: 'license_overage_checkouts_total',
    help: 'Total overage checkouts',
    labelNames: ['tool', 'user'] as const,
    registers: [this.registry],
  });
  private readonly duration = new Histogram({
    name: 'license_borrow_duration_seconds',
    help: 'Borrow operation duration',
    labelNames: ['tool'] as const,
    registers: [this.registry],
  });

  private readonly borrowed = this.poolGauge('licenses_borrowed', 'Currently borrowed licenses per tool');
  private readonly total = this.poolGauge('licenses_total', 'Total licenses available per tool');
  private readonly overage = this.poolGauge('licenses_overage', 'Current overage count per tool');
  private readonly commit = this.poolGauge('licenses_commit', 'Commit quantity per tool');
  private readonly maxOverage = this.poolGauge('licenses_max_overage', 'Max overage allowed per tool');
  private readonly atMaxOverage = this.poolGauge(
    'licenses_at_max_overage',
    'Whether tool is at max overage (1) or not (0)'
  );

  get contentType(): string {
    return this.registry.contentType;
  }

  borrowAttempted(poolName: string, holder: string): void {
    this.attempts.inc({ tool: poolName, user: holder });
  }

  borrowSucceeded(poolName: string, holder: string, isOverage: boolean, durationSeconds: number): void {
    this.duration.observe({ tool: poolName }, durationSeconds);
    this.successes.inc({ tool: poolName, user: holder });
    if (isOverage) {
      this.overageCheckouts.inc({ tool: poolName, user: holder });
    }
  }

  borrowFailed(poolName: string, reason: FailureReason, durationSeconds: number): void {
    this.duration.observe({ tool: poolName }, durationSeconds);
    this.failures.inc({ tool: poolName, reason });
  }

  poolChanged(status: PoolStatus): void {
    const labels = { tool: status.name };
    this.borrowed.set(labels, status.borrowed);
    this.total.set(labels, status.total);
    this.overage.set(labels, status.overage);
    this.commit.set(labels, status.commit);
    this.maxOverage.set(labels, status.maxOverage);
    this.atMaxOverage.set(labels, status.overage >= status.maxOverage ? 1 : 0);
  }

  /** Exposition text for every metric in this registry. */
  render(): Promise<string> {
    return this.registry.metrics();
  }

  private poolGauge(name: string, help: string): Gauge<'tool'> {
    return new Gauge({ name, help, labelNames: ['tool'] as const, registers: [this.registry] });
  }
}
