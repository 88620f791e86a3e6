/**
 * Expiry Monitor
 *
 * Periodically walks the store's secret metadata and notifies rotation
 * handlers once per warning threshold as secrets approach expiry.
 */

import { ConfigurationError, toError } from '../error.js';
import { type Logger, NoOpLogger } from '../observability/logging.js';
import { type MetricsCollector, NoOpMetricsCollector, METRICS } from '../observability/metrics.js';
import type { SecretStoreClient } from '../services/secrets/index.js';
import type { SecretMetadata } from '../types/index.js';
import { daysUntilExpiry } from './expiry.js';
import type { RotationHandler } from './handler.js';

export interface ExpiryMonitorConfig {
  /**
   * Interval between expiry checks in milliseconds.
   * Default: 3600000 (1 hour)
   */
  checkIntervalMs: number;

  /**
   * Warning thresholds in days.
   * Default: [30, 7, 1]
   */
  warningThresholds: number[];
}

const DEFAULT_CONFIG: ExpiryMonitorConfig = {
  checkIntervalMs: 3600000, // 1 hour
  warningThresholds: [30, 7, 1],
};

export interface ExpiryMonitorDeps {
  logger?: Logger;
  metrics?: MetricsCollector;
}

/** Summary of one pass over the store */
export interface ExpiryCheckResult {
  checked: number;
  notified: string[];
}

/** Thresholds reported for one expiry date of a secret */
interface NotificationRecord {
  expiresAt: number;
  thresholds: Set<number>;
}

export class ExpiryMonitor {
  private intervalId?: NodeJS.Timeout;
  private readonly handlers: RotationHandler[] = [];
  private readonly config: ExpiryMonitorConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  /** Thresholds already reported, per secret name */
  private readonly notifiedSecrets = new Map<string, NotificationRecord>();

  constructor(
    private readonly store: Pick<SecretStoreClient, 'list'>,
    config?: Partial<ExpiryMonitorConfig>,
    deps: ExpiryMonitorDeps = {}
  ) {
    const warningThresholds = [...(config?.warningThresholds ?? DEFAULT_CONFIG.warningThresholds)];
    this.config = {
      checkIntervalMs: config?.checkIntervalMs ?? DEFAULT_CONFIG.checkIntervalMs,
      warningThresholds: warningThresholds.sort((a, b) => a - b),
    };
    this.logger = deps.logger ?? new NoOpLogger();
    this.metrics = deps.metrics ?? new NoOpMetricsCollector();

    if (this.config.checkIntervalMs < 1000) {
      throw new ConfigurationError({ message: 'Check interval must be at least 1000ms' });
    }

    if (this.config.warningThresholds.length === 0) {
      throw new ConfigurationError({ message: 'Warning thresholds cannot be empty' });
    }
  }

  addHandler(handler: RotationHandler): void {
    if (!this.handlers.includes(handler)) {
      this.handlers.push(handler);
    }
  }

  removeHandler(handler: RotationHandler): void {
    const index = this.handlers.indexOf(handler);
    if (index !== -1) {
      this.handlers.splice(index, 1);
    }
  }

  /**
   * Start periodic checks. The first check runs immediately.
   */
  start(): void {
    if (this.intervalId !== undefined) {
      this.logger.warn('Expiry monitor already started');
      return;
    }

    this.logger.info('Starting expiry monitor', {
      check_interval_ms: this.config.checkIntervalMs,
      warning_thresholds: this.config.warningThresholds,
    });

    this.runScheduledCheck();
    this.intervalId = setInterval(() => this.runScheduledCheck(), this.config.checkIntervalMs);
    this.intervalId.unref();
  }

  stop(): void {
    if (this.intervalId !== undefined) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
      this.logger.info('Stopped expiry monitor');
    }
  }

  isRunning(): boolean {
    return this.intervalId !== undefined;
  }

  /**
   * Walk every secret once and notify handlers where a new threshold was crossed.
   * History of secrets missing from a completed pass is dropped.
   *
   * @throws If listing fails
   */
  async checkNow(): Promise<ExpiryCheckResult> {
    const result: ExpiryCheckResult = { checked: 0, notified: [] };
    const seen = new Set<string>();

    for await (const secret of this.store.list()) {
      result.checked++;
      seen.add(secret.name);
      if (this.checkSecretExpiry(secret)) {
        result.notified.push(secret.name);
      }
    }

    for (const name of [...this.notifiedSecrets.keys()]) {
      if (!seen.has(name)) {
        this.notifiedSecrets.delete(name);
      }
    }

    this.logger.debug('Expiry check complete', { checked: result.checked, notified: result.notified.length });
    return result;
  }

  /**
   * Forget which thresholds were reported
   */
  clearNotificationHistory(): void {
    this.notifiedSecrets.clear();
  }

  private checkSecretExpiry(secret: SecretMetadata, now: number = Date.now()): boolean {
    if (!secret.expiresAt) {
      this.notifiedSecrets.delete(secret.name);
      return false;
    }

    const days = daysUntilExpiry(secret.expiresAt, now);
    this.metrics.gauge(METRICS.SECRET_EXPIRY_DAYS, days, { secret_name: secret.name });

    // Tightest threshold reached; thresholds are sorted ascending
    const threshold = this.config.warningThresholds.find((t) => days <= t);
    if (threshold === undefined) {
      this.notifiedSecrets.delete(secret.name);
      return false;
    }

    const expiresAt = secret.expiresAt.getTime();
    let record = this.notifiedSecrets.get(secret.name);
    // A later expiry means the secret was renewed; its thresholds apply afresh
    if (!record || expiresAt > record.expiresAt) {
      record = { expiresAt, thresholds: new Set<number>() };
      this.notifiedSecrets.set(secret.name, record);
    }
    record.expiresAt = expiresAt;

    if (record.thresholds.has(threshold)) {
      return false;
    }
    record.thresholds.add(threshold);

    this.logger.warn('Secret near expiry', {
      secret_name: secret.name,
      days_until_expiry: days,
      threshold_days: threshold,
      expires_at: secret.expiresAt.toISOString(),
    });
    this.notifyHandlers(secret, days);
    return true;
  }

  private notifyHandlers(secret: SecretMetadata, days: number): void {
    for (const handler of this.handlers) {
      Promise.resolve()
        .then(() => handler.onNearExpiry(secret, days))
        .catch((error: unknown) => {
          this.logger.error('Rotation handler failed', toError(error), {
            secret_name: secret.name,
            days_until_expiry: days,
          });
        });
    }
  }

  private runScheduledCheck(): void {
    this.checkNow().catch((error: unknown) => {
      this.logger.error('Expiry check failed', toError(error));
    });
  }
}
