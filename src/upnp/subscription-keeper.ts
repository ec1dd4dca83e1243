import { EventEmitter } from 'events';
import logger from '../utils/logger.js';
import { debugManager } from '../utils/debug-manager.js';
import { getErrorMessage } from '../utils/error-helper.js';
import { backoffDelay } from '../utils/retry.js';
import type { CancelTimer, Scheduler } from '../utils/scheduler.js';
import type { ServiceName, Subscription } from '../types/streamer.js';

export interface RenewalPolicy {
  /** Fraction of the granted lease after which we renew */
  renewFraction: number;
  /** Consecutive renewal failures before one fresh SUBSCRIBE is attempted */
  maxRenewalFailures: number;
  retryBaseMs: number;
  retryMaxMs: number;
}

export const DEFAULT_RENEWAL_POLICY: RenewalPolicy = {
  renewFraction: 0.5,
  maxRenewalFailures: 3,
  retryBaseMs: 1000,
  retryMaxMs: 30000
};

/**
 * The GENA operations a keeper needs from the device transport
 */
export interface SubscriptionTransport {
  subscribe(service: ServiceName): Promise<Subscription>;
  renew(subscription: Subscription): Promise<Subscription>;
  unsubscribe(subscription: Subscription): Promise<void>;
  retire(sid: string): void;
}

/**
 * Keeps one service subscription alive.
 *
 * Emits:
 * - 'renewed' (subscription)
 * - 'renewal-failed' (error, consecutiveFailures)
 * - 'resubscribed' (subscription, previousSid)
 * - 'unreachable' (error) once renewals and the fresh subscribe have all failed;
 *   the keeper stops itself
 */
export class SubscriptionKeeper extends EventEmitter {
  private current?: Subscription;
  private failures = 0;
  private cancelTimer?: CancelTimer;
  private inFlight: Promise<void> = Promise.resolve();
  private stopped = false;

  constructor(
    readonly service: ServiceName,
    private readonly transport: SubscriptionTransport,
    private readonly scheduler: Scheduler,
    private readonly policy: RenewalPolicy = DEFAULT_RENEWAL_POLICY
  ) {
    super();
  }

  get subscription(): Subscription | undefined {
    return this.current;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  async start(): Promise<Subscription> {
    this.stopped = false;
    const subscription = await this.transport.subscribe(this.service);
    this.current = subscription;
    this.failures = 0;
    this.scheduleRenewal(subscription);
    return subscription;
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.cancel();
    const subscription = this.current;
    this.current = undefined;
    if (subscription) {
      await this.transport.unsubscribe(subscription);
    }
  }

  /**
   * Resolves when the renewal currently running (if any) has finished
   */
  whenIdle(): Promise<void> {
    return this.inFlight;
  }

  private cancel(): void {
    if (this.cancelTimer) {
      this.cancelTimer();
      this.cancelTimer = undefined;
    }
  }

  private scheduleRenewal(subscription: Subscription): void {
    const delay = subscription.timeoutSeconds * 1000 * this.policy.renewFraction;
    debugManager.trace('gena', `Next ${this.service} renewal in ${delay}ms`);
    this.arm(delay);
  }

  private scheduleRetry(subscription: Subscription): void {
    const remaining = Math.max(0, subscription.expiresAt - this.scheduler.now());
    const delay = Math.min(
      backoffDelay(this.failures, this.policy.retryBaseMs, this.policy.retryMaxMs),
      remaining
    );
    debugManager.debug('gena', `Retrying ${this.service} renewal in ${delay}ms (failure ${this.failures})`);
    this.arm(delay);
  }

  private arm(delayMs: number): void {
    this.cancel();
    this.cancelTimer = this.scheduler.setTimeout(() => {
      this.cancelTimer = undefined;
      this.inFlight = this.renewOnce().catch((error) => {
        logger.error(`Unexpected error renewing ${this.service} subscription:`, error);
      });
    }, delayMs);
  }

  private async renewOnce(): Promise<void> {
    const subscription = this.current;
    if (this.stopped || !subscription) {
      return;
    }

    try {
      const renewed = await this.transport.renew(subscription);
      if (this.stopped) {
        return;
      }
      this.current = renewed;
      this.failures = 0;
      this.emit('renewed', renewed);
      this.scheduleRenewal(renewed);
      return;
    } catch (error) {
      if (this.stopped) {
        return;
      }
      this.failures++;
      logger.warn(`Renewal of ${this.service} subscription failed (${this.failures}/${this.policy.maxRenewalFailures}): ${getErrorMessage(error)}`);
      this.emit('renewal-failed', error, this.failures);
    }

    if (this.failures < this.policy.maxRenewalFailures) {
      this.scheduleRetry(subscription);
      return;
    }

    // Exactly one fresh subscription; the old SID stays accepted until it succeeds
    try {
      const fresh = await this.transport.subscribe(this.service);
      if (this.stopped) {
        await this.transport.unsubscribe(fresh);
        return;
      }
      this.transport.retire(subscription.sid);
      this.current = fresh;
      this.failures = 0;
      logger.info(`Resubscribed to ${this.service} after ${this.policy.maxRenewalFailures} failed renewals (SID ${fresh.sid})`);
      this.emit('resubscribed', fresh, subscription.sid);
      this.scheduleRenewal(fresh);
    } catch (error) {
      if (this.stopped) {
        return;
      }
      this.failures++;
      this.stopped = true;
      this.current = undefined;
      this.transport.retire(subscription.sid);
      logger.error(`Resubscribe to ${this.service} failed, giving up: ${getErrorMessage(error)}`);
      this.emit('unreachable', error);
    }
  }
}
