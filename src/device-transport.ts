import { debugManager } from './utils/debug-manager.js';
import { soapRequest, type SoapArgs } from './utils/soap.js';
import { timerScheduler, type Scheduler } from './utils/scheduler.js';
import type { UPnPSubscriber } from './upnp/subscriber.js';
import type { SubscriptionTransport } from './upnp/subscription-keeper.js';
import {
  CancelledError,
  CapabilityError,
  DeviceUnreachableError,
  SubscriptionError
} from './errors/streamer-errors.js';
import type { ActionResult } from './types/soap-responses.js';
import type {
  CapabilitySet,
  DeviceDescriptor,
  ServiceEndpoint,
  ServiceName,
  Subscription
} from './types/streamer.js';

export interface DeviceTransportOptions {
  /** Bound on every SOAP call */
  timeoutMs: number;
  /** Lease requested on SUBSCRIBE, in seconds */
  subscriptionTimeout: number;
  scheduler?: Scheduler;
}

/**
 * The only component that talks to the streamer over the network.
 *
 * Calls are refused before any I/O when the negotiated capability set lacks
 * the action. Every (re)configuration bumps `generation`; a reply that lands
 * after the bump is discarded with CancelledError.
 */
export class DeviceTransport implements SubscriptionTransport {
  private gen = 1;
  private unreachableReason?: string;
  private readonly scheduler: Scheduler;

  constructor(
    private descriptor: DeviceDescriptor,
    private capabilities: CapabilitySet,
    private readonly subscriber: UPnPSubscriber,
    private readonly options: DeviceTransportOptions
  ) {
    this.scheduler = options.scheduler ?? timerScheduler;
  }

  get generation(): number {
    return this.gen;
  }

  get isUnreachable(): boolean {
    return this.unreachableReason !== undefined;
  }

  getDescriptor(): DeviceDescriptor {
    return this.descriptor;
  }

  getCapabilities(): CapabilitySet {
    return this.capabilities;
  }

  /**
   * Swap in a freshly negotiated descriptor. Anything still in flight for the
   * previous generation is abandoned.
   */
  reconfigure(descriptor: DeviceDescriptor, capabilities: CapabilitySet): number {
    this.descriptor = descriptor;
    this.capabilities = capabilities;
    this.unreachableReason = undefined;
    this.gen++;
    debugManager.debug('soap', `Transport reconfigured, generation ${this.gen}`);
    return this.gen;
  }

  markUnreachable(reason: string): void {
    this.unreachableReason = reason;
  }

  supports(service: ServiceName, action: string): boolean {
    return this.capabilities.actions[service]?.has(action) ?? false;
  }

  async invoke(service: ServiceName, action: string, args: SoapArgs = {}): Promise<ActionResult> {
    if (this.unreachableReason !== undefined) {
      throw new DeviceUnreachableError(service, action, this.unreachableReason);
    }
    const endpoint = this.descriptor.services[service];
    if (!endpoint || !this.supports(service, action)) {
      throw new CapabilityError(`${service}.${action}`, 'not advertised by the device');
    }

    const generation = this.gen;
    try {
      const result = await soapRequest(endpoint.controlUrl, endpoint.serviceType, action, args, {
        service,
        timeoutMs: this.options.timeoutMs
      });
      this.assertCurrent(generation, `${service}.${action}`);
      return result;
    } catch (error) {
      this.assertCurrent(generation, `${service}.${action}`);
      throw error;
    }
  }

  async subscribe(service: ServiceName): Promise<Subscription> {
    const endpoint = this.eventEndpoint(service);
    const generation = this.gen;
    const granted = await this.subscriber.subscribe(service, endpoint.eventSubUrl, this.options.subscriptionTimeout);

    if (generation !== this.gen) {
      await this.subscriber.unsubscribe(service, endpoint.eventSubUrl, granted.sid);
      throw new CancelledError(`${service} SUBSCRIBE`);
    }

    this.subscriber.accept(granted.sid, service, generation);
    return this.toSubscription(service, endpoint.eventSubUrl, granted.sid, granted.timeoutSeconds, generation);
  }

  async renew(subscription: Subscription): Promise<Subscription> {
    const granted = await this.subscriber.renew(
      subscription.service,
      subscription.eventUrl,
      subscription.sid,
      this.options.subscriptionTimeout
    );
    if (granted.sid !== subscription.sid) {
      this.subscriber.accept(granted.sid, subscription.service, subscription.generation);
    }
    return this.toSubscription(subscription.service, subscription.eventUrl, granted.sid, granted.timeoutSeconds, subscription.generation);
  }

  async unsubscribe(subscription: Subscription): Promise<void> {
    await this.subscriber.unsubscribe(subscription.service, subscription.eventUrl, subscription.sid);
  }

  retire(sid: string): void {
    this.subscriber.retire(sid);
  }

  private assertCurrent(generation: number, operation: string): void {
    if (generation !== this.gen) {
      throw new CancelledError(operation);
    }
  }

  private eventEndpoint(service: ServiceName): ServiceEndpoint {
    const endpoint = this.descriptor.services[service];
    if (!endpoint || !endpoint.eventSubUrl) {
      throw new SubscriptionError(`${service} has no event subscription URL`, service);
    }
    return endpoint;
  }

  private toSubscription(
    service: ServiceName,
    eventUrl: string,
    sid: string,
    timeoutSeconds: number,
    generation: number
  ): Subscription {
    return Object.freeze({
      service,
      sid,
      eventUrl,
      timeoutSeconds,
      expiresAt: this.scheduler.now() + timeoutSeconds * 1000,
      generation
    });
  }
}
