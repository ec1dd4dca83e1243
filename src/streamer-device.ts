import { EventEmitter } from 'events';
import logger from './utils/logger.js';
import { debugManager } from './utils/debug-manager.js';
import { getErrorMessage } from './utils/error-helper.js';
import { EventChannel } from './utils/event-channel.js';
import { formatDuration } from './utils/duration.js';
import { timerScheduler, type CancelTimer, type Scheduler } from './utils/scheduler.js';
import { DeviceTransport } from './device-transport.js';
import { EventReconciler, type MalformedEventDiagnostic } from './event-reconciler.js';
import { PlaybackStateMachine, type StateTransition } from './playback-state-machine.js';
import type { CapabilityNegotiator } from './capability-negotiator.js';
import type { UPnPSubscriber } from './upnp/subscriber.js';
import { SubscriptionKeeper, type RenewalPolicy } from './upnp/subscription-keeper.js';
import { buildDidl, type DidlItem } from './upnp/didl.js';
import {
  fieldsFromMediaInfo,
  fieldsFromPositionInfo,
  fieldsFromTransportInfo,
  normalizePlayMode
} from './upnp/event-parser.js';
import {
  CapabilityError,
  DeviceUnreachableError,
  ValidationError
} from './errors/streamer-errors.js';
import { toMediaInfo, toPositionInfo, toTransportInfo } from './types/soap-responses.js';
import type {
  CapabilitySet,
  DeviceDescriptor,
  PlaybackSnapshot,
  PlayerState,
  PlayMode,
  RawEvent,
  ServiceName,
  SnapshotField,
  SnapshotFields,
  Subscription
} from './types/streamer.js';

export interface StreamerDeviceOptions {
  location: string;
  negotiator: CapabilityNegotiator;
  subscriber: UPnPSubscriber;
  httpTimeout: number;
  subscriptionTimeout: number;
  /** Fallback poll period in ms; 0 disables it */
  pollInterval: number;
  malformedThreshold: number;
  volumeStep: number;
  scheduler?: Scheduler;
  renewalPolicy?: RenewalPolicy;
}

export type PlayUrlMetadata = Omit<DidlItem, 'uri'>;

const INSTANCE = { InstanceID: 0 };
const MASTER = { InstanceID: 0, Channel: 'Master' };

/**
 * One Naim streamer: owns its transport, subscriptions, reconciler and player
 * state. Nothing about a device is shared across instances.
 *
 * Events:
 * - 'snapshot' (PlaybackSnapshot) after every applied event or poll
 * - 'state-change' (StateTransition)
 * - 'unreachable' (reason)
 * - 'recovered' (PlaybackSnapshot)
 * - 'malformed' (MalformedEventDiagnostic)
 */
export class StreamerDevice extends EventEmitter {
  private transport?: DeviceTransport;
  private readonly reconciler: EventReconciler;
  private readonly stateMachine = new PlaybackStateMachine();
  private readonly channel = new EventChannel<RawEvent>();
  private keepers: SubscriptionKeeper[] = [];
  private consumer?: Promise<void>;
  private cancelPoll?: CancelTimer;
  private reconnecting?: Promise<void>;
  private closed = false;
  private readonly scheduler: Scheduler;

  constructor(private readonly options: StreamerDeviceOptions) {
    super();
    this.scheduler = options.scheduler ?? timerScheduler;
    this.reconciler = new EventReconciler({
      baseUrl: options.location,
      malformedThreshold: options.malformedThreshold,
      now: () => this.scheduler.now()
    });
    this.reconciler.on('malformed', (diagnostic: MalformedEventDiagnostic) => {
      this.emit('malformed', diagnostic);
    });
    this.reconciler.on('malformed-threshold', () => {
      logger.warn(`Too many malformed events from ${this.options.location}, reconnecting`);
      this.reconnect().catch((error) => {
        logger.error(`Reconnect after malformed events failed: ${getErrorMessage(error)}`);
      });
    });
  }

  get location(): string {
    return this.options.location;
  }

  getSnapshot(): PlaybackSnapshot {
    return this.reconciler.getSnapshot();
  }

  getState(): PlayerState {
    return this.stateMachine.state;
  }

  getCapabilities(): CapabilitySet | undefined {
    return this.transport?.getCapabilities();
  }

  getDescriptor(): DeviceDescriptor | undefined {
    return this.transport?.getDescriptor();
  }

  get generation(): number {
    return this.transport?.generation ?? 0;
  }

  /**
   * Intake for NOTIFYs routed to this device. Never blocks the HTTP handler.
   */
  pushEvent(event: RawEvent): void {
    this.channel.push(event);
  }

  /**
   * Negotiate, subscribe and take the first poll
   */
  async connect(): Promise<void> {
    await this.establish();
    if (!this.consumer) {
      this.consumer = this.consume();
    }
    this.schedulePoll();
  }

  /**
   * Re-negotiate from scratch. Responses and events from before the call are
   * discarded. Leaves UNREACHABLE when it succeeds.
   */
  reconnect(): Promise<void> {
    if (!this.reconnecting) {
      this.reconnecting = this.doReconnect().finally(() => {
        this.reconnecting = undefined;
      });
    }
    return this.reconnecting;
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.cancelPoll) {
      this.cancelPoll();
      this.cancelPoll = undefined;
    }
    if (this.reconnecting) {
      await this.reconnecting.catch((error) => {
        logger.warn(`Reconnect interrupted by close failed: ${getErrorMessage(error)}`);
      });
    }
    await this.stopKeepers();
    this.channel.close();
    await this.consumer;
  }

  // Commands. None of them touches the snapshot; the device's events do.

  async play(): Promise<void> {
    const transport = this.requireTransport('AVTransport', 'Play');
    const snapshot = this.getSnapshot();
    const lost = snapshot.transportStatus === 'ERROR_OCCURRED' || snapshot.transportState === 'NO_MEDIA';
    if (lost && snapshot.currentUri && transport.supports('AVTransport', 'SetAVTransportURI')) {
      debugManager.debug('state', `Restoring transport URI before play: ${snapshot.currentUri}`);
      await transport.invoke('AVTransport', 'SetAVTransportURI', {
        ...INSTANCE,
        CurrentURI: snapshot.currentUri,
        CurrentURIMetaData: snapshot.currentUriMetadata ?? ''
      });
    }
    await transport.invoke('AVTransport', 'Play', { ...INSTANCE, Speed: '1' });
  }

  async pause(): Promise<void> {
    await this.requireTransport('AVTransport', 'Pause').invoke('AVTransport', 'Pause', INSTANCE);
  }

  async stop(): Promise<void> {
    await this.requireTransport('AVTransport', 'Stop').invoke('AVTransport', 'Stop', INSTANCE);
  }

  async nextTrack(): Promise<void> {
    await this.requireTransport('AVTransport', 'Next').invoke('AVTransport', 'Next', INSTANCE);
  }

  async previousTrack(): Promise<void> {
    await this.requireTransport('AVTransport', 'Previous').invoke('AVTransport', 'Previous', INSTANCE);
  }

  async setVolume(level: number): Promise<void> {
    if (!Number.isInteger(level) || level < 0 || level > 100) {
      throw new ValidationError('Volume must be an integer between 0 and 100', 'volume', level);
    }
    const transport = this.requireTransport('RenderingControl', 'SetVolume');
    await transport.invoke('RenderingControl', 'SetVolume', { ...MASTER, DesiredVolume: level });
  }

  async volumeUp(): Promise<void> {
    await this.adjustVolume(this.options.volumeStep);
  }

  async volumeDown(): Promise<void> {
    await this.adjustVolume(-this.options.volumeStep);
  }

  /**
   * Relative change from the last known volume, clamped to 0..100. One
   * SetVolume call; nothing is read back first.
   */
  async adjustVolume(delta: number): Promise<void> {
    if (!Number.isInteger(delta)) {
      throw new ValidationError('Volume delta must be an integer', 'delta', delta);
    }
    const current = this.getSnapshot().volume;
    if (current === undefined) {
      throw new ValidationError('Current volume is not known yet', 'volume');
    }
    await this.setVolume(Math.min(100, Math.max(0, current + delta)));
  }

  async setMute(mute: boolean): Promise<void> {
    const transport = this.requireTransport('RenderingControl', 'SetMute');
    await transport.invoke('RenderingControl', 'SetMute', { ...MASTER, DesiredMute: mute });
  }

  /**
   * Select an input by name (case-insensitive) or by index
   */
  async selectSource(source: string | number): Promise<void> {
    const transport = this.requireTransport('Product', 'SetSourceIndex');
    const capabilities = transport.getCapabilities();
    if (!capabilities.hasSourceList) {
      throw new CapabilityError('selectSource', 'device has no source list');
    }

    const wanted = typeof source === 'number' ? String(source) : source.trim();
    const match = capabilities.sources.find(s => s.name.toLowerCase() === wanted.toLowerCase())
      ?? capabilities.sources.find(s => /^\d+$/.test(wanted) && s.index === parseInt(wanted, 10));
    if (!match) {
      throw new ValidationError(`Unknown source: ${source}`, 'source', source);
    }

    await transport.invoke('Product', 'SetSourceIndex', { Value: match.index });
  }

  async seek(seconds: number): Promise<void> {
    const transport = this.requireTransport('AVTransport', 'Seek');
    if (!transport.getCapabilities().hasSeek) {
      throw new CapabilityError('seek', 'device does not report a playback position');
    }
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new ValidationError('Seek position must be a non-negative number of seconds', 'seconds', seconds);
    }
    await transport.invoke('AVTransport', 'Seek', { ...INSTANCE, Unit: 'REL_TIME', Target: formatDuration(seconds) });
  }

  async setPlayMode(mode: string): Promise<void> {
    const playMode: PlayMode | undefined = normalizePlayMode(mode);
    if (!playMode) {
      throw new ValidationError(`Unknown play mode: ${mode}`, 'mode', mode);
    }
    const transport = this.requireTransport('AVTransport', 'SetPlayMode');
    await transport.invoke('AVTransport', 'SetPlayMode', { ...INSTANCE, NewPlayMode: playMode });
  }

  /**
   * Load a URI with generated DIDL-Lite metadata and start it: two calls,
   * SetAVTransportURI then Play
   */
  async playUrl(uri: string, metadata: PlayUrlMetadata = {}): Promise<void> {
    let parsed: URL;
    try {
      parsed = new URL(uri);
    } catch {
      throw new ValidationError(`Invalid URI: ${uri}`, 'uri', uri);
    }
    const transport = this.requireTransport('AVTransport', 'SetAVTransportURI');
    await transport.invoke('AVTransport', 'SetAVTransportURI', {
      ...INSTANCE,
      CurrentURI: parsed.toString(),
      CurrentURIMetaData: buildDidl({ ...metadata, uri: parsed.toString() })
    });
    await transport.invoke('AVTransport', 'Play', { ...INSTANCE, Speed: '1' });
  }

  /**
   * Read the full state from the device and merge it. Fields written by an
   * event while the poll was running are kept.
   */
  async poll(): Promise<PlaybackSnapshot> {
    const transport = this.requireTransport('AVTransport', 'GetTransportInfo');
    const capabilities = transport.getCapabilities();
    const descriptor = transport.getDescriptor();
    const basedOn = this.reconciler.sequence;
    const fields: SnapshotFields = {};

    Object.assign(fields, fieldsFromTransportInfo(toTransportInfo(
      await transport.invoke('AVTransport', 'GetTransportInfo', INSTANCE)
    )));

    await this.optional(transport, 'AVTransport', 'GetPositionInfo', async () => {
      const info = toPositionInfo(await transport.invoke('AVTransport', 'GetPositionInfo', INSTANCE));
      Object.assign(fields, fieldsFromPositionInfo(info, descriptor.baseUrl, capabilities.hasPosition));
    });

    await this.optional(transport, 'AVTransport', 'GetMediaInfo', async () => {
      Object.assign(fields, fieldsFromMediaInfo(toMediaInfo(
        await transport.invoke('AVTransport', 'GetMediaInfo', INSTANCE)
      )));
    });

    await this.optional(transport, 'AVTransport', 'GetTransportSettings', async () => {
      const result = await transport.invoke('AVTransport', 'GetTransportSettings', INSTANCE);
      const mode = normalizePlayMode(result['PlayMode'] ?? '');
      if (mode) {
        fields.playMode = mode;
      }
    });

    await this.optional(transport, 'RenderingControl', 'GetVolume', async () => {
      const result = await transport.invoke('RenderingControl', 'GetVolume', MASTER);
      const volume = parseInt(result['CurrentVolume'] ?? '', 10);
      if (!Number.isNaN(volume)) {
        fields.volume = Math.min(100, Math.max(0, volume));
      }
    });

    await this.optional(transport, 'RenderingControl', 'GetMute', async () => {
      const result = await transport.invoke('RenderingControl', 'GetMute', MASTER);
      const mute = result['CurrentMute'];
      if (mute !== undefined && mute !== '') {
        fields.mute = mute === '1' || mute.toLowerCase() === 'true';
      }
    });

    if (capabilities.hasSourceList) {
      await this.optional(transport, 'Product', 'SourceIndex', async () => {
        const result = await transport.invoke('Product', 'SourceIndex', {});
        const index = parseInt(result['Value'] ?? '', 10);
        const source = capabilities.sources.find(s => s.index === index);
        if (source) {
          fields.source = source.name;
        }
      });
    }

    const result = this.reconciler.applyPoll(fields, basedOn, this.scheduler.now());
    if (result.applied) {
      this.publish(result.snapshot, result.changed);
    }
    return this.reconciler.getSnapshot();
  }

  private requireTransport(service: ServiceName, action: string): DeviceTransport {
    if (!this.transport) {
      throw new DeviceUnreachableError(service, action, 'not connected');
    }
    return this.transport;
  }

  /**
   * Poll steps other than GetTransportInfo are best effort; a failure leaves
   * their fields out of this poll
   */
  private async optional(
    transport: DeviceTransport,
    service: ServiceName,
    action: string,
    step: () => Promise<void>
  ): Promise<void> {
    if (!transport.supports(service, action)) {
      return;
    }
    try {
      await step();
    } catch (error) {
      logger.warn(`Poll step ${service}.${action} failed: ${getErrorMessage(error)}`);
    }
  }

  private async establish(): Promise<void> {
    const { descriptor, capabilities } = await this.options.negotiator.negotiate(this.options.location);
    if (this.closed) {
      return;
    }

    if (this.transport) {
      this.transport.reconfigure(descriptor, capabilities);
    } else {
      this.transport = new DeviceTransport(descriptor, capabilities, this.options.subscriber, {
        timeoutMs: this.options.httpTimeout,
        subscriptionTimeout: this.options.subscriptionTimeout,
        scheduler: this.scheduler
      });
    }

    this.reconciler.setContext(descriptor.baseUrl, capabilities.sources);
    this.reconciler.resetSubscriptions();

    await this.startKeepers(this.transport, capabilities);
    if (this.closed) {
      return;
    }
    await this.poll();
  }

  private async startKeepers(transport: DeviceTransport, capabilities: CapabilitySet): Promise<void> {
    const services: ServiceName[] = ['AVTransport'];
    if (capabilities.hasVolume || capabilities.hasMute) {
      services.push('RenderingControl');
    }
    if (capabilities.hasSourceList) {
      services.push('Product');
    }

    for (const service of services) {
      if (!transport.getDescriptor().services[service]?.eventSubUrl) {
        continue;
      }
      const keeper = new SubscriptionKeeper(service, transport, this.scheduler, this.options.renewalPolicy);
      keeper.on('resubscribed', (_subscription: Subscription, previousSid: string) => {
        this.reconciler.retireSid(previousSid);
      });
      keeper.on('unreachable', (error: unknown) => {
        this.markUnreachable(`${service} subscription lost: ${getErrorMessage(error)}`);
      });

      if (this.closed) {
        return;
      }
      try {
        await keeper.start();
      } catch (error) {
        if (service === 'AVTransport') {
          throw error;
        }
        logger.warn(`Subscribing to ${service} failed, relying on polls: ${getErrorMessage(error)}`);
        continue;
      }
      this.keepers.push(keeper);
    }
  }

  private async stopKeepers(): Promise<void> {
    const keepers = this.keepers;
    this.keepers = [];
    await Promise.all(keepers.map(keeper => keeper.stop().catch((error) => {
      logger.warn(`Stopping ${keeper.service} subscription failed: ${getErrorMessage(error)}`);
    })));
  }

  private async doReconnect(): Promise<void> {
    const wasUnreachable = this.stateMachine.isUnreachable;
    logger.info(`Reconnecting to ${this.options.location}`);
    await this.stopKeepers();
    await this.establish();

    if (wasUnreachable && !this.closed) {
      const snapshot = this.getSnapshot();
      const transition = this.stateMachine.recover(snapshot);
      if (transition) {
        this.emit('state-change', transition);
      }
      logger.info(`Streamer at ${this.options.location} is reachable again`);
      this.emit('recovered', snapshot);
    }
  }

  private markUnreachable(reason: string): void {
    if (this.stateMachine.isUnreachable) {
      return;
    }
    logger.error(`Streamer at ${this.options.location} unreachable: ${reason}`);
    this.transport?.markUnreachable(reason);
    this.stopKeepers().catch((error) => {
      logger.warn(`Releasing subscriptions failed: ${getErrorMessage(error)}`);
    });
    const transition = this.stateMachine.markUnreachable();
    if (transition) {
      this.emit('state-change', transition);
    }
    this.emit('unreachable', reason);
  }

  private async consume(): Promise<void> {
    for await (const event of this.channel) {
      try {
        this.applyEvent(event);
      } catch (error) {
        logger.error(`Failed to apply ${event.service} event: ${getErrorMessage(error)}`);
      }
    }
  }

  private applyEvent(event: RawEvent): void {
    if (!this.transport || event.generation !== this.transport.generation) {
      debugManager.debug('events', `Dropping ${event.service} event from generation ${event.generation}`);
      return;
    }
    const result = this.reconciler.onEvent(event);
    if (result.applied) {
      this.publish(result.snapshot, result.changed);
    }
  }

  private publish(snapshot: PlaybackSnapshot, changed: readonly SnapshotField[]): void {
    this.emit('snapshot', snapshot);
    const transition: StateTransition | null = this.stateMachine.apply(snapshot, changed);
    if (transition) {
      this.emit('state-change', transition);
    }
  }

  private schedulePoll(): void {
    if (this.options.pollInterval <= 0 || this.closed) {
      return;
    }
    if (this.cancelPoll) {
      this.cancelPoll();
    }
    this.cancelPoll = this.scheduler.setTimeout(() => {
      this.cancelPoll = undefined;
      this.fallbackPoll()
        .catch((error) => {
          debugManager.warn('state', `Fallback poll failed: ${getErrorMessage(error)}`);
        })
        .finally(() => this.schedulePoll());
    }, this.options.pollInterval);
  }

  private async fallbackPoll(): Promise<void> {
    if (this.stateMachine.isUnreachable) {
      // Try to come back instead of polling a device we know is gone
      await this.reconnect();
      return;
    }
    await this.poll();
  }
}
