export type ServiceName = 'AVTransport' | 'RenderingControl' | 'ConnectionManager' | 'Product';

export const SERVICE_URNS: Record<ServiceName, string> = {
  AVTransport: 'urn:schemas-upnp-org:service:AVTransport:1',
  RenderingControl: 'urn:schemas-upnp-org:service:RenderingControl:1',
  ConnectionManager: 'urn:schemas-upnp-org:service:ConnectionManager:1',
  Product: 'urn:av-openhome-org:service:Product:1'
};

export interface ServiceEndpoint {
  serviceType: string;
  serviceId: string;
  controlUrl: string;   // absolute
  eventSubUrl: string;  // absolute, empty when the service does not event
  scpdUrl: string;      // absolute
}

/**
 * Identity and endpoints of one streamer, as read from its device description.
 * Frozen at creation; a re-discovery produces a new descriptor.
 */
export interface DeviceDescriptor {
  readonly udn: string;
  readonly location: string;
  readonly baseUrl: string;
  readonly friendlyName: string;
  readonly manufacturer: string;
  readonly modelName: string;
  readonly services: Readonly<Partial<Record<ServiceName, ServiceEndpoint>>>;
}

export interface SourceInfo {
  index: number;
  name: string;
  type: string;
  visible: boolean;
}

export interface CapabilitySet {
  readonly actions: Readonly<Partial<Record<ServiceName, ReadonlySet<string>>>>;
  readonly hasVolume: boolean;
  readonly hasMute: boolean;
  readonly hasSourceList: boolean;
  readonly hasPosition: boolean;
  readonly hasSeek: boolean;
  readonly hasPlayMode: boolean;
  readonly sources: readonly SourceInfo[];
  /** Lease we ask for when subscribing, in seconds */
  readonly subscriptionTimeout: number;
}

export type TransportState = 'STOPPED' | 'PLAYING' | 'PAUSED' | 'TRANSITIONING' | 'NO_MEDIA' | 'UNKNOWN';

export type PlayMode = 'NORMAL' | 'SHUFFLE' | 'REPEAT_ONE' | 'REPEAT_ALL' | 'SHUFFLE_NOREPEAT' | 'RANDOM' | 'DIRECT_1' | 'INTRO';

/**
 * Optional fields an event or a poll may carry. Absent means "unchanged".
 */
export interface SnapshotFields {
  transportState?: TransportState;
  transportStatus?: string;
  title?: string;
  artist?: string;
  album?: string;
  artworkUrl?: string;
  duration?: number;
  position?: number;
  trackUri?: string;
  currentUri?: string;
  currentUriMetadata?: string;
  nextTitle?: string;
  nextArtist?: string;
  source?: string;
  volume?: number;
  mute?: boolean;
  playMode?: PlayMode;
}

export type SnapshotField = keyof SnapshotFields;

export interface PlaybackSnapshot extends Readonly<SnapshotFields> {
  readonly transportState: TransportState;
  readonly sequence: number;
  /** Epoch ms at which `position` was reported */
  readonly positionUpdatedAt?: number;
  readonly updatedAt: number;
}

export type PlayerState = 'IDLE' | 'PLAYING' | 'PAUSED' | 'STOPPED' | 'BUFFERING' | 'UNREACHABLE';

export interface Subscription {
  readonly service: ServiceName;
  readonly sid: string;
  readonly eventUrl: string;
  readonly timeoutSeconds: number;
  readonly expiresAt: number;
  readonly generation: number;
}

/** A NOTIFY body as it came off the wire, tagged with what we know about its origin */
export interface RawEvent {
  service: ServiceName;
  sid: string;
  seq: number;
  body: string;
  generation: number;
  receivedAt: number;
}

export interface RemoteButtonCode {
  readonly id: string;
  readonly code: Buffer;
  lastSentAt?: number;
}

export interface BroadlinkConfig {
  host: string;
  port?: number;
  mac?: string;
  devtype?: number;
}

export interface WebhookConfig {
  url: string;
  headers?: Record<string, string>;
}

export interface Config {
  host: string;
  port: number;
  logLevel: string;
  debugCategories?: string[];
  nodeEnv?: string;
  logger?: string;
  streamer: {
    location?: string;
    host?: string;
    port?: number;
    descriptionPath: string;
  };
  callback: {
    host?: string;
    port: number;
  };
  httpTimeout: number;
  subscriptionTimeout: number;
  malformedThreshold: number;
  pollInterval: number;
  broadlink?: BroadlinkConfig;
  buttonCodesFile?: string;
  buttonCodes: Record<string, string>;
  debounceMs: number;
  volumeStep: number;
  webhooks: WebhookConfig[];
  readonly isDevelopment: boolean;
  readonly isProduction: boolean;
}

export interface ApiResponse<T = unknown> {
  status: number;
  body: T;
}

export interface ErrorResponse {
  status: 'error';
  error: string;
  code?: string;
  stack?: string;
}

export interface SuccessResponse {
  status: 'success';
}

export interface RouteParams {
  [key: string]: string;
}
