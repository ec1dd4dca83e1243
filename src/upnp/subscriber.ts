import http from 'http';
import { networkInterfaces } from 'os';
import { debugManager } from '../utils/debug-manager.js';
import { getErrorMessage } from '../utils/error-helper.js';
import { headerValue, httpRequest, type HttpResponse } from '../utils/http.js';
import { NetworkError, SubscriptionError, TimeoutError } from '../errors/streamer-errors.js';
import type { RawEvent, ServiceName } from '../types/streamer.js';

const USER_AGENT = 'Node.js UPnP/1.0 naim-streamer-control';

export interface GrantedSubscription {
  sid: string;
  timeoutSeconds: number;
}

export interface SubscriberOptions {
  /** Per-request timeout for SUBSCRIBE / UNSUBSCRIBE */
  timeoutMs: number;
  /** Address the device should call back on; defaults to the first external IPv4 */
  callbackHost?: string;
}

interface AcceptedSid {
  service: ServiceName;
  generation: number;
}

/**
 * Parse a GENA TIMEOUT header ("Second-1800" or "Second-infinite")
 */
export function parseTimeoutHeader(value: string | undefined, requested: number): number {
  if (!value) {
    return requested;
  }
  const match = value.match(/^Second-(\d+|infinite)$/i);
  if (!match || !match[1]) {
    return requested;
  }
  if (match[1].toLowerCase() === 'infinite') {
    return requested;
  }
  const seconds = parseInt(match[1], 10);
  return seconds > 0 ? seconds : requested;
}

/**
 * GENA client: sends SUBSCRIBE / UNSUBSCRIBE and runs the callback server the
 * device NOTIFYs. Only SIDs registered through accept() are delivered; NOTIFYs
 * for any other SID are answered 412 so the device drops them.
 */
export class UPnPSubscriber {
  private callbackServer?: http.Server;
  private callbackPort = 0;
  private callbackHost = '';
  private accepted = new Map<string, AcceptedSid>();

  constructor(
    private readonly eventHandler: (event: RawEvent) => void,
    private readonly options: SubscriberOptions
  ) {}

  async start(port = 0): Promise<void> {
    const server = http.createServer((req, res) => {
      this.handleNotification(req, res);
    });
    this.callbackServer = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, () => {
        server.off('error', reject);
        const addr = server.address();
        if (typeof addr === 'object' && addr) {
          this.callbackPort = addr.port;
          this.callbackHost = this.options.callbackHost || this.getLocalIP();
          debugManager.info('gena', `GENA callback server listening on ${this.callbackHost}:${this.callbackPort}`);
          resolve();
        } else {
          reject(new Error('Failed to get server address'));
        }
      });
    });
  }

  async stop(): Promise<void> {
    this.accepted.clear();
    const server = this.callbackServer;
    this.callbackServer = undefined;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  get callbackUrlBase(): string {
    return `http://${this.callbackHost}:${this.callbackPort}/notify`;
  }

  callbackUrlFor(service: ServiceName): string {
    return `${this.callbackUrlBase}/${service}`;
  }

  /**
   * Deliver NOTIFYs carrying this SID from now on
   */
  accept(sid: string, service: ServiceName, generation: number): void {
    this.accepted.set(sid, { service, generation });
  }

  retire(sid: string): void {
    this.accepted.delete(sid);
  }

  isAccepted(sid: string): boolean {
    return this.accepted.has(sid);
  }

  /**
   * Initial subscription. Resolves with the SID and the lease the device granted.
   */
  async subscribe(service: ServiceName, eventUrl: string, timeoutSeconds: number): Promise<GrantedSubscription> {
    const response = await this.send(service, 'SUBSCRIBE', eventUrl, {
      'CALLBACK': `<${this.callbackUrlFor(service)}>`,
      'NT': 'upnp:event',
      'TIMEOUT': `Second-${timeoutSeconds}`
    });

    this.assertOk(service, 'Subscription', response);

    const sid = headerValue(response.headers, 'sid');
    if (!sid) {
      throw new SubscriptionError(`Subscription to ${service} returned no SID`, service, response.statusCode);
    }

    const granted = parseTimeoutHeader(headerValue(response.headers, 'timeout'), timeoutSeconds);
    debugManager.info('gena', `Subscribed to ${service}, SID: ${sid}, timeout: ${granted}s`);
    return { sid, timeoutSeconds: granted };
  }

  /**
   * Renewal keeps the SID; only the lease changes
   */
  async renew(service: ServiceName, eventUrl: string, sid: string, timeoutSeconds: number): Promise<GrantedSubscription> {
    const response = await this.send(service, 'SUBSCRIBE', eventUrl, {
      'SID': sid,
      'TIMEOUT': `Second-${timeoutSeconds}`
    });

    this.assertOk(service, 'Renewal', response);

    const granted = parseTimeoutHeader(headerValue(response.headers, 'timeout'), timeoutSeconds);
    debugManager.debug('gena', `Renewed ${service} subscription ${sid}, timeout: ${granted}s`);
    return { sid: headerValue(response.headers, 'sid') || sid, timeoutSeconds: granted };
  }

  async unsubscribe(service: ServiceName, eventUrl: string, sid: string): Promise<void> {
    this.retire(sid);
    try {
      await this.send(service, 'UNSUBSCRIBE', eventUrl, { 'SID': sid });
      debugManager.debug('gena', `Unsubscribed ${service} subscription ${sid}`);
    } catch (error) {
      // The lease runs out on its own if the device missed this
      debugManager.warn('gena', `Failed to unsubscribe ${service} subscription ${sid}: ${getErrorMessage(error)}`);
    }
  }

  private assertOk(service: ServiceName, what: string, response: HttpResponse): void {
    if (response.statusCode === 200) {
      return;
    }
    if (response.statusCode === 412) {
      // 412 Precondition Failed - the device no longer knows this SID
      throw new SubscriptionError(`${what} of ${service} rejected (412): ${response.statusMessage}`, service, 412);
    }
    throw new SubscriptionError(
      `${what} of ${service} failed: ${response.statusCode} ${response.statusMessage}`,
      service,
      response.statusCode
    );
  }

  private async send(
    service: ServiceName,
    method: 'SUBSCRIBE' | 'UNSUBSCRIBE',
    eventUrl: string,
    headers: Record<string, string>
  ): Promise<HttpResponse> {
    try {
      return await httpRequest({
        url: eventUrl,
        method,
        headers: { ...headers, 'USER-AGENT': USER_AGENT },
        timeout: this.options.timeoutMs
      });
    } catch (error) {
      const message = error instanceof TimeoutError
        ? `${method} timed out after ${this.options.timeoutMs}ms`
        : `${method} failed: ${getErrorMessage(error)}`;
      throw new NetworkError(service, method, message, error);
    }
  }

  private handleNotification(req: http.IncomingMessage, res: http.ServerResponse): void {
    if (req.method !== 'NOTIFY') {
      debugManager.debug('gena', `Ignoring non-NOTIFY request: ${req.method}`);
      res.writeHead(405);
      res.end();
      return;
    }

    const sid = headerValue(req.headers, 'sid') || '';
    const registration = this.accepted.get(sid);
    if (!registration) {
      debugManager.debug('gena', `Rejecting NOTIFY for unknown SID '${sid}'`);
      // Drain the body so the connection can be reused
      req.resume();
      res.writeHead(412);
      res.end();
      return;
    }

    const seqHeader = headerValue(req.headers, 'seq');
    const seq = seqHeader !== undefined && /^\d+$/.test(seqHeader) ? parseInt(seqHeader, 10) : -1;

    let body = '';
    req.setEncoding('utf8');
    req.on('data', (chunk: string) => {
      body += chunk;
    });

    req.on('end', () => {
      res.writeHead(200);
      res.end();

      debugManager.debug('gena', `NOTIFY ${registration.service} SID ${sid} SEQ ${seq}, body length: ${body.length}`);
      try {
        this.eventHandler({
          service: registration.service,
          sid,
          seq,
          body,
          generation: registration.generation,
          receivedAt: Date.now()
        });
      } catch (error) {
        debugManager.error('gena', 'Error handling NOTIFY:', error);
      }
    });
  }

  private getLocalIP(): string {
    const nets = networkInterfaces();

    for (const name of Object.keys(nets)) {
      const interfaces = nets[name];
      if (interfaces) {
        for (const net of interfaces) {
          if (net.family === 'IPv4' && !net.internal) {
            return net.address;
          }
        }
      }
    }

    return '127.0.0.1';
  }
}
