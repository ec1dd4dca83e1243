import dgram from 'dgram';
import { randomInt } from 'crypto';
import logger from '../utils/logger.js';
import { debugManager } from '../utils/debug-manager.js';
import { getErrorMessage } from '../utils/error-helper.js';
import { sleep } from '../utils/retry.js';
import { NetworkError, TransportError } from '../errors/streamer-errors.js';
import {
  AUTH_ERROR,
  COMMAND_AUTH,
  COMMAND_DATA,
  DEFAULT_KEY,
  authPayload,
  decodePacket,
  encodePacket,
  isRm4,
  nextCount,
  parseAuthResponse,
  parseMac,
  sendDataPayload,
  type DecodedPacket
} from './packet.js';

/**
 * Whatever can replay a learned code. The bridge only depends on this.
 */
export interface RemoteTransport {
  sendCode(code: Buffer, repeats: number): Promise<void>;
  close(): Promise<void>;
}

export interface BroadlinkClientOptions {
  host: string;
  port?: number;
  mac?: string;
  /** Device type reported by discovery; decides the RM4 framing */
  devtype?: number;
  timeoutMs?: number;
  /** Pause between repeated sends of the same code */
  repeatDelayMs?: number;
}

// RM mini 3
const DEFAULT_DEVTYPE = 0x27c2;

/**
 * UDP client for a Broadlink RM bridge. Requests are serialized: a device
 * answers one packet at a time.
 */
export class BroadlinkClient implements RemoteTransport {
  private key: Buffer = DEFAULT_KEY;
  private id = 0;
  private count = randomInt(0x8000, 0x10000);
  private authenticated = false;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly mac: Buffer;
  private readonly devtype: number;
  private readonly port: number;
  private readonly timeoutMs: number;
  private readonly repeatDelayMs: number;

  constructor(private readonly options: BroadlinkClientOptions) {
    this.mac = parseMac(options.mac);
    this.devtype = options.devtype ?? DEFAULT_DEVTYPE;
    this.port = options.port ?? 80;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.repeatDelayMs = options.repeatDelayMs ?? 400;
  }

  get isAuthenticated(): boolean {
    return this.authenticated;
  }

  async auth(): Promise<void> {
    this.key = DEFAULT_KEY;
    this.id = 0;
    const response = await this.exchange(COMMAND_AUTH, authPayload(), 'auth');
    if (response.errorCode !== 0) {
      throw this.deviceError('auth', response.errorCode);
    }
    const { id, key } = parseAuthResponse(response.payload);
    this.id = id;
    this.key = key;
    this.authenticated = true;
    debugManager.debug('remote', `Authenticated with Broadlink ${this.options.host}, session ${id}`);
  }

  /**
   * Send a learned code `repeats` times
   */
  async sendCode(code: Buffer, repeats = 1): Promise<void> {
    const times = Math.max(1, Math.floor(repeats));
    for (let i = 0; i < times; i++) {
      if (i > 0) {
        await sleep(this.repeatDelayMs);
      }
      await this.sendOnce(code);
    }
  }

  async close(): Promise<void> {
    // Sockets are per request; wait for anything still queued
    await this.queue.catch(() => undefined);
  }

  private async sendOnce(code: Buffer): Promise<void> {
    if (!this.authenticated) {
      await this.auth();
    }

    const payload = sendDataPayload(code, isRm4(this.devtype));
    let response = await this.exchange(COMMAND_DATA, payload, 'send_data');

    if (response.errorCode === AUTH_ERROR) {
      // Session expired on the device; authenticate once and retry
      logger.info(`Broadlink ${this.options.host} rejected the session, re-authenticating`);
      this.authenticated = false;
      await this.auth();
      response = await this.exchange(COMMAND_DATA, payload, 'send_data');
    }

    if (response.errorCode !== 0) {
      throw this.deviceError('send_data', response.errorCode);
    }
    debugManager.debug('remote', `Sent ${code.length} byte code to ${this.options.host}`);
  }

  private deviceError(action: string, errorCode: number): TransportError {
    if (errorCode === AUTH_ERROR) {
      this.authenticated = false;
    }
    return new TransportError(
      `Broadlink ${action} failed with device error ${errorCode}`,
      'FAULT',
      'Broadlink',
      action,
      String(errorCode)
    );
  }

  private exchange(command: number, payload: Buffer, action: string): Promise<DecodedPacket> {
    const run = this.queue.then(() => this.roundTrip(command, payload, action));
    this.queue = run.catch(() => undefined);
    return run;
  }

  private roundTrip(command: number, payload: Buffer, action: string): Promise<DecodedPacket> {
    this.count = nextCount(this.count);
    const packet = encodePacket(
      { devtype: this.devtype, command, count: this.count, mac: this.mac, id: this.id },
      payload,
      this.key
    );
    const key = this.key;

    return new Promise((resolve, reject) => {
      const socket = dgram.createSocket('udp4');
      let settled = false;

      const finish = (error: Error | null, result?: DecodedPacket): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        socket.close();
        if (error) {
          reject(error);
        } else if (result) {
          resolve(result);
        }
      };

      const timer = setTimeout(() => {
        finish(new NetworkError('Broadlink', action, `${action} timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      socket.on('error', (error) => {
        finish(new NetworkError('Broadlink', action, `${action} failed: ${getErrorMessage(error)}`, error));
      });

      socket.on('message', (message) => {
        try {
          finish(null, decodePacket(message, key));
        } catch (error) {
          finish(error instanceof Error ? error : new Error(getErrorMessage(error)));
        }
      });

      debugManager.trace('remote', `-> ${this.options.host}:${this.port} command 0x${command.toString(16)} count ${this.count}`);
      socket.send(packet, this.port, this.options.host, (error) => {
        if (error) {
          finish(new NetworkError('Broadlink', action, `${action} failed: ${getErrorMessage(error)}`, error));
        }
      });
    });
  }
}
