import logger from './utils/logger.js';
import { debugManager } from './utils/debug-manager.js';
import { getErrorMessage } from './utils/error-helper.js';
import { timerScheduler, type CancelTimer, type Scheduler } from './utils/scheduler.js';
import { decodeCode } from './broadlink/packet.js';
import { getButtonCatalog, type RemoteButton } from './remote-buttons.js';
import { CancelledError, UnknownButtonError } from './errors/streamer-errors.js';
import type { RemoteTransport } from './broadlink/broadlink-client.js';
import type { RemoteButtonCode } from './types/streamer.js';

export interface PressOptions {
  /** Times the code is sent */
  repeats?: number;
}

export interface RemoteCommandBridgeOptions {
  /** Presses of one button within this window collapse into one send */
  debounceMs?: number;
  scheduler?: Scheduler;
}

export interface ButtonStatus extends RemoteButton {
  configured: boolean;
  lastSentAt?: number;
}

interface Waiter {
  resolve: () => void;
  reject: (error: unknown) => void;
}

interface PendingPress {
  repeats: number;
  waiters: Waiter[];
  cancel: CancelTimer;
}

/**
 * Replays learned IR/RF codes through a remote transport.
 *
 * Each button has a trailing debounce window: the first press opens it, later
 * presses replace the pending request, and one send goes out when the window
 * closes with the most recent parameters. Every press in the window settles
 * with that send's outcome.
 */
export class RemoteCommandBridge {
  private readonly codes = new Map<string, RemoteButtonCode>();
  private readonly pending = new Map<string, PendingPress>();
  private readonly debounceMs: number;
  private readonly scheduler: Scheduler;

  constructor(
    private readonly transport: RemoteTransport,
    codes: Record<string, string>,
    options: RemoteCommandBridgeOptions = {}
  ) {
    this.debounceMs = options.debounceMs ?? 400;
    this.scheduler = options.scheduler ?? timerScheduler;

    for (const [id, value] of Object.entries(codes)) {
      const key = id.toLowerCase();
      try {
        this.codes.set(key, { id: key, code: decodeCode(value) });
      } catch (error) {
        logger.warn(`Ignoring remote code for '${id}': ${getErrorMessage(error)}`);
      }
    }
    debugManager.info('remote', `Loaded ${this.codes.size} remote codes`);
  }

  /**
   * Catalog buttons plus any configured code outside the catalog
   */
  listButtons(): ButtonStatus[] {
    const catalog = getButtonCatalog();
    const buttons: ButtonStatus[] = catalog.map(button => this.status(button));
    for (const id of this.codes.keys()) {
      if (!catalog.some(button => button.id === id)) {
        buttons.push(this.status({ id, name: id, icon: 'mdi:remote' }));
      }
    }
    return buttons;
  }

  hasButton(buttonId: string): boolean {
    return this.codes.has(buttonId.toLowerCase());
  }

  /**
   * Rejects with UnknownButtonError when the button has no code, and with the
   * transport's error if the send fails.
   */
  press(buttonId: string, options: PressOptions = {}): Promise<void> {
    const id = buttonId.toLowerCase();
    if (!this.codes.has(id)) {
      return Promise.reject(new UnknownButtonError(buttonId));
    }
    const repeats = Math.max(1, Math.floor(options.repeats ?? 1));

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject };
      const existing = this.pending.get(id);
      if (existing) {
        existing.repeats = repeats;
        existing.waiters.push(waiter);
        debugManager.debug('remote', `Coalesced press of '${id}' (${existing.waiters.length} in window)`);
        return;
      }

      this.pending.set(id, {
        repeats,
        waiters: [waiter],
        cancel: this.scheduler.setTimeout(() => this.flush(id), this.debounceMs)
      });
    });
  }

  /**
   * Reject presses still waiting for their window and release the transport
   */
  async close(): Promise<void> {
    for (const [id, press] of this.pending) {
      press.cancel();
      const error = new CancelledError(`press ${id}`, 'remote bridge shutdown');
      press.waiters.forEach(waiter => waiter.reject(error));
    }
    this.pending.clear();
    await this.transport.close();
  }

  private status(button: RemoteButton): ButtonStatus {
    const code = this.codes.get(button.id);
    return {
      ...button,
      configured: code !== undefined,
      ...(code?.lastSentAt !== undefined ? { lastSentAt: code.lastSentAt } : {})
    };
  }

  private flush(id: string): void {
    const press = this.pending.get(id);
    const code = this.codes.get(id);
    this.pending.delete(id);
    if (!press || !code) {
      return;
    }

    code.lastSentAt = this.scheduler.now();
    debugManager.debug('remote', `Sending '${id}' x${press.repeats} for ${press.waiters.length} press(es)`);

    this.transport.sendCode(code.code, press.repeats).then(
      () => press.waiters.forEach(waiter => waiter.resolve()),
      (error: unknown) => {
        logger.warn(`Remote button '${id}' failed: ${getErrorMessage(error)}`);
        press.waiters.forEach(waiter => waiter.reject(error));
      }
    );
  }
}
