import { debugManager } from './utils/debug-manager.js';
import type { PlaybackSnapshot, PlayerState, SnapshotField, TransportState } from './types/streamer.js';

export interface StateTransition {
  from: PlayerState;
  to: PlayerState;
  sequence?: number;
}

export function mapTransportState(state: TransportState): PlayerState {
  switch (state) {
    case 'PLAYING':
      return 'PLAYING';
    case 'PAUSED':
      return 'PAUSED';
    case 'STOPPED':
      return 'STOPPED';
    case 'TRANSITIONING':
      return 'BUFFERING';
    case 'NO_MEDIA':
    case 'UNKNOWN':
      return 'IDLE';
  }
}

/**
 * Player state derived from snapshots only. Commands never move it; the
 * device's own report of the outcome does.
 */
export class PlaybackStateMachine {
  private current: PlayerState = 'IDLE';
  /** State held before the device became unreachable */
  private beforeUnreachable?: PlayerState;

  get state(): PlayerState {
    return this.current;
  }

  get isUnreachable(): boolean {
    return this.current === 'UNREACHABLE';
  }

  /**
   * Apply a new snapshot. `changed` lists the fields that snapshot changed.
   * Returns the transition, or null when the state stays put.
   */
  apply(snapshot: PlaybackSnapshot, changed: readonly SnapshotField[]): StateTransition | null {
    if (this.current === 'UNREACHABLE') {
      // Only recover() leaves UNREACHABLE
      return null;
    }

    let next: PlayerState | undefined;
    if (changed.includes('transportState')) {
      next = mapTransportState(snapshot.transportState);
    } else if (changed.includes('source')) {
      // Switching input without a transport report leaves nothing playing
      next = 'IDLE';
    }

    if (next === undefined) {
      return null;
    }
    return this.moveTo(next, snapshot.sequence);
  }

  markUnreachable(): StateTransition | null {
    if (this.current === 'UNREACHABLE') {
      return null;
    }
    this.beforeUnreachable = this.current;
    return this.moveTo('UNREACHABLE');
  }

  /**
   * Leave UNREACHABLE after a successful reconnect. The fresh snapshot decides;
   * without one the state from before the outage comes back, else IDLE.
   */
  recover(fresh?: PlaybackSnapshot): StateTransition | null {
    if (this.current !== 'UNREACHABLE') {
      return null;
    }
    let next: PlayerState;
    if (fresh && fresh.transportState !== 'UNKNOWN') {
      next = mapTransportState(fresh.transportState);
    } else {
      next = this.beforeUnreachable ?? 'IDLE';
    }
    this.beforeUnreachable = undefined;
    return this.moveTo(next, fresh?.sequence);
  }

  private moveTo(next: PlayerState, sequence?: number): StateTransition | null {
    if (next === this.current) {
      return null;
    }
    const transition: StateTransition = { from: this.current, to: next, sequence };
    this.current = next;
    debugManager.debug('state', `${transition.from} -> ${transition.to}`, { sequence });
    return transition;
  }
}
