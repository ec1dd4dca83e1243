import { EventEmitter } from 'events';
import logger from './utils/logger.js';
import { debugManager } from './utils/debug-manager.js';
import { getErrorMessage } from './utils/error-helper.js';
import { parseEventBody, type ParsedEvent } from './upnp/event-parser.js';
import type {
  PlaybackSnapshot,
  RawEvent,
  SnapshotField,
  SnapshotFields,
  SourceInfo
} from './types/streamer.js';

export type IgnoreReason = 'stale' | 'malformed' | 'unchanged';

export type ReconcileResult =
  | { applied: true; snapshot: PlaybackSnapshot; changed: SnapshotField[] }
  | { applied: false; reason: IgnoreReason };

export interface MalformedEventDiagnostic {
  service: RawEvent['service'];
  sid: string;
  seq: number;
  properties: string[];
  error?: string;
}

export interface ReconcilerOptions {
  baseUrl: string;
  sources?: readonly SourceInfo[];
  /** Consecutive malformed events before 'malformed-threshold' is emitted */
  malformedThreshold?: number;
  now?: () => number;
}

const SNAPSHOT_FIELDS: readonly SnapshotField[] = [
  'transportState', 'transportStatus', 'title', 'artist', 'album', 'artworkUrl',
  'duration', 'position', 'trackUri', 'currentUri', 'currentUriMetadata',
  'nextTitle', 'nextArtist', 'source', 'volume', 'mute', 'playMode'
];

/**
 * Folds GENA events (and polls) into the device's playback snapshot.
 *
 * Events merge: only the fields an event carries change. Each subscription's
 * SEQ must increase; anything at or below the last applied SEQ for that SID is
 * ignored. Every applied change produces a new frozen snapshot with a higher
 * `sequence`.
 *
 * Emits 'malformed' (MalformedEventDiagnostic) for unreadable properties and
 * 'malformed-threshold' once too many malformed events arrive back to back.
 */
export class EventReconciler extends EventEmitter {
  private snapshot: PlaybackSnapshot;
  private readonly lastSeq = new Map<string, number>();
  /** SIDs replaced by a resubscribe; their queued NOTIFYs are stale */
  private readonly retiredSids = new Set<string>();
  /** Snapshot sequence at which an event last wrote each field */
  private readonly fieldVersions = new Map<SnapshotField, number>();
  private consecutiveMalformed = 0;
  private baseUrl: string;
  private sources: readonly SourceInfo[];
  private readonly malformedThreshold: number;
  private readonly now: () => number;

  constructor(options: ReconcilerOptions) {
    super();
    this.baseUrl = options.baseUrl;
    this.sources = options.sources ?? [];
    this.malformedThreshold = options.malformedThreshold ?? 5;
    this.now = options.now ?? Date.now;
    const initial: PlaybackSnapshot = {
      transportState: 'UNKNOWN',
      sequence: 0,
      updatedAt: this.now()
    };
    this.snapshot = Object.freeze(initial);
  }

  getSnapshot(): PlaybackSnapshot {
    return this.snapshot;
  }

  get sequence(): number {
    return this.snapshot.sequence;
  }

  setContext(baseUrl: string, sources: readonly SourceInfo[]): void {
    this.baseUrl = baseUrl;
    this.sources = sources;
  }

  /**
   * Forget per-subscription sequence numbers; used when subscriptions are
   * replaced wholesale on reconnect
   */
  resetSubscriptions(): void {
    this.lastSeq.clear();
    this.retiredSids.clear();
    this.consecutiveMalformed = 0;
  }

  /**
   * Stop applying events for a SID that a resubscribe replaced. Events for it
   * may still be queued behind the resubscribe.
   */
  retireSid(sid: string): void {
    this.lastSeq.delete(sid);
    this.retiredSids.add(sid);
  }

  onEvent(raw: RawEvent): ReconcileResult {
    if (this.retiredSids.has(raw.sid)) {
      debugManager.debug('events', `Ignoring ${raw.service} event SEQ ${raw.seq} for retired ${raw.sid}`);
      return { applied: false, reason: 'stale' };
    }

    // A NOTIFY without a SEQ header cannot be ordered; it is applied as it comes
    if (raw.seq >= 0) {
      const last = this.lastSeq.get(raw.sid);
      if (last !== undefined && raw.seq <= last) {
        debugManager.debug('events', `Ignoring stale ${raw.service} event SEQ ${raw.seq} (last applied ${last}) for ${raw.sid}`);
        return { applied: false, reason: 'stale' };
      }
      this.lastSeq.set(raw.sid, raw.seq);
    }

    let parsed: ParsedEvent;
    try {
      parsed = parseEventBody(raw.service, raw.body, { baseUrl: this.baseUrl, sources: this.sources });
    } catch (error) {
      this.reportMalformed(raw, ['propertyset'], getErrorMessage(error));
      return { applied: false, reason: 'malformed' };
    }

    if (parsed.malformed.length > 0) {
      this.reportMalformed(raw, parsed.malformed);
    } else {
      this.consecutiveMalformed = 0;
    }

    return this.merge(parsed.fields, raw.receivedAt, true);
  }

  /**
   * Merge a poll result taken when the snapshot was at `basedOnSequence`.
   * Fields an event has written since then are newer than the poll and kept.
   */
  applyPoll(fields: SnapshotFields, basedOnSequence: number, receivedAt = this.now()): ReconcileResult {
    const fresh: SnapshotFields = {};
    for (const field of SNAPSHOT_FIELDS) {
      if (!(field in fields)) {
        continue;
      }
      const version = this.fieldVersions.get(field) ?? 0;
      if (version > basedOnSequence) {
        debugManager.trace('events', `Poll skips ${field}: event at ${version} is newer than poll base ${basedOnSequence}`);
        continue;
      }
      copyField(fresh, fields, field);
    }
    return this.merge(fresh, receivedAt, false);
  }

  private merge(fields: SnapshotFields, receivedAt: number, fromEvent: boolean): ReconcileResult {
    const current = this.snapshot;
    const next: SnapshotFields = {};
    const changed: SnapshotField[] = [];

    for (const field of SNAPSHOT_FIELDS) {
      if (field in fields && fields[field] !== current[field]) {
        copyField(next, fields, field);
        changed.push(field);
      } else if (current[field] !== undefined) {
        copyField(next, current, field);
      }
    }

    if (changed.length === 0) {
      return { applied: false, reason: 'unchanged' };
    }

    const sequence = current.sequence + 1;
    const positionUpdatedAt = changed.includes('position') ? receivedAt : current.positionUpdatedAt;
    const snapshot: PlaybackSnapshot = Object.freeze({
      ...next,
      transportState: next.transportState ?? 'UNKNOWN',
      sequence,
      updatedAt: receivedAt,
      ...(positionUpdatedAt !== undefined ? { positionUpdatedAt } : {})
    });
    this.snapshot = snapshot;

    if (fromEvent) {
      changed.forEach(field => this.fieldVersions.set(field, sequence));
    }

    debugManager.debug('events', `Snapshot ${sequence}: ${changed.join(', ')}`);
    return { applied: true, snapshot, changed };
  }

  private reportMalformed(raw: RawEvent, properties: string[], error?: string): void {
    this.consecutiveMalformed++;
    const diagnostic: MalformedEventDiagnostic = {
      service: raw.service,
      sid: raw.sid,
      seq: raw.seq,
      properties,
      error
    };
    logger.warn(`Malformed ${raw.service} event (SEQ ${raw.seq}): ${properties.join(', ')}${error ? ` - ${error}` : ''}`);
    this.emit('malformed', diagnostic);

    if (this.consecutiveMalformed >= this.malformedThreshold) {
      logger.error(`${this.consecutiveMalformed} malformed events in a row from ${raw.service}`);
      this.consecutiveMalformed = 0;
      this.emit('malformed-threshold', diagnostic);
    }
  }
}

function copyField(target: SnapshotFields, source: SnapshotFields, field: SnapshotField): void {
  switch (field) {
    case 'transportState': target.transportState = source.transportState; break;
    case 'transportStatus': target.transportStatus = source.transportStatus; break;
    case 'title': target.title = source.title; break;
    case 'artist': target.artist = source.artist; break;
    case 'album': target.album = source.album; break;
    case 'artworkUrl': target.artworkUrl = source.artworkUrl; break;
    case 'duration': target.duration = source.duration; break;
    case 'position': target.position = source.position; break;
    case 'trackUri': target.trackUri = source.trackUri; break;
    case 'currentUri': target.currentUri = source.currentUri; break;
    case 'currentUriMetadata': target.currentUriMetadata = source.currentUriMetadata; break;
    case 'nextTitle': target.nextTitle = source.nextTitle; break;
    case 'nextArtist': target.nextArtist = source.nextArtist; break;
    case 'source': target.source = source.source; break;
    case 'volume': target.volume = source.volume; break;
    case 'mute': target.mute = source.mute; break;
    case 'playMode': target.playMode = source.playMode; break;
  }
}
