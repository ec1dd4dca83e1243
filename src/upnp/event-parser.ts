import { MalformedResponseError } from '../errors/streamer-errors.js';
import { debugManager } from '../utils/debug-manager.js';
import { parseDuration } from '../utils/duration.js';
import { asArray, attrOf, decodeEmbeddedXml, findFirst, isWellFormed, isXmlNode, parseXML, textOf } from '../utils/xml.js';
import { parseDidl } from './didl.js';
import type { MediaInfo, PositionInfo, TransportInfo } from '../types/soap-responses.js';
import type { PlayMode, ServiceName, SnapshotFields, SourceInfo, TransportState } from '../types/streamer.js';

export interface EventParseContext {
  /** Relative artwork URLs are resolved against this */
  baseUrl: string;
  /** Source list for mapping the Product SourceIndex */
  sources: readonly SourceInfo[];
}

export interface ParsedEvent {
  /**
   * Fields the event carried. A key that is present with an undefined value
   * clears that field; an absent key leaves it unchanged.
   */
  fields: SnapshotFields;
  /** Properties (or LastChange variables) whose content could not be read */
  malformed: string[];
}

const TRANSPORT_STATES: readonly TransportState[] = ['STOPPED', 'PLAYING', 'PAUSED', 'TRANSITIONING', 'NO_MEDIA', 'UNKNOWN'];

const PLAY_MODES: readonly PlayMode[] = ['NORMAL', 'SHUFFLE', 'REPEAT_ONE', 'REPEAT_ALL', 'SHUFFLE_NOREPEAT', 'RANDOM', 'DIRECT_1', 'INTRO'];

export function normalizeTransportState(value: string): TransportState {
  const upper = value.trim().toUpperCase();
  switch (upper) {
    case 'PAUSED_PLAYBACK':
    case 'PAUSED_RECORDING':
      return 'PAUSED';
    case 'NO_MEDIA_PRESENT':
      return 'NO_MEDIA';
    default:
      return TRANSPORT_STATES.find(state => state === upper) ?? 'UNKNOWN';
  }
}

export function normalizePlayMode(value: string): PlayMode | undefined {
  const upper = value.trim().toUpperCase();
  return PLAY_MODES.find(mode => mode === upper);
}

function isUnset(value: string | undefined): boolean {
  return !value || value === 'NOT_IMPLEMENTED';
}

/**
 * Track fields from a DIDL-Lite value (possibly entity-encoded again).
 * Returns null when the value is present but unreadable, undefined when it
 * carries nothing.
 */
export function metadataFields(raw: string | undefined, baseUrl: string): SnapshotFields | null | undefined {
  if (raw === undefined || isUnset(raw.trim())) {
    return undefined;
  }
  const didl = decodeEmbeddedXml(raw);
  if (!didl) {
    return null;
  }
  const track = parseDidl(didl, baseUrl);
  const fields: SnapshotFields = {
    title: track.title,
    artist: track.artist,
    album: track.album,
    artworkUrl: track.artworkUrl
  };
  if (track.duration !== undefined) {
    fields.duration = track.duration;
  }
  if (track.uri) {
    fields.trackUri = track.uri;
  }
  return fields;
}

function channelValue(value: unknown): string | undefined {
  const entries = asArray(value);
  const master = entries.find(entry => {
    const channel = attrOf(entry, 'channel');
    return channel === undefined || channel === 'Master';
  });
  return attrOf(master ?? entries[0], 'val');
}

function applyAvTransportVariable(name: string, value: unknown, context: EventParseContext, result: ParsedEvent): void {
  const val = attrOf(value, 'val');
  if (val === undefined) {
    return;
  }
  const fields = result.fields;

  switch (name) {
    case 'TransportState':
      fields.transportState = normalizeTransportState(val);
      break;
    case 'TransportStatus':
      fields.transportStatus = val;
      break;
    case 'CurrentTrackDuration': {
      const duration = parseDuration(val);
      if (duration !== undefined) {
        fields.duration = duration;
      }
      break;
    }
    case 'RelativeTimePosition': {
      const position = parseDuration(val);
      if (position !== undefined) {
        fields.position = position;
      }
      break;
    }
    case 'CurrentTrackURI':
      if (!isUnset(val)) {
        fields.trackUri = val;
      }
      break;
    case 'CurrentTrackMetaData': {
      const track = metadataFields(val, context.baseUrl);
      if (track === null) {
        result.malformed.push(name);
      } else if (track) {
        // An explicit CurrentTrackDuration wins over the res@duration
        const { duration, trackUri, ...rest } = track;
        Object.assign(fields, rest);
        if (duration !== undefined && fields.duration === undefined) {
          fields.duration = duration;
        }
        if (trackUri !== undefined && fields.trackUri === undefined) {
          fields.trackUri = trackUri;
        }
      }
      break;
    }
    case 'AVTransportURI':
      if (!isUnset(val)) {
        fields.currentUri = val;
      }
      break;
    case 'AVTransportURIMetaData': {
      if (isUnset(val.trim())) {
        break;
      }
      const didl = decodeEmbeddedXml(val);
      if (didl) {
        fields.currentUriMetadata = didl;
      } else {
        result.malformed.push(name);
      }
      break;
    }
    case 'NextAVTransportURIMetaData': {
      const next = metadataFields(val, context.baseUrl);
      if (next === null) {
        result.malformed.push(name);
      } else if (next) {
        fields.nextTitle = next.title;
        fields.nextArtist = next.artist;
      }
      break;
    }
    case 'CurrentPlayMode': {
      const mode = normalizePlayMode(val);
      if (mode) {
        fields.playMode = mode;
      }
      break;
    }
    default:
      // Variables we do not model are ignored
      break;
  }
}

function applyRenderingControlVariable(name: string, value: unknown, result: ParsedEvent): void {
  const val = channelValue(value);
  if (val === undefined) {
    return;
  }

  if (name === 'Volume') {
    const volume = parseInt(val, 10);
    if (Number.isNaN(volume)) {
      result.malformed.push(name);
    } else {
      result.fields.volume = Math.min(100, Math.max(0, volume));
    }
  } else if (name === 'Mute') {
    result.fields.mute = val === '1' || val.toLowerCase() === 'true';
  }
}

function applyLastChange(service: ServiceName, text: string, context: EventParseContext, result: ParsedEvent): void {
  const xml = decodeEmbeddedXml(text);
  if (!xml) {
    result.malformed.push('LastChange');
    return;
  }

  const instance = asArray(findFirst(parseXML(xml), 'InstanceID'))[0];
  if (!isXmlNode(instance)) {
    return;
  }

  for (const [name, value] of Object.entries(instance)) {
    if (name.startsWith('@_')) {
      continue;
    }
    if (service === 'AVTransport') {
      applyAvTransportVariable(name, value, context, result);
    } else if (service === 'RenderingControl') {
      applyRenderingControlVariable(name, value, result);
    }
  }
}

function applyProductProperty(name: string, value: unknown, context: EventParseContext, result: ParsedEvent): void {
  if (name !== 'SourceIndex') {
    return;
  }
  const index = parseInt(textOf(value) ?? '', 10);
  if (Number.isNaN(index)) {
    result.malformed.push(name);
    return;
  }
  const source = context.sources.find(s => s.index === index);
  result.fields.source = source ? source.name : String(index);
}

/**
 * Parse a NOTIFY body (e:propertyset). Throws MalformedResponseError when the
 * property set itself cannot be read; a bad individual property is reported
 * in `malformed` and contributes no fields.
 */
export function parseEventBody(service: ServiceName, body: string, context: EventParseContext): ParsedEvent {
  if (!body.trim() || !isWellFormed(body)) {
    throw new MalformedResponseError(service, 'NOTIFY', 'Event body is not well-formed XML');
  }

  const propertyset = findFirst(parseXML(body), 'propertyset');
  if (propertyset === undefined) {
    throw new MalformedResponseError(service, 'NOTIFY', 'Event body has no propertyset');
  }

  const result: ParsedEvent = { fields: {}, malformed: [] };

  for (const property of asArray(findFirst(propertyset, 'property'))) {
    if (!isXmlNode(property)) {
      continue;
    }
    for (const [name, value] of Object.entries(property)) {
      if (name.startsWith('@_')) {
        continue;
      }
      if (name === 'LastChange') {
        applyLastChange(service, textOf(value) ?? '', context, result);
      } else if (service === 'Product') {
        applyProductProperty(name, value, context, result);
      } else {
        debugManager.trace('events', `Ignoring ${service} property ${name}`);
      }
    }
  }

  return result;
}

export function fieldsFromTransportInfo(info: TransportInfo): SnapshotFields {
  const fields: SnapshotFields = {};
  if (info.CurrentTransportState) {
    fields.transportState = normalizeTransportState(info.CurrentTransportState);
  }
  if (info.CurrentTransportStatus) {
    fields.transportStatus = info.CurrentTransportStatus;
  }
  return fields;
}

export function fieldsFromPositionInfo(info: PositionInfo, baseUrl: string, includePosition: boolean): SnapshotFields {
  const fields: SnapshotFields = {};
  const track = metadataFields(info.TrackMetaData, baseUrl);
  if (track) {
    Object.assign(fields, track);
  }
  const duration = parseDuration(info.TrackDuration);
  if (duration !== undefined) {
    fields.duration = duration;
  }
  if (!isUnset(info.TrackURI)) {
    fields.trackUri = info.TrackURI;
  }
  if (includePosition) {
    const position = parseDuration(info.RelTime);
    if (position !== undefined) {
      fields.position = position;
    }
  }
  return fields;
}

export function fieldsFromMediaInfo(info: MediaInfo): SnapshotFields {
  const fields: SnapshotFields = {};
  if (!isUnset(info.CurrentURI)) {
    fields.currentUri = info.CurrentURI;
  }
  if (!isUnset(info.CurrentURIMetaData.trim())) {
    const didl = decodeEmbeddedXml(info.CurrentURIMetaData);
    if (didl) {
      fields.currentUriMetadata = didl;
    }
  }
  return fields;
}
