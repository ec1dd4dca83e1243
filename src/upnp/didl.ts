import { XMLBuilder } from 'fast-xml-parser';
import { parseDuration } from '../utils/duration.js';
import { attrOf, findFirst, parseXML, textOf } from '../utils/xml.js';

export interface DidlTrack {
  title?: string;
  artist?: string;
  album?: string;
  artworkUrl?: string;
  uri?: string;
  duration?: number;
}

export interface DidlItem {
  uri: string;
  title?: string;
  artist?: string;
  album?: string;
  artworkUrl?: string;
  mimeType?: string;
  upnpClass?: string;
}

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  format: false,
  suppressEmptyNode: true
});

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function resolveArtworkUrl(art: string, baseUrl: string): string {
  try {
    return new URL(art, baseUrl).toString();
  } catch {
    return art;
  }
}

/**
 * Extract track details from a DIDL-Lite document. The document must already
 * be decoded to markup (see decodeEmbeddedXml).
 */
export function parseDidl(xml: string, baseUrl: string): DidlTrack {
  const doc = parseXML(xml);
  const res = findFirst(doc, 'res');
  const art = nonEmpty(textOf(findFirst(doc, 'albumArtURI')));

  const track: DidlTrack = {
    title: nonEmpty(textOf(findFirst(doc, 'title'))),
    artist: nonEmpty(textOf(findFirst(doc, 'artist'))) ?? nonEmpty(textOf(findFirst(doc, 'creator'))),
    album: nonEmpty(textOf(findFirst(doc, 'album'))),
    artworkUrl: art ? resolveArtworkUrl(art, baseUrl) : undefined,
    uri: nonEmpty(textOf(res)),
    duration: parseDuration(attrOf(res, 'duration'))
  };
  return track;
}

function urlPath(uri: string): string {
  try {
    return new URL(uri).pathname;
  } catch {
    return uri;
  }
}

/**
 * MIME type for a stream URL, from its extension. Station streams without an
 * extension are AAC.
 */
export function guessMimeType(uri: string): string {
  const path = urlPath(uri).toLowerCase();
  if (path.endsWith('.aac') || uri.includes('stationstream')) {
    return 'audio/x-mpeg-aac';
  }
  if (path.endsWith('.mp3')) {
    return 'audio/mpeg';
  }
  if (path.endsWith('.flac')) {
    return 'audio/x-flac';
  }
  return '*/*';
}

/**
 * Last path segment of a URL, used when an item has no title
 */
export function titleFromUri(uri: string): string {
  const name = urlPath(uri).split('/').pop() ?? '';
  try {
    return decodeURIComponent(name) || 'Unknown';
  } catch {
    return name || 'Unknown';
  }
}

/**
 * Build DIDL-Lite metadata for SetAVTransportURI
 */
export function buildDidl(item: DidlItem): string {
  const entry: Record<string, unknown> = {
    '@_id': '0',
    '@_parentID': '-1',
    '@_restricted': '1',
    'dc:title': item.title || titleFromUri(item.uri)
  };
  if (item.artist) {
    entry['upnp:artist'] = item.artist;
  }
  if (item.album) {
    entry['upnp:album'] = item.album;
  }
  if (item.artworkUrl) {
    entry['upnp:albumArtURI'] = item.artworkUrl;
  }
  entry['upnp:class'] = item.upnpClass || 'object.item.audioItem.musicTrack';
  entry['res'] = {
    '@_protocolInfo': `http-get:*:${item.mimeType || guessMimeType(item.uri)}:*`,
    '#text': item.uri
  };

  return builder.build({
    'DIDL-Lite': {
      '@_xmlns': 'urn:schemas-upnp-org:metadata-1-0/DIDL-Lite/',
      '@_xmlns:dc': 'http://purl.org/dc/elements/1.1/',
      '@_xmlns:upnp': 'urn:schemas-upnp-org:metadata-1-0/upnp/',
      'item': entry
    }
  });
}
