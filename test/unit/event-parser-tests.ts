import '../helpers/test-setup.js';
import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  fieldsFromMediaInfo,
  fieldsFromPositionInfo,
  fieldsFromTransportInfo,
  normalizePlayMode,
  normalizeTransportState,
  parseEventBody,
  type EventParseContext
} from '../../src/upnp/event-parser.js';
import { buildDidl, guessMimeType, parseDidl } from '../../src/upnp/didl.js';
import { MalformedResponseError } from '../../src/errors/streamer-errors.js';
import { escapeXml } from '../../src/utils/xml.js';
import { didl, lastChangeEvent, propertySet } from '../helpers/fake-streamer.js';

const context: EventParseContext = {
  baseUrl: 'http://192.168.1.20:8080/',
  sources: [
    { index: 0, name: 'UPnP', type: 'UPnP', visible: true },
    { index: 1, name: 'Radio', type: 'Radio', visible: true },
    { index: 2, name: 'Digital 1', type: 'Digital', visible: true }
  ]
};

const RCS = 'urn:schemas-upnp-org:metadata-1-0/RCS/';

const kindOfBlue = didl({
  title: 'So What',
  artist: 'Miles Davis',
  album: 'Kind of Blue',
  art: '/art/1.jpg',
  uri: 'http://192.168.1.5:9000/music/1.flac',
  duration: '0:09:22'
});

describe('Event Parser', () => {
  describe('AVTransport LastChange', () => {
    it('should read transport state and track metadata', () => {
      const body = lastChangeEvent({ TransportState: 'PLAYING', CurrentTrackMetaData: kindOfBlue });

      const parsed = parseEventBody('AVTransport', body, context);

      assert.deepStrictEqual(parsed.malformed, []);
      assert.deepStrictEqual(parsed.fields, {
        transportState: 'PLAYING',
        title: 'So What',
        artist: 'Miles Davis',
        album: 'Kind of Blue',
        artworkUrl: 'http://192.168.1.20:8080/art/1.jpg',
        duration: 562,
        trackUri: 'http://192.168.1.5:9000/music/1.flac'
      });
    });

    it('should prefer CurrentTrackDuration over the res duration', () => {
      const body = lastChangeEvent({ CurrentTrackMetaData: kindOfBlue, CurrentTrackDuration: '0:09:25' });

      assert.strictEqual(parseEventBody('AVTransport', body, context).fields.duration, 565);
    });

    it('should decode metadata that was entity-encoded twice', () => {
      const body = lastChangeEvent({ CurrentTrackMetaData: escapeXml(kindOfBlue) });

      const parsed = parseEventBody('AVTransport', body, context);

      assert.deepStrictEqual(parsed.malformed, []);
      assert.strictEqual(parsed.fields.title, 'So What');
      assert.strictEqual(parsed.fields.album, 'Kind of Blue');
    });

    it('should clear fields the new track does not carry', () => {
      const body = lastChangeEvent({ CurrentTrackMetaData: didl({ title: 'Radio Paradise' }) });

      assert.deepStrictEqual(parseEventBody('AVTransport', body, context).fields, {
        title: 'Radio Paradise',
        artist: undefined,
        album: undefined,
        artworkUrl: undefined
      });
    });

    it('should leave track fields alone for empty or NOT_IMPLEMENTED metadata', () => {
      const body = lastChangeEvent({ TransportState: 'STOPPED', CurrentTrackMetaData: 'NOT_IMPLEMENTED' });
      const empty = lastChangeEvent({ CurrentTrackMetaData: '' });

      assert.deepStrictEqual(parseEventBody('AVTransport', body, context), { fields: { transportState: 'STOPPED' }, malformed: [] });
      assert.deepStrictEqual(parseEventBody('AVTransport', empty, context), { fields: {}, malformed: [] });
    });

    it('should report unreadable metadata and keep the rest of the event', () => {
      const body = lastChangeEvent({ TransportState: 'PAUSED_PLAYBACK', CurrentTrackMetaData: '<DIDL-Lite><item>' });

      const parsed = parseEventBody('AVTransport', body, context);

      assert.deepStrictEqual(parsed.malformed, ['CurrentTrackMetaData']);
      assert.deepStrictEqual(parsed.fields, { transportState: 'PAUSED' });
    });

    it('should read position, play mode and the next track', () => {
      const body = lastChangeEvent({
        RelativeTimePosition: '0:01:05',
        CurrentPlayMode: 'repeat_all',
        NextAVTransportURIMetaData: didl({ title: 'Freddie Freeloader', artist: 'Miles Davis' })
      });

      assert.deepStrictEqual(parseEventBody('AVTransport', body, context).fields, {
        position: 65,
        playMode: 'REPEAT_ALL',
        nextTitle: 'Freddie Freeloader',
        nextArtist: 'Miles Davis'
      });
    });

    it('should keep the transport URI and its metadata as markup', () => {
      const metadata = didl({ title: 'Stream', uri: 'http://radio.example/stream' });
      const body = lastChangeEvent({ AVTransportURI: 'http://radio.example/stream', AVTransportURIMetaData: metadata });

      assert.deepStrictEqual(parseEventBody('AVTransport', body, context).fields, {
        currentUri: 'http://radio.example/stream',
        currentUriMetadata: metadata
      });
    });

    it('should ignore variables it does not model', () => {
      const body = lastChangeEvent({ NumberOfTracks: '12', CurrentMediaDuration: 'NOT_IMPLEMENTED' });

      assert.deepStrictEqual(parseEventBody('AVTransport', body, context), { fields: {}, malformed: [] });
    });

    it('should report a LastChange that is not XML', () => {
      const body = propertySet({ LastChange: '<Event><InstanceID val="0">' });

      assert.deepStrictEqual(parseEventBody('AVTransport', body, context).malformed, ['LastChange']);
    });
  });

  describe('RenderingControl LastChange', () => {
    it('should read master volume and mute', () => {
      const body = lastChangeEvent({
        Volume: { channel: 'Master', val: '40' },
        Mute: { channel: 'Master', val: '1' }
      }, RCS);

      assert.deepStrictEqual(parseEventBody('RenderingControl', body, context).fields, { volume: 40, mute: true });
    });

    it('should clamp volume to 0..100', () => {
      const body = lastChangeEvent({ Volume: { channel: 'Master', val: '150' } }, RCS);

      assert.strictEqual(parseEventBody('RenderingControl', body, context).fields.volume, 100);
    });

    it('should report a volume that is not a number', () => {
      const body = lastChangeEvent({ Volume: { channel: 'Master', val: 'loud' }, Mute: { channel: 'Master', val: 'false' } }, RCS);

      const parsed = parseEventBody('RenderingControl', body, context);
      assert.deepStrictEqual(parsed.malformed, ['Volume']);
      assert.deepStrictEqual(parsed.fields, { mute: false });
    });
  });

  describe('Product properties', () => {
    it('should map the source index to its name', () => {
      const parsed = parseEventBody('Product', propertySet({ SourceIndex: '2', Standby: 'false' }), context);

      assert.deepStrictEqual(parsed, { fields: { source: 'Digital 1' }, malformed: [] });
    });

    it('should fall back to the index for unknown sources', () => {
      assert.strictEqual(parseEventBody('Product', propertySet({ SourceIndex: '9' }), context).fields.source, '9');
    });

    it('should report an unreadable source index', () => {
      assert.deepStrictEqual(parseEventBody('Product', propertySet({ SourceIndex: 'tv' }), context).malformed, ['SourceIndex']);
    });
  });

  describe('malformed bodies', () => {
    it('should throw for bodies that are not XML', () => {
      assert.throws(() => parseEventBody('AVTransport', '<e:propertyset>', context), MalformedResponseError);
      assert.throws(() => parseEventBody('AVTransport', '', context), MalformedResponseError);
    });

    it('should throw when there is no property set', () => {
      assert.throws(
        () => parseEventBody('AVTransport', '<root><value>1</value></root>', context),
        (error: unknown) => error instanceof MalformedResponseError && error.message === 'Event body has no propertyset'
      );
    });
  });

  describe('normalization', () => {
    it('should map device transport states', () => {
      assert.strictEqual(normalizeTransportState('PAUSED_PLAYBACK'), 'PAUSED');
      assert.strictEqual(normalizeTransportState('NO_MEDIA_PRESENT'), 'NO_MEDIA');
      assert.strictEqual(normalizeTransportState(' playing '), 'PLAYING');
      assert.strictEqual(normalizeTransportState('RECORDING'), 'UNKNOWN');
    });

    it('should accept known play modes in any case', () => {
      assert.strictEqual(normalizePlayMode('shuffle'), 'SHUFFLE');
      assert.strictEqual(normalizePlayMode('REPEAT_ONE'), 'REPEAT_ONE');
      assert.strictEqual(normalizePlayMode('bogus'), undefined);
    });
  });

  describe('poll results', () => {
    it('should read transport info', () => {
      assert.deepStrictEqual(
        fieldsFromTransportInfo({ CurrentTransportState: 'TRANSITIONING', CurrentTransportStatus: 'OK', CurrentSpeed: '1' }),
        { transportState: 'TRANSITIONING', transportStatus: 'OK' }
      );
    });

    it('should only include position when asked', () => {
      const info = {
        Track: '1',
        TrackDuration: '0:04:00',
        TrackMetaData: '',
        TrackURI: '',
        RelTime: '0:01:05',
        AbsTime: 'NOT_IMPLEMENTED'
      };

      assert.deepStrictEqual(fieldsFromPositionInfo(info, context.baseUrl, false), { duration: 240 });
      assert.deepStrictEqual(fieldsFromPositionInfo(info, context.baseUrl, true), { duration: 240, position: 65 });
    });

    it('should read media info and skip unset values', () => {
      assert.deepStrictEqual(fieldsFromMediaInfo({
        NrTracks: '1',
        MediaDuration: '',
        CurrentURI: 'http://radio.example/stream',
        CurrentURIMetaData: 'NOT_IMPLEMENTED',
        NextURI: '',
        NextURIMetaData: ''
      }), { currentUri: 'http://radio.example/stream' });
    });
  });

  describe('DIDL-Lite', () => {
    it('should fall back to dc:creator for the artist', () => {
      const xml = '<DIDL-Lite xmlns="urn:schemas-upnp-org:metadata-1-0/DIDL-Lite/" xmlns:dc="http://purl.org/dc/elements/1.1/">'
        + '<item><dc:title>Track</dc:title><dc:creator>Someone</dc:creator></item></DIDL-Lite>';

      assert.deepStrictEqual(parseDidl(xml, context.baseUrl), {
        title: 'Track',
        artist: 'Someone',
        album: undefined,
        artworkUrl: undefined,
        uri: undefined,
        duration: undefined
      });
    });

    it('should build metadata the parser can read back', () => {
      const xml = buildDidl({ uri: 'http://192.168.1.5/a.mp3', title: 'A & B', artist: 'Band', mimeType: 'audio/mpeg' });

      assert(xml.includes('protocolInfo="http-get:*:audio/mpeg:*"'));
      assert(xml.includes('<dc:title>A &amp; B</dc:title>'));
      const track = parseDidl(xml, context.baseUrl);
      assert.strictEqual(track.title, 'A & B');
      assert.strictEqual(track.artist, 'Band');
      assert.strictEqual(track.uri, 'http://192.168.1.5/a.mp3');
    });

    it('should title an untitled item with its file name', () => {
      const xml = buildDidl({ uri: 'http://192.168.1.5/music/Blue%20in%20Green.mp3?session=1' });

      assert.strictEqual(parseDidl(xml, context.baseUrl).title, 'Blue in Green.mp3');
      assert(xml.includes('<upnp:class>object.item.audioItem.musicTrack</upnp:class>'));
      assert.strictEqual(parseDidl(buildDidl({ uri: 'http://radio.local/' }), context.baseUrl).title, 'Unknown');
    });

    it('should infer the protocol MIME type from the URL', () => {
      assert.strictEqual(guessMimeType('http://192.168.1.5/a.FLAC'), 'audio/x-flac');
      assert.strictEqual(guessMimeType('http://192.168.1.5/a.mp3?token=test-secret'), 'audio/mpeg');
      assert.strictEqual(guessMimeType('http://192.168.1.5/a.aac'), 'audio/x-mpeg-aac');
      assert.strictEqual(guessMimeType('http://radio.local/stationstream/42'), 'audio/x-mpeg-aac');
      assert.strictEqual(guessMimeType('http://radio.local/live'), '*/*');

      assert(buildDidl({ uri: 'http://192.168.1.5/a.flac' }).includes('protocolInfo="http-get:*:audio/x-flac:*"'));
      assert(buildDidl({ uri: 'http://192.168.1.5/a.flac', mimeType: 'audio/flac' }).includes('protocolInfo="http-get:*:audio/flac:*"'));
    });
  });
});
