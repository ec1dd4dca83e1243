import '../helpers/test-setup.js';
import { describe, it, before, after, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { StreamerDevice, type StreamerDeviceOptions } from '../../src/streamer-device.js';
import { CapabilityNegotiator } from '../../src/capability-negotiator.js';
import { UPnPSubscriber } from '../../src/upnp/subscriber.js';
import { buildDidl } from '../../src/upnp/didl.js';
import {
  CapabilityError,
  DeviceUnreachableError,
  NetworkError,
  ProtocolFaultError,
  SubscriptionError,
  ValidationError
} from '../../src/errors/streamer-errors.js';
import type { StateTransition } from '../../src/playback-state-machine.js';
import type { MalformedEventDiagnostic } from '../../src/event-reconciler.js';
import type { PlaybackSnapshot } from '../../src/types/streamer.js';
import { FakeStreamer, didl, lastChangeEvent, propertySet, type FakeStreamerOptions } from '../helpers/fake-streamer.js';
import { ManualScheduler, flushAsync, waitFor } from '../helpers/manual-scheduler.js';

const RCS = 'urn:schemas-upnp-org:metadata-1-0/RCS/';
const START = 1_700_000_000_000;

describe('StreamerDevice', () => {
  let device: StreamerDevice | undefined;
  let streamer: FakeStreamer;
  let scheduler: ManualScheduler;
  let snapshots: PlaybackSnapshot[];
  let transitions: StateTransition[];

  const subscriber = new UPnPSubscriber(event => device?.pushEvent(event), { timeoutMs: 1000, callbackHost: '127.0.0.1' });
  const negotiator = new CapabilityNegotiator({ timeoutMs: 1000, subscriptionTimeout: 1800, retryOptions: { maxAttempts: 0 } });

  async function createDevice(
    streamerOptions: FakeStreamerOptions = {},
    overrides: Partial<StreamerDeviceOptions> = {}
  ): Promise<StreamerDevice> {
    streamer = new FakeStreamer(streamerOptions);
    await streamer.start();
    const created = new StreamerDevice({
      location: streamer.location,
      negotiator,
      subscriber,
      httpTimeout: 1000,
      subscriptionTimeout: 1800,
      pollInterval: 0,
      malformedThreshold: 5,
      volumeStep: 5,
      scheduler,
      ...overrides
    });
    created.on('snapshot', (snapshot: PlaybackSnapshot) => snapshots.push(snapshot));
    created.on('state-change', (transition: StateTransition) => transitions.push(transition));
    device = created;
    return created;
  }

  async function connected(streamerOptions: FakeStreamerOptions = {}, overrides: Partial<StreamerDeviceOptions> = {}): Promise<StreamerDevice> {
    const created = await createDevice(streamerOptions, overrides);
    await created.connect();
    streamer.calls.length = 0;
    return created;
  }

  function lastArgs(action: string): Record<string, string> | undefined {
    return streamer.callsFor(action).at(-1)?.args;
  }

  before(async () => {
    await subscriber.start();
  });

  after(async () => {
    await subscriber.stop();
  });

  beforeEach(() => {
    scheduler = new ManualScheduler(START);
    snapshots = [];
    transitions = [];
  });

  afterEach(async () => {
    await device?.close();
    device = undefined;
    await streamer.stop();
  });

  describe('connect', () => {
    it('should negotiate, subscribe to every evented service and take a first poll', async () => {
      const streamerDevice = await createDevice();

      await streamerDevice.connect();

      assert.deepStrictEqual(
        streamer.genaCalls.filter(call => call.method === 'SUBSCRIBE').map(call => call.service),
        ['AVTransport', 'RenderingControl', 'Product']
      );
      assert.deepStrictEqual(streamerDevice.getSnapshot(), {
        transportState: 'STOPPED',
        transportStatus: 'OK',
        duration: 240,
        position: 10,
        playMode: 'NORMAL',
        volume: 30,
        mute: false,
        source: 'UPnP',
        sequence: 1,
        updatedAt: START,
        positionUpdatedAt: START
      });
      assert.strictEqual(streamerDevice.getState(), 'STOPPED');
      assert.deepStrictEqual(transitions, [{ from: 'IDLE', to: 'STOPPED', sequence: 1 }]);
      assert.strictEqual(snapshots.length, 1);
      assert.strictEqual(streamerDevice.getDescriptor()?.friendlyName, 'Living Room');
      assert.strictEqual(streamerDevice.getCapabilities()?.hasSourceList, true);
    });

    it('should fail when the AVTransport subscription is refused', async () => {
      const streamerDevice = await createDevice();
      streamer.subscribeStatus = 500;

      await assert.rejects(streamerDevice.connect(), SubscriptionError);
    });

    it('should fall back to polling for services that do not event', async () => {
      const streamerDevice = await createDevice({ evented: ['AVTransport'] });

      await streamerDevice.connect();

      assert.deepStrictEqual(streamer.genaCalls.map(call => call.service), ['AVTransport']);
      assert.strictEqual(streamerDevice.getSnapshot().volume, 30);
    });

    it('should refuse commands before connecting', async () => {
      const streamerDevice = await createDevice();

      await assert.rejects(
        streamerDevice.play(),
        (error: unknown) => error instanceof DeviceUnreachableError && error.message === 'Device unreachable: not connected'
      );
    });
  });

  describe('events', () => {
    it('should apply NOTIFYs and follow the transport state', async () => {
      const streamerDevice = await connected();

      await streamer.notify('AVTransport', lastChangeEvent({
        TransportState: 'PLAYING',
        CurrentTrackMetaData: didl({ title: 'So What', artist: 'Miles Davis' })
      }));
      await waitFor(() => snapshots.length === 2);

      const snapshot = streamerDevice.getSnapshot();
      assert.strictEqual(snapshot.transportState, 'PLAYING');
      assert.strictEqual(snapshot.title, 'So What');
      assert.strictEqual(snapshot.artist, 'Miles Davis');
      assert.strictEqual(snapshot.volume, 30);
      assert.strictEqual(snapshot.sequence, 2);
      assert.strictEqual(streamerDevice.getState(), 'PLAYING');
      assert.deepStrictEqual(transitions.at(-1), { from: 'STOPPED', to: 'PLAYING', sequence: 2 });
    });

    it('should ignore NOTIFYs that arrive out of order', async () => {
      const streamerDevice = await connected();

      await streamer.notify('AVTransport', lastChangeEvent({ TransportState: 'PLAYING' }), { seq: 5 });
      await waitFor(() => snapshots.length === 2);
      await streamer.notify('AVTransport', lastChangeEvent({ TransportState: 'PAUSED_PLAYBACK' }), { seq: 3 });
      await flushAsync();

      assert.strictEqual(snapshots.length, 2);
      assert.strictEqual(streamerDevice.getState(), 'PLAYING');
    });

    it('should merge volume and source events', async () => {
      const streamerDevice = await connected();

      await streamer.notify('RenderingControl', lastChangeEvent({ Volume: { channel: 'Master', val: '44' } }, RCS));
      await waitFor(() => snapshots.length === 2);
      await streamer.notify('Product', propertySet({ SourceIndex: '2' }));
      await waitFor(() => snapshots.length === 3);

      const snapshot = streamerDevice.getSnapshot();
      assert.strictEqual(snapshot.volume, 44);
      assert.strictEqual(snapshot.source, 'Digital 1');
      assert.strictEqual(snapshot.transportState, 'STOPPED');
      assert.strictEqual(streamerDevice.getState(), 'IDLE');
    });

    it('should drop events from an earlier generation', async () => {
      const streamerDevice = await connected();

      streamerDevice.pushEvent({
        service: 'AVTransport',
        sid: 'uuid:old',
        seq: 0,
        body: lastChangeEvent({ TransportState: 'PLAYING' }),
        generation: streamerDevice.generation - 1,
        receivedAt: START
      });
      await flushAsync();

      assert.strictEqual(snapshots.length, 1);
      assert.strictEqual(streamerDevice.getSnapshot().transportState, 'STOPPED');
    });

    it('should reconnect after too many malformed events', async () => {
      const streamerDevice = await connected({}, { malformedThreshold: 2 });
      const diagnostics: MalformedEventDiagnostic[] = [];
      streamerDevice.on('malformed', (diagnostic: MalformedEventDiagnostic) => diagnostics.push(diagnostic));

      for (const seq of [0, 1]) {
        streamerDevice.pushEvent({
          service: 'AVTransport',
          sid: 'uuid:fake-sid-1',
          seq,
          body: 'garbage',
          generation: streamerDevice.generation,
          receivedAt: START
        });
      }
      await waitFor(() => streamerDevice.generation === 2);

      assert.strictEqual(diagnostics.length, 2);
    });
  });

  describe('commands', () => {
    it('should send transport commands without touching the snapshot', async () => {
      const streamerDevice = await connected();

      await streamerDevice.play();
      await streamerDevice.pause();
      await streamerDevice.stop();
      await streamerDevice.nextTrack();
      await streamerDevice.previousTrack();

      assert.deepStrictEqual(streamer.calls.map(call => call.action), ['Play', 'Pause', 'Stop', 'Next', 'Previous']);
      assert.deepStrictEqual(lastArgs('Play'), { InstanceID: '0', Speed: '1' });
      assert.deepStrictEqual(lastArgs('Next'), { InstanceID: '0' });
      assert.strictEqual(streamerDevice.getSnapshot().transportState, 'STOPPED');
      assert.strictEqual(streamerDevice.getState(), 'STOPPED');
    });

    it('should restore the transport URI before play after an error', async () => {
      const streamerDevice = await connected();
      await streamer.notify('AVTransport', lastChangeEvent({
        TransportStatus: 'ERROR_OCCURRED',
        AVTransportURI: 'http://radio.example/stream'
      }));
      await waitFor(() => snapshots.length === 2);

      await streamerDevice.play();

      assert.deepStrictEqual(streamer.calls.map(call => call.action), ['SetAVTransportURI', 'Play']);
      assert.deepStrictEqual(lastArgs('SetAVTransportURI'), {
        InstanceID: '0',
        CurrentURI: 'http://radio.example/stream',
        CurrentURIMetaData: ''
      });
    });

    it('should set volume within 0..100', async () => {
      const streamerDevice = await connected();

      await streamerDevice.setVolume(45);
      assert.deepStrictEqual(lastArgs('SetVolume'), { InstanceID: '0', Channel: 'Master', DesiredVolume: '45' });

      await assert.rejects(streamerDevice.setVolume(101), ValidationError);
      await assert.rejects(streamerDevice.setVolume(2.5), ValidationError);
      assert.strictEqual(streamer.callsFor('SetVolume').length, 1);
    });

    it('should step volume from the last known level', async () => {
      const streamerDevice = await connected();

      await streamerDevice.volumeUp();
      assert.strictEqual(lastArgs('SetVolume')?.['DesiredVolume'], '35');

      await streamerDevice.volumeDown();
      assert.strictEqual(lastArgs('SetVolume')?.['DesiredVolume'], '25');

      await streamerDevice.adjustVolume(-40);
      assert.strictEqual(lastArgs('SetVolume')?.['DesiredVolume'], '0');

      await streamerDevice.adjustVolume(90);
      assert.strictEqual(lastArgs('SetVolume')?.['DesiredVolume'], '100');
    });

    it('should send mute as a boolean', async () => {
      const streamerDevice = await connected();

      await streamerDevice.setMute(true);

      assert.deepStrictEqual(lastArgs('SetMute'), { InstanceID: '0', Channel: 'Master', DesiredMute: '1' });
    });

    it('should select sources by name or index', async () => {
      const streamerDevice = await connected();

      await streamerDevice.selectSource('radio');
      assert.deepStrictEqual(lastArgs('SetSourceIndex'), { Value: '1' });

      await streamerDevice.selectSource(3);
      assert.deepStrictEqual(lastArgs('SetSourceIndex'), { Value: '3' });

      await assert.rejects(
        streamerDevice.selectSource('Tape'),
        (error: unknown) => error instanceof ValidationError && error.message === 'Unknown source: Tape'
      );
    });

    it('should seek to a relative time', async () => {
      const streamerDevice = await connected();

      await streamerDevice.seek(90);

      assert.deepStrictEqual(lastArgs('Seek'), { InstanceID: '0', Unit: 'REL_TIME', Target: '00:01:30' });
      await assert.rejects(streamerDevice.seek(-1), ValidationError);
    });

    it('should set the play mode', async () => {
      const streamerDevice = await connected();

      await streamerDevice.setPlayMode('shuffle');

      assert.deepStrictEqual(lastArgs('SetPlayMode'), { InstanceID: '0', NewPlayMode: 'SHUFFLE' });
      await assert.rejects(streamerDevice.setPlayMode('bogus'), ValidationError);
    });

    it('should load and start a URL with metadata', async () => {
      const streamerDevice = await connected();

      await streamerDevice.playUrl('http://192.168.1.5:9000/a.flac', { title: 'A', mimeType: 'audio/flac' });

      assert.deepStrictEqual(streamer.calls.map(call => call.action), ['SetAVTransportURI', 'Play']);
      assert.deepStrictEqual(lastArgs('SetAVTransportURI'), {
        InstanceID: '0',
        CurrentURI: 'http://192.168.1.5:9000/a.flac',
        CurrentURIMetaData: buildDidl({ uri: 'http://192.168.1.5:9000/a.flac', title: 'A', mimeType: 'audio/flac' })
      });
      await assert.rejects(streamerDevice.playUrl('not a url'), ValidationError);
    });

    it('should guess the stream type and title when the caller gives none', async () => {
      const streamerDevice = await connected();

      await streamerDevice.playUrl('http://192.168.1.5:9000/music/b.flac');

      const metadata = lastArgs('SetAVTransportURI')?.CurrentURIMetaData ?? '';
      assert(metadata.includes('protocolInfo="http-get:*:audio/x-flac:*"'));
      assert(metadata.includes('<dc:title>b.flac</dc:title>'));
    });

    it('should report a timed-out command without changing the state', async () => {
      const streamerDevice = await connected({}, { httpTimeout: 150 });
      const before = streamerDevice.getSnapshot();
      streamer.on('Play', () => ({ hang: true }));

      await assert.rejects(
        streamerDevice.play(),
        (error: unknown) => error instanceof NetworkError && error.kind === 'NETWORK' && error.message === 'Play timed out after 150ms'
      );

      assert.strictEqual(streamerDevice.getState(), 'STOPPED');
      assert.strictEqual(streamerDevice.getSnapshot(), before);
      assert.strictEqual(snapshots.length, 1);
    });

    it('should surface device faults', async () => {
      const streamerDevice = await connected();
      streamer.on('Pause', () => ({ fault: '701', description: 'Transition not available' }));

      await assert.rejects(
        streamerDevice.pause(),
        (error: unknown) => error instanceof ProtocolFaultError && error.errorCode === '701'
      );
    });

    it('should refuse what a transport-only device cannot do', async () => {
      const streamerDevice = await connected({ services: ['AVTransport'] });

      await assert.rejects(streamerDevice.setVolume(10), CapabilityError);
      await assert.rejects(streamerDevice.selectSource('Radio'), CapabilityError);
      await assert.rejects(streamerDevice.adjustVolume(5), ValidationError);
      assert.strictEqual(streamer.calls.length, 0);
    });
  });

  describe('poll', () => {
    it('should merge polled values', async () => {
      const streamerDevice = await connected();
      streamer.on('GetVolume', () => ({ result: { CurrentVolume: '62' } }));
      streamer.on('GetTransportInfo', () => ({ result: { CurrentTransportState: 'PLAYING', CurrentTransportStatus: 'OK', CurrentSpeed: '1' } }));

      const snapshot = await streamerDevice.poll();

      assert.strictEqual(snapshot.volume, 62);
      assert.strictEqual(snapshot.transportState, 'PLAYING');
      assert.strictEqual(streamerDevice.getState(), 'PLAYING');
    });

    it('should skip optional steps that fail', async () => {
      const streamerDevice = await connected();
      streamer.on('GetMute', () => ({ fault: '501' }));
      streamer.on('GetVolume', () => ({ result: { CurrentVolume: '12' } }));

      const snapshot = await streamerDevice.poll();

      assert.strictEqual(snapshot.volume, 12);
      assert.strictEqual(snapshot.mute, false);
    });

    it('should poll on the configured interval', async () => {
      await connected({}, { pollInterval: 60000 });
      streamer.on('GetVolume', () => ({ result: { CurrentVolume: '70' } }));

      scheduler.advance(60000);
      await waitFor(() => snapshots.length === 2);

      assert.strictEqual(snapshots[1]?.volume, 70);
    });
  });

  describe('unreachable', () => {
    it('should go unreachable when renewals and the fresh subscribe fail, then recover', async () => {
      const streamerDevice = await connected();
      const reasons: string[] = [];
      const recovered: PlaybackSnapshot[] = [];
      streamerDevice.on('unreachable', (reason: string) => reasons.push(reason));
      streamerDevice.on('recovered', (snapshot: PlaybackSnapshot) => recovered.push(snapshot));
      streamer.renewStatus = 500;
      streamer.subscribeStatus = 500;

      // Renewal at half the 1800s lease, then retries after 1s and 2s
      scheduler.advance(900000);
      await waitFor(() => scheduler.pendingCount === 3);
      scheduler.advance(1000);
      await waitFor(() => scheduler.pendingCount === 3);
      scheduler.advance(2000);
      await waitFor(() => reasons.length === 1);

      assert.match(reasons[0] ?? '', /subscription lost/);
      assert.strictEqual(streamerDevice.getState(), 'UNREACHABLE');
      assert.deepStrictEqual(transitions.at(-1), { from: 'STOPPED', to: 'UNREACHABLE', sequence: undefined });
      await assert.rejects(streamerDevice.play(), DeviceUnreachableError);

      streamer.renewStatus = 200;
      streamer.subscribeStatus = 200;
      await streamerDevice.reconnect();

      assert.strictEqual(streamerDevice.getState(), 'STOPPED');
      assert.strictEqual(streamerDevice.generation, 2);
      assert.strictEqual(recovered.length, 1);
      assert.deepStrictEqual(transitions.at(-1), { from: 'UNREACHABLE', to: 'STOPPED', sequence: 1 });
      await streamerDevice.play();
    });

    it('should share one reconnect between concurrent callers', async () => {
      const streamerDevice = await connected();
      const subscribesBefore = streamer.genaCalls.filter(call => call.method === 'SUBSCRIBE' && !call.sid).length;

      await Promise.all([streamerDevice.reconnect(), streamerDevice.reconnect()]);

      const subscribesAfter = streamer.genaCalls.filter(call => call.method === 'SUBSCRIBE' && !call.sid).length;
      assert.strictEqual(subscribesAfter - subscribesBefore, 3);
      assert.strictEqual(streamerDevice.generation, 2);
    });

    it('should not resubscribe when closed during a reconnect', async () => {
      const streamerDevice = await connected();
      const freshSubscribes = () => streamer.genaCalls.filter(call => call.method === 'SUBSCRIBE' && !call.sid).length;
      const subscribesBefore = freshSubscribes();

      const reconnecting = streamerDevice.reconnect();
      await streamerDevice.close();
      await reconnecting;

      assert.strictEqual(freshSubscribes(), subscribesBefore);
      assert.strictEqual(scheduler.pendingCount, 0);
      assert.strictEqual(streamer.genaCalls.filter(call => call.method === 'UNSUBSCRIBE').length, 3);
    });
  });
});
