import '../helpers/test-setup.js';
import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { EventReconciler, type MalformedEventDiagnostic } from '../../src/event-reconciler.js';
import type { RawEvent, ServiceName } from '../../src/types/streamer.js';
import { didl, lastChangeEvent, propertySet } from '../helpers/fake-streamer.js';

const RCS = 'urn:schemas-upnp-org:metadata-1-0/RCS/';

function raw(seq: number, body: string, options: { sid?: string; service?: ServiceName; receivedAt?: number } = {}): RawEvent {
  return {
    service: options.service ?? 'AVTransport',
    sid: options.sid ?? 'uuid:avt-1',
    seq,
    body,
    generation: 1,
    receivedAt: options.receivedAt ?? 1000
  };
}

const playing = lastChangeEvent({ TransportState: 'PLAYING' });
const paused = lastChangeEvent({ TransportState: 'PAUSED_PLAYBACK' });
const stopped = lastChangeEvent({ TransportState: 'STOPPED' });

function volumeEvent(level: number, seq: number): RawEvent {
  return raw(seq, lastChangeEvent({ Volume: { channel: 'Master', val: String(level) } }, RCS), {
    sid: 'uuid:rc-1',
    service: 'RenderingControl'
  });
}

describe('EventReconciler', () => {
  let reconciler: EventReconciler;

  beforeEach(() => {
    reconciler = new EventReconciler({ baseUrl: 'http://192.168.1.20:8080/', malformedThreshold: 3, now: () => 500 });
  });

  it('should start from an unknown snapshot', () => {
    const snapshot = reconciler.getSnapshot();

    assert.deepStrictEqual(snapshot, { transportState: 'UNKNOWN', sequence: 0, updatedAt: 500 });
    assert(Object.isFrozen(snapshot));
  });

  it('should apply an event and bump the sequence', () => {
    const result = reconciler.onEvent(raw(0, playing));

    assert.strictEqual(result.applied, true);
    if (result.applied) {
      assert.deepStrictEqual(result.changed, ['transportState']);
      assert.deepStrictEqual(result.snapshot, { transportState: 'PLAYING', sequence: 1, updatedAt: 1000 });
      assert(Object.isFrozen(result.snapshot));
    }
    assert.strictEqual(reconciler.sequence, 1);
  });

  it('should merge events from different services', () => {
    reconciler.onEvent(raw(0, playing));
    reconciler.onEvent(volumeEvent(35, 0));

    const snapshot = reconciler.getSnapshot();
    assert.strictEqual(snapshot.transportState, 'PLAYING');
    assert.strictEqual(snapshot.volume, 35);
    assert.strictEqual(snapshot.sequence, 2);
  });

  it('should ignore events at or below the last applied SEQ', () => {
    reconciler.onEvent(raw(3, playing));

    assert.deepStrictEqual(reconciler.onEvent(raw(3, paused)), { applied: false, reason: 'stale' });
    assert.deepStrictEqual(reconciler.onEvent(raw(2, stopped)), { applied: false, reason: 'stale' });
    assert.strictEqual(reconciler.getSnapshot().transportState, 'PLAYING');

    assert.strictEqual(reconciler.onEvent(raw(4, paused)).applied, true);
    assert.strictEqual(reconciler.getSnapshot().transportState, 'PAUSED');
  });

  it('should order each subscription independently', () => {
    reconciler.onEvent(raw(10, playing));
    reconciler.onEvent(volumeEvent(20, 0));

    assert.strictEqual(reconciler.getSnapshot().volume, 20);
  });

  it('should always apply events without a SEQ', () => {
    reconciler.onEvent(raw(5, playing));

    assert.strictEqual(reconciler.onEvent(raw(-1, paused)).applied, true);
    assert.strictEqual(reconciler.onEvent(raw(-1, stopped)).applied, true);
    assert.strictEqual(reconciler.getSnapshot().transportState, 'STOPPED');
  });

  it('should not publish events that change nothing', () => {
    reconciler.onEvent(raw(0, playing));

    assert.deepStrictEqual(reconciler.onEvent(raw(1, playing)), { applied: false, reason: 'unchanged' });
    assert.strictEqual(reconciler.sequence, 1);
  });

  it('should ignore late events for a retired SID', () => {
    reconciler.onEvent(raw(5, playing));
    reconciler.retireSid('uuid:avt-1');

    assert.deepStrictEqual(reconciler.onEvent(raw(3, stopped)), { applied: false, reason: 'stale' });
    assert.deepStrictEqual(reconciler.onEvent(raw(6, paused)), { applied: false, reason: 'stale' });
    assert.strictEqual(reconciler.getSnapshot().transportState, 'PLAYING');
  });

  it('should order the SID that replaced a retired one from its own SEQ 0', () => {
    reconciler.onEvent(raw(5, playing));
    reconciler.retireSid('uuid:avt-1');

    assert.strictEqual(reconciler.onEvent(raw(0, paused, { sid: 'uuid:avt-2' })).applied, true);
    assert.strictEqual(reconciler.getSnapshot().transportState, 'PAUSED');
  });

  it('should reach the same snapshot whatever order the events arrive in', () => {
    const events = [
      raw(1, lastChangeEvent({ TransportState: 'PLAYING', RelativeTimePosition: '0:00:10' })),
      raw(2, lastChangeEvent({ TransportState: 'PAUSED_PLAYBACK', RelativeTimePosition: '0:00:20' })),
      raw(3, lastChangeEvent({ TransportState: 'PLAYING', RelativeTimePosition: '0:00:25' })),
      volumeEvent(20, 1),
      volumeEvent(30, 2)
    ];
    const settled = (order: number[]) => {
      const target = new EventReconciler({ baseUrl: 'http://192.168.1.20:8080/', now: () => 500 });
      for (const index of order) {
        const event = events[index];
        if (event) {
          target.onEvent(event);
        }
      }
      return { ...target.getSnapshot(), sequence: 0 };
    };

    const inOrder = settled([0, 1, 2, 3, 4]);
    assert.deepStrictEqual(inOrder, {
      transportState: 'PLAYING',
      position: 25,
      volume: 30,
      sequence: 0,
      updatedAt: 1000,
      positionUpdatedAt: 1000
    });

    for (const order of [[2, 0, 4, 1, 3], [4, 3, 1, 2, 0], [1, 0, 3, 2, 4], [0, 2, 1, 4, 3]]) {
      assert.deepStrictEqual(settled(order), inOrder, `delivery order ${order.join(',')}`);
    }
  });

  it('should combine a state event with a later metadata event', () => {
    reconciler.onEvent(raw(0, playing));
    assert.strictEqual(reconciler.getSnapshot().title, undefined);

    const result = reconciler.onEvent(raw(1, lastChangeEvent({ CurrentTrackMetaData: didl({ title: 'Song A' }) })));

    assert.strictEqual(result.applied, true);
    if (result.applied) {
      assert.deepStrictEqual(result.changed, ['title']);
    }
    assert.strictEqual(reconciler.getSnapshot().transportState, 'PLAYING');
    assert.strictEqual(reconciler.getSnapshot().title, 'Song A');
  });

  it('should keep track metadata when a volume event arrives', () => {
    reconciler.onEvent(raw(0, lastChangeEvent({ CurrentTrackMetaData: didl({ title: 'Song A', artist: 'Band B' }) })));
    reconciler.onEvent(volumeEvent(40, 0));

    const snapshot = reconciler.getSnapshot();
    assert.strictEqual(snapshot.title, 'Song A');
    assert.strictEqual(snapshot.artist, 'Band B');
    assert.strictEqual(snapshot.volume, 40);
  });

  it('should forget every SID on resetSubscriptions', () => {
    reconciler.onEvent(raw(8, playing));
    reconciler.onEvent(volumeEvent(10, 4));
    reconciler.resetSubscriptions();

    assert.strictEqual(reconciler.onEvent(raw(0, paused)).applied, true);
    assert.strictEqual(reconciler.onEvent(volumeEvent(11, 0)).applied, true);
  });

  it('should stamp position updates with the receive time', () => {
    reconciler.onEvent(raw(0, lastChangeEvent({ RelativeTimePosition: '0:00:42' }), { receivedAt: 5000 }));
    reconciler.onEvent(raw(1, playing, { receivedAt: 6000 }));

    const snapshot = reconciler.getSnapshot();
    assert.strictEqual(snapshot.position, 42);
    assert.strictEqual(snapshot.positionUpdatedAt, 5000);
    assert.strictEqual(snapshot.updatedAt, 6000);
  });

  it('should map source indexes through the context', () => {
    reconciler.setContext('http://192.168.1.20:8080/', [{ index: 3, name: 'Analogue 1', type: 'Analog', visible: true }]);

    reconciler.onEvent(raw(0, propertySet({ SourceIndex: '3' }), { sid: 'uuid:product-1', service: 'Product' }));

    assert.strictEqual(reconciler.getSnapshot().source, 'Analogue 1');
  });

  describe('malformed events', () => {
    it('should report unreadable bodies without touching the snapshot', () => {
      const diagnostics: MalformedEventDiagnostic[] = [];
      reconciler.on('malformed', (diagnostic: MalformedEventDiagnostic) => diagnostics.push(diagnostic));

      assert.deepStrictEqual(reconciler.onEvent(raw(0, 'garbage')), { applied: false, reason: 'malformed' });

      assert.strictEqual(diagnostics.length, 1);
      assert.strictEqual(diagnostics[0]?.sid, 'uuid:avt-1');
      assert.deepStrictEqual(diagnostics[0]?.properties, ['propertyset']);
      assert.strictEqual(diagnostics[0]?.error, 'Event body is not well-formed XML');
      assert.strictEqual(reconciler.sequence, 0);
    });

    it('should apply the readable part of a partly malformed event', () => {
      const diagnostics: MalformedEventDiagnostic[] = [];
      reconciler.on('malformed', (diagnostic: MalformedEventDiagnostic) => diagnostics.push(diagnostic));

      const result = reconciler.onEvent(raw(0, lastChangeEvent({ TransportState: 'PLAYING', CurrentTrackMetaData: '<broken' })));

      assert.strictEqual(result.applied, true);
      assert.deepStrictEqual(diagnostics[0]?.properties, ['CurrentTrackMetaData']);
    });

    it('should signal the threshold after consecutive malformed events', () => {
      let thresholds = 0;
      reconciler.on('malformed-threshold', () => thresholds++);

      reconciler.onEvent(raw(0, 'garbage'));
      reconciler.onEvent(raw(1, 'garbage'));
      assert.strictEqual(thresholds, 0);
      reconciler.onEvent(raw(2, 'garbage'));
      assert.strictEqual(thresholds, 1);

      // The count starts over after firing
      reconciler.onEvent(raw(3, 'garbage'));
      reconciler.onEvent(raw(4, 'garbage'));
      assert.strictEqual(thresholds, 1);
    });

    it('should reset the count on a good event', () => {
      let thresholds = 0;
      reconciler.on('malformed-threshold', () => thresholds++);

      reconciler.onEvent(raw(0, 'garbage'));
      reconciler.onEvent(raw(1, 'garbage'));
      reconciler.onEvent(raw(2, playing));
      reconciler.onEvent(raw(3, 'garbage'));
      reconciler.onEvent(raw(4, 'garbage'));

      assert.strictEqual(thresholds, 0);
    });
  });

  describe('applyPoll', () => {
    it('should merge poll fields', () => {
      const result = reconciler.applyPoll({ transportState: 'STOPPED', volume: 25, mute: false }, 0, 700);

      assert.strictEqual(result.applied, true);
      assert.deepStrictEqual(reconciler.getSnapshot(), {
        transportState: 'STOPPED',
        volume: 25,
        mute: false,
        sequence: 1,
        updatedAt: 700
      });
    });

    it('should not overwrite fields an event wrote after the poll started', () => {
      const basedOn = reconciler.sequence;
      reconciler.onEvent(volumeEvent(60, 0));

      reconciler.applyPoll({ volume: 30, title: 'Polled' }, basedOn);

      assert.strictEqual(reconciler.getSnapshot().volume, 60);
      assert.strictEqual(reconciler.getSnapshot().title, 'Polled');
    });

    it('should apply fields whose last event is older than the poll', () => {
      reconciler.onEvent(volumeEvent(60, 0));
      const basedOn = reconciler.sequence;

      reconciler.applyPoll({ volume: 30 }, basedOn);

      assert.strictEqual(reconciler.getSnapshot().volume, 30);
    });

    it('should not let a poll protect fields from later polls', () => {
      reconciler.applyPoll({ volume: 30 }, 0);
      reconciler.applyPoll({ volume: 31 }, 0);

      assert.strictEqual(reconciler.getSnapshot().volume, 31);
    });
  });
});
