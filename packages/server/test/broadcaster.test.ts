/**
 * Event Broadcaster Tests
 * Record change fan-out to subscribed sockets and client message parsing
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { StoreChange } from '../src/store/types.js';
import { EventBroadcaster } from '../src/server/websocket/broadcaster.js';
import { parseClientMessage } from '../src/server/websocket/handler.js';
import { SOCKET_OPEN, type BroadcastSocket } from '../src/server/websocket/types.js';
import { makeReport, makeRequest } from './helpers/pipeline.js';

class FakeSocket implements BroadcastSocket {
  readonly sent: unknown[] = [];

  constructor(
    public readyState: number = SOCKET_OPEN,
    private readonly failOnSend = false
  ) {}

  send(data: string): void {
    if (this.failOnSend) {
      throw new Error('socket hang up');
    }
    this.sent.push(JSON.parse(data));
  }
}

function requestCreated(requestId: string): StoreChange {
  return {
    collection: 'requests',
    id: requestId,
    change: 'created',
    record: makeRequest(requestId),
    previous: null,
  };
}

describe('EventBroadcaster', () => {
  let broadcaster: EventBroadcaster;

  beforeEach(() => {
    broadcaster = new EventBroadcaster();
  });

  it('should send a change only to connections following the request', () => {
    const following = new FakeSocket();
    const other = new FakeSocket();
    broadcaster.subscribe(broadcaster.addConnection(following), 'req_1');
    broadcaster.subscribe(broadcaster.addConnection(other), 'req_2');

    const sent = broadcaster.emitRecordChanged(requestCreated('req_1'));

    expect(sent).toBe(1);
    expect(other.sent).toEqual([]);
    expect(following.sent).toEqual([
      {
        type: 'record_changed',
        requestId: 'req_1',
        collection: 'requests',
        change: 'created',
        status: 'submitted',
        timestamp: expect.any(String),
      },
    ]);
  });

  it('should include the previous status of an update', () => {
    const socket = new FakeSocket();
    broadcaster.subscribe(broadcaster.addConnection(socket), 'req_1');

    broadcaster.emitRecordChanged({
      collection: 'damage_reports',
      id: 'req_1',
      change: 'updated',
      record: makeReport('req_1', { status: 'complete' }),
      previous: makeReport('req_1'),
    });

    expect(socket.sent[0]).toMatchObject({
      collection: 'damage_reports',
      change: 'updated',
      status: 'complete',
      previousStatus: 'analyzing',
    });
  });

  it('should never broadcast claims', () => {
    const socket = new FakeSocket();
    broadcaster.subscribe(broadcaster.addConnection(socket), 'req_1');

    const sent = broadcaster.emitRecordChanged({
      collection: 'claims',
      id: 'damage:req_1:0',
      change: 'created',
      record: {
        key: 'damage:req_1:0',
        stage: 'damage',
        requestId: 'req_1',
        attempt: 0,
        owner: 'worker-a',
        claimedAt: '2026-03-01T10:00:00.000Z',
      },
      previous: null,
    });

    expect(sent).toBe(0);
    expect(socket.sent).toEqual([]);
  });

  it('should stop sending after unsubscribe', () => {
    const socket = new FakeSocket();
    const id = broadcaster.addConnection(socket);
    broadcaster.subscribe(id, 'req_1');

    expect(broadcaster.unsubscribe(id, 'req_1')).toBe(true);
    expect(broadcaster.emitRecordChanged(requestCreated('req_1'))).toBe(0);
  });

  it('should drop a connection whose socket is no longer open', () => {
    const socket = new FakeSocket(3);
    broadcaster.subscribe(broadcaster.addConnection(socket), 'req_1');

    expect(broadcaster.emitRecordChanged(requestCreated('req_1'))).toBe(0);
    expect(broadcaster.getConnectionCount()).toBe(0);
  });

  it('should drop a connection whose send throws', () => {
    const broken = new FakeSocket(SOCKET_OPEN, true);
    const healthy = new FakeSocket();
    broadcaster.subscribe(broadcaster.addConnection(broken), 'req_1');
    broadcaster.subscribe(broadcaster.addConnection(healthy), 'req_1');

    expect(broadcaster.emitRecordChanged(requestCreated('req_1'))).toBe(1);
    expect(broadcaster.getConnectionCount()).toBe(1);
    expect(healthy.sent).toHaveLength(1);
  });

  it('should refuse to subscribe an unknown connection', () => {
    expect(broadcaster.subscribe('missing', 'req_1')).toBe(false);
    expect(broadcaster.unsubscribe('missing', 'req_1')).toBe(false);
  });
});

describe('parseClientMessage', () => {
  it('should accept the known message types', () => {
    expect(parseClientMessage('{"type":"subscribe","requestId":"req_1"}')).toEqual({
      type: 'subscribe',
      requestId: 'req_1',
    });
    expect(parseClientMessage('{"type":"ping"}')).toEqual({ type: 'ping' });
  });

  it('should return null for anything else', () => {
    expect(parseClientMessage('not json')).toBeNull();
    expect(parseClientMessage('{"type":"shout"}')).toBeNull();
    expect(parseClientMessage('{"type":"subscribe"}')).toBeNull();
  });
});
