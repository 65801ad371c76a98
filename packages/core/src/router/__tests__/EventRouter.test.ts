import { createChatEvent } from '../../cot/builders';
import type { CotEvent } from '../../cot/types';
import { EventRouter } from '../EventRouter';
import type { EventKind } from '../types';

jest.mock('../../utils/logger', () => ({
  logger: {
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { logger } from '../../utils/logger';

const mockLogger = jest.mocked(logger);

const T0 = Date.UTC(2024, 0, 1);

function position(uid: string, type = 'a-f-G'): CotEvent {
  return {
    version: '2.0',
    uid,
    type,
    time: T0,
    start: T0,
    stale: T0 + 60_000,
    how: 'm-g',
    point: { lat: 0, lon: 0, hae: 0, ce: 9999999, le: 9999999 },
  };
}

describe('EventRouter', () => {
  let router: EventRouter;

  beforeEach(() => {
    jest.clearAllMocks();
    router = new EventRouter();
  });

  it('delivers each event to the listeners of its kind only', () => {
    const positions: string[] = [];
    const chats: string[] = [];
    router.on('position', (routed) => positions.push(routed.position.affiliation));
    router.on('chat', (routed) => chats.push(routed.message.text));

    router.route(position('U1', 'a-h-G'));
    router.route(createChatEvent({ senderUid: 'U1', senderCallsign: 'A', text: 'hello', messageId: 'm1', now: T0 }));

    expect(positions).toEqual(['hostile']);
    expect(chats).toEqual(['hello']);
  });

  it('calls catch-all listeners after the typed ones', () => {
    const order: string[] = [];
    router.onAny((routed) => order.push(`any:${routed.kind}`));
    router.on('position', () => order.push('position'));

    router.route(position('U1'));

    expect(order).toEqual(['position', 'any:position']);
  });

  it('returns the classification', () => {
    const routed: EventKind = router.route(position('U1', 'b-m-p-w'));
    expect(routed.kind).toBe('waypoint');
  });

  it('stops delivering after the disposer runs', () => {
    const listener = jest.fn();
    const off = router.on('position', listener);

    router.route(position('U1'));
    off();
    router.route(position('U2'));

    expect(listener).toHaveBeenCalledTimes(1);
    expect(router.getListenerCount()).toBe(0);
  });

  it('logs a throwing listener and keeps delivering', () => {
    const failure = new Error('boom');
    const after = jest.fn();
    router.on('position', () => {
      throw failure;
    });
    router.on('position', after);

    router.route(position('U1'));

    expect(after).toHaveBeenCalledTimes(1);
    expect(mockLogger.error).toHaveBeenCalledWith(
      { err: failure, kind: 'position', uid: 'U1' },
      'EventRouter listener error'
    );
  });

  it('counts routed events per kind', () => {
    router.route(position('U1'));
    router.route(position('U2'));
    router.route(position('X', 'u-d-f'));

    expect(router.getStats()).toEqual({ position: 2, chat: 0, emergency: 0, waypoint: 0, unknown: 1 });
  });

  it('drops every listener on dispose', () => {
    router.on('chat', jest.fn());
    router.on('unknown', jest.fn());
    router.onAny(jest.fn());
    expect(router.getListenerCount()).toBe(3);

    router.dispose();

    expect(router.getListenerCount()).toBe(0);
  });
});
