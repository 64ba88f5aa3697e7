import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { EmailDedupStore, openDatabase } from '../../db';
import type { ExecuteOptions } from '../../engine';
import type { ExecutionResult } from '../../signals/types';
import { EmailAlertProcessor, mailboxActionFor, resolveMessageId } from '../processor';
import type { InboundEmail } from '../processor';

const NOW = Date.UTC(2024, 5, 1, 12, 0, 0);
const BODY = '{"side":"long","symbol":"ETHUSDT","time_unix_ms":1717243200000}';

const filled: ExecutionResult = {
  status: 'filled',
  orderId: 'ord-1',
  instrument: 'ETH/USDT:USDT',
  side: 'long',
  contracts: 10,
  fillPrice: 100,
  simulated: false,
  dedupKey: 'mexc:ETHUSDT:long:unknown:1717243200000',
  advisories: [],
};

function email(overrides: Partial<InboundEmail> = {}): InboundEmail {
  return { messageId: '<1@mail>', subject: 'TradingView alert', text: BODY, receivedAt: new Date(NOW - 60_000), ...overrides };
}

describe('EmailAlertProcessor', () => {
  let db: Database.Database;
  let store: EmailDedupStore;
  let result: ExecutionResult;
  let clock: number;
  const execute = vi.fn(async (_payload: unknown, _opts?: ExecuteOptions) => result);

  const processor = () =>
    new EmailAlertProcessor({ execute }, store, { maxMessageAgeMs: 5 * 60_000, now: () => clock });

  beforeEach(() => {
    clock = NOW;
    db = openDatabase(':memory:');
    store = new EmailDedupStore(db, () => clock);
    result = filled;
    execute.mockClear();
  });

  afterEach(() => {
    db.close();
  });

  it('executes the alert and records the message', async () => {
    const outcome = await processor().process(email());

    expect(outcome).toEqual({ kind: 'executed', messageId: '<1@mail>', result: filled });
    expect(execute).toHaveBeenCalledWith(
      { side: 'long', symbol: 'ETHUSDT', time_unix_ms: 1717243200000 },
      { source: 'email' },
    );
    expect(store.status('<1@mail>')).toBe('ok');
    expect(mailboxActionFor(outcome)).toBe('seen');
  });

  it('skips a message it has already handled', async () => {
    const p = processor();
    await p.process(email());
    const again = await p.process(email());

    expect(again).toEqual({ kind: 'duplicate', messageId: '<1@mail>' });
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it('marks old messages stale without executing', async () => {
    const outcome = await processor().process(email({ receivedAt: new Date(NOW - 6 * 60_000) }));

    expect(outcome).toEqual({ kind: 'stale', messageId: '<1@mail>' });
    expect(store.status('<1@mail>')).toBe('stale');
    expect(execute).not.toHaveBeenCalled();
  });

  it('routes unparseable mail to the failed label', async () => {
    const outcome = await processor().process(email({ text: 'price crossed 2000', subject: 'alert' }));

    expect(outcome).toEqual({ kind: 'unparseable', messageId: '<1@mail>' });
    expect(store.status('<1@mail>')).toBe('invalid_payload');
    expect(mailboxActionFor(outcome)).toBe('failed');
  });

  it('records policy rejections with their reason', async () => {
    result = { status: 'rejected', reason: 'Cooldown', detail: 'cooldown', dedupKey: filled.dedupKey };
    const outcome = await processor().process(email());

    expect(outcome.kind).toBe('rejected');
    expect(store.status('<1@mail>')).toBe('rejected:Cooldown');
    expect(mailboxActionFor(outcome)).toBe('seen');
  });

  it('leaves the message for a later sweep after an execution error', async () => {
    result = { status: 'error', stage: 'price', detail: 'price failed: timeout' };
    const outcome = await processor().process(email());

    expect(outcome.kind).toBe('retry');
    expect(store.isProcessed('<1@mail>')).toBe(false);
    expect(store.status('<1@mail>')).toBe('retry');
    expect(mailboxActionFor(outcome)).toBe('leave');
  });

  it('retries a failed alert on a later sweep after it has aged past the window', async () => {
    const p = processor();
    result = { status: 'error', stage: 'price', detail: 'price failed: timeout' };
    expect((await p.process(email())).kind).toBe('retry');

    clock += 10 * 60_000;
    result = filled;
    const outcome = await p.process(email());

    expect(outcome).toEqual({ kind: 'executed', messageId: '<1@mail>', result: filled });
    expect(execute).toHaveBeenCalledTimes(2);
    expect(store.status('<1@mail>')).toBe('ok');
  });

  it('records simulated fills', async () => {
    result = { ...filled, simulated: true };
    await processor().process(email());
    expect(store.status('<1@mail>')).toBe('simulated_ok');
  });
});

describe('resolveMessageId', () => {
  it('uses the header when present and a content hash otherwise', () => {
    expect(resolveMessageId(email({ messageId: '  <x@mail>  ' }))).toBe('<x@mail>');
    const a = resolveMessageId(email({ messageId: undefined }));
    const b = resolveMessageId(email({ messageId: '' }));
    expect(a).toMatch(/^md5-[0-9a-f]{32}$/);
    expect(b).toBe(a);
    expect(resolveMessageId(email({ messageId: undefined, text: 'other' }))).not.toBe(a);
  });
});
