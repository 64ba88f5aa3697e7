import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { EmailDedupStore, openDatabase } from '../../db';
import { MailboxListener, reconnectDelayMs } from '../listener';
import { EmailAlertProcessor } from '../processor';

const imap = vi.hoisted(() => ({ opened: 0, closed: 0, labels: [] as string[] }));

vi.mock('imapflow', async () => {
  const { EventEmitter } = await import('events');
  class ImapFlow extends EventEmitter {
    constructor() {
      super();
      imap.opened += 1;
    }
    async connect(): Promise<void> {}
    async getMailboxLock(label: string): Promise<never> {
      imap.labels.push(label);
      throw new Error(`Mailbox doesn't exist: ${label}`);
    }
    close(): void {
      imap.closed += 1;
      this.emit('close');
    }
    async logout(): Promise<void> {
      this.close();
    }
  }
  return { ImapFlow };
});

describe('reconnectDelayMs', () => {
  it('backs off through 2, 5, 10, 20 and then holds at 30 seconds', () => {
    expect([0, 1, 2, 3, 4, 5, 12].map(reconnectDelayMs)).toEqual([2000, 5000, 10000, 20000, 30000, 30000, 30000]);
  });
});

describe('MailboxListener', () => {
  let db: Database.Database;

  beforeEach(() => {
    vi.useFakeTimers();
    imap.opened = 0;
    imap.closed = 0;
    imap.labels = [];
    db = openDatabase(':memory:');
  });

  afterEach(() => {
    vi.useRealTimers();
    db.close();
  });

  it('closes every connection whose label cannot be selected', async () => {
    const execute = vi.fn();
    const processor = new EmailAlertProcessor({ execute }, new EmailDedupStore(db), { maxMessageAgeMs: 300_000 });
    const listener = new MailboxListener(
      { host: 'imap.test', port: 993, user: 'alerts', password: 'test-password', label: 'TV', pollIntervalMs: 600_000 },
      processor,
    );

    listener.start();
    await vi.advanceTimersByTimeAsync(20_000);
    await listener.stop();

    expect(imap.opened).toBeGreaterThan(1);
    expect(imap.closed).toBe(imap.opened);
    expect(imap.labels.every((label) => label === 'TV')).toBe(true);
    expect(execute).not.toHaveBeenCalled();
  });
});
