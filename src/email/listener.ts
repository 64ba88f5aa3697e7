import { ImapFlow } from 'imapflow';
import { simpleParser } from 'mailparser';
import { createLogger, errorMessage } from '../logger';
import { mailboxActionFor } from './processor';
import type { EmailAlertProcessor, InboundEmail } from './processor';

const logger = createLogger('email-idle');

const RECONNECT_BACKOFFS_SEC = [2, 5, 10, 20, 30];

export interface MailboxConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  label: string;
  failedLabel?: string;
  pollIntervalMs: number;
}

export function reconnectDelayMs(attempt: number): number {
  return RECONNECT_BACKOFFS_SEC[Math.min(attempt, RECONNECT_BACKOFFS_SEC.length - 1)] * 1000;
}

/**
 * Keeps an IMAP connection on the alert label. Unseen messages are swept at
 * connect, on every EXISTS push while idling, and on a fallback poll timer.
 */
export class MailboxListener {
  private client: ImapFlow | null = null;
  private sweeping: Promise<void> = Promise.resolve();
  private stopped = false;
  private attempt = 0;

  constructor(
    private readonly cfg: MailboxConfig,
    private readonly processor: EmailAlertProcessor,
  ) {}

  start(): void {
    logger.info({ host: this.cfg.host, label: this.cfg.label }, 'mailbox listener starting');
    void this.runForever();
  }

  async stop(): Promise<void> {
    this.stopped = true;
    const client = this.client;
    this.client = null;
    if (client) {
      await client.logout().catch((err: unknown) => logger.warn({ err: errorMessage(err) }, 'imap logout failed'));
    }
  }

  private async runForever(): Promise<void> {
    while (!this.stopped) {
      try {
        await this.connectAndListen();
        this.attempt = 0;
      } catch (err) {
        logger.warn({ err: errorMessage(err) }, 'imap connection failed');
      }
      if (this.stopped) break;
      const wait = reconnectDelayMs(this.attempt);
      this.attempt += 1;
      logger.warn({ waitMs: wait }, 'imap disconnected; reconnecting');
      await new Promise((r) => setTimeout(r, wait));
    }
  }

  private async connectAndListen(): Promise<void> {
    const client = new ImapFlow({
      host: this.cfg.host,
      port: this.cfg.port,
      secure: true,
      auth: { user: this.cfg.user, pass: this.cfg.password },
      logger: false,
    });
    this.client = client;
    const closed = new Promise<void>((resolve) => client.once('close', () => resolve()));
    client.on('error', (err: unknown) => logger.warn({ err: errorMessage(err) }, 'imap error'));

    try {
      await client.connect();
      const lock = await client.getMailboxLock(this.cfg.label);
      logger.info({ label: this.cfg.label }, 'imap connected and label selected');

      const poll = setInterval(() => this.scheduleSweep(client), this.cfg.pollIntervalMs);
      client.on('exists', () => this.scheduleSweep(client));
      try {
        this.scheduleSweep(client);
        await closed;
      } finally {
        clearInterval(poll);
        lock.release();
      }
    } finally {
      // Drops the socket when setup failed part way.
      client.close();
      if (this.client === client) this.client = null;
    }
  }

  private scheduleSweep(client: ImapFlow): void {
    this.sweeping = this.sweeping
      .then(() => this.sweep(client))
      .catch((err: unknown) => logger.error({ err: errorMessage(err) }, 'mailbox sweep failed'));
  }

  private async sweep(client: ImapFlow): Promise<void> {
    const found = await client.search({ seen: false }, { uid: true });
    const uids = Array.isArray(found) ? found : [];
    if (uids.length === 0) return;
    logger.info({ unseen: uids.length }, 'backlog');

    for (const uid of uids) {
      try {
        await this.handleMessage(client, uid);
      } catch (err) {
        logger.error({ err: errorMessage(err), uid }, 'error processing message');
      }
    }
  }

  private async handleMessage(client: ImapFlow, uid: number): Promise<void> {
    const msg = await client.fetchOne(String(uid), { source: true, envelope: true, internalDate: true }, { uid: true });
    if (!msg || !msg.source) return;
    const parsed = await simpleParser(msg.source);
    const email: InboundEmail = {
      messageId: parsed.messageId ?? msg.envelope?.messageId,
      subject: parsed.subject ?? '',
      text: parsed.text ?? (typeof parsed.html === 'string' ? parsed.html : ''),
      receivedAt: msg.internalDate ? new Date(msg.internalDate) : new Date(),
    };

    const outcome = await this.processor.process(email);
    const action = mailboxActionFor(outcome);
    logger.info({ uid, messageId: outcome.messageId, outcome: outcome.kind, action }, 'email handled');
    if (action === 'leave') return;
    if (action === 'failed' && this.cfg.failedLabel) {
      await client.messageCopy(String(uid), this.cfg.failedLabel, { uid: true });
    }
    await client.messageFlagsAdd(String(uid), ['\\Seen'], { uid: true });
  }
}
