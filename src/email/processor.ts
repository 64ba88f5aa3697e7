import { createHash } from 'crypto';
import { createLogger } from '../logger';
import { RETRY_STATUS } from '../db';
import type { EmailDedupStore } from '../db';
import type { ExecuteOptions } from '../engine';
import type { ExecutionResult } from '../signals/types';
import { extractSignalPayload } from './extract';
import type { AlertPayload } from './extract';

const logger = createLogger('email');

export interface InboundEmail {
  messageId?: string;
  subject: string;
  text: string;
  receivedAt: Date;
}

export type EmailOutcome =
  | { kind: 'duplicate'; messageId: string }
  | { kind: 'stale'; messageId: string }
  | { kind: 'unparseable'; messageId: string }
  | { kind: 'executed'; messageId: string; result: ExecutionResult }
  | { kind: 'rejected'; messageId: string; result: ExecutionResult }
  | { kind: 'retry'; messageId: string; result: ExecutionResult };

export type MailboxAction = 'seen' | 'failed' | 'leave';

export interface EmailProcessorOptions {
  maxMessageAgeMs: number;
  now?: () => number;
}

export function mailboxActionFor(outcome: EmailOutcome): MailboxAction {
  switch (outcome.kind) {
    case 'unparseable':
      return 'failed';
    case 'retry':
      return 'leave';
    default:
      return 'seen';
  }
}

export function resolveMessageId(email: InboundEmail): string {
  const id = email.messageId?.trim();
  if (id) return id;
  const digest = createHash('md5').update(`${email.subject}\n${email.text}`).digest('hex');
  return `md5-${digest}`;
}

function field(payload: AlertPayload, ...names: string[]): string | undefined {
  for (const name of names) {
    const v = payload[name];
    if (typeof v === 'string' || typeof v === 'number') return String(v);
  }
  return undefined;
}

/**
 * Turns one alert e-mail into at most one engine call. E-mail level dedup is
 * by Message-ID; bar-level dedup still happens inside the engine.
 */
export class EmailAlertProcessor {
  private readonly now: () => number;

  constructor(
    private readonly engine: { execute(payload: unknown, opts?: ExecuteOptions): Promise<ExecutionResult> },
    private readonly store: EmailDedupStore,
    private readonly options: EmailProcessorOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  async process(email: InboundEmail): Promise<EmailOutcome> {
    const messageId = resolveMessageId(email);
    if (this.store.isProcessed(messageId)) {
      logger.info({ messageId }, 'email already processed');
      return { kind: 'duplicate', messageId };
    }

    // The age gate applies to first sight only; a retried alert was fresh when it first failed.
    const ageMs = this.now() - email.receivedAt.getTime();
    if (!this.store.wasRetried(messageId) && ageMs > this.options.maxMessageAgeMs) {
      logger.info({ messageId, ageMs }, 'skip stale email');
      this.store.markProcessed({ messageId }, 'stale');
      return { kind: 'stale', messageId };
    }

    const payload = extractSignalPayload(email.text, email.subject);
    if (!payload) {
      logger.warn({ messageId, subject: email.subject.slice(0, 80) }, 'could not extract JSON from email');
      this.store.markProcessed({ messageId }, 'invalid_payload');
      return { kind: 'unparseable', messageId };
    }

    const record = {
      messageId,
      barTs: field(payload, 'time_unix_ms', 'bar_ts', 'time'),
      symbol: field(payload, 'symbol', 'symbol_tv'),
      side: field(payload, 'side'),
    };
    logger.info({ messageId, symbol: record.symbol, side: record.side }, 'processing alert email');
    const result = await this.engine.execute(payload, { source: 'email' });

    if (result.status === 'error') {
      logger.warn({ messageId, stage: result.stage, detail: result.detail }, 'email alert failed; will retry');
      this.store.markProcessed(record, RETRY_STATUS);
      return { kind: 'retry', messageId, result };
    }
    if (result.status === 'filled') {
      this.store.markProcessed(record, result.simulated ? 'simulated_ok' : 'ok');
      return { kind: 'executed', messageId, result };
    }
    this.store.markProcessed(record, `rejected:${result.reason}`);
    return { kind: 'rejected', messageId, result };
  }
}
