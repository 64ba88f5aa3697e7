import 'dotenv/config';
import { loadConfig } from './config';
import { EmailDedupStore, SqliteDedupStore, openDatabase } from './db';
import { EmailAlertProcessor } from './email/processor';
import { MailboxListener } from './email/listener';
import { SignalEngine, engineConfigFrom } from './engine';
import { MexcContractGateway } from './exchanges/mexc';
import { createLogger, errorMessage } from './logger';
import { closePg } from './pg';
import { createHttpServer } from './server';

const logger = createLogger('signal-bridge');

const PRUNE_INTERVAL_MS = 60 * 60 * 1000;

async function main(): Promise<void> {
  const cfg = loadConfig();
  logger.info(
    { exchange: cfg.EXCHANGE, dryRun: cfg.dryRun, tradingEnabled: cfg.tradingEnabled, emailEnabled: cfg.emailEnabled },
    'signal bridge starting',
  );

  const db = openDatabase(cfg.PERSISTENCE_DB_PATH);
  const signals = new SqliteDedupStore(db);
  const emails = new EmailDedupStore(db);
  const prune = () => {
    signals.prune(cfg.retentionMs);
    emails.prune(cfg.retentionMs);
  };
  prune();
  const pending = signals.pendingCount();
  if (pending > 0) {
    // Claims left by an interrupted run; those keys stay blocked until pruned.
    logger.warn({ pending }, 'pending signal claims found at startup');
  }
  const pruneTimer = setInterval(() => {
    try {
      prune();
    } catch (err) {
      logger.error({ err: errorMessage(err) }, 'prune failed');
    }
  }, PRUNE_INTERVAL_MS);

  const gateway = new MexcContractGateway({
    apiKey: cfg.MEXC_KEY,
    apiSecret: cfg.MEXC_SECRET,
    baseURL: cfg.MEXC_BASE_URL,
    timeoutMs: cfg.GATEWAY_TIMEOUT_MS,
  });
  const engine = new SignalEngine({ config: engineConfigFrom(cfg), gateway, dedup: signals });

  const server = createHttpServer({
    engine,
    gateway,
    dryRun: cfg.dryRun,
    tradingEnabled: cfg.tradingEnabled,
    emailEnabled: cfg.emailEnabled,
  });
  server.listen(cfg.PORT, () => logger.info({ port: cfg.PORT }, 'http server listening'));

  let listener: MailboxListener | undefined;
  if (cfg.emailEnabled && cfg.IMAP_USER && cfg.IMAP_PASSWORD) {
    const processor = new EmailAlertProcessor(engine, emails, { maxMessageAgeMs: cfg.MAX_MESSAGE_AGE_MIN * 60 * 1000 });
    listener = new MailboxListener(
      {
        host: cfg.IMAP_HOST,
        port: cfg.IMAP_PORT,
        user: cfg.IMAP_USER,
        password: cfg.IMAP_PASSWORD,
        label: cfg.IMAP_LABEL,
        failedLabel: cfg.IMAP_FAILED_LABEL,
        pollIntervalMs: cfg.POLL_INTERVAL_SEC * 1000,
      },
      processor,
    );
    listener.start();
  } else {
    logger.info('IMAP credentials not set; e-mail front-end disabled');
  }

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'shutting down');
    clearInterval(pruneTimer);
    await listener?.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await closePg();
    db.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err: errorMessage(err) }, 'shutdown failed');
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  logger.error({ err: errorMessage(err) }, 'fatal error');
  process.exit(1);
});
