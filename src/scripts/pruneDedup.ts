import 'dotenv/config';
import { loadConfig } from '../config';
import { EmailDedupStore, SqliteDedupStore, openDatabase } from '../db';
import { closePg } from '../pg';

async function main(): Promise<void> {
  const cfg = loadConfig();
  const db = openDatabase(cfg.PERSISTENCE_DB_PATH);
  const signals = new SqliteDedupStore(db).prune(cfg.retentionMs);
  const emails = new EmailDedupStore(db).prune(cfg.retentionMs);
  console.table([
    { Table: 'processed_signals', Deleted: signals },
    { Table: 'processed_emails', Deleted: emails },
  ]);
  db.close();
  await closePg();
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
