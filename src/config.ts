import { z } from 'zod';

const optionalPct = z.preprocess(
  (v) => (v === '' || v === undefined ? undefined : v),
  z.coerce.number().positive().max(100).optional(),
);

const configSchema = z.object({
  EXCHANGE: z.literal('mexc').default('mexc'),
  MEXC_KEY: z.string().optional(),
  MEXC_SECRET: z.string().optional(),
  MEXC_BASE_URL: z.string().url().default('https://contract.mexc.com'),
  TV_WEBHOOK_SECRET: z.string().optional(),
  POSITION_USDT: z.coerce.number().positive().default(20),
  DEFAULT_LEVERAGE: z.coerce.number().int().positive().default(5),
  MARGIN_MODE: z.enum(['isolated', 'cross']).default('isolated'),
  COOLDOWN_SEC: z.coerce.number().int().nonnegative().default(300),
  MAX_SIGNAL_AGE_HOURS: z.coerce.number().positive().default(48),
  DEFAULT_TP_PCT: optionalPct,
  DEFAULT_SL_PCT: optionalPct,
  TRADING_ENABLED: z.string().optional(),
  DRY_RUN: z.string().optional(),
  GATEWAY_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  PERSISTENCE_DB_PATH: z.string().min(1).default('data/processed.sqlite'),
  PRUNE_DAYS: z.coerce.number().int().positive().default(30),
  PORT: z.coerce.number().int().nonnegative().default(8000),
  LOG_LEVEL: z.string().default('info'),
  DATABASE_URL: z.string().optional(),
  IMAP_HOST: z.string().default('imap.gmail.com'),
  IMAP_PORT: z.coerce.number().int().positive().default(993),
  IMAP_USER: z.string().optional(),
  IMAP_PASSWORD: z.string().optional(),
  IMAP_LABEL: z.string().default('tv-alerts'),
  IMAP_FAILED_LABEL: z.string().default('tv-alerts-failed'),
  MAX_MESSAGE_AGE_MIN: z.coerce.number().positive().default(5),
  POLL_INTERVAL_SEC: z.coerce.number().int().positive().default(600),
});

export type AppConfig = z.infer<typeof configSchema> & {
  dryRun: boolean;
  tradingEnabled: boolean;
  webhookSecret?: string;
  emailEnabled: boolean;
  cooldownMs: number;
  maxSignalAgeMs: number;
  retentionMs: number;
};

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return TRUTHY.has(value.trim().toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.toString()}`);
  }
  const cfg = parsed.data;
  // DRY_RUN stays on until explicitly disabled
  const dryRun = parseFlag(cfg.DRY_RUN, true);
  if (!dryRun && (!cfg.MEXC_KEY || !cfg.MEXC_SECRET)) {
    throw new Error('Invalid configuration: MEXC_KEY and MEXC_SECRET are required when DRY_RUN is off');
  }
  const webhookSecret = cfg.TV_WEBHOOK_SECRET?.trim();
  if (!dryRun && !webhookSecret) {
    throw new Error('Invalid configuration: TV_WEBHOOK_SECRET is required when DRY_RUN is off');
  }
  return {
    ...cfg,
    dryRun,
    tradingEnabled: parseFlag(cfg.TRADING_ENABLED, true),
    webhookSecret: webhookSecret ? webhookSecret : undefined,
    emailEnabled: Boolean(cfg.IMAP_USER && cfg.IMAP_PASSWORD),
    cooldownMs: cfg.COOLDOWN_SEC * 1000,
    maxSignalAgeMs: cfg.MAX_SIGNAL_AGE_HOURS * 3600 * 1000,
    retentionMs: cfg.PRUNE_DAYS * 24 * 3600 * 1000,
  };
}
