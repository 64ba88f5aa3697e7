import 'dotenv/config';
import { loadConfig } from '../config';
import { MexcContractGateway } from '../exchanges/mexc';
import { createLogger, errorMessage } from '../logger';
import { mapInstrument } from '../trading/symbols';

const logger = createLogger('ping-mexc');

async function main(): Promise<void> {
  const cfg = loadConfig();
  const instrument = mapInstrument(process.argv[2] ?? 'BTCUSDT');
  if (!instrument) {
    logger.warn({ symbol: process.argv[2] }, 'unsupported symbol');
    return;
  }
  const gateway = new MexcContractGateway({
    apiKey: cfg.MEXC_KEY,
    apiSecret: cfg.MEXC_SECRET,
    baseURL: cfg.MEXC_BASE_URL,
    timeoutMs: cfg.GATEWAY_TIMEOUT_MS,
  });
  const price = await gateway.getLastPrice(instrument);
  const metadata = await gateway.instrumentMetadata(instrument);
  logger.info({ instrument, price, metadata }, 'mexc contract api reachable');

  if (!cfg.MEXC_KEY || !cfg.MEXC_SECRET) {
    logger.warn('No MEXC keys in env; skipping private endpoints');
    return;
  }
  const positions = await gateway.listPositions();
  logger.info({ positions }, 'open positions');
}

main().catch((err: unknown) => {
  logger.error({ err: errorMessage(err) }, 'mexc ping failed');
  process.exit(1);
});
