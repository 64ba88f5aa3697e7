import http from 'http';
import type { Readable } from 'stream';
import { createLogger, errorMessage } from './logger';
import type { ExecuteOptions, EngineStatus } from './engine';
import type { ExchangeGateway, InstrumentMetadata } from './exchanges/types';
import type { ExecutionResult } from './signals/types';
import { mapInstrument } from './trading/symbols';
import { FALLBACK_CONTRACT_SIZES } from './trading/sizing';

const logger = createLogger('server');

const MAX_BODY_BYTES = 64 * 1024;

export class PayloadTooLargeError extends Error {
  constructor(readonly limitBytes: number) {
    super(`request body exceeds ${limitBytes} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

export interface ServerDeps {
  engine: {
    execute(payload: unknown, opts?: ExecuteOptions): Promise<ExecutionResult>;
    status(): EngineStatus;
  };
  gateway: Pick<ExchangeGateway, 'venue' | 'instrumentMetadata'>;
  dryRun: boolean;
  tradingEnabled: boolean;
  emailEnabled?: boolean;
}

export interface RouteResponse {
  status: number;
  body: unknown;
}

export function httpStatusFor(result: ExecutionResult): number {
  if (result.status === 'filled') return 200;
  if (result.status === 'error') return 502;
  switch (result.reason) {
    case 'DuplicateSignal':
    case 'Cooldown':
    case 'AlreadyInPosition':
      return 200;
    case 'InvalidSignal':
      return 400;
    case 'Unauthorized':
      return 403;
    case 'StaleSignal':
      return 422;
    case 'TradingDisabled':
      return 503;
  }
}

export async function routeRequest(
  method: string,
  rawUrl: string,
  rawBody: string,
  deps: ServerDeps,
): Promise<RouteResponse> {
  const pathname = new URL(rawUrl, 'http://localhost').pathname.replace(/\/+$/, '') || '/';

  if (method === 'GET' && pathname === '/health') {
    return {
      status: 200,
      body: {
        ok: true,
        exchange: deps.gateway.venue,
        dry_run: deps.dryRun,
        trading_enabled: deps.tradingEnabled,
        email_enabled: deps.emailEnabled ?? false,
      },
    };
  }

  if (method === 'GET' && pathname === '/status') {
    return { status: 200, body: deps.engine.status() };
  }

  if (method === 'GET' && pathname.startsWith('/debug/')) {
    const symbol = decodeURIComponent(pathname.slice('/debug/'.length));
    const instrument = mapInstrument(symbol);
    if (!instrument) {
      return { status: 400, body: { error: `unsupported symbol ${symbol}` } };
    }
    let metadata: InstrumentMetadata | undefined;
    let metadataError: string | undefined;
    try {
      metadata = await deps.gateway.instrumentMetadata(instrument);
    } catch (err) {
      metadataError = errorMessage(err);
    }
    return {
      status: 200,
      body: {
        symbol,
        instrument,
        metadata: metadata ?? null,
        fallback_contract_size: FALLBACK_CONTRACT_SIZES[instrument] ?? null,
        metadata_error: metadataError,
      },
    };
  }

  if (method === 'POST' && (pathname === '/tv' || pathname === '/webhook')) {
    let payload: unknown;
    try {
      payload = JSON.parse(rawBody);
    } catch {
      return { status: 400, body: { error: 'Invalid JSON' } };
    }
    const result = await deps.engine.execute(payload, { source: 'webhook', requireSecret: true });
    return { status: httpStatusFor(result), body: result };
  }

  return { status: 404, body: { error: 'not found' } };
}

export function readBody(req: Readable, limitBytes: number = MAX_BODY_BYTES): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    const onData = (chunk: Buffer) => {
      size += chunk.length;
      if (size > limitBytes) {
        req.off('data', onData);
        req.pause();
        reject(new PayloadTooLargeError(limitBytes));
        return;
      }
      chunks.push(chunk);
    };
    req.on('data', onData);
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    req.on('error', reject);
  });
}

export function failureResponse(err: unknown): RouteResponse {
  if (err instanceof PayloadTooLargeError) return { status: 413, body: { error: 'payload too large' } };
  return { status: 500, body: { error: 'internal error' } };
}

export function createHttpServer(deps: ServerDeps): http.Server {
  return http.createServer((req, res) => {
    const method = req.method ?? 'GET';
    const url = req.url ?? '/';
    readBody(req)
      .then((body) => routeRequest(method, url, body, deps))
      .then(({ status, body }) => {
        if (status >= 400) logger.warn({ method, url, status }, 'request not accepted');
        res.writeHead(status, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(body));
      })
      .catch((err: unknown) => {
        const { status, body } = failureResponse(err);
        logger.error({ err: errorMessage(err), method, url, status }, 'request failed');
        if (!res.headersSent) res.writeHead(status, { 'Content-Type': 'application/json', Connection: 'close' });
        // The rest of an oversized body is never read; the socket goes once the reply is out.
        res.end(JSON.stringify(body), () => req.destroy());
      });
  });
}
