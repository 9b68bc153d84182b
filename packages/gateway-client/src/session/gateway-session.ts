import { ZodError } from 'zod';
import {
  ConnectionError,
  EntitlementDeniedError,
  HARDCODED_CONFIG,
  MalformedRequestError,
  ProviderError,
  ProviderUnavailableError,
  RequestTimeoutError,
  SessionCongestionError,
  SessionLostError,
  UnresolvableSecurityError,
  BarSchema,
  type Bar,
  type BarSize,
  type BarsResponse,
  type Chunk,
  type IProviderSession,
  type SecurityKind,
} from '@quarry/schemas';
import { createLogger, getRequestTimeoutMs, isIntradayBarSize } from '@quarry/utils';
import { GatewayHttpError, GatewayRestClient } from '../rest/client';
import {
  AuthStatusSchema,
  ContractSearchResponseSchema,
  HistoryResponseSchema,
  type ContractMatch,
  type HistoryBar,
} from '../rest/gateway-schemas';
import {
  GATEWAY_MAX_BARS_PER_RESPONSE,
  buildHistoryQuery,
  formatBarDate,
  getGatewayMaxWindowDays,
  toGatewayBar,
} from './bar-params';

const logger = createLogger({ name: 'gateway', service: 'gateway' });

/**
 * Listing exchange to prefer when an index symbol matches several contracts
 */
export const INDEX_EXCHANGE_PREFERENCES: Readonly<Record<string, string>> = {
  NDX: 'NASDAQ',
  SPX: 'CBOE',
  VIX: 'CBOE',
  DJI: 'NYSE',
  RUT: 'RUSSELL',
};

const ENTITLEMENT_PATTERN = /permission|entitle|subscription/i;
const UNRESOLVABLE_PATTERN = /no symbol|not found|invalid symbol|no contract/i;

// /tickle answers with a session summary; only reachability matters
const TICKLE_RESPONSE = AuthStatusSchema.partial().passthrough();

export interface GatewaySessionOptions {
  /** Gateway API root, e.g. https://localhost:5000/v1/api */
  baseUrl: string;
  barSize: BarSize;
  /** History request timeout (default: by bar size category) */
  requestTimeoutMs?: number;
  /** Keepalive interval while connected */
  tickleIntervalMs?: number;
  /** Timeout for status, keepalive and contract lookups */
  controlTimeoutMs?: number;
}

/**
 * ProviderSession over the Client Portal gateway REST API
 *
 * - connect() checks the brokerage session and starts the keepalive
 * - requestBars() resolves the contract (cached per symbol and kind) and
 *   issues one bounded history request; it never throws
 * - a 401 or a dropped connection marks the session lost; the next request
 *   re-checks the gateway status before doing anything else
 */
export class GatewaySession implements IProviderSession {
  private client: GatewayRestClient;
  private barParam: string;
  private intraday: boolean;
  private requestTimeoutMs: number;
  private tickleIntervalMs: number;
  private controlTimeoutMs: number;
  private windowDays: number;

  private connected = false;
  private needsStatusCheck = false;
  private keepalive: NodeJS.Timeout | null = null;
  private contracts = new Map<string, string>();

  constructor(options: GatewaySessionOptions) {
    const barParam = toGatewayBar(options.barSize);
    if (!barParam) {
      throw new RangeError(`Bar size "${options.barSize}" is not offered by the gateway`);
    }
    this.client = new GatewayRestClient(options.baseUrl);
    this.barParam = barParam;
    this.intraday = isIntradayBarSize(options.barSize);
    this.windowDays = getGatewayMaxWindowDays(options.barSize);
    this.requestTimeoutMs = options.requestTimeoutMs ?? getRequestTimeoutMs(options.barSize);
    this.tickleIntervalMs = options.tickleIntervalMs ?? HARDCODED_CONFIG.gateway.tickleIntervalMs;
    this.controlTimeoutMs = options.controlTimeoutMs ?? HARDCODED_CONFIG.gateway.controlTimeoutMs;
  }

  async connect(): Promise<void> {
    if (this.connected) return;

    await this.checkStatus();
    this.connected = true;
    this.needsStatusCheck = false;
    this.startKeepalive();

    logger.info(
      { event: 'gateway_connected', url: this.client.url, requestTimeoutMs: this.requestTimeoutMs },
      'Connected to gateway'
    );
  }

  async disconnect(): Promise<void> {
    this.stopKeepalive();
    if (!this.connected) return;

    this.connected = false;
    this.contracts.clear();
    logger.info({ event: 'gateway_disconnected' }, 'Disconnected from gateway');
  }

  isConnected(): boolean {
    return this.connected;
  }

  /** Widest chunk whose bars fit in one history response */
  get maxWindowDays(): number {
    return this.windowDays;
  }

  async requestBars(symbol: string, chunk: Chunk, kindHint: SecurityKind): Promise<BarsResponse> {
    try {
      await this.ensureSession();

      if (kindHint === 'unknown') {
        throw new UnresolvableSecurityError(`Security kind of ${symbol} is unknown`);
      }

      const conid = await this.resolveContract(symbol, kindHint);
      const query = buildHistoryQuery(conid, chunk, this.barParam);
      const response = await this.client.request(
        `/iserver/marketdata/history?${query.toString()}`,
        HistoryResponseSchema,
        { timeoutMs: this.requestTimeoutMs }
      );

      const truncated = response.data.length >= GATEWAY_MAX_BARS_PER_RESPONSE;
      if (truncated) {
        logger.warn(
          { event: 'gateway_response_capped', symbol, chunkIndex: chunk.index, rows: response.data.length },
          'History response hit the per-response cap'
        );
      }
      return { ok: true, bars: this.toBars(symbol, response.data), truncated };
    } catch (error) {
      const classified = this.classify(error);
      logger.debug(
        {
          event: 'gateway_request_failed',
          symbol,
          chunkIndex: chunk.index,
          errorType: classified.name,
          error: classified.message,
        },
        'Bars request failed'
      );
      return { ok: false, error: classified };
    }
  }

  private async checkStatus(): Promise<void> {
    let authenticated: boolean;
    try {
      const status = await this.client.request('/iserver/auth/status', AuthStatusSchema, {
        method: 'POST',
        timeoutMs: this.controlTimeoutMs,
      });
      authenticated = status.authenticated;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConnectionError(`Gateway unreachable at ${this.client.url}: ${message}`, {
        cause: error,
      });
    }

    if (!authenticated) {
      throw new ConnectionError(
        'Gateway session is not authenticated; log in through the gateway first'
      );
    }
  }

  private async ensureSession(): Promise<void> {
    if (!this.connected) {
      throw new SessionLostError('Session is not connected');
    }
    if (!this.needsStatusCheck) return;

    try {
      await this.checkStatus();
    } catch (error) {
      throw new SessionLostError('Gateway session is still unavailable', { cause: error });
    }
    this.needsStatusCheck = false;
    logger.info({ event: 'gateway_reconnected' }, 'Gateway session restored');
  }

  private async resolveContract(symbol: string, kind: 'equity' | 'index'): Promise<string> {
    const cacheKey = `${kind}:${symbol}`;
    const cached = this.contracts.get(cacheKey);
    if (cached) return cached;

    const secType = kind === 'index' ? 'IND' : 'STK';
    const params = new URLSearchParams({ symbol, secType });
    const matches = await this.client.request(
      `/iserver/secdef/search?${params.toString()}`,
      ContractSearchResponseSchema,
      { timeoutMs: this.controlTimeoutMs }
    );

    const match = selectContract(symbol, kind, matches, secType);
    if (!match) {
      throw new UnresolvableSecurityError(`No ${secType} contract found for ${symbol}`);
    }

    this.contracts.set(cacheKey, match.conid);
    logger.debug({ symbol, kind, conid: match.conid }, 'Resolved contract');
    return match.conid;
  }

  private toBars(symbol: string, rows: HistoryBar[]): Bar[] {
    const bars: Bar[] = [];
    for (const row of rows) {
      const parsed = BarSchema.safeParse({
        date: formatBarDate(row.t, this.intraday),
        open: row.o,
        high: row.h,
        low: row.l,
        close: row.c,
        volume: row.v !== undefined && row.v > 0 ? row.v : 0,
      });
      if (parsed.success) {
        bars.push(parsed.data);
      } else {
        logger.debug({ symbol, t: row.t }, 'Dropped bar with invalid prices');
      }
    }
    return bars;
  }

  /**
   * Map anything thrown while serving a request to a classified ProviderError
   */
  private classify(error: unknown): ProviderError {
    if (error instanceof ProviderError) return error;

    if (error instanceof Error && error.name === 'TimeoutError') {
      return new RequestTimeoutError(this.requestTimeoutMs);
    }

    if (error instanceof GatewayHttpError) {
      return this.classifyHttp(error);
    }

    if (error instanceof ZodError) {
      return new ProviderUnavailableError('Unexpected gateway response shape', { cause: error });
    }

    // fetch rejects with a TypeError when the gateway process goes away
    if (error instanceof TypeError) {
      this.needsStatusCheck = true;
      return new SessionLostError(`Gateway connection dropped: ${error.message}`, { cause: error });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ProviderUnavailableError(message, { cause: error });
  }

  private classifyHttp(error: GatewayHttpError): ProviderError {
    if (error.status === 401) {
      this.needsStatusCheck = true;
      return new SessionLostError(error.message, { cause: error });
    }
    if (error.status === 429 || error.status === 503) {
      return new SessionCongestionError(error.message, { cause: error });
    }
    if (error.status === 403 || ENTITLEMENT_PATTERN.test(error.body)) {
      return new EntitlementDeniedError(error.message, { cause: error });
    }
    if (UNRESOLVABLE_PATTERN.test(error.body)) {
      return new UnresolvableSecurityError(error.message, { cause: error });
    }
    if (error.status === 400) {
      return new MalformedRequestError(error.message, { cause: error });
    }
    return new ProviderUnavailableError(error.message, { cause: error });
  }

  private startKeepalive(): void {
    this.stopKeepalive();
    this.keepalive = setInterval(() => {
      void this.tickle();
    }, this.tickleIntervalMs);
    this.keepalive.unref();
  }

  private stopKeepalive(): void {
    if (this.keepalive) {
      clearInterval(this.keepalive);
      this.keepalive = null;
    }
  }

  private async tickle(): Promise<void> {
    try {
      await this.client.request('/tickle', TICKLE_RESPONSE, {
        method: 'POST',
        timeoutMs: this.controlTimeoutMs,
      });
    } catch (error) {
      this.needsStatusCheck = true;
      logger.warn(
        { event: 'gateway_tickle_failed', error: error instanceof Error ? error.message : String(error) },
        'Gateway keepalive failed'
      );
    }
  }
}

/**
 * Pick the contract for a symbol among search results of the wanted security type
 */
export function selectContract(
  symbol: string,
  kind: 'equity' | 'index',
  matches: ContractMatch[],
  secType: string
): ContractMatch | undefined {
  const typed = matches.filter(
    (match) => !match.sections || match.sections.some((section) => section.secType === secType)
  );
  if (typed.length === 0) return undefined;

  if (kind === 'index') {
    const preferred = INDEX_EXCHANGE_PREFERENCES[symbol];
    if (preferred) {
      const onExchange = typed.find((match) => listsExchange(match, preferred));
      if (onExchange) return onExchange;
    }
    return typed[0];
  }

  return typed.find((match) => match.symbol === symbol) ?? typed[0];
}

function listsExchange(match: ContractMatch, exchange: string): boolean {
  const wanted = exchange.toUpperCase();
  const texts = [
    match.description ?? '',
    match.companyName ?? '',
    ...(match.sections ?? []).map((section) => section.exchange ?? ''),
  ];
  return texts.some((text) => text.toUpperCase().includes(wanted));
}
