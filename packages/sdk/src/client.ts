import { createLogger, type Logger } from '@knox-integ/logger';
import { KnoxClientError } from './errors';
import {
  searchTransactionsResponseSchema,
  type SearchTransactionsRequest,
  type SearchTransactionsResponse,
} from './types/search';
import {
  transactionDataWithLineItemsSchema,
  transactionSchema,
  type PutTransactionRequest,
  type Transaction,
} from './types/transactions';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_RETRIES = 3;

export interface KnoxClientConfig {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  /** Retries for connection failures only; HTTP errors are never retried */
  maxRetries?: number;
  headers?: Record<string, string>;
  fetch?: typeof fetch;
  logger?: Logger;
}

interface RequestOptions {
  body?: unknown;
  params?: Record<string, string | number>;
  headers?: Record<string, string>;
}

/**
 * HTTP client for the Knox transaction service.
 */
export class KnoxClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly headers: Record<string, string>;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;
  private closed = false;

  constructor(config: KnoxClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.headers = {
      ...config.headers,
      Authorization: `Bearer ${config.apiKey}`,
    };
    this.fetchFn = config.fetch ?? fetch;
    this.logger = (config.logger ?? createLogger()).child({ client: 'knox' });
  }

  /**
   * Upsert a transaction. The version query parameter is the record's
   * `version`, falling back to its standard template record id.
   */
  async putTransaction(
    transaction: PutTransactionRequest,
    headers?: Record<string, string>,
  ): Promise<Transaction> {
    const body = transactionDataWithLineItemsSchema.parse(transaction);
    const version = body.version ?? body.transaction_metadata.standard_template_records_id;

    const response = await this.request('PUT', '/v1/transactions', {
      body,
      headers,
      params: { version },
    });
    const json: unknown = await response.json();
    return transactionSchema.parse(dataOf(json));
  }

  async searchTransactions(payload: SearchTransactionsRequest): Promise<SearchTransactionsResponse> {
    const response = await this.request('POST', '/v1/transactions/search', { body: payload });
    const parsed = searchTransactionsResponseSchema.parse(await response.json());
    return { data: parsed.data ?? [] };
  }

  /**
   * True only on a 200. Non-2xx statuses throw KnoxClientError.
   */
  async health(): Promise<boolean> {
    const response = await this.request('GET', '/v1/health');
    await response.body?.cancel();
    return response.status === 200;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private async request(
    method: string,
    endpoint: string,
    options: RequestOptions = {},
  ): Promise<Response> {
    if (this.closed) {
      throw new Error('KnoxClient is closed');
    }

    const url = new URL(`${this.baseUrl}/${endpoint.replace(/^\/+/, '')}`);
    for (const [key, value] of Object.entries(options.params ?? {})) {
      url.searchParams.set(key, String(value));
    }

    this.logger.debug('knox_request', { method, url: url.toString() });

    const response = await this.send(url, {
      method,
      headers: {
        ...this.headers,
        ...(options.body !== undefined && { 'Content-Type': 'application/json' }),
        ...options.headers,
      },
      body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
    });

    if (!response.ok) {
      throw await KnoxClientError.fromResponse(response);
    }
    return response;
  }

  private async send(url: URL, init: RequestInit): Promise<Response> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.fetchFn(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
      } catch (error) {
        if (!isConnectionError(error) || attempt >= this.maxRetries) {
          throw error;
        }
        this.logger.warn('knox_request_retry', {
          url: url.toString(),
          attempt: attempt + 1,
          error,
        });
      }
    }
  }
}

/** fetch rejects with a TypeError when no response was received */
function isConnectionError(error: unknown): boolean {
  return error instanceof TypeError;
}

function dataOf(json: unknown): unknown {
  if (typeof json === 'object' && json !== null && 'data' in json) {
    return json.data;
  }
  return undefined;
}

export function createKnoxClient(config: KnoxClientConfig): KnoxClient {
  return new KnoxClient(config);
}
