/**
 * Maintenance Connection v8 API Client
 *
 * One value per server/credential pair. The Basic auth header is built
 * once in the constructor and reused for every request.
 */

import type {
  AssetRecordInput,
  AssetRecordUpdate,
  GetOptions,
  JsonValue,
  Module,
  NormalizedRecord,
} from '../models/types.js';
import { normalizeResults } from '../models/normalize.js';
import { buildQuery } from './query.js';
import { validateConfig, type MaintenanceConnectionConfig } from '../utils/config.js';
import { ConfigError, ResultsMissingError } from '../utils/errors.js';
import { basicAuthHeader, isJsonObject, singularModule } from '../utils/index.js';

type HttpMethod = 'GET' | 'POST' | 'PUT';

interface ApiResult {
  ok: boolean;
  status: number;
  text: string;
}

const LOG_PREFIX = '[MC Client]';

export class MaintenanceConnectionClient {
  private baseUrl: string;
  private headers: Record<string, string>;
  private timeout?: number;

  constructor(config: MaintenanceConnectionConfig) {
    const { valid, errors } = validateConfig(config);
    if (!valid) {
      throw new ConfigError(errors);
    }

    this.baseUrl = `http://${config.server}/v8`;
    this.timeout = config.timeout;
    this.headers = {
      Authorization: basicAuthHeader(config.user, config.password),
      Accept: 'application/json',
      'Content-Type': 'application/json',
    };
  }

  private url(module: Module, query: string = ''): string {
    return `${this.baseUrl}/${module}${query}`;
  }

  private async request(method: HttpMethod, url: string, body?: unknown): Promise<ApiResult> {
    const response = await fetch(url, {
      method,
      headers: this.headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: this.timeout ? AbortSignal.timeout(this.timeout) : undefined,
    });

    return { ok: response.ok, status: response.status, text: await response.text() };
  }

  /**
   * Log the status line, then parse the body. Runs regardless of status;
   * failed calls usually still carry a JSON body.
   */
  private logAndParse(method: HttpMethod, module: Module, result: ApiResult, action?: string): JsonValue {
    this.logResult(method, module, result, action);
    const data: JsonValue = JSON.parse(result.text);
    return data;
  }

  private logResult(method: HttpMethod, module: Module, result: ApiResult, action?: string): void {
    if (result.ok) {
      const suffix = action ? `: the ${singularModule(module)} has been ${action}` : '';
      console.log(`${LOG_PREFIX} ✅ ${method} ${module} → ${result.status}${suffix}`);
    } else {
      console.warn(`${LOG_PREFIX} ❌ ${method} ${module} → ${result.status}`);
    }
  }

  // === QUERY ===

  /**
   * Fetch one page of a collection.
   *
   * A non-2xx status is logged, not thrown. If the body has no `Results`
   * array a ResultsMissingError is thrown; a body that is not JSON throws
   * the parser's SyntaxError.
   */
  async get(module: Module, options: GetOptions & { raw: true }): Promise<JsonValue[]>;
  async get(module: Module, options?: GetOptions & { raw?: false }): Promise<NormalizedRecord[]>;
  async get(module: Module, options?: GetOptions): Promise<JsonValue[] | NormalizedRecord[]>;
  async get(module: Module, options: GetOptions = {}): Promise<JsonValue[] | NormalizedRecord[]> {
    const { raw = false, ...query } = options;
    const result = await this.request('GET', this.url(module, buildQuery(query)));
    const data = this.logAndParse('GET', module, result);

    const results = isJsonObject(data) ? data.Results : undefined;
    if (!Array.isArray(results)) {
      throw new ResultsMissingError(module, result.status, data);
    }

    return raw ? results : normalizeResults(results);
  }

  // === MUTATIONS ===

  /**
   * Create one or more records. The response body is returned as sent by
   * the server, including its per-record validation errors.
   */
  async create(module: Module, records: AssetRecordInput[]): Promise<JsonValue> {
    const result = await this.request('POST', this.url(module), records);
    return this.logAndParse('POST', module, result, 'added');
  }

  /**
   * Update one or more records by PK. Same pass-through contract as create().
   */
  async update(module: Module, records: AssetRecordUpdate[]): Promise<JsonValue> {
    const result = await this.request('PUT', this.url(module), records);
    return this.logAndParse('PUT', module, result, 'updated');
  }
}

/**
 * Create a client instance from a configuration object.
 */
export function createClient(config: MaintenanceConnectionConfig): MaintenanceConnectionClient {
  return new MaintenanceConnectionClient(config);
}
