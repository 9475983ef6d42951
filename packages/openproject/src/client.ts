import { ApiHttpError, basicAuthHeader, parseRetryAfter, withRetry } from '@timelog/sync-sdk';
import type { HalCollection, OpFilter, OpProject, OpTimeEntry, OpTimeEntryRequest, OpUser, OpWorkPackage } from './types.js';

const SERVICE = 'openproject';
const DEFAULT_PAGE_SIZE = 100;

export interface OpenProjectClientOptions {
  /** API root, e.g. `https://op.example.com/api/v3`. */
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  maxRetries?: number;
  baseDelayMs?: number;
  jitterMs?: number;
  pageSize?: number;
  fetchImpl?: typeof fetch;
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
}

interface RequestOptions {
  method?: 'GET' | 'POST';
  body?: unknown;
  retry?: boolean;
}

export function buildApiBaseUrl(host: string, httpSchema = 'https'): string {
  const trimmedHost = host.replace(/^[a-z]+:\/\//i, '').replace(/\/+$/, '');
  return `${httpSchema}://${trimmedHost}/api/v3`;
}

export function encodeFilters(filters: OpFilter[]): string {
  return encodeURIComponent(JSON.stringify(filters));
}

/**
 * Last path segment of a HAL href, e.g. `/api/v3/projects/5` → `5`.
 */
export function idFromHref(href: string | null | undefined): string | null {
  if (!href) return null;
  const segment = href.split('/').filter(Boolean).at(-1);
  return segment ?? null;
}

export class OpenProjectClient {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly jitterMs?: number;
  private readonly pageSize: number;
  private readonly fetchImpl: typeof fetch;
  private readonly onRetry?: (error: unknown, attempt: number, waitMs: number) => void;

  constructor(options: OpenProjectClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.authorization = basicAuthHeader('apikey', options.apiKey);
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 500;
    this.jitterMs = options.jitterMs;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.onRetry = options.onRetry;
  }

  async getWorkPackage(id: string): Promise<OpWorkPackage | null> {
    try {
      return await this.request<OpWorkPackage>(`/work_packages/${encodeURIComponent(id)}`);
    } catch (error) {
      if (error instanceof ApiHttpError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  async findUsers(name: string): Promise<OpUser[]> {
    const filters = encodeFilters([{ name: { operator: '~', values: [name] } }]);
    const collection = await this.request<HalCollection<OpUser>>(`/users?pageSize=${this.pageSize}&filters=${filters}`);
    return collection._embedded.elements;
  }

  async findProjects(name: string): Promise<OpProject[]> {
    const filters = encodeFilters([{ name_and_identifier: { operator: '~', values: [name] } }]);
    const collection = await this.request<HalCollection<OpProject>>(`/projects?pageSize=${this.pageSize}&filters=${filters}`);
    return collection._embedded.elements;
  }

  /**
   * All time entries logged on a work package, across pages.
   */
  async listTimeEntries(workPackageId: string): Promise<OpTimeEntry[]> {
    const filters = encodeFilters([{ work_package: { operator: '=', values: [workPackageId] } }]);
    const entries: OpTimeEntry[] = [];

    for (let offset = 1; ; offset += 1) {
      const page = await this.request<HalCollection<OpTimeEntry>>(
        `/time_entries?pageSize=${this.pageSize}&offset=${offset}&filters=${filters}`,
      );
      const elements = page._embedded.elements;
      entries.push(...elements);

      if (elements.length === 0 || entries.length >= page.total) {
        return entries;
      }
    }
  }

  /**
   * Single attempt: retrying a create is the caller's decision.
   */
  async createTimeEntry(body: OpTimeEntryRequest): Promise<OpTimeEntry> {
    return this.request<OpTimeEntry>('/time_entries', { method: 'POST', body, retry: false });
  }

  private async request<T>(path: string, options: RequestOptions = {}): Promise<T> {
    const method = options.method ?? 'GET';
    if (options.retry === false) {
      return this.requestOnce<T>(method, path, options.body);
    }

    return withRetry(() => this.requestOnce<T>(method, path, options.body), {
      label: `openproject ${method} ${path.split('?')[0] ?? path}`,
      maxRetries: this.maxRetries,
      baseDelayMs: this.baseDelayMs,
      jitterMs: this.jitterMs,
      onRetry: this.onRetry,
    });
  }

  private async requestOnce<T>(method: 'GET' | 'POST', path: string, body?: unknown): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        signal: controller.signal,
        headers: {
          Accept: 'application/hal+json',
          'Content-Type': 'application/json',
          Authorization: this.authorization,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
      });

      if (!response.ok) {
        const text = await response.text();
        throw new ApiHttpError(SERVICE, response.status, text, parseRetryAfter(response.headers.get('retry-after')));
      }

      return (await response.json()) as T;
    } finally {
      clearTimeout(timeout);
    }
  }
}
