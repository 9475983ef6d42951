import { ApiHttpError, basicAuthHeader, parseRetryAfter, sleep, withRetry } from '@timelog/sync-sdk';
import type { TogglMe, TogglPageCursor, TogglProject, TogglReportPage, TogglReportRow, TogglSearchParams } from './types.js';

const DEFAULT_BASE_URL = 'https://api.track.toggl.com';
const SERVICE = 'toggl';

export interface TogglClientOptions {
  apiToken: string;
  baseUrl?: string;
  minIntervalMs?: number;
  timeoutMs?: number;
  maxRetries?: number;
  baseDelayMs?: number;
  jitterMs?: number;
  fetchImpl?: typeof fetch;
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
}

interface TogglResponse<T> {
  data: T;
  headers: Headers;
}

function readIntHeader(headers: Headers, name: string): number | undefined {
  const raw = headers.get(name);
  if (!raw) return undefined;

  const value = Number(raw);
  return Number.isInteger(value) ? value : undefined;
}

export function readNextCursor(headers: Headers): TogglPageCursor | null {
  const firstId = readIntHeader(headers, 'x-next-id');
  const firstRowNumber = readIntHeader(headers, 'x-next-row-number');
  if (firstId === undefined || firstRowNumber === undefined) {
    return null;
  }

  return {
    firstId,
    firstRowNumber,
    firstTimestamp: readIntHeader(headers, 'x-next-timestamp'),
  };
}

export class TogglClient {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly minIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly jitterMs?: number;
  private readonly fetchImpl: typeof fetch;
  private readonly onRetry?: (error: unknown, attempt: number, waitMs: number) => void;

  private sequence: Promise<void> = Promise.resolve();
  private lastRequestAt = 0;

  constructor(options: TogglClientOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.authorization = basicAuthHeader(options.apiToken, 'api_token');
    this.minIntervalMs = options.minIntervalMs ?? 1000;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 500;
    this.jitterMs = options.jitterMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.onRetry = options.onRetry;
  }

  async getMe(): Promise<TogglMe> {
    const response = await this.request<TogglMe>('GET', '/api/v9/me');
    return response.data;
  }

  async getProject(workspaceId: number, projectId: number): Promise<TogglProject> {
    const response = await this.request<TogglProject>('GET', `/api/v9/workspaces/${workspaceId}/projects/${projectId}`);
    return response.data;
  }

  async searchTimeEntries(workspaceId: number, params: TogglSearchParams): Promise<TogglReportPage> {
    const body: Record<string, unknown> = {
      start_date: params.startDate,
      end_date: params.endDate,
      page_size: params.pageSize ?? 50,
      order_by: 'date',
      order_dir: 'asc',
    };

    if (params.cursor) {
      body.first_id = params.cursor.firstId;
      body.first_row_number = params.cursor.firstRowNumber;
      if (params.cursor.firstTimestamp !== undefined) {
        body.first_timestamp = params.cursor.firstTimestamp;
      }
    }

    const response = await this.request<TogglReportRow[]>(
      'POST',
      `/reports/api/v3/workspace/${workspaceId}/search/time_entries`,
      body,
    );

    return {
      rows: response.data,
      next: readNextCursor(response.headers),
    };
  }

  private async request<T>(method: 'GET' | 'POST', path: string, body?: unknown): Promise<TogglResponse<T>> {
    return this.enqueue(() =>
      withRetry(
        async () => {
          await this.waitForRateWindow();
          return this.requestOnce<T>(method, path, body);
        },
        {
          label: `toggl ${method} ${path}`,
          maxRetries: this.maxRetries,
          baseDelayMs: this.baseDelayMs,
          jitterMs: this.jitterMs,
          onRetry: this.onRetry,
        },
      ),
    );
  }

  private async requestOnce<T>(method: 'GET' | 'POST', path: string, body?: unknown): Promise<TogglResponse<T>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        signal: controller.signal,
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          Authorization: this.authorization,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
      });

      if (!response.ok) {
        const text = await response.text();
        throw new ApiHttpError(SERVICE, response.status, text, parseRetryAfter(response.headers.get('retry-after')));
      }

      return {
        data: (await response.json()) as T,
        headers: response.headers,
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  private async waitForRateWindow(): Promise<void> {
    const now = Date.now();
    if (this.lastRequestAt === 0 || this.minIntervalMs <= 0) {
      this.lastRequestAt = now;
      return;
    }

    const target = this.lastRequestAt + this.minIntervalMs;
    if (target > now) {
      await sleep(target - now);
    }

    this.lastRequestAt = Date.now();
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.sequence.then(task, task);
    this.sequence = next.then(
      () => undefined,
      () => undefined,
    );

    return next;
  }
}
