import { URL } from 'node:url';

import { AdapterError, MalformedResponseError } from '@spatial-audio/contracts';

export interface HttpAdapterOptions {
  baseUrl: string;
  version?: string;
  timeoutMs?: number;
  fetchImplementation?: typeof fetch;
}

export const DEFAULT_ADAPTER_TIMEOUT_MS = 300_000;

/**
 * Thin fetch wrapper shared by the stage adapters: one timeout per request,
 * every transport failure surfaced as an AdapterError.
 */
export class StageHttpClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly label: string,
    options: HttpAdapterOptions,
  ) {
    if (!options.baseUrl) {
      throw new AdapterError(`${label} adapter requires a baseUrl.`);
    }
    this.baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ADAPTER_TIMEOUT_MS;
    this.fetchImpl = options.fetchImplementation ?? globalThis.fetch;
  }

  resolveUrl(path: string): string {
    return new URL(path.replace(/^\/+/, ''), this.baseUrl).toString();
  }

  async postForm(path: string, form: FormData): Promise<unknown> {
    const text = await this.request(this.resolveUrl(path), { method: 'POST', body: form }, (response) =>
      response.text(),
    );
    try {
      return JSON.parse(text);
    } catch (error: unknown) {
      throw new MalformedResponseError(`${this.label} service returned invalid JSON`, { cause: error });
    }
  }

  async download(pathOrUrl: string): Promise<Uint8Array> {
    const body = await this.request(this.resolveUrl(pathOrUrl), { method: 'GET' }, (response) =>
      response.arrayBuffer(),
    );
    return new Uint8Array(body);
  }

  /** `read` runs inside the timeout window so a stalled body also aborts. */
  private async request<T>(
    url: string,
    init: RequestInit,
    read: (response: Response) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    timeout.unref?.();

    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        const errorText = await response.text().catch(() => 'Unknown error');
        throw new AdapterError(
          `${this.label} request failed (${response.status} ${response.statusText}): ${errorText}`,
          { status: response.status },
        );
      }
      return await read(response);
    } catch (error: unknown) {
      if (error instanceof AdapterError) throw error;
      if (error instanceof Error && error.name === 'AbortError') {
        throw new AdapterError(`${this.label} request timed out after ${this.timeoutMs}ms`, {
          cause: error,
        });
      }
      throw new AdapterError(
        `${this.label} request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function audioForm(audio: Uint8Array, filename: string, fields: Record<string, string> = {}): FormData {
  const form = new FormData();
  form.append('file', new Blob([audio]), filename);
  for (const [key, value] of Object.entries(fields)) {
    form.append(key, value);
  }
  return form;
}
