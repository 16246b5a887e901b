import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';

import { ResolvedConfiguration } from './config';
import { ClientConstructionError, NetboxApiError } from './errors';
import { PLUGIN_NAME, REQUEST_TIMEOUT_MS } from './settings';

/**
 * One page of a NetBox list endpoint.
 *
 * API Response Format:
 * {
 *   "count": 1,
 *   "next": null,
 *   "previous": null,
 *   "results": [{ "id": 1, "name": "VMware", "slug": "vmware", ... }]
 * }
 */
export interface NetboxPage<T> {
  readonly count: number;
  readonly next: string | null;
  readonly previous: string | null;
  readonly results: T[];
}

// NetBox reports request errors as { "detail": "..." }
const errorBodySchema = z.object({ detail: z.string() });

const pageEnvelopeSchema = z.object({
  count: z.number(),
  next: z.string().nullable(),
  previous: z.string().nullable(),
  results: z.array(z.unknown()),
});

export interface NetboxClientOptions {
  // Replaces axios' HTTP transport, e.g. to answer requests in process
  readonly adapter?: AxiosAdapter;
}

/**
 * NetboxClient - Handle to the NetBox REST API
 *
 * Built once per provider configuration and shared, read-only, by every data
 * source and resource. The API token lives only inside the axios instance's
 * default headers.
 *
 * Requests go to <server_url>/api/<path> with:
 * - Authorization: Token <api_token>
 * - Accept: application/json
 * - User-Agent: the npm package name
 */
export class NetboxClient {
  private readonly http: AxiosInstance;

  /**
   * @param serverUrl - Resolved server URL, scheme included
   * @param apiToken - NetBox API token
   * @param options - Transport override, fixed for the client's lifetime
   * @throws Error if serverUrl is not an absolute http(s) URL
   */
  constructor(
    public readonly serverUrl: string,
    apiToken: string,
    options: NetboxClientOptions = {},
  ) {
    const parsed = new URL(serverUrl);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error(`unsupported scheme "${parsed.protocol}" in NetBox server URL, expected http or https`);
    }

    this.http = axios.create({
      baseURL: `${serverUrl}/api/`,
      headers: {
        Authorization: `Token ${apiToken}`,
        Accept: 'application/json',
        'User-Agent': PLUGIN_NAME,
      },
      adapter: options.adapter,
      timeout: REQUEST_TIMEOUT_MS,
      // 4xx responses carry a NetBox error body worth reporting
      validateStatus: status => status < 500,
    });
  }

  /**
   * Fetch one page of a list endpoint, e.g. `virtualization/cluster-types/`.
   *
   * @throws NetboxApiError on transport failure, a non-2xx status or a body
   * that does not look like a NetBox list page
   */
  async list<T>(
    path: string,
    itemSchema: z.ZodType<T>,
    query: Readonly<Record<string, string | number>> = {},
  ): Promise<NetboxPage<T>> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(path, { params: query });
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new NetboxApiError(`request to ${path} failed: ${error.message}`, error.response?.status, { cause: error });
      }
      throw error;
    }

    if (response.status < 200 || response.status >= 300) {
      let message = `NetBox API returned status ${response.status} for ${path}`;
      const body = errorBodySchema.safeParse(response.data);
      if (body.success) {
        message += `: ${body.data.detail}`;
      }
      throw new NetboxApiError(message, response.status);
    }

    const envelope = pageEnvelopeSchema.safeParse(response.data);
    if (!envelope.success) {
      throw new NetboxApiError(`unexpected response body from ${path}: ${envelope.error.issues[0]?.message ?? 'invalid'}`, response.status);
    }
    const results = z.array(itemSchema).safeParse(envelope.data.results);
    if (!results.success) {
      throw new NetboxApiError(`unexpected item in response from ${path}: ${results.error.issues[0]?.message ?? 'invalid'}`, response.status);
    }

    const { count, next, previous } = envelope.data;
    return { count, next, previous, results: results.data };
  }
}

export type BootstrapResult =
  | { readonly ok: true; readonly client: NetboxClient }
  | { readonly ok: false; readonly error: ClientConstructionError };

/**
 * Build the shared client from a resolved configuration.
 *
 * Never throws: whatever goes wrong is returned as a ClientConstructionError
 * carrying the original message.
 */
export function bootstrapClient(config: ResolvedConfiguration): BootstrapResult {
  try {
    return { ok: true, client: new NetboxClient(config.serverUrl, config.apiToken) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new ClientConstructionError(message, { cause: error }) };
  }
}
