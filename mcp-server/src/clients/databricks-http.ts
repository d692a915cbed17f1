import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse, type Method } from 'axios';
import type { z } from 'zod';
import type { CredentialsProvider } from '../auth/credentials-provider.js';
import { TransportError, type UpstreamError } from '../errors/warehouse-errors.js';
import { ServiceErrorSchema } from './statement-api.js';

export interface DatabricksAxiosOptions {
  host: string;
  timeoutMs: number;
  /** Replaces axios' network adapter; tests use it to answer requests in process. */
  adapter?: AxiosAdapter;
}

export function createDatabricksAxios(options: DatabricksAxiosOptions): AxiosInstance {
  return axios.create({
    baseURL: options.host,
    timeout: options.timeoutMs,
    headers: {
      Accept: 'application/json',
      'Content-Type': 'application/json',
      'User-Agent': 'databricks-sql-mcp-server/1.0.0'
    },
    adapter: options.adapter
  });
}

interface RequestOptions {
  params?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Authenticated JSON requests against one Databricks workspace. Every response
 * body is checked against the caller's schema; every failure becomes a TransportError.
 */
export class DatabricksHttpClient {
  constructor(
    private readonly http: AxiosInstance,
    private readonly credentials: CredentialsProvider
  ) {}

  get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: RequestOptions = {}): Promise<T> {
    return this.request('GET', path, undefined, schema, options);
  }

  post<T>(
    path: string,
    body: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    return this.request('POST', path, body, schema, options);
  }

  private async request<T>(
    method: Method,
    path: string,
    body: Record<string, unknown> | undefined,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions
  ): Promise<T> {
    const target = `${method} ${path}`;
    let response: AxiosResponse<unknown>;

    try {
      const authorization = await this.credentials.getAuthorizationHeader();
      response = await this.http.request<unknown>({
        method,
        url: path,
        data: body,
        params: options.params,
        signal: options.signal,
        headers: { Authorization: authorization }
      });
    } catch (error) {
      throw toTransportError(error, target);
    }

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new TransportError(
        `Malformed response from ${target}: ${where}${issue?.message ?? 'unexpected body'}`,
        { httpStatus: response.status }
      );
    }

    return parsed.data;
  }
}

export function toTransportError(error: unknown, target: string): TransportError {
  if (error instanceof TransportError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    if (error.response) {
      const upstream = parseUpstreamError(error.response.data);
      const detail = upstream?.message ?? (error.response.statusText || 'no error details');
      return new TransportError(
        `${target} failed with HTTP ${error.response.status}: ${detail}`,
        { httpStatus: error.response.status, upstream, cause: error }
      );
    }
    return new TransportError(`${target} failed: ${error.message}`, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`${target} failed: ${message}`, { cause: error });
}

function parseUpstreamError(data: unknown): UpstreamError | undefined {
  const parsed = ServiceErrorSchema.safeParse(data);
  if (!parsed.success || (!parsed.data.message && !parsed.data.error_code)) {
    return undefined;
  }
  return { errorCode: parsed.data.error_code, message: parsed.data.message };
}
