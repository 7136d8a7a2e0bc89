import axios, { AxiosAdapter, AxiosError, AxiosInstance } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { API_TIMEOUT, MAX_RETRIES, RETRY_DELAY, SDK_VERSION } from '../constants';
import {
  APIError,
  AuthError,
  NetworkError,
  ResourceNotExistError,
  ServerError,
  ValidationError,
} from '../errors';
import { logger, warn } from '../utils/logger';
import { errorBodySchema } from './schemas';
import { HttpMethod, RequestOptions, ResourceRef } from './types';

export interface HttpClientParams {
  accessKey: string;
  url: string;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
  // Replaces axios' network adapter, e.g. with an in-process stand-in.
  adapter?: AxiosAdapter;
}

// Only idempotent requests are replayed after a transient failure.
const RETRYABLE_METHODS: ReadonlySet<HttpMethod> = new Set<HttpMethod>(['GET', 'DELETE']);

function errorMessage(body: unknown, fallback: string): string {
  if (typeof body === 'string' && body.trim() !== '') return body;
  const parsed = errorBodySchema.safeParse(body);
  return parsed.success ? parsed.data.message : fallback;
}

function toApiError(error: AxiosError, method: HttpMethod, path: string, resource?: ResourceRef): APIError {
  const response = error.response;
  if (!response) {
    return new NetworkError(`${method} ${path} failed: ${error.message}`, error.code);
  }

  const { status, data } = response;
  const message = errorMessage(data, error.message);

  if (status === 404) {
    return new ResourceNotExistError(
      resource?.resource ?? 'resource',
      resource?.identification ?? path,
      status,
      data
    );
  }
  if (status === 401 || status === 403) return new AuthError(message, status, data);
  if (status >= 500) return new ServerError(message, status, data);
  if (status >= 400) return new ValidationError(message, status, data);
  return new APIError(message, status, data);
}

function isTransient(error: APIError): boolean {
  return error instanceof NetworkError || error instanceof ServerError || error.statusCode === 429;
}

export class HttpClient {
  readonly baseUrl: string;
  private readonly axios: AxiosInstance;
  private readonly maxRetries: number;
  private readonly retryDelay: number;

  constructor(params: HttpClientParams) {
    this.baseUrl = params.url;
    this.maxRetries = params.maxRetries ?? MAX_RETRIES;
    this.retryDelay = params.retryDelay ?? RETRY_DELAY;

    this.axios = axios.create({
      baseURL: params.url,
      timeout: params.timeout ?? API_TIMEOUT,
      adapter: params.adapter,
      headers: {
        'X-Token': params.accessKey,
        'Content-Type': 'application/json',
        'Accept': 'application/json',
        'User-Agent': `strata-sdk/${SDK_VERSION}`,
      },
    });

    // Add request/response interceptors for logging
    if (logger.level === 'debug') {
      this.axios.interceptors.request.use(request => {
        logger.debug(`API Request: ${request.method?.toUpperCase()} ${request.url}`, {
          params: request.params,
          data: request.data,
        });
        return request;
      });

      this.axios.interceptors.response.use(
        response => {
          logger.debug(`API Response: ${response.status} ${response.config.url}`);
          return response;
        },
        error => {
          if (error instanceof AxiosError) {
            logger.debug(`API Error: ${error.response?.status} ${error.config?.url}`, {
              error: error.response?.data,
            });
          }
          return Promise.reject(error);
        }
      );
    }

    logger.debug(`HTTP client initialized at ${this.baseUrl}`);
  }

  /**
   * Issue one request relative to the platform URL and return the parsed body.
   * Non-2xx responses and transport failures are thrown as APIError subclasses.
   */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const attempts = RETRYABLE_METHODS.has(method) ? this.maxRetries + 1 : 1;

    for (let attempt = 0; ; attempt++) {
      try {
        const response = await this.axios.request<unknown>({
          method,
          url: path,
          params: options.params,
          data: options.json,
          headers: { 'X-Request-Id': uuidv4() },
        });
        return response.data;
      } catch (err) {
        if (!(err instanceof AxiosError)) throw err;

        const apiError = toApiError(err, method, path, options.resource);
        if (attempt + 1 >= attempts || !isTransient(apiError)) throw apiError;

        const delay = this.retryDelay * Math.pow(2, attempt); // Exponential backoff
        warn(`API request failed, retrying in ${delay}ms...`, {
          method,
          path,
          attempt: attempt + 1,
          error: apiError.message,
        });
        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }

  get(path: string, options?: Omit<RequestOptions, 'json'>): Promise<unknown> {
    return this.request('GET', path, options);
  }

  post(path: string, options?: RequestOptions): Promise<unknown> {
    return this.request('POST', path, options);
  }

  patch(path: string, options?: RequestOptions): Promise<unknown> {
    return this.request('PATCH', path, options);
  }

  async delete(path: string, options?: Omit<RequestOptions, 'json'>): Promise<void> {
    await this.request('DELETE', path, options);
  }
}
