/**
 * HTTP client for the GPU Scope API
 *
 * Usage:
 * ```typescript
 * const client = createApiClient({
 *   baseUrl: 'http://localhost:3001',
 *   getToken: () => null,
 * });
 *
 * const analysis = await client.nodes.getFragmentationAnalysis();
 * ```
 */

/**
 * Configuration for the API client
 */
export interface ApiClientConfig {
  /**
   * Base URL for API requests (e.g., 'http://localhost:3001')
   * Empty string means same-origin requests
   */
  baseUrl: string;

  /**
   * Returns a bearer token to send, or null to send none
   */
  getToken: () => string | null;

  /**
   * Called when the server answers 401
   */
  onUnauthorized?: () => void;

  /**
   * Custom fetch implementation (tests, proxies)
   */
  fetchImpl?: typeof fetch;
}

/**
 * Non-2xx response from the API
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

interface ErrorBody {
  error?: { message?: string };
  message?: string;
}

function isErrorBody(value: unknown): value is ErrorBody {
  return typeof value === 'object' && value !== null;
}

/**
 * Creates a request function bound to the given configuration
 */
export function createRequestFn(config: ApiClientConfig) {
  const fetchFn = config.fetchImpl ?? fetch;

  return async function request<T>(
    endpoint: string,
    options?: RequestInit
  ): Promise<T> {
    const url = `${config.baseUrl}/api${endpoint}`;

    const headers = new Headers(options?.headers);
    headers.set('Content-Type', 'application/json');

    const token = config.getToken();
    if (token) {
      headers.set('Authorization', `Bearer ${token}`);
    }

    const response = await fetchFn(url, {
      ...options,
      headers,
    });

    if (!response.ok) {
      if (response.status === 401 && config.onUnauthorized) {
        config.onUnauthorized();
      }

      let errorMessage: string;
      try {
        const body: unknown = await response.json();
        errorMessage =
          (isErrorBody(body) && (body.error?.message || body.message)) ||
          `Request failed with status ${response.status}`;
      } catch {
        // Empty or non-JSON body
        errorMessage = `Request failed with status ${response.status}: ${response.statusText || 'No response body'}`;
      }

      throw new ApiError(response.status, errorMessage);
    }

    return (await response.json()) as T;
  };
}

export type RequestFn = ReturnType<typeof createRequestFn>;
