import axios from 'axios';

export interface HttpRequestOptions {
  headers: Record<string, string>;
  timeout: number;
}

export interface HttpResponse {
  status: number;
  data: unknown;
}

/**
 * The slice of an HTTP client the push and webhook channels need.
 * Non-2xx responses reject, as axios does by default.
 */
export interface HttpTransport {
  post(url: string, body: unknown, options: HttpRequestOptions): Promise<HttpResponse>;
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}

export const axiosTransport: HttpTransport = {
  async post(url, body, options) {
    const response = await axios.post<unknown>(url, body, options);
    return { status: response.status, data: response.data };
  },
  async get(url, options) {
    const response = await axios.get<unknown>(url, options);
    return { status: response.status, data: response.data };
  },
};

export function describeHttpError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return `HTTP ${error.response.status}: ${error.message}`;
    }
    if (error.code === 'ECONNABORTED') {
      return `Request timed out: ${error.message}`;
    }
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
