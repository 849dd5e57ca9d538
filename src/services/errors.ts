import axios from 'axios';

export class NetworkError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super(message);
    this.name = 'NetworkError';
    this.url = url;
    this.status = status;
  }
}

export class PublishError extends Error {
  readonly status: number;
  readonly responseBody: string;

  constructor(status: number, responseBody: string) {
    super(`Facebook-post feilet med status ${status}`);
    this.name = 'PublishError';
    this.status = status;
    this.responseBody = responseBody;
  }
}

export const toNetworkError = (url: string, error: unknown): NetworkError => {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const detail = status ? `${status} ${error.response?.statusText ?? ''}`.trim() : error.message;
    return new NetworkError(url, `Request to ${url} failed: ${detail}`, status);
  }
  return new NetworkError(url, `Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`);
};
