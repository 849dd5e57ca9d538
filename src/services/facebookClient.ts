import axios, { type AxiosInstance, type AxiosResponse } from 'axios';

import type { AnnouncementPublisher, PublishResult } from '../types.js';
import { logger } from '../utils/logger.js';
import { PublishError, toNetworkError } from './errors.js';

export interface FacebookPublisherOptions {
  pageId: string;
  accessToken: string;
  graphApiVersion: string;
  baseUrl: string;
  http?: AxiosInstance;
}

const stringifyBody = (data: unknown): string => (typeof data === 'string' ? data : JSON.stringify(data));

const isPublishResult = (value: unknown): value is PublishResult =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Posts plain text to a page feed through the Graph API. Never retries. */
export class FacebookPublisher implements AnnouncementPublisher {
  private readonly options: FacebookPublisherOptions;
  private readonly http: AxiosInstance;

  constructor(options: FacebookPublisherOptions) {
    this.options = options;
    this.http = options.http ?? axios.create();
  }

  get feedUrl(): string {
    const { baseUrl, graphApiVersion, pageId } = this.options;
    return `${baseUrl.replace(/\/?$/, '')}/${graphApiVersion}/${encodeURIComponent(pageId)}/feed`;
  }

  async publish(message: string): Promise<PublishResult> {
    const url = this.feedUrl;
    const body = new URLSearchParams({ message, access_token: this.options.accessToken });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(url, body.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        validateStatus: () => true
      });
    } catch (error) {
      throw toNetworkError(url, error);
    }

    if (response.status < 200 || response.status >= 300) {
      const responseBody = stringifyBody(response.data);
      logger.error('❌ Facebook-post feilet', { status: response.status, body: responseBody });
      throw new PublishError(response.status, responseBody);
    }

    logger.info('✅ Facebook-post publisert.');
    const data: unknown = typeof response.data === 'string' ? JSON.parse(response.data) : response.data;
    return isPublishResult(data) ? data : { result: data };
  }
}
