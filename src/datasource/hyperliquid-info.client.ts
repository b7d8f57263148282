import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import { DataSource } from './datasource.interface';
import { AppConfig } from '../config/configuration';
import { UpstreamApiException } from '../common/exceptions/upstream-api.exception';
import { isRecord } from '../common/utils/record.util';

// Hyperliquid caps userFills / userFunding responses at 500 rows.
export const HYPERLIQUID_PAGE_SIZE = 500;

export type InfoRequestType = 'userFills' | 'userFunding' | 'clearinghouseState' | 'allMids';

export interface InfoRequest {
  type: InfoRequestType;
  user?: string;
  startTime?: number;
}

/**
 * Maps a failed info call to a 502.
 * Status and body are kept in the message when the exchange answered.
 */
export function toUpstreamException(type: InfoRequestType, error: unknown): UpstreamApiException {
  if (axios.isAxiosError(error) && error.response) {
    const body = typeof error.response.data === 'string'
      ? error.response.data
      : JSON.stringify(error.response.data);
    return new UpstreamApiException(
      `Hyperliquid ${type} request failed with status ${error.response.status}: ${body}`,
      error,
    );
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new UpstreamApiException(`Hyperliquid ${type} request failed: ${reason}`, error);
}

// Client for the Hyperliquid POST /info endpoint.
@Injectable()
export class HyperliquidInfoClient implements DataSource {
  private readonly logger = new Logger(HyperliquidInfoClient.name);
  private readonly http: AxiosInstance;

  constructor(configService: ConfigService<AppConfig, true>) {
    const { infoUrl, timeoutMs } = configService.get('hyperliquid', { infer: true });
    this.http = axios.create({
      baseURL: infoUrl,
      timeout: timeoutMs,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  getFills(wallet: string, since?: number): Promise<unknown[]> {
    return this.fetchPaginated('userFills', wallet, since);
  }

  getFunding(wallet: string, since?: number): Promise<unknown[]> {
    return this.fetchPaginated('userFunding', wallet, since);
  }

  getUserState(wallet: string): Promise<unknown> {
    return this.postInfo({ type: 'clearinghouseState', user: wallet });
  }

  getAllMids(): Promise<unknown> {
    return this.postInfo({ type: 'allMids' });
  }

  /** Single POST /info round trip. Any failure becomes an UpstreamApiException. */
  async postInfo(request: InfoRequest): Promise<unknown> {
    try {
      const response = await this.http.post<unknown>('', request);
      return response.data;
    } catch (error) {
      const exception = toUpstreamException(request.type, error);
      this.logger.error(exception.message);
      throw exception;
    }
  }

  // Pages are time-ascending. A short page is the last one; otherwise the
  // next page starts 1ms after the last record so it isn't fetched twice.
  private async fetchPaginated(
    type: InfoRequestType,
    wallet: string,
    startTime?: number,
  ): Promise<unknown[]> {
    const items: unknown[] = [];
    let cursor = startTime;

    for (;;) {
      const request: InfoRequest = { type, user: wallet };
      if (cursor !== undefined) {
        request.startTime = cursor;
      }

      const page = await this.postInfo(request);
      const records: unknown[] = Array.isArray(page) ? page : [];
      if (records.length === 0) {
        break;
      }

      items.push(...records);

      if (records.length < HYPERLIQUID_PAGE_SIZE) {
        break;
      }

      const last = records[records.length - 1];
      if (!isRecord(last) || typeof last.time !== 'number') {
        break;
      }
      cursor = last.time + 1;
      this.logger.debug(`${type}: ${items.length} records so far, next page from ${cursor}`);
    }

    return items;
  }
}
