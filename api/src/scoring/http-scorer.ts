// api/src/scoring/http-scorer.ts
import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { isAxiosError } from 'axios';
import { firstValueFrom, TimeoutError } from 'rxjs';
import { timeout } from 'rxjs/operators';

import { AppConfig, ScorerConfig } from '../config/configuration';
import { Scorer } from './scorer';
import { ScoringTransportError } from './scoring-transport.error';

/**
 * Scorer backed by an HTTP invocation endpoint.
 * One POST per call, no retry; the reply body is returned untouched.
 */
@Injectable()
export class HttpScorer implements Scorer {
  private readonly logger = new Logger(HttpScorer.name);
  private readonly settings: ScorerConfig;

  constructor(
    private readonly http: HttpService,
    config: ConfigService<AppConfig, true>,
  ) {
    this.settings = config.get('scorer', { infer: true });
  }

  async invoke(payload: string, contentType: string): Promise<string> {
    const { endpointUrl, timeoutMs, authToken } = this.settings;

    const headers: Record<string, string> = {
      'Content-Type': contentType,
      Accept: 'text/plain',
    };
    if (authToken) headers.Authorization = `Bearer ${authToken}`;

    let data: unknown;
    try {
      const res = await firstValueFrom(
        this.http
          .post<string>(endpointUrl, payload, { headers, responseType: 'text' })
          .pipe(timeout(timeoutMs)),
      );
      data = res.data;
    } catch (e: unknown) {
      throw this.toTransportError(e, endpointUrl);
    }

    if (typeof data !== 'string') {
      throw new ScoringTransportError(
        'malformed-reply',
        `Scorer replied with ${typeof data} instead of text`,
      );
    }
    return data;
  }

  private toTransportError(e: unknown, url: string): ScoringTransportError {
    if (e instanceof TimeoutError) {
      return new ScoringTransportError(
        'timeout',
        `Scorer did not reply within ${this.settings.timeoutMs}ms`,
      );
    }

    if (isAxiosError(e)) {
      if (e.response) {
        const status = e.response.status;
        this.logger.warn(`[scorer] ${url} -> HTTP ${status}`);
        return new ScoringTransportError(
          'http-status',
          `Scorer responded with HTTP ${status}`,
          status,
        );
      }
      if (e.code === 'ECONNABORTED' || e.code === 'ETIMEDOUT') {
        return new ScoringTransportError('timeout', e.message);
      }
      return new ScoringTransportError('unreachable', e.message);
    }

    return new ScoringTransportError(
      'unreachable',
      e instanceof Error ? e.message : String(e),
    );
  }
}
