// api/src/scoring/scoring.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';

import { parseDecimal, serializeVector } from '../features/feature-encoder';
import { FEATURE_COUNT } from '../features/feature-schema';
import { EncodedVector, VECTOR_CONTENT_TYPE } from '../features/feature.types';
import { SCORER, Scorer } from './scorer';
import { ScoringTransportError } from './scoring-transport.error';
import { ScoringResult, TransportFailure } from './scoring.types';

@Injectable()
export class ScoringService {
  private readonly logger = new Logger(ScoringService.name);

  constructor(@Inject(SCORER) private readonly scorer: Scorer) {}

  /**
   * Send one encoded vector to the scorer and read back its prediction.
   * Resolves with a failure variant instead of rejecting.
   */
  async score(vector: EncodedVector): Promise<ScoringResult> {
    if (vector.length !== FEATURE_COUNT) {
      return this.fail(
        new ScoringTransportError(
          'invalid-payload',
          `Refusing to score a vector of length ${vector.length}`,
        ),
      );
    }

    const payload = serializeVector(vector);

    let reply: string;
    try {
      reply = await this.scorer.invoke(payload, VECTOR_CONTENT_TYPE);
    } catch (e: unknown) {
      return this.fail(
        e instanceof ScoringTransportError
          ? e
          : new ScoringTransportError(
              'unreachable',
              e instanceof Error ? e.message : String(e),
            ),
      );
    }

    const prediction = parseDecimal(reply);
    if (prediction === null) {
      return this.fail(
        new ScoringTransportError(
          'malformed-reply',
          `Scorer reply is not a number: ${JSON.stringify(reply.slice(0, 64))}`,
        ),
      );
    }

    this.logger.debug(`[score] -> ${prediction}`);
    return { ok: true, prediction };
  }

  private fail(error: ScoringTransportError): TransportFailure {
    this.logger.error(`[score] ${error.reason}: ${error.message}`);
    return { ok: false, kind: 'transport', error };
  }
}
