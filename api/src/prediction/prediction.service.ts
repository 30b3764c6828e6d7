// api/src/prediction/prediction.service.ts
import { Injectable } from '@nestjs/common';

import { EncodingError } from '../features/encoding.error';
import { encodeFeatures } from '../features/feature-encoder';
import { EncodedVector, RawInput } from '../features/feature.types';
import { ScoringService } from '../scoring/scoring.service';
import { ScoringResult } from '../scoring/scoring.types';

@Injectable()
export class PredictionService {
  constructor(private readonly scoring: ScoringService) {}

  /**
   * Encode the caller's features and score them.
   * A malformed feature value short-circuits before the scorer is called.
   */
  async predict(raw: RawInput): Promise<ScoringResult> {
    let vector: EncodedVector;
    try {
      vector = encodeFeatures(raw);
    } catch (e: unknown) {
      if (e instanceof EncodingError) {
        return { ok: false, kind: 'encoding', error: e };
      }
      throw e;
    }

    return this.scoring.score(vector);
  }
}
