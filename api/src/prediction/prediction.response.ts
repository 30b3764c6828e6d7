import { HttpStatus } from '@nestjs/common';
import { ScoringResult } from '../scoring/scoring.types';
import {
  PredictionErrorDto,
  PredictionSuccessDto,
} from './dto/predict.dto';

export const SCORING_UNAVAILABLE_MESSAGE = 'Scoring service unavailable';

export interface PredictionResponse {
  statusCode: number;
  body: PredictionSuccessDto | PredictionErrorDto;
}

/**
 * Shape a scoring result for any HTTP-like surface.
 * Transport details are never echoed back; they are logged by ScoringService.
 */
export function toPredictionResponse(result: ScoringResult): PredictionResponse {
  if (result.ok) {
    return {
      statusCode: HttpStatus.OK,
      body: { status: 'success', prediction: result.prediction },
    };
  }

  switch (result.kind) {
    case 'encoding':
      return {
        statusCode: HttpStatus.BAD_REQUEST,
        body: {
          status: 'error',
          error: 'EncodingError',
          message: result.error.message,
          feature: result.error.feature,
        },
      };
    case 'transport':
      return {
        statusCode: HttpStatus.BAD_GATEWAY,
        body: {
          status: 'error',
          error: 'ScoringTransportError',
          message: SCORING_UNAVAILABLE_MESSAGE,
        },
      };
  }
}
