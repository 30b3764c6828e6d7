import { EncodingError } from '../features/encoding.error';
import { ScoringTransportError } from './scoring-transport.error';

export interface ScoringSuccess {
  ok: true;
  prediction: number;
}

export interface EncodingFailure {
  ok: false;
  kind: 'encoding';
  error: EncodingError;
}

export interface TransportFailure {
  ok: false;
  kind: 'transport';
  error: ScoringTransportError;
}

export type ScoringFailure = EncodingFailure | TransportFailure;

/**
 * Outcome of one request: a prediction, or the reason there is none.
 */
export type ScoringResult = ScoringSuccess | ScoringFailure;
