export type TransportFailureReason =
  | 'unreachable'
  | 'timeout'
  | 'http-status'
  | 'malformed-reply'
  | 'invalid-payload';

/**
 * The external scorer could not produce a usable prediction.
 * `message` is for logs; callers only ever see a generic text.
 */
export class ScoringTransportError extends Error {
  constructor(
    readonly reason: TransportFailureReason,
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'ScoringTransportError';
  }
}
