/**
 * The hosted model endpoint, reduced to what the gateway needs from it:
 * send a delimited-text payload, get the raw reply body back.
 * Implementations reject on any transport or service fault.
 */
export interface Scorer {
  invoke(payload: string, contentType: string): Promise<string>;
}

export const SCORER = Symbol('SCORER');
