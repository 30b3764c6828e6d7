import { Test } from '@nestjs/testing';
import { EncodingError } from '../features/encoding.error';
import { SCORER } from '../scoring/scorer';
import { ScoringService } from '../scoring/scoring.service';
import { PredictionService } from './prediction.service';
import { toPredictionResponse } from './prediction.response';

describe('PredictionService', () => {
  let service: PredictionService;
  const invoke = jest.fn<Promise<string>, [string, string]>();

  beforeEach(async () => {
    invoke.mockReset();
    const moduleRef = await Test.createTestingModule({
      providers: [
        PredictionService,
        ScoringService,
        { provide: SCORER, useValue: { invoke } },
      ],
    }).compile();
    service = moduleRef.get(PredictionService);
  });

  it('encodes and scores', async () => {
    invoke.mockResolvedValue('0.9');

    const result = await service.predict({ age: '56', campaign: '1', pdays: '999' });

    expect(result).toEqual({ ok: true, prediction: 0.9 });
    const [payload] = invoke.mock.calls[0];
    expect(payload.split(',').slice(0, 4)).toEqual(['56', '1', '999', '0']);
  });

  it('stops at an encoding error without calling the scorer', async () => {
    const result = await service.predict({ age: 'fifty' });

    expect(invoke).not.toHaveBeenCalled();
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.kind).toBe('encoding');
    expect(result.error).toBeInstanceOf(EncodingError);
  });
});

describe('toPredictionResponse', () => {
  it('maps a prediction to 200', () => {
    expect(toPredictionResponse({ ok: true, prediction: 0.25 })).toEqual({
      statusCode: 200,
      body: { status: 'success', prediction: 0.25 },
    });
  });

  it('maps an encoding failure to 400 naming the slot', () => {
    const error = new EncodingError('pdays', 'soon');
    expect(toPredictionResponse({ ok: false, kind: 'encoding', error })).toEqual({
      statusCode: 400,
      body: {
        status: 'error',
        error: 'EncodingError',
        message: 'Invalid value for feature "pdays": "soon" is not a number',
        feature: 'pdays',
      },
    });
  });
});
