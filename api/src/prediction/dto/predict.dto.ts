import { Equals, IsIn, IsNumber, IsObject, IsOptional, IsString } from 'class-validator';

/**
 * Body of POST /predict: feature name -> value.
 * Values are normally strings; numbers and booleans are accepted and
 * stringified before encoding.
 */
export class PredictRequestDto {
  @IsObject()
  features!: Record<string, unknown>;
}

/**
 * DTO for a successful prediction
 */
export class PredictionSuccessDto {
  @Equals('success')
  status!: 'success';

  @IsNumber()
  prediction!: number;
}

/**
 * DTO for a failed prediction
 */
export class PredictionErrorDto {
  @Equals('error')
  status!: 'error';

  @IsIn(['EncodingError', 'ScoringTransportError'])
  error!: 'EncodingError' | 'ScoringTransportError';

  @IsString()
  message!: string;

  /** Offending slot, for encoding errors */
  @IsOptional()
  @IsString()
  feature?: string;
}

export class FeatureListDto {
  @IsNumber()
  count!: number;

  @IsString({ each: true })
  features!: readonly string[];
}
