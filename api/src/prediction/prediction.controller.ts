// api/src/prediction/prediction.controller.ts
import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpException,
  Post,
  Query,
} from '@nestjs/common';
import { toRawInput } from '../features/feature-encoder';
import { FEATURE_SCHEMA } from '../features/feature-schema';
import { RawInput } from '../features/feature.types';
import {
  FeatureListDto,
  PredictRequestDto,
  PredictionSuccessDto,
} from './dto/predict.dto';
import { toPredictionResponse } from './prediction.response';
import { PredictionService } from './prediction.service';

@Controller('predict')
export class PredictionController {
  constructor(private readonly predictions: PredictionService) {}

  /**
   * GET /predict?age=56&campaign=1&...
   * Returns: { status: 'success', prediction: number }
   */
  @Get()
  async predictFromQuery(
    @Query() query: Record<string, unknown>,
  ): Promise<PredictionSuccessDto> {
    return this.run(toRawInput(query));
  }

  /**
   * POST /predict
   * Body: { features: { age: "56", ... } }
   */
  @Post()
  @HttpCode(200)
  async predictFromBody(
    @Body() body: PredictRequestDto,
  ): Promise<PredictionSuccessDto> {
    return this.run(toRawInput(body.features));
  }

  /**
   * GET /predict/features
   * The ordered schema the scorer expects.
   */
  @Get('features')
  features(): FeatureListDto {
    return { count: FEATURE_SCHEMA.length, features: FEATURE_SCHEMA };
  }

  private async run(raw: RawInput): Promise<PredictionSuccessDto> {
    const { statusCode, body } = toPredictionResponse(
      await this.predictions.predict(raw),
    );
    if (body.status === 'error') {
      throw new HttpException(body, statusCode);
    }
    return body;
  }
}
