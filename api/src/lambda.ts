// api/src/lambda.ts
import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { toRawInput } from './features/feature-encoder';
import { RawInput } from './features/feature.types';
import { toPredictionResponse } from './prediction/prediction.response';
import { PredictionService } from './prediction/prediction.service';

/** The subset of an HTTP gateway proxy event the handler reads */
export interface GatewayEvent {
  queryStringParameters?: Record<string, string | undefined> | null;
  multiValueQueryStringParameters?: Record<string, string[] | undefined> | null;
  body?: string | null;
  isBase64Encoded?: boolean;
}

export interface GatewayResult {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export type GatewayHandler = (event: GatewayEvent) => Promise<GatewayResult>;

class BadRequestBody extends Error {}

function json(statusCode: number, body: unknown): GatewayResult {
  return {
    statusCode,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Query parameters first, then `features` from a JSON body on top.
 * Multi-value parameters resolve to their last value.
 */
function readEvent(event: GatewayEvent): RawInput {
  const query = toRawInput(
    event.multiValueQueryStringParameters ?? event.queryStringParameters ?? {},
  );

  if (!event.body) return query;

  const text = event.isBase64Encoded
    ? Buffer.from(event.body, 'base64').toString('utf8')
    : event.body;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new BadRequestBody('Request body is not valid JSON');
  }
  const features = isRecord(parsed) ? parsed.features : undefined;
  if (!isRecord(features)) {
    throw new BadRequestBody('Request body must be an object with a "features" object');
  }

  return { ...query, ...toRawInput(features) };
}

/**
 * Build a function-as-a-service entry point around an application context.
 * The context is created on the first invocation and reused afterwards.
 */
export function createHandler(
  createContext: () => Promise<INestApplicationContext>,
): GatewayHandler {
  const logger = new Logger('LambdaHandler');
  let context: Promise<INestApplicationContext> | undefined;

  const getContext = (): Promise<INestApplicationContext> => {
    if (!context) {
      context = createContext().catch((err: unknown) => {
        context = undefined;
        throw err;
      });
    }
    return context;
  };

  return async (event) => {
    let raw: RawInput;
    try {
      raw = readEvent(event);
    } catch (e: unknown) {
      if (e instanceof BadRequestBody) {
        logger.warn(`[lambda] ${e.message}`);
        return json(400, { status: 'error', error: 'BadRequest', message: e.message });
      }
      throw e;
    }

    const predictions = (await getContext()).get(PredictionService);
    const { statusCode, body } = toPredictionResponse(await predictions.predict(raw));
    return json(statusCode, body);
  };
}

export const handler: GatewayHandler = createHandler(() =>
  NestFactory.createApplicationContext(AppModule),
);
