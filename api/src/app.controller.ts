import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from './config/configuration';
import { FEATURE_COUNT } from './features/feature-schema';

@Controller()
export class AppController {
  constructor(private readonly config: ConfigService<AppConfig, true>) {}

  @Get('health')
  health() {
    return {
      ok: true,
      env: this.config.get('nodeEnv', { infer: true }),
      version: 'v1',
      features: FEATURE_COUNT,
    };
  }
}
