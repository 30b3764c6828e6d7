import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { HttpScorer } from './http-scorer';
import { SCORER } from './scorer';
import { ScoringService } from './scoring.service';

@Module({
  imports: [HttpModule],
  providers: [{ provide: SCORER, useClass: HttpScorer }, ScoringService],
  exports: [ScoringService],
})
export class ScoringModule {}
