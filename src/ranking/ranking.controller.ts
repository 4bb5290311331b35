import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiSecurity, ApiTags } from '@nestjs/swagger';
import type { Ranked } from './ranking.js';
import { RankingService } from './ranking.service.js';
import type { RankingEntry } from './ranking.service.js';

@ApiTags('ranking')
@ApiSecurity('X-API-Key')
@Controller('ranking')
export class RankingController {
  constructor(private readonly ranking: RankingService) {}

  @Get()
  @ApiOperation({
    summary: 'Analysis projects ranked by coverage, duplication, new issues and worst open hotspot',
  })
  getRanking(): Promise<Ranked<RankingEntry>[]> {
    return this.ranking.computeRanking();
  }
}
