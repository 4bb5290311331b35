import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Get,
  InternalServerErrorException,
  Post,
  Query,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { toSyncTarget } from '../config/sync-target.js';
import type { SyncTarget } from '../config/sync-target.js';
import { ConfigurationError, RunInProgressError } from '../raw/errors.js';
import { ListRunsQueryDto, RunSyncDto } from './dto/run-sync.dto.js';
import { PipelineService } from './pipeline.service.js';
import type { RunSummary } from './pipeline.service.js';
import type { SyncRun } from './sync-run.entity.js';
import { SyncRunRepo } from './sync-run.repo.js';

@ApiTags('pipeline')
@ApiSecurity('X-API-Key')
@Controller('pipeline')
export class PipelineController {
  constructor(
    private readonly pipeline: PipelineService,
    private readonly runs: SyncRunRepo,
  ) {}

  @Post('run')
  @ApiOperation({ summary: 'Sync the given (or configured) targets and return the run summary' })
  @ApiBody({ type: RunSyncDto })
  async run(@Body() body: RunSyncDto): Promise<RunSummary> {
    const targets = this.parseTargets(body);
    let summary: RunSummary;
    try {
      summary = await this.pipeline.run({ targets, concurrency: body.concurrency });
    } catch (error: unknown) {
      if (error instanceof ConfigurationError) throw new InternalServerErrorException(error.message);
      if (error instanceof RunInProgressError) throw new ConflictException(error.message);
      throw error;
    }
    await this.runs.record('http', summary);
    return summary;
  }

  @Get('runs')
  @ApiOperation({ summary: 'Most recent recorded sync runs' })
  listRuns(@Query() query: ListRunsQueryDto): Promise<SyncRun[]> {
    return this.runs.latest(query.limit);
  }

  private parseTargets(body: RunSyncDto): SyncTarget[] | undefined {
    if (!body.targets || body.targets.length === 0) return undefined;
    try {
      return body.targets.map(toSyncTarget);
    } catch (error: unknown) {
      if (error instanceof ConfigurationError) throw new BadRequestException(error.message);
      throw error;
    }
  }
}
