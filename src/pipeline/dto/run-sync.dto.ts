import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsArray, IsInt, IsOptional, Max, Min, ValidateNested } from 'class-validator';
import { SyncTargetDto } from '../../config/sync-target.js';

export class RunSyncDto {
  @ApiPropertyOptional({
    type: [SyncTargetDto],
    description: 'Targets to sync; the configured targets when omitted',
  })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SyncTargetDto)
  targets?: SyncTargetDto[];

  @ApiPropertyOptional({ minimum: 1, maximum: 16, example: 2 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(16)
  concurrency?: number;
}

export class ListRunsQueryDto {
  @ApiPropertyOptional({ minimum: 1, maximum: 100, default: 20 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number;
}
