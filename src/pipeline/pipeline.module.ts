import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { HierarchyModule } from '../hierarchy/hierarchy.module.js';
import { PipelineController } from './pipeline.controller.js';
import { PipelineService } from './pipeline.service.js';
import { SyncRun } from './sync-run.entity.js';
import { SyncRunRepo } from './sync-run.repo.js';

@Module({
  imports: [HierarchyModule, TypeOrmModule.forFeature([SyncRun])],
  controllers: [PipelineController],
  providers: [PipelineService, SyncRunRepo],
  exports: [PipelineService, SyncRunRepo],
})
export class PipelineModule {}
