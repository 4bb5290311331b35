import { Module } from '@nestjs/common';
import { RawModule } from '../raw/raw.module.js';
import { ReconcileModule } from '../reconcile/reconcile.module.js';
import { StorageModule } from '../storage/storage.module.js';
import { HostingHierarchyService } from './hosting-hierarchy.service.js';
import { QualityHierarchyService } from './quality-hierarchy.service.js';
import { RepositoryLinker } from './repository-linker.js';

@Module({
  imports: [RawModule, StorageModule, ReconcileModule],
  providers: [HostingHierarchyService, QualityHierarchyService, RepositoryLinker],
  exports: [HostingHierarchyService, QualityHierarchyService],
})
export class HierarchyModule {}
