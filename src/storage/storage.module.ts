import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SYNC_ENTITIES } from './entities/index.js';
import { STORAGE_GATEWAY } from './entity-store.js';
import { TypeOrmStorage } from './typeorm-storage.js';

@Module({
  imports: [TypeOrmModule.forFeature(SYNC_ENTITIES)],
  providers: [{ provide: STORAGE_GATEWAY, useClass: TypeOrmStorage }],
  exports: [STORAGE_GATEWAY],
})
export class StorageModule {}
