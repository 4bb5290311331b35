import { Global, Module } from '@nestjs/common';
import { SYNC_CONFIG, loadSyncConfig } from './sync.config.js';

@Global()
@Module({
  providers: [{ provide: SYNC_CONFIG, useFactory: () => loadSyncConfig(process.env) }],
  exports: [SYNC_CONFIG],
})
export class ConfigModule {}
