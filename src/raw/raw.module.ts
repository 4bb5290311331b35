import { Module } from '@nestjs/common';
import { SYNC_CONFIG } from '../config/sync.config.js';
import type { SyncConfig } from '../config/sync.config.js';
import { BitbucketClient } from './bitbucket-client.js';
import { HttpTransport } from './http-transport.js';
import { HOSTING_CLIENT, QUALITY_CLIENT } from './platform-client.tokens.js';
import { SonarCloudClient } from './sonarcloud-client.js';

@Module({
  providers: [
    {
      provide: HOSTING_CLIENT,
      inject: [SYNC_CONFIG],
      useFactory: (config: SyncConfig) =>
        new BitbucketClient(
          new HttpTransport({
            platform: 'bitbucket',
            baseURL: config.bitbucketApiUrl,
            token: config.bitbucketToken,
            timeoutMs: config.timeoutMs,
          }),
        ),
    },
    {
      provide: QUALITY_CLIENT,
      inject: [SYNC_CONFIG],
      useFactory: (config: SyncConfig) =>
        new SonarCloudClient(
          new HttpTransport({
            platform: 'sonarcloud',
            baseURL: config.sonarcloudApiUrl,
            token: config.sonarcloudToken,
            timeoutMs: config.timeoutMs,
          }),
        ),
    },
  ],
  exports: [HOSTING_CLIENT, QUALITY_CLIENT],
})
export class RawModule {}
