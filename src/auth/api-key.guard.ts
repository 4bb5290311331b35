import { Inject, Injectable, CanActivate, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import type { FastifyRequest } from 'fastify';
import { SYNC_CONFIG } from '../config/sync.config.js';
import type { SyncConfig } from '../config/sync.config.js';
import { ConfigurationError } from '../raw/errors.js';

@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(@Inject(SYNC_CONFIG) private readonly config: SyncConfig) {}

  canActivate(context: ExecutionContext): boolean {
    // Skip authentication outside production
    if (this.config.nodeEnv !== 'production') {
      return true;
    }

    const request = context.switchToHttp().getRequest<FastifyRequest>();
    const apiKey = this.extractApiKey(request);
    const validApiKey = this.config.apiKey;

    if (!validApiKey) {
      throw new ConfigurationError('API_KEY environment variable is not configured');
    }

    if (!apiKey) {
      throw new UnauthorizedException('Missing API key');
    }

    if (apiKey !== validApiKey) {
      throw new UnauthorizedException('Invalid API key');
    }

    return true;
  }

  private extractApiKey(request: FastifyRequest): string | undefined {
    const apiKeyHeader = request.headers['x-api-key'];
    const apiKey = Array.isArray(apiKeyHeader) ? apiKeyHeader[0] : apiKeyHeader;
    if (typeof apiKey === 'string' && apiKey.trim().length > 0) {
      return apiKey.trim();
    }

    const authHeader = request.headers['authorization'];
    if (typeof authHeader === 'string' && authHeader.startsWith('Bearer ')) {
      return authHeader.slice(7).trim();
    }

    return undefined;
  }
}
