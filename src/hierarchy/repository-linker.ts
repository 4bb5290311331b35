import { Injectable, Logger } from '@nestjs/common';
import { StorageConstraintError } from '../raw/errors.js';
import type { EntityStore } from '../storage/entity-store.js';
import type { LinkStatus } from './unit-stats.js';

/**
 * Cross-links an analysis project to the hosting repository it analyzes.
 * The part of the project key after the last ':' ("acme:payments-api") is
 * matched against repository slugs. Each repository backs at most one
 * analysis project.
 */
@Injectable()
export class RepositoryLinker {
  private readonly logger = new Logger(RepositoryLinker.name);

  async link(store: EntityStore, analysisProjectId: string, projectKey: string): Promise<LinkStatus> {
    const slug = repositorySlugFor(projectKey);
    const candidates = await store.find('repository', { slug });

    if (candidates.length === 0) return 'unmatched';
    if (candidates.length > 1) {
      this.logger.warn(
        `Analysis project ${projectKey} matches ${candidates.length} repositories named "${slug}", not linking`,
      );
      return 'ambiguous';
    }

    const repositoryId = candidates[0].id;
    const claimants = await store.find('analysisProject', { linkedRepositoryId: repositoryId });
    const other = claimants.find((row) => row.id !== analysisProjectId);
    if (other) {
      this.logger.warn(
        `Repository "${slug}" is already linked to analysis project ${String(other.fields.key)}, skipping ${projectKey}`,
      );
      return 'claimed';
    }
    if (claimants.length > 0) return 'unchanged';

    try {
      await store.savepoint(() =>
        store.update('analysisProject', analysisProjectId, { linkedRepositoryId: repositoryId }),
      );
    } catch (error: unknown) {
      if (!(error instanceof StorageConstraintError)) throw error;
      this.logger.warn(`Repository "${slug}" was claimed concurrently, skipping ${projectKey}`);
      return 'claimed';
    }
    this.logger.log(`🔗 Linked analysis project ${projectKey} to repository "${slug}"`);
    return 'linked';
  }
}

export function repositorySlugFor(projectKey: string): string {
  const separator = projectKey.lastIndexOf(':');
  return separator === -1 ? projectKey : projectKey.slice(separator + 1);
}
