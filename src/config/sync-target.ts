import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { ConfigurationError } from '../raw/errors.js';

export const PLATFORMS = ['bitbucket', 'sonarcloud'] as const;
export type Platform = (typeof PLATFORMS)[number];

export const HOSTING_SCOPES = ['workspace', 'project', 'repository'] as const;
export const QUALITY_SCOPES = ['organization', 'project'] as const;

export interface HostingTarget {
  platform: 'bitbucket';
  scope: (typeof HOSTING_SCOPES)[number];
  workspace: string;
  /** Project key; required for the project scope. */
  project?: string;
  /** Repository slug; required for the repository scope. */
  repository?: string;
}

export interface QualityTarget {
  platform: 'sonarcloud';
  scope: (typeof QUALITY_SCOPES)[number];
  organization: string;
  /** Analysis project key; required for the project scope. */
  project?: string;
}

export type SyncTarget = HostingTarget | QualityTarget;

export class SyncTargetDto {
  @ApiProperty({ enum: PLATFORMS, example: 'bitbucket' })
  @IsIn(PLATFORMS)
  platform!: Platform;

  @ApiProperty({
    enum: ['workspace', 'project', 'repository', 'organization'],
    example: 'repository',
  })
  @IsIn(['workspace', 'project', 'repository', 'organization'])
  scope!: string;

  @ApiPropertyOptional({ example: 'acme' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  workspace?: string;

  @ApiPropertyOptional({ example: 'acme-org' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  organization?: string;

  @ApiPropertyOptional({ example: 'CORE' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  project?: string;

  @ApiPropertyOptional({ example: 'payments-api' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  repository?: string;
}

/** Shape of the targets file: `{ "targets": [...] }`. */
export class TargetsFileDto {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => SyncTargetDto)
  targets!: SyncTargetDto[];
}

/** Narrows a validated DTO to the target union, checking scope/field combinations. */
export function toSyncTarget(dto: SyncTargetDto): SyncTarget {
  if (dto.platform === 'bitbucket') {
    if (!dto.workspace) throw new ConfigurationError('bitbucket target requires "workspace"');
    switch (dto.scope) {
      case 'workspace':
        return { platform: 'bitbucket', scope: 'workspace', workspace: dto.workspace };
      case 'project':
        if (!dto.project) throw new ConfigurationError('bitbucket project target requires "project"');
        return { platform: 'bitbucket', scope: 'project', workspace: dto.workspace, project: dto.project };
      case 'repository':
        if (!dto.repository) {
          throw new ConfigurationError('bitbucket repository target requires "repository"');
        }
        return {
          platform: 'bitbucket',
          scope: 'repository',
          workspace: dto.workspace,
          repository: dto.repository,
        };
      default:
        throw new ConfigurationError(`bitbucket targets do not support scope "${dto.scope}"`);
    }
  }

  if (!dto.organization) throw new ConfigurationError('sonarcloud target requires "organization"');
  switch (dto.scope) {
    case 'organization':
      return { platform: 'sonarcloud', scope: 'organization', organization: dto.organization };
    case 'project':
      if (!dto.project) throw new ConfigurationError('sonarcloud project target requires "project"');
      return {
        platform: 'sonarcloud',
        scope: 'project',
        organization: dto.organization,
        project: dto.project,
      };
    default:
      throw new ConfigurationError(`sonarcloud targets do not support scope "${dto.scope}"`);
  }
}

export function targetLabel(target: SyncTarget): string {
  if (target.platform === 'bitbucket') {
    const leaf = target.repository ?? target.project;
    return leaf ? `bitbucket:${target.workspace}/${leaf}` : `bitbucket:${target.workspace}`;
  }
  return target.project
    ? `sonarcloud:${target.organization}/${target.project}`
    : `sonarcloud:${target.organization}`;
}
