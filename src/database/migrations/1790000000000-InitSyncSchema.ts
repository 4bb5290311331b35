import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitSyncSchema1790000000000 implements MigrationInterface {
  name = 'InitSyncSchema1790000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('CREATE EXTENSION IF NOT EXISTS pgcrypto');
    await queryRunner.query('CREATE SCHEMA IF NOT EXISTS hosting');
    await queryRunner.query('CREATE SCHEMA IF NOT EXISTS quality');
    await queryRunner.query('CREATE SCHEMA IF NOT EXISTS sync');

    // Hierarchy A: workspace -> project -> repository -> {commit, pull request, branch}
    await queryRunner.query(`CREATE TABLE IF NOT EXISTS hosting.workspaces (
      id          UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      uuid        TEXT NOT NULL,
      slug        TEXT NOT NULL,
      name        TEXT NOT NULL,
      is_private  BOOLEAN,
      created_on  TIMESTAMPTZ,
      created_at  TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at  TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT uq_workspaces_uuid UNIQUE (uuid),
      CONSTRAINT uq_workspaces_slug UNIQUE (slug)
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS hosting.projects (
      id            UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      workspace_id  UUID NOT NULL REFERENCES hosting.workspaces(id),
      uuid          TEXT NOT NULL,
      key           TEXT NOT NULL,
      name          TEXT NOT NULL,
      description   TEXT,
      is_private    BOOLEAN,
      created_on    TIMESTAMPTZ,
      updated_on    TIMESTAMPTZ,
      created_at    TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at    TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT uq_projects_uuid UNIQUE (uuid),
      CONSTRAINT uq_projects_workspace_key UNIQUE (workspace_id, key)
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS hosting.repositories (
      id            UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      workspace_id  UUID NOT NULL REFERENCES hosting.workspaces(id),
      project_id    UUID REFERENCES hosting.projects(id),
      uuid          TEXT NOT NULL,
      slug          TEXT NOT NULL,
      name          TEXT NOT NULL,
      full_name     TEXT,
      description   TEXT,
      is_private    BOOLEAN,
      language      TEXT,
      size_bytes    BIGINT,
      main_branch   TEXT,
      created_on    TIMESTAMPTZ,
      updated_on    TIMESTAMPTZ,
      created_at    TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at    TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT uq_repositories_uuid UNIQUE (uuid),
      CONSTRAINT uq_repositories_workspace_slug UNIQUE (workspace_id, slug)
    )`);
    await queryRunner.query('CREATE INDEX IF NOT EXISTS ix_repositories_slug ON hosting.repositories (slug)');

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS hosting.commits (
      id             UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      repository_id  UUID NOT NULL REFERENCES hosting.repositories(id),
      hash           TEXT NOT NULL,
      message        TEXT,
      author_raw     TEXT,
      author_name    TEXT,
      committed_at   TIMESTAMPTZ,
      is_merge       BOOLEAN NOT NULL DEFAULT false,
      created_at     TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at     TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT uq_commits_hash UNIQUE (hash)
    )`);
    await queryRunner.query('CREATE INDEX IF NOT EXISTS ix_commits_repository ON hosting.commits (repository_id)');

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS hosting.pull_requests (
      id                  UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      repository_id       UUID NOT NULL REFERENCES hosting.repositories(id),
      number              INTEGER NOT NULL,
      title               TEXT NOT NULL,
      description         TEXT,
      state               TEXT NOT NULL,
      author_name         TEXT,
      source_branch       TEXT,
      destination_branch  TEXT,
      merge_commit_hash   TEXT,
      comment_count       INTEGER,
      task_count          INTEGER,
      created_on          TIMESTAMPTZ,
      updated_on          TIMESTAMPTZ,
      created_at          TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at          TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT uq_pull_requests_repository_number UNIQUE (repository_id, number),
      CONSTRAINT ck_pull_requests_state CHECK (state IN ('OPEN', 'MERGED', 'DECLINED', 'SUPERSEDED'))
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS hosting.branches (
      id             UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      repository_id  UUID NOT NULL REFERENCES hosting.repositories(id),
      name           TEXT NOT NULL,
      target_hash    TEXT,
      target_date    TIMESTAMPTZ,
      created_at     TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at     TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT uq_branches_repository_name UNIQUE (repository_id, name)
    )`);

    // Hierarchy B: organization -> analysis project -> {issue, hotspot, quality gate, metric}
    await queryRunner.query(`CREATE TABLE IF NOT EXISTS quality.organizations (
      id           UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      key          TEXT NOT NULL,
      name         TEXT NOT NULL,
      description  TEXT,
      url          TEXT,
      created_at   TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at   TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT uq_organizations_key UNIQUE (key)
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS quality.analysis_projects (
      id                    UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      organization_id       UUID NOT NULL REFERENCES quality.organizations(id),
      linked_repository_id  UUID REFERENCES hosting.repositories(id),
      key                   TEXT NOT NULL,
      name                  TEXT NOT NULL,
      qualifier             TEXT,
      visibility            TEXT,
      last_analysis_date    TIMESTAMPTZ,
      revision              TEXT,
      created_at            TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at            TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT uq_analysis_projects_key UNIQUE (key)
    )`);
    // At most one analysis project per repository
    await queryRunner.query(
      'CREATE UNIQUE INDEX IF NOT EXISTS uq_analysis_projects_linked_repository ON quality.analysis_projects (linked_repository_id) WHERE linked_repository_id IS NOT NULL',
    );

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS quality.issues (
      id                   UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      analysis_project_id  UUID NOT NULL REFERENCES quality.analysis_projects(id),
      key                  TEXT NOT NULL,
      rule                 TEXT NOT NULL,
      severity             TEXT NOT NULL,
      type                 TEXT NOT NULL,
      status               TEXT NOT NULL,
      resolution           TEXT,
      message              TEXT,
      component            TEXT,
      line                 INTEGER,
      effort               TEXT,
      author               TEXT,
      creation_date        TIMESTAMPTZ,
      update_date          TIMESTAMPTZ,
      close_date           TIMESTAMPTZ,
      created_at           TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at           TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT uq_issues_key UNIQUE (key),
      CONSTRAINT ck_issues_severity CHECK (severity IN ('BLOCKER', 'CRITICAL', 'MAJOR', 'MINOR', 'INFO')),
      CONSTRAINT ck_issues_type CHECK (type IN ('BUG', 'VULNERABILITY', 'CODE_SMELL')),
      CONSTRAINT ck_issues_status CHECK (status IN ('OPEN', 'CONFIRMED', 'REOPENED', 'RESOLVED', 'CLOSED'))
    )`);
    await queryRunner.query('CREATE INDEX IF NOT EXISTS ix_issues_project ON quality.issues (analysis_project_id)');

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS quality.security_hotspots (
      id                   UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      analysis_project_id  UUID NOT NULL REFERENCES quality.analysis_projects(id),
      key                  TEXT NOT NULL,
      rule_key             TEXT,
      component            TEXT,
      line                 INTEGER,
      message              TEXT,
      status               TEXT NOT NULL,
      resolution           TEXT,
      severity             TEXT NOT NULL,
      security_category    TEXT,
      author               TEXT,
      creation_date        TIMESTAMPTZ,
      update_date          TIMESTAMPTZ,
      created_at           TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at           TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT uq_security_hotspots_key UNIQUE (key),
      CONSTRAINT ck_security_hotspots_status CHECK (status IN ('TO_REVIEW', 'IN_REVIEW', 'REVIEWED')),
      CONSTRAINT ck_security_hotspots_severity CHECK (severity IN ('CRITICAL', 'HIGH', 'MEDIUM', 'LOW'))
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS quality.quality_gates (
      id                      UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      analysis_project_id     UUID NOT NULL REFERENCES quality.analysis_projects(id),
      analysis_key            TEXT NOT NULL,
      status                  TEXT NOT NULL,
      condition_count         INTEGER NOT NULL DEFAULT 0,
      failed_condition_count  INTEGER NOT NULL DEFAULT 0,
      ignored_conditions      BOOLEAN,
      created_at              TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at              TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT uq_quality_gates_project_analysis UNIQUE (analysis_project_id, analysis_key),
      CONSTRAINT ck_quality_gates_status CHECK (status IN ('OK', 'WARN', 'ERROR', 'NONE'))
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS quality.metrics (
      id                   UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      analysis_project_id  UUID NOT NULL REFERENCES quality.analysis_projects(id),
      metric_key           TEXT NOT NULL,
      value                DOUBLE PRECISION,
      value_text           TEXT,
      best_value           BOOLEAN,
      created_at           TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at           TIMESTAMPTZ NOT NULL DEFAULT now(),
      CONSTRAINT uq_metrics_project_metric UNIQUE (analysis_project_id, metric_key)
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS sync.sync_runs (
      id             UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      trigger        VARCHAR(20) NOT NULL,
      exit_code      INTEGER NOT NULL,
      cancelled      BOOLEAN NOT NULL DEFAULT false,
      started_at     TIMESTAMPTZ NOT NULL,
      finished_at    TIMESTAMPTZ NOT NULL,
      target_count   INTEGER NOT NULL,
      failed_count   INTEGER NOT NULL,
      skipped_count  INTEGER NOT NULL,
      summary        JSONB NOT NULL,
      created_at     TIMESTAMPTZ NOT NULL DEFAULT now()
    )`);
    await queryRunner.query('CREATE INDEX IF NOT EXISTS ix_sync_runs_started ON sync.sync_runs (started_at DESC)');
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('DROP SCHEMA IF EXISTS sync CASCADE');
    await queryRunner.query('DROP SCHEMA IF EXISTS quality CASCADE');
    await queryRunner.query('DROP SCHEMA IF EXISTS hosting CASCADE');
  }
}
