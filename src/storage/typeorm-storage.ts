import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, QueryFailedError } from 'typeorm';
import type { EntityManager, ObjectLiteral, SelectQueryBuilder } from 'typeorm';
import { ReferentialIntegrityError, StorageConstraintError } from '../raw/errors.js';
import { isRawRecord } from '../raw/platform-client-interface.js';
import { ENTITY_TARGETS } from './entities/index.js';
import type { EntityKind } from './schema.js';
import type { EntityStore, FieldMap, FieldValue, StorageGateway, StoredRow } from './entity-store.js';

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

@Injectable()
export class TypeOrmStorage implements StorageGateway {
  readonly store: EntityStore;

  constructor(@InjectDataSource() private readonly ds: DataSource) {
    this.store = new TypeOrmEntityStore(ds.manager, false);
  }

  transaction<T>(work: (store: EntityStore) => Promise<T>): Promise<T> {
    return this.ds.transaction((manager) => work(new TypeOrmEntityStore(manager, true)));
  }
}

class TypeOrmEntityStore implements EntityStore {
  private savepoints = 0;

  constructor(
    private readonly manager: EntityManager,
    private readonly inTransaction: boolean,
  ) {}

  async findOne(kind: EntityKind, where: FieldMap): Promise<StoredRow | null> {
    const entity = await this.select(kind, where).getOne();
    return entity ? this.toRow(kind, entity) : null;
  }

  async find(kind: EntityKind, where: FieldMap = {}): Promise<StoredRow[]> {
    const entities = await this.select(kind, where).orderBy('e.createdAt', 'ASC').getMany();
    return entities.map((entity) => this.toRow(kind, entity));
  }

  async exists(kind: EntityKind, id: string): Promise<boolean> {
    const count = await this.select(kind, { id }).getCount();
    return count > 0;
  }

  count(kind: EntityKind): Promise<number> {
    return this.select(kind, {}).getCount();
  }

  async insert(kind: EntityKind, fields: FieldMap): Promise<string> {
    try {
      // DO NOTHING on conflict keeps the surrounding transaction usable
      const result = await this.manager
        .createQueryBuilder()
        .insert()
        .into(ENTITY_TARGETS[kind])
        .values(fields)
        .orIgnore()
        .returning('id')
        .execute();

      const id = returnedId(result.raw);
      if (id === null) {
        throw new StorageConstraintError(`${kind} insert conflicted with an existing row`);
      }
      return id;
    } catch (error: unknown) {
      throw translate(kind, error);
    }
  }

  async update(kind: EntityKind, id: string, fields: FieldMap): Promise<void> {
    try {
      await this.manager
        .createQueryBuilder()
        .update(ENTITY_TARGETS[kind])
        .set(fields)
        .where('id = :id', { id })
        .execute();
    } catch (error: unknown) {
      throw translate(kind, error);
    }
  }

  async savepoint<T>(work: () => Promise<T>): Promise<T> {
    if (!this.inTransaction) return work();

    this.savepoints += 1;
    const name = `sync_sp_${this.savepoints}`;
    await this.manager.query(`SAVEPOINT ${name}`);
    try {
      const result = await work();
      await this.manager.query(`RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (error: unknown) {
      await this.manager.query(`ROLLBACK TO SAVEPOINT ${name}`);
      throw error;
    }
  }

  private select(kind: EntityKind, where: FieldMap): SelectQueryBuilder<ObjectLiteral> {
    const qb = this.manager.createQueryBuilder(ENTITY_TARGETS[kind], 'e');
    Object.entries(where).forEach(([field, value], index) => {
      // field names come from ENTITY_SCHEMA and the mappers, never from input
      if (value === null) {
        qb.andWhere(`e.${field} IS NULL`);
      } else {
        qb.andWhere(`e.${field} = :p${index}`, { [`p${index}`]: value });
      }
    });
    return qb;
  }

  private toRow(kind: EntityKind, entity: ObjectLiteral): StoredRow {
    const metadata = this.manager.connection.getMetadata(ENTITY_TARGETS[kind]);
    const fields: FieldMap = {};
    let id = '';
    for (const column of metadata.columns) {
      const value: unknown = column.getEntityValue(entity);
      if (column.propertyName === 'id') {
        id = String(value);
        continue;
      }
      fields[column.propertyName] = toFieldValue(value);
    }
    return { id, fields };
  }
}

function returnedId(raw: unknown): string | null {
  if (!Array.isArray(raw) || raw.length === 0) return null;
  const first: unknown = raw[0];
  return isRawRecord(first) && typeof first.id === 'string' ? first.id : null;
}

function toFieldValue(value: unknown): FieldValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  return value === undefined ? null : String(value);
}

function translate(kind: EntityKind, error: unknown): unknown {
  if (!(error instanceof QueryFailedError)) return error;
  const driverError: unknown = error.driverError;
  const code = isRawRecord(driverError) ? driverError.code : undefined;
  const constraint =
    isRawRecord(driverError) && typeof driverError.constraint === 'string'
      ? driverError.constraint
      : undefined;

  if (code === UNIQUE_VIOLATION) {
    return new StorageConstraintError(`${kind}: ${error.message}`, constraint, { cause: error });
  }
  if (code === FOREIGN_KEY_VIOLATION) {
    return new ReferentialIntegrityError(`${kind}: ${error.message}`, { cause: error });
  }
  return error;
}
