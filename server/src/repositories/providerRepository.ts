/**
 * Provider Repository
 *
 * SQLite-backed provider store. Implements the ProviderDirectory consumed
 * by the health monitor as well as the registry CRUD operations.
 */

import Database from 'better-sqlite3';
import type { SqliteDatabase } from '../models/database';
import { HealthStatus, isHealthStatus } from '../models/provider';
import type { Provider, ProviderInput } from '../models/provider';
import {
  ProviderIdTakenError,
  ProviderNameTakenError,
  ProviderNotFoundError,
} from './types';
import type { ProviderFilter, ProviderStore } from './types';

interface ProviderRow {
  id: string;
  name: string;
  service_type: string;
  schema_version: string;
  endpoint: string;
  create_time: number;
  update_time: number;
  health_status: string;
  consecutive_failures: number;
  next_health_check: number | null;
}

const COLUMNS = `
  id, name, service_type, schema_version, endpoint, create_time, update_time,
  health_status, consecutive_failures, next_health_check
`;

function toProvider(row: ProviderRow): Provider {
  return {
    id: row.id,
    name: row.name,
    serviceType: row.service_type,
    schemaVersion: row.schema_version,
    endpoint: row.endpoint,
    createTime: new Date(row.create_time),
    updateTime: new Date(row.update_time),
    // The CHECK constraint only admits known values
    healthStatus: isHealthStatus(row.health_status) ? row.health_status : HealthStatus.NOT_READY,
    consecutiveFailures: row.consecutive_failures,
    nextHealthCheck: row.next_health_check === null ? null : new Date(row.next_health_check),
  };
}

type ConstraintCode = 'SQLITE_CONSTRAINT_UNIQUE' | 'SQLITE_CONSTRAINT_PRIMARYKEY';

function isConstraintViolation(error: unknown, code: ConstraintCode): boolean {
  return error instanceof Database.SqliteError && error.code === code;
}

export class ProviderRepository implements ProviderStore {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async create(input: ProviderInput & { id: string }): Promise<Provider> {
    const now = this.clock().getTime();
    try {
      this.db
        .prepare<[string, string, string, string, string, number, number, string]>(
          `INSERT INTO providers (
             id, name, service_type, schema_version, endpoint, create_time, update_time,
             health_status, consecutive_failures, next_health_check
           ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, 0, NULL)`
        )
        .run(
          input.id,
          input.name,
          input.serviceType,
          input.schemaVersion,
          input.endpoint,
          now,
          now,
          HealthStatus.READY
        );
    } catch (error) {
      if (isConstraintViolation(error, 'SQLITE_CONSTRAINT_PRIMARYKEY')) {
        throw new ProviderIdTakenError(input.id);
      }
      if (isConstraintViolation(error, 'SQLITE_CONSTRAINT_UNIQUE')) {
        throw new ProviderNameTakenError(input.name);
      }
      throw error;
    }
    return this.get(input.id);
  }

  async get(id: string): Promise<Provider> {
    const row = this.db
      .prepare<[string], ProviderRow>(`SELECT ${COLUMNS} FROM providers WHERE id = ?`)
      .get(id);
    if (!row) {
      throw new ProviderNotFoundError(id);
    }
    return toProvider(row);
  }

  async getByName(name: string): Promise<Provider | null> {
    const row = this.db
      .prepare<[string], ProviderRow>(`SELECT ${COLUMNS} FROM providers WHERE name = ?`)
      .get(name);
    return row ? toProvider(row) : null;
  }

  async existsById(id: string): Promise<boolean> {
    const row = this.db
      .prepare<[string], { id: string }>('SELECT id FROM providers WHERE id = ?')
      .get(id);
    return row !== undefined;
  }

  async list(filter: ProviderFilter = {}): Promise<Provider[]> {
    const rows =
      filter.serviceType !== undefined
        ? this.db
            .prepare<[string], ProviderRow>(
              `SELECT ${COLUMNS} FROM providers WHERE service_type = ? ORDER BY create_time ASC, id ASC`
            )
            .all(filter.serviceType)
        : this.db
            .prepare<[], ProviderRow>(
              `SELECT ${COLUMNS} FROM providers ORDER BY create_time ASC, id ASC`
            )
            .all();
    return rows.map(toProvider);
  }

  async update(id: string, input: ProviderInput): Promise<Provider> {
    let changes: number;
    try {
      changes = this.db
        .prepare<[string, string, string, string, number, string]>(
          `UPDATE providers
              SET name = ?, service_type = ?, schema_version = ?, endpoint = ?, update_time = ?
            WHERE id = ?`
        )
        .run(input.name, input.serviceType, input.schemaVersion, input.endpoint, this.clock().getTime(), id)
        .changes;
    } catch (error) {
      if (isConstraintViolation(error, 'SQLITE_CONSTRAINT_UNIQUE')) {
        throw new ProviderNameTakenError(input.name);
      }
      throw error;
    }
    if (changes === 0) {
      throw new ProviderNotFoundError(id);
    }
    return this.get(id);
  }

  async delete(id: string): Promise<void> {
    const { changes } = this.db
      .prepare<[string]>('DELETE FROM providers WHERE id = ?')
      .run(id);
    if (changes === 0) {
      throw new ProviderNotFoundError(id);
    }
  }

  async listDueForHealthCheck(now: Date): Promise<Provider[]> {
    const rows = this.db
      .prepare<[number], ProviderRow>(
        `SELECT ${COLUMNS} FROM providers
          WHERE next_health_check IS NULL OR next_health_check <= ?
          ORDER BY create_time ASC, id ASC`
      )
      .all(now.getTime());
    return rows.map(toProvider);
  }

  async updateHealthStatus(
    id: string,
    status: HealthStatus,
    consecutiveFailures: number,
    nextCheck: Date
  ): Promise<void> {
    const { changes } = this.db
      .prepare<[string, number, number, string]>(
        `UPDATE providers
            SET health_status = ?, consecutive_failures = ?, next_health_check = ?
          WHERE id = ?`
      )
      .run(status, consecutiveFailures, nextCheck.getTime(), id);
    if (changes === 0) {
      throw new ProviderNotFoundError(id);
    }
  }
}
