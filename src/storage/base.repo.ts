/**
 * Base Repository - common patterns for the catalog repositories
 *
 * Catalog rows are addressed by their content `key` rather than a generated
 * ID; rows are validated through a zod schema on the way out.
 *
 * Usage:
 *   class MonsterCatalogRepository extends KeyedRepository<MonsterTemplate, MonsterRow> {
 *       constructor(db: Database.Database) {
 *           super(db, 'monster_catalog', MonsterTemplateSchema);
 *       }
 *
 *       protected rowToEntity(row: MonsterRow): MonsterTemplate {
 *           return this.validateEntity({ key: row.key, ... });
 *       }
 *   }
 */

import Database from 'better-sqlite3';
import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// JSON FIELD HELPERS
// ═══════════════════════════════════════════════════════════════════════════

export const jsonField = {
    serialize(value: unknown): string {
        return JSON.stringify(value);
    },

    /**
     * Deserialize a JSON column, with fallback for null, unparseable or
     * mis-shaped text
     */
    deserialize<T>(json: string | null | undefined, schema: z.ZodType<T>, fallback: T): T {
        if (!json) return fallback;
        let value: unknown;
        try {
            value = JSON.parse(json);
        } catch {
            return fallback;
        }
        const parsed = schema.safeParse(value);
        return parsed.success ? parsed.data : fallback;
    }
};

/**
 * SQLite stores booleans as 0/1
 */
export const boolField = {
    serialize(value: boolean): number {
        return value ? 1 : 0;
    },
    deserialize(value: number | null | undefined): boolean {
        return value === 1;
    }
};

// ═══════════════════════════════════════════════════════════════════════════
// KEYED REPOSITORY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * @template TEntity - The domain entity type
 * @template TRow - The database row type (snake_case)
 */
export abstract class KeyedRepository<
    TEntity extends { key: string },
    TRow extends { key: string }
> {
    constructor(
        protected db: Database.Database,
        protected tableName: string,
        protected schema: z.ZodType<TEntity, z.ZodTypeDef, unknown>
    ) {}

    protected abstract rowToEntity(row: TRow): TEntity;

    findByKey(key: string): TEntity | null {
        const stmt = this.db.prepare(`SELECT * FROM ${this.tableName} WHERE key = ?`);
        const row = stmt.get(key) as TRow | undefined;

        if (!row) return null;
        return this.rowToEntity(row);
    }

    /**
     * All entries, ordered by key
     */
    listAll(): TEntity[] {
        const stmt = this.db.prepare(`SELECT * FROM ${this.tableName} ORDER BY key`);
        const rows = stmt.all() as TRow[];
        return rows.map(row => this.rowToEntity(row));
    }

    delete(key: string): boolean {
        const stmt = this.db.prepare(`DELETE FROM ${this.tableName} WHERE key = ?`);
        return stmt.run(key).changes > 0;
    }

    exists(key: string): boolean {
        const stmt = this.db.prepare(`SELECT 1 FROM ${this.tableName} WHERE key = ? LIMIT 1`);
        return stmt.get(key) !== undefined;
    }

    count(): number {
        const stmt = this.db.prepare(`SELECT COUNT(*) as count FROM ${this.tableName}`);
        const result = stmt.get() as { count: number };
        return result.count;
    }

    protected validateEntity(data: unknown): TEntity {
        return this.schema.parse(data);
    }

    /**
     * Execute a select and map rows through rowToEntity
     */
    protected query(sql: string, params: unknown[] = []): TEntity[] {
        const stmt = this.db.prepare(sql);
        const rows = stmt.all(...params) as TRow[];
        return rows.map(row => this.rowToEntity(row));
    }
}
