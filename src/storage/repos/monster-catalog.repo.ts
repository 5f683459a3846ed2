import Database from 'better-sqlite3';
import {
    MonsterTemplate,
    MonsterTemplateInput,
    MonsterTemplateSchema
} from '../../schema/catalog.js';
import { KeyedRepository } from '../base.repo.js';
import { CatalogError } from '../errors.js';

/**
 * MonsterCatalogRepository - monster templates keyed by content key
 *
 * Stands in for the external monster data source: placement callers read
 * XP and CR from here when they build monster entities.
 */
export class MonsterCatalogRepository extends KeyedRepository<MonsterTemplate, MonsterRow> {
    constructor(db: Database.Database) {
        super(db, 'monster_catalog', MonsterTemplateSchema);
    }

    upsert(input: MonsterTemplateInput): MonsterTemplate {
        const template = MonsterTemplateSchema.parse(input);
        const stmt = this.db.prepare(`
            INSERT INTO monster_catalog (key, name, cr, xp, type, size)
            VALUES (@key, @name, @cr, @xp, @type, @size)
            ON CONFLICT(key) DO UPDATE SET
                name = excluded.name,
                cr = excluded.cr,
                xp = excluded.xp,
                type = excluded.type,
                size = excluded.size
        `);
        stmt.run(template);
        return template;
    }

    /**
     * XP awarded for defeating the monster
     *
     * @throws CatalogError MONSTER_NOT_FOUND
     */
    getMonsterXP(key: string): number {
        const template = this.findByKey(key);
        if (!template) {
            throw new CatalogError('MONSTER_NOT_FOUND', key);
        }
        return template.xp;
    }

    /**
     * Monsters at or below a challenge rating, strongest first
     */
    findByMaxCR(maxCR: number): MonsterTemplate[] {
        return this.query(
            'SELECT * FROM monster_catalog WHERE cr <= ? ORDER BY cr DESC, key ASC',
            [maxCR]
        );
    }

    protected rowToEntity(row: MonsterRow): MonsterTemplate {
        return this.validateEntity({
            key: row.key,
            name: row.name,
            cr: row.cr,
            xp: row.xp,
            type: row.type,
            size: row.size
        });
    }
}

interface MonsterRow {
    key: string;
    name: string;
    cr: number;
    xp: number;
    type: string;
    size: string;
}
