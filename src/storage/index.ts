/**
 * Catalog storage - SQLite handles and migrations
 *
 * Only the content catalog lives here; rooms are in-memory values and are
 * never persisted.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { resolveCatalogPath } from '../config.js';
import { ITEM_CATALOG } from '../data/item-catalog.js';
import { MONSTER_CATALOG } from '../data/monster-catalog.js';
import { createLogger } from '../utils/logger.js';
import { ItemCatalogRepository } from './repos/item-catalog.repo.js';
import { MonsterCatalogRepository } from './repos/monster-catalog.repo.js';

const log = createLogger('Storage');

const connections = new Map<string, Database.Database>();

const MIGRATIONS = `
    CREATE TABLE IF NOT EXISTS monster_catalog (
        key TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        cr REAL NOT NULL,
        xp INTEGER NOT NULL,
        type TEXT NOT NULL,
        size TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_monster_catalog_cr ON monster_catalog(cr);

    CREATE TABLE IF NOT EXISTS item_catalog (
        key TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        type TEXT NOT NULL,
        category TEXT NOT NULL,
        value INTEGER NOT NULL,
        value_unit TEXT NOT NULL,
        weight REAL NOT NULL,
        properties TEXT,
        damage_dice TEXT,
        damage_type TEXT,
        armor_class INTEGER,
        stealth_disadvantage INTEGER NOT NULL DEFAULT 0
    );
    CREATE INDEX IF NOT EXISTS idx_item_catalog_category ON item_catalog(category);
`;

export function migrate(db: Database.Database): void {
    db.exec(MIGRATIONS);
}

/**
 * Open (or reuse) the catalog database at `dbPath` and bring its schema up
 * to date. `:memory:` handles are never shared, so each call gets a fresh
 * database.
 */
export function getDb(dbPath: string = resolveCatalogPath()): Database.Database {
    if (dbPath !== ':memory:') {
        const existing = connections.get(dbPath);
        if (existing) return existing;
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    migrate(db);

    if (dbPath !== ':memory:') {
        connections.set(dbPath, db);
    }
    log.debug(`Opened catalog database at ${dbPath}`);
    return db;
}

export function closeDb(): void {
    for (const [dbPath, db] of connections) {
        db.close();
        log.debug(`Closed catalog database at ${dbPath}`);
    }
    connections.clear();
}

/**
 * Insert the bundled monster and item presets. Safe to run repeatedly;
 * existing entries are refreshed.
 */
export function seedCatalog(db: Database.Database): { monsters: number; items: number } {
    const monsters = new MonsterCatalogRepository(db);
    const items = new ItemCatalogRepository(db);

    const seed = db.transaction(() => {
        MONSTER_CATALOG.forEach(template => monsters.upsert(template));
        ITEM_CATALOG.forEach(template => items.upsert(template));
    });
    seed();

    return { monsters: monsters.count(), items: items.count() };
}
