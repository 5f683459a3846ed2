import Database from 'better-sqlite3';
import { z } from 'zod';
import { ItemTemplate, ItemTemplateInput, ItemTemplateSchema } from '../../schema/catalog.js';
import { defaultRandom, RandomSource, sampleWithoutReplacement } from '../../engine/room/random.js';
import { boolField, jsonField, KeyedRepository } from '../base.repo.js';
import { CatalogError } from '../errors.js';

/**
 * ItemCatalogRepository - item templates keyed by content key
 *
 * Random selections sample without replacement through the injected random
 * source, so a seeded source gives a reproducible pick. They return fewer
 * entries than asked for when the catalog runs short.
 */
export class ItemCatalogRepository extends KeyedRepository<ItemTemplate, ItemRow> {
    constructor(db: Database.Database, private random: RandomSource = defaultRandom) {
        super(db, 'item_catalog', ItemTemplateSchema);
    }

    upsert(input: ItemTemplateInput): ItemTemplate {
        const template = ItemTemplateSchema.parse(input);
        const stmt = this.db.prepare(`
            INSERT INTO item_catalog (
                key, name, type, category, value, value_unit, weight, properties,
                damage_dice, damage_type, armor_class, stealth_disadvantage
            )
            VALUES (
                @key, @name, @type, @category, @value, @valueUnit, @weight, @properties,
                @damageDice, @damageType, @armorClass, @stealthDisadvantage
            )
            ON CONFLICT(key) DO UPDATE SET
                name = excluded.name,
                type = excluded.type,
                category = excluded.category,
                value = excluded.value,
                value_unit = excluded.value_unit,
                weight = excluded.weight,
                properties = excluded.properties,
                damage_dice = excluded.damage_dice,
                damage_type = excluded.damage_type,
                armor_class = excluded.armor_class,
                stealth_disadvantage = excluded.stealth_disadvantage
        `);

        stmt.run({
            key: template.key,
            name: template.name,
            type: template.type,
            category: template.category,
            value: template.value,
            valueUnit: template.valueUnit,
            weight: template.weight,
            properties: jsonField.serialize(template.properties),
            damageDice: template.damageDice ?? null,
            damageType: template.damageType ?? null,
            armorClass: template.armorClass ?? null,
            stealthDisadvantage: boolField.serialize(template.stealthDisadvantage)
        });
        return template;
    }

    /**
     * @throws CatalogError ITEM_NOT_FOUND
     */
    getItemByKey(key: string): ItemTemplate {
        const template = this.findByKey(key);
        if (!template) {
            throw new CatalogError('ITEM_NOT_FOUND', key);
        }
        return template;
    }

    getRandomItems(count: number): ItemTemplate[] {
        if (count <= 0) return [];
        return sampleWithoutReplacement(this.random, this.listAll(), count);
    }

    getRandomItemsByCategory(category: string, count: number): ItemTemplate[] {
        if (count <= 0) return [];
        const candidates = this.query(
            'SELECT * FROM item_catalog WHERE category = ? ORDER BY key',
            [category]
        );
        return sampleWithoutReplacement(this.random, candidates, count);
    }

    listCategories(): string[] {
        const stmt = this.db.prepare('SELECT DISTINCT category FROM item_catalog ORDER BY category');
        const rows = stmt.all() as { category: string }[];
        return rows.map(row => row.category);
    }

    protected rowToEntity(row: ItemRow): ItemTemplate {
        return this.validateEntity({
            key: row.key,
            name: row.name,
            type: row.type,
            category: row.category,
            value: row.value,
            valueUnit: row.value_unit,
            weight: row.weight,
            properties: jsonField.deserialize(row.properties, z.array(z.string()), []),
            damageDice: row.damage_dice ?? undefined,
            damageType: row.damage_type ?? undefined,
            armorClass: row.armor_class ?? undefined,
            stealthDisadvantage: boolField.deserialize(row.stealth_disadvantage)
        });
    }
}

interface ItemRow {
    key: string;
    name: string;
    type: string;
    category: string;
    value: number;
    value_unit: string;
    weight: number;
    properties: string | null;
    damage_dice: string | null;
    damage_type: string | null;
    armor_class: number | null;
    stealth_disadvantage: number;
}
