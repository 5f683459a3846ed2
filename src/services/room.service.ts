/**
 * Room Service - room generation on top of the placement engine
 *
 * Builds rooms, fills monster XP from the monster catalog, balances monster
 * counts against a party and populates treasure rooms from the item catalog.
 * All spatial work is delegated to the engine; this layer only decides what
 * to place.
 *
 * DESIGN PHILOSOPHY:
 * - Placement conflicts degrade (displacement, per-entity failure) and are logged
 * - Catalog misses on optional data (monster XP) are logged, not fatal
 * - Structural problems (bad config, no space for a treasure room) throw
 */

import Database from 'better-sqlite3';
import { loadConfig, RoomgenConfig } from '../config.js';
import { adjustMonsterSelection, averageLevel, determineEncounterDifficulty, partySize } from '../engine/encounter/balancer.js';
import {
    addPlaceablesToRoom,
    BatchPlacementResult
} from '../engine/room/batch-placement.js';
import { cleanupRoom, CleanupResult } from '../engine/room/cleanup.js';
import { RoomError } from '../engine/room/errors.js';
import { createRandomSource, defaultRandom, RandomSource } from '../engine/room/random.js';
import { assertRoom, createRoom } from '../engine/room/room.js';
import { ItemTemplate, MonsterTemplate } from '../schema/catalog.js';
import { EncounterDifficulty, EncounterDifficultySchema, Party } from '../schema/party.js';
import { ItemConfig, MonsterConfig, PlaceableConfig, PlayerConfig } from '../schema/placement.js';
import { CellType, Room, RoomConfig } from '../schema/room.js';
import { ItemCatalogRepository } from '../storage/repos/item-catalog.repo.js';
import { MonsterCatalogRepository } from '../storage/repos/monster-catalog.repo.js';
import { createLogger, getErrorMessage, Logger } from '../utils/logger.js';

// ═══════════════════════════════════════════════════════════════════════════
// DATA SOURCES
// ═══════════════════════════════════════════════════════════════════════════

export interface MonsterDataSource {
    getMonsterXP(key: string): number;
    /** Templates at or below a CR, strongest first */
    findByMaxCR(maxCR: number): MonsterTemplate[];
}

export interface ItemDataSource {
    getItemByKey(key: string): ItemTemplate;
    getRandomItems(count: number): ItemTemplate[];
    getRandomItemsByCategory(category: string, count: number): ItemTemplate[];
}

export interface RoomServiceOptions {
    monsters: MonsterDataSource;
    items: ItemDataSource;
    random?: RandomSource;
    logger?: Logger;
}

export interface PopulatedRoom {
    room: Room;
    placement: BatchPlacementResult;
}

// ═══════════════════════════════════════════════════════════════════════════
// TREASURE TABLES
// ═══════════════════════════════════════════════════════════════════════════

const TREASURE_MULTIPLIERS: Record<EncounterDifficulty, number> = {
    easy: 0.75,
    medium: 1.0,
    hard: 1.25,
    deadly: 1.5
};

export const TREASURE_REMINDER = 'Remember to clear the room after collecting all treasure.';
const DEFAULT_TREASURE_DESCRIPTION = `A treasure room with valuable items. ${TREASURE_REMINDER}`;

/**
 * Item categories scaled to the party's average level
 */
export function treasureCategories(avgLevel: number): string[] {
    const weapons = avgLevel >= 5 ? 'martial-weapons' : 'simple-weapons';
    const armor = avgLevel >= 10 ? 'heavy-armor' : avgLevel >= 5 ? 'medium-armor' : 'light-armor';
    return [weapons, armor, 'potion', 'adventuring-gear'];
}

/**
 * One item per member plus one per three average levels, scaled by difficulty
 */
export function treasureItemCount(party: Party, difficulty: EncounterDifficulty): number {
    const base = partySize(party) + Math.floor(averageLevel(party) / 3);
    return Math.max(1, Math.floor(base * TREASURE_MULTIPLIERS[difficulty]));
}

function configCount(configs: readonly { count?: number }[]): number {
    return configs.reduce((sum, config) => sum + (config.count ?? 1), 0);
}

function itemConfigFromTemplate(template: ItemTemplate): ItemConfig {
    return { ...template, kind: 'item', randomPlace: true, count: 1 };
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════════════════

export class RoomService {
    private readonly monsters: MonsterDataSource;
    private readonly items: ItemDataSource;
    private readonly random: RandomSource;
    private readonly log: Logger;

    constructor(options: RoomServiceOptions) {
        this.monsters = options.monsters;
        this.items = options.items;
        this.random = options.random ?? defaultRandom;
        this.log = options.logger ?? createLogger('RoomService');
    }

    /**
     * Service backed by the SQLite catalog, seeded from ROOMGEN_SEED when set
     */
    static fromCatalog(db: Database.Database, config: RoomgenConfig = loadConfig()): RoomService {
        const random = config.seed !== undefined ? createRandomSource(config.seed) : defaultRandom;
        return new RoomService({
            monsters: new MonsterCatalogRepository(db),
            items: new ItemCatalogRepository(db, random),
            random
        });
    }

    generateRoom(config: RoomConfig): Room {
        return createRoom(config);
    }

    /**
     * Batch-place configs, filling a monster's missing XP from the catalog
     */
    addPlaceablesToRoom(room: Room | null | undefined, configs: readonly PlaceableConfig[]): BatchPlacementResult {
        assertRoom(room);

        const withXp = configs.map(config => this.withCatalogXp(config));
        const result = addPlaceablesToRoom(room, withXp, { random: this.random });

        for (const failure of result.failed) {
            this.log.warn(
                `Could not place ${failure.kind} "${failure.name}" (config #${failure.configIndex}): ${failure.error.message}`
            );
        }
        for (const displacement of result.displaced) {
            const { requested, placedAt } = displacement;
            this.log.info(
                `${displacement.entity.kind} "${displacement.entity.name}" displaced from ` +
                `(${requested.x}, ${requested.y}) to (${placedAt.x}, ${placedAt.y})`
            );
        }
        return result;
    }

    private withCatalogXp(config: PlaceableConfig): PlaceableConfig {
        if (config.kind !== 'monster' || config.xp !== undefined || !config.key) {
            return config;
        }
        try {
            return { ...config, xp: this.monsters.getMonsterXP(config.key) };
        } catch (error) {
            this.log.warn(`Failed to get XP for monster ${config.key}: ${getErrorMessage(error)}`);
            return config;
        }
    }

    populateRoom(roomConfig: RoomConfig, configs: readonly PlaceableConfig[]): PopulatedRoom {
        const room = this.generateRoom(roomConfig);
        const placement = this.addPlaceablesToRoom(room, configs);
        return { room, placement };
    }

    // ───────────────────────────────────────────────────────────────────────
    // BALANCING
    // ───────────────────────────────────────────────────────────────────────

    balanceMonsterConfigs(
        monsterConfigs: readonly MonsterConfig[],
        party: Party,
        difficulty: EncounterDifficulty
    ): MonsterConfig[] {
        return adjustMonsterSelection(monsterConfigs, party, difficulty);
    }

    populateRoomWithBalancedMonsters(
        roomConfig: RoomConfig,
        monsterConfigs: readonly MonsterConfig[],
        party: Party,
        difficulty: EncounterDifficulty
    ): PopulatedRoom {
        const room = this.generateRoom(roomConfig);
        const balanced = this.balanceMonsterConfigs(monsterConfigs, party, difficulty);
        const placement = this.addPlaceablesToRoom(room, balanced);
        return { room, placement };
    }

    determineRoomDifficulty(room: Room | null | undefined, party: Party): EncounterDifficulty {
        assertRoom(room);
        return determineEncounterDifficulty(room.monsters, party);
    }

    // ───────────────────────────────────────────────────────────────────────
    // TREASURE ROOMS
    // ───────────────────────────────────────────────────────────────────────

    /**
     * Treasure room with `itemCount` random catalog items and optional guardians
     */
    populateTreasureRoom(
        roomConfig: RoomConfig,
        itemCount: number,
        guardianConfigs: readonly MonsterConfig[] = []
    ): PopulatedRoom {
        const room = this.generateRoom({ ...roomConfig, roomType: 'treasure' });

        const available = room.width * room.height - configCount(guardianConfigs);
        if (itemCount > available) {
            throw new RoomError(
                'INSUFFICIENT_SPACE',
                `Not enough space in room for ${itemCount} items (available space: ${available})`,
                { itemCount, available }
            );
        }

        const itemConfigs = this.items.getRandomItems(itemCount).map(itemConfigFromTemplate);
        const placement = this.addPlaceablesToRoom(room, [...itemConfigs, ...guardianConfigs]);
        return { room, placement };
    }

    /**
     * Treasure room with loot scaled to the party, an optional guardian, and
     * the party placed at random
     */
    populateRandomTreasureRoomWithParty(
        roomConfig: RoomConfig,
        party: Party,
        includeGuardian: boolean,
        difficulty: EncounterDifficulty
    ): PopulatedRoom {
        if (party.members.length === 0) {
            throw new RoomError('EMPTY_PARTY', 'Party must have at least one member');
        }
        if (!EncounterDifficultySchema.safeParse(difficulty).success) {
            throw new RoomError('INVALID_DIFFICULTY', `Invalid difficulty: ${difficulty}`, { difficulty });
        }

        const avgLevel = averageLevel(party);
        const itemCount = treasureItemCount(party, difficulty);
        const guardianConfigs = includeGuardian ? this.pickGuardian(party, avgLevel, difficulty) : [];
        const loot = this.pickLoot(avgLevel, itemCount);

        const room = this.generateRoom({ ...roomConfig, roomType: 'treasure' });

        const guardians = configCount(guardianConfigs);
        const available = room.width * room.height - guardians - party.members.length;
        if (loot.length > available) {
            throw new RoomError(
                'INSUFFICIENT_SPACE',
                `Not enough space in room for ${loot.length} items, ${guardians} monsters, and ` +
                `${party.members.length} party members (available space: ${available})`,
                { items: loot.length, monsters: guardians, partyMembers: party.members.length, available }
            );
        }

        const playerConfigs: PlayerConfig[] = party.members.map(member => ({
            kind: 'player',
            name: member.name,
            level: member.level,
            randomPlace: true
        }));

        const placement = this.addPlaceablesToRoom(room, [
            ...loot.map(itemConfigFromTemplate),
            ...guardianConfigs,
            ...playerConfigs
        ]);

        room.description = room.description === ''
            ? DEFAULT_TREASURE_DESCRIPTION
            : `${room.description} ${TREASURE_REMINDER}`;

        return { room, placement };
    }

    private pickGuardian(party: Party, avgLevel: number, difficulty: EncounterDifficulty): MonsterConfig[] {
        const tough = difficulty === 'hard' || difficulty === 'deadly';
        const guardianCR = Math.max(1, tough ? avgLevel : avgLevel - 2);

        const [template] = this.monsters.findByMaxCR(guardianCR);
        const guardian: MonsterConfig = template
            ? { kind: 'monster', key: template.key, name: template.name, cr: template.cr, xp: template.xp }
            : { kind: 'monster', name: 'Guardian', cr: guardianCR };

        return adjustMonsterSelection([{ ...guardian, randomPlace: true, count: 1 }], party, difficulty);
    }

    /**
     * Spread the item count across level-appropriate categories, then top up
     * with random items and trim to the count
     */
    private pickLoot(avgLevel: number, itemCount: number): ItemTemplate[] {
        const categories = treasureCategories(avgLevel);
        const perCategory = Math.max(1, Math.floor(itemCount / categories.length));

        const loot = categories.flatMap(category => this.items.getRandomItemsByCategory(category, perCategory));
        if (loot.length < itemCount) {
            loot.push(...this.items.getRandomItems(itemCount - loot.length));
        }
        return loot.slice(0, itemCount);
    }

    // ───────────────────────────────────────────────────────────────────────
    // CLEANUP
    // ───────────────────────────────────────────────────────────────────────

    cleanupRoom(room: Room | null | undefined, cellType: CellType, ids: readonly string[] = []): CleanupResult {
        const result = cleanupRoom(room, cellType, ids);
        this.log.info(`Removed ${result.removed.length} ${cellType} entities, ${result.totalXP} XP gained`);
        if (result.notRemoved.length > 0) {
            this.log.warn(`Not found during cleanup: ${result.notRemoved.join(', ')}`);
        }
        return result;
    }
}
