/**
 * Batch placement with priority conflict resolution
 *
 * Configs are bucketed by entity kind and the buckets are processed strictly
 * in priority order (player > monster > npc > obstacle > item), configs in
 * input order within a bucket. An entity that asks for a fixed cell already
 * taken, by a higher-priority entity or one placed earlier in the same pass,
 * is displaced to a random empty cell. Once placed, an entity is never moved
 * again by the batch.
 *
 * Only structural problems fail the batch, and they are detected before
 * anything is written. When no empty cell is left for an entity, that entity
 * alone is reported as failed and the rest of the batch continues.
 *
 * @module room/batch-placement
 */

import { EntityKind, Placeable, PlaceableSchema } from '../../schema/entities.js';
import {
    PlaceableConfig,
    PlaceableConfigSchema,
    ResolvedPlaceableConfig
} from '../../schema/placement.js';
import { Position } from '../../schema/position.js';
import { Room } from '../../schema/room.js';
import { createLogger } from '../../utils/logger.js';
import { isRoomError, RoomError } from './errors.js';
import { describeEntity } from './placeable.js';
import { findEmptyPosition, placeEntity } from './placement.js';
import { defaultRandom, RandomSource } from './random.js';
import { assertRoom, ENTITY_KINDS_BY_PRIORITY, isInBounds } from './room.js';

const log = createLogger('BatchPlacement');

export const PLACEMENT_PRIORITY: readonly EntityKind[] = ENTITY_KINDS_BY_PRIORITY;

export interface BatchPlacementOptions {
    random?: RandomSource;
}

/**
 * An entity whose requested cell was taken and which landed elsewhere
 */
export interface Displacement {
    entity: Placeable;
    requested: Position;
    placedAt: Position;
}

export interface PlacementFailure {
    configIndex: number;
    kind: EntityKind;
    name: string;
    error: RoomError;
}

export interface BatchPlacementResult {
    /** Copies of every placed entity, in placement order */
    placed: Placeable[];
    displaced: Displacement[];
    failed: PlacementFailure[];
}

interface IndexedConfig {
    index: number;
    config: ResolvedPlaceableConfig;
}

// ============================================================
// VALIDATION
// ============================================================

function resolveConfigs(room: Room, configs: readonly PlaceableConfig[]): IndexedConfig[] {
    return configs.map((raw, index) => {
        const parsed = PlaceableConfigSchema.safeParse(raw);
        if (!parsed.success) {
            const reasons = parsed.error.issues.map(issue => issue.message).join('; ');
            throw new RoomError('MALFORMED_CONFIG', `Placement config #${index} is malformed: ${reasons}`, {
                configIndex: index,
                issues: parsed.error.issues
            });
        }

        const config = parsed.data;
        if (room.grid !== null && !config.randomPlace && config.position !== undefined &&
            !isInBounds(room, config.position)) {
            throw new RoomError(
                'INVALID_POSITION',
                `Placement config #${index} requests (${config.position.x}, ${config.position.y}) outside room bounds (${room.width}, ${room.height})`,
                { configIndex: index, position: config.position }
            );
        }

        return { index, config };
    });
}

// ============================================================
// PLACEMENT
// ============================================================

/**
 * Build copy number `copy` of a config. The config was parsed once, so
 * copies after the first drop the inventory item IDs it generated and get
 * fresh ones.
 */
function buildEntity(config: ResolvedPlaceableConfig, position: Position, copy: number): Placeable {
    const { randomPlace: _randomPlace, position: _requested, count: _count, ...attributes } = config;
    const inventory = config.kind === 'npc' && copy > 0
        ? { inventory: config.inventory.map(({ id: _id, ...item }) => item) }
        : {};
    return PlaceableSchema.parse({ ...attributes, ...inventory, position });
}

/**
 * Place a mixed list of entity configs in one pass.
 *
 * @throws RoomError `NIL_ROOM`, `MALFORMED_CONFIG` or `INVALID_POSITION`,
 *   before any entity is placed
 *
 * @example
 * ```typescript
 * const result = addPlaceablesToRoom(room, [
 *     { kind: 'item', name: 'Rope', position: { x: 2, y: 2 } },
 *     { kind: 'player', name: 'Aria', level: 3, position: { x: 2, y: 2 } },
 * ]);
 * // The player holds (2, 2); the rope is in result.displaced
 * ```
 */
export function addPlaceablesToRoom(
    room: Room | null | undefined,
    configs: readonly PlaceableConfig[],
    options: BatchPlacementOptions = {}
): BatchPlacementResult {
    assertRoom(room);
    const random = options.random ?? defaultRandom;
    const resolved = resolveConfigs(room, configs);

    const result: BatchPlacementResult = { placed: [], displaced: [], failed: [] };

    for (const kind of PLACEMENT_PRIORITY) {
        const bucket = resolved.filter(entry => entry.config.kind === kind);
        for (const entry of bucket) {
            for (let copy = 0; copy < entry.config.count; copy++) {
                placeFromConfig(room, entry, copy, random, result);
            }
        }
    }

    log.debug(
        `Batch placed ${result.placed.length} entities in room ${room.id} ` +
        `(${result.displaced.length} displaced, ${result.failed.length} failed)`
    );
    return result;
}

function placeFromConfig(
    room: Room,
    entry: IndexedConfig,
    copy: number,
    random: RandomSource,
    result: BatchPlacementResult
): void {
    const { config, index } = entry;
    const recordFailure = (error: RoomError): void => {
        result.failed.push({ configIndex: index, kind: config.kind, name: config.name, error });
    };

    if (config.randomPlace || config.position === undefined) {
        const position = tryFindEmpty(room, random, recordFailure);
        if (position === null) return;
        result.placed.push(placeEntity(room, buildEntity(config, position, copy)));
        return;
    }

    const requested = config.position;
    try {
        result.placed.push(placeEntity(room, buildEntity(config, requested, copy)));
        return;
    } catch (error) {
        if (!isRoomError(error, 'CELL_OCCUPIED')) throw error;
    }

    const fallback = tryFindEmpty(room, random, recordFailure);
    if (fallback === null) return;

    const placed = placeEntity(room, buildEntity(config, fallback, copy));
    result.placed.push(placed);
    result.displaced.push({ entity: placed, requested: { ...requested }, placedAt: { ...fallback } });
    log.debug(
        `Displaced ${describeEntity(placed)} from (${requested.x}, ${requested.y}) to (${fallback.x}, ${fallback.y})`
    );
}

function tryFindEmpty(
    room: Room,
    random: RandomSource,
    onExhausted: (error: RoomError) => void
): Position | null {
    try {
        return findEmptyPosition(room, random);
    } catch (error) {
        if (!isRoomError(error, 'NO_EMPTY_POSITIONS')) throw error;
        onExhausted(error);
        return null;
    }
}
