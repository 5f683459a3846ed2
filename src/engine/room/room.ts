/**
 * Room aggregate - construction, grid access and typed entity collections
 *
 * The per-kind collections are the authoritative store of entity data; the
 * grid is a derived index over them. Everything outside this directory reads
 * rooms through copies and mutates them only through the placement, cleanup
 * and inventory operations, which keep the two in sync.
 *
 * @module room/room
 */

import { v4 as uuidv4 } from 'uuid';
import { EntityKind, EntityOf, Placeable } from '../../schema/entities.js';
import { Position, samePosition } from '../../schema/position.js';
import { Cell, EMPTY_CELL, Room, RoomConfig, RoomConfigSchema } from '../../schema/room.js';
import { createLogger } from '../../utils/logger.js';
import { RoomError } from './errors.js';

const log = createLogger('Room');

/**
 * Narrative priority of entity kinds, highest first. Batch placement resolves
 * same-cell conflicts in this order and listings follow it.
 */
export const ENTITY_KINDS_BY_PRIORITY: readonly EntityKind[] = [
    'player',
    'monster',
    'npc',
    'obstacle',
    'item'
];

// ============================================================
// CONSTRUCTION
// ============================================================

export function assertRoom(room: Room | null | undefined): asserts room is Room {
    if (room === null || room === undefined) {
        throw new RoomError('NIL_ROOM');
    }
}

/**
 * Create an empty room. With `useGrid` the room is backed by an all-empty
 * occupancy grid; otherwise it is gridless.
 */
export function createRoom(config: RoomConfig): Room {
    if (!isPositiveInteger(config.width) || !isPositiveInteger(config.height)) {
        throw new RoomError(
            'INVALID_DIMENSIONS',
            `Room dimensions must be positive integers, got ${config.width}x${config.height}`,
            { width: config.width, height: config.height }
        );
    }

    const parsed = RoomConfigSchema.safeParse(config);
    if (!parsed.success) {
        throw new RoomError('MALFORMED_CONFIG', `Invalid room config: ${parsed.error.message}`, {
            issues: parsed.error.issues
        });
    }
    const { width, height, lightLevel, description, useGrid, roomType } = parsed.data;

    const room: Room = {
        id: uuidv4(),
        width,
        height,
        lightLevel,
        description,
        roomType,
        monsters: [],
        players: [],
        items: [],
        npcs: [],
        obstacles: [],
        grid: useGrid ? buildEmptyGrid(width, height) : null
    };

    log.debug(`Created ${useGrid ? 'grid' : 'gridless'} ${roomType} room ${room.id} (${width}x${height})`);
    return room;
}

/**
 * Back a room with a fresh all-empty grid. Refused once the room holds
 * entities, since their cells would be lost.
 */
export function initializeGrid(room: Room | null | undefined): void {
    assertRoom(room);

    const populated = ENTITY_KINDS_BY_PRIORITY.some(kind => collectionFor(room, kind).length > 0);
    if (populated) {
        throw new RoomError('CELL_OCCUPIED', 'Cannot initialize the grid of a room that already holds entities');
    }

    room.grid = buildEmptyGrid(room.width, room.height);
}

function buildEmptyGrid(width: number, height: number): Cell[][] {
    return Array.from({ length: height }, () => Array.from({ length: width }, (): Cell => EMPTY_CELL));
}

function isPositiveInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

// ============================================================
// GRID ACCESS
// ============================================================

export function isInBounds(room: Room, position: Position): boolean {
    return Number.isInteger(position.x) && Number.isInteger(position.y) &&
        position.x >= 0 && position.x < room.width &&
        position.y >= 0 && position.y < room.height;
}

/**
 * Read a cell. Null for gridless rooms and out-of-bounds positions.
 */
export function getCell(room: Room | null | undefined, position: Position): Cell | null {
    assertRoom(room);
    if (room.grid === null || !isInBounds(room, position)) {
        return null;
    }
    return room.grid[position.y][position.x];
}

/** @internal */
export function writeCell(grid: Cell[][], position: Position, cell: Cell): void {
    grid[position.y][position.x] = cell;
}

/**
 * Chebyshev distance: diagonal steps cost one square, as on a D&D 5e grid
 */
export function calculateDistance(a: Position, b: Position): number {
    return Math.max(Math.abs(b.x - a.x), Math.abs(b.y - a.y));
}

// ============================================================
// COLLECTIONS
// ============================================================

type CollectionAccessors = { [K in EntityKind]: (room: Room) => EntityOf<K>[] };

const COLLECTIONS: CollectionAccessors = {
    monster: room => room.monsters,
    player: room => room.players,
    item: room => room.items,
    npc: room => room.npcs,
    obstacle: room => room.obstacles
};

/**
 * Live collection for a kind. @internal
 */
export function collectionFor<K extends EntityKind>(room: Room, kind: K): EntityOf<K>[] {
    const accessor: (room: Room) => EntityOf<K>[] = COLLECTIONS[kind];
    return accessor(room);
}

/**
 * Live reference to the entity with the given ID, searched across every
 * collection. @internal
 */
export function locateEntity(room: Room, entityId: string): Placeable | undefined {
    for (const kind of ENTITY_KINDS_BY_PRIORITY) {
        const found = collectionFor(room, kind).find(entity => entity.id === entityId);
        if (found) return found;
    }
    return undefined;
}

export function cloneEntity<T extends Placeable>(entity: T): T {
    return structuredClone(entity);
}

/**
 * Copy of the entity with the given ID, or null
 */
export function findEntity(room: Room | null | undefined, entityId: string): Placeable | null {
    assertRoom(room);
    const found = locateEntity(room, entityId);
    return found ? cloneEntity(found) : null;
}

/**
 * Copies of every entity, in priority order then insertion order
 */
export function listEntities(room: Room | null | undefined): Placeable[] {
    assertRoom(room);
    return ENTITY_KINDS_BY_PRIORITY.flatMap(kind => collectionFor(room, kind).map(cloneEntity));
}

/**
 * Entity at a position. Gridded rooms answer from the grid; gridless rooms
 * return the first entity (in priority order) whose advisory position matches.
 */
export function getEntityAt(room: Room | null | undefined, position: Position): Placeable | null {
    assertRoom(room);

    if (room.grid === null) {
        return listEntities(room).find(entity => samePosition(entity.position, position)) ?? null;
    }

    const cell = getCell(room, position);
    if (cell === null || cell.type === 'empty') {
        return null;
    }
    return findEntity(room, cell.entityId);
}
