/**
 * Placement Engine - single-entity place, remove and move
 *
 * Grid-backed rooms enforce bounds and occupancy: every occupied cell names
 * exactly one live entity whose position is that cell, and every live entity
 * is recorded in the cell at its position. Gridless rooms skip both checks;
 * positions there are advisory and collisions are not detected.
 *
 * Each operation validates before it writes, so a thrown error leaves the
 * room untouched.
 *
 * @module room/placement
 */

import { EntityKind, Placeable } from '../../schema/entities.js';
import { Position } from '../../schema/position.js';
import { EMPTY_CELL, Room } from '../../schema/room.js';
import { createLogger } from '../../utils/logger.js';
import { RoomError } from './errors.js';
import { describeEntity, setPosition } from './placeable.js';
import { defaultRandom, pickOne, RandomSource, randomInt } from './random.js';
import {
    assertRoom,
    cloneEntity,
    collectionFor,
    isInBounds,
    locateEntity,
    writeCell
} from './room.js';

const log = createLogger('Placement');

// ============================================================
// VALIDATION
// ============================================================

function assertWholeCell(position: Position, context: string): void {
    if (!Number.isInteger(position.x) || !Number.isInteger(position.y)) {
        throw new RoomError(
            'INVALID_POSITION',
            `Invalid ${context}: (${position.x}, ${position.y}) is not a whole cell`,
            { position }
        );
    }
}

function assertInBounds(room: Room, position: Position, context: string): void {
    assertWholeCell(position, context);
    if (!isInBounds(room, position)) {
        throw new RoomError(
            'INVALID_POSITION',
            `Invalid ${context}: (${position.x}, ${position.y}) is outside room bounds (${room.width}, ${room.height})`,
            { position, width: room.width, height: room.height }
        );
    }
}

function assertUniqueId(room: Room, entity: Placeable): void {
    const existing = locateEntity(room, entity.id);
    if (existing) {
        throw new RoomError(
            'DUPLICATE_ENTITY_ID',
            `Entity with ID ${entity.id} is already in room as ${describeEntity(existing)}`,
            { entityId: entity.id, kind: existing.kind }
        );
    }
}

/**
 * Throws unless the cell is empty or already held by `ownerId`
 */
function assertCellAvailable(room: Room, position: Position, ownerId?: string): void {
    if (room.grid === null) return;
    const cell = room.grid[position.y][position.x];
    if (cell.type !== 'empty' && cell.entityId !== ownerId) {
        throw new RoomError(
            'CELL_OCCUPIED',
            `Cell (${position.x}, ${position.y}) is already occupied by ${cell.type} ${cell.entityId}`,
            { position, occupant: { ...cell } }
        );
    }
}

/**
 * Empty the cell at `position` if it still records `entityId`
 */
function releaseCell(room: Room, position: Position, entityId: string): void {
    if (room.grid === null || !isInBounds(room, position)) return;
    const cell = room.grid[position.y][position.x];
    if (cell.type !== 'empty' && cell.entityId === entityId) {
        writeCell(room.grid, position, EMPTY_CELL);
    }
}

// ============================================================
// PLACE
// ============================================================

/**
 * Add an entity to the room at its current position.
 *
 * A copy of the entity is stored; the caller's object is not retained. The
 * ID must not already be in the room (`DUPLICATE_ENTITY_ID`) and the position
 * must name a whole cell (`INVALID_POSITION`). In a gridded room the position
 * must also be in bounds (`INVALID_POSITION`) and the cell empty
 * (`CELL_OCCUPIED`).
 *
 * @returns Copy of the stored entity
 *
 * @example
 * ```typescript
 * const room = createRoom({ width: 10, height: 10, useGrid: true });
 * placeEntity(room, createMonster({ name: 'Goblin', position: { x: 2, y: 3 } }));
 * getCell(room, { x: 2, y: 3 }); // { type: 'monster', entityId: '...' }
 * ```
 */
export function placeEntity(room: Room | null | undefined, entity: Placeable): Placeable {
    assertRoom(room);
    assertUniqueId(room, entity);

    if (room.grid === null) {
        assertWholeCell(entity.position, 'position');
    } else {
        assertInBounds(room, entity.position, 'position');
        assertCellAvailable(room, entity.position);
    }

    const stored = cloneEntity(entity);
    collectionFor(room, stored.kind).push(stored);

    if (room.grid !== null) {
        writeCell(room.grid, stored.position, { type: stored.kind, entityId: stored.id });
    }

    log.debug(`Placed ${describeEntity(stored)} at (${stored.position.x}, ${stored.position.y})`);
    return cloneEntity(stored);
}

// ============================================================
// REMOVE
// ============================================================

/**
 * Remove an entity from its collection and the grid, returning the removed
 * entity. Remaining entities keep their relative order. @internal
 */
export function detachEntity(room: Room, entityId: string, kind: EntityKind): Placeable | undefined {
    const collection: Placeable[] = collectionFor(room, kind);
    const index = collection.findIndex(entity => entity.id === entityId);
    if (index === -1) {
        return undefined;
    }

    const [removed] = collection.splice(index, 1);
    releaseCell(room, removed.position, removed.id);

    log.debug(`Removed ${describeEntity(removed)}`);
    return removed;
}

/**
 * Remove the entity of the given kind and ID.
 *
 * @returns false when no such entity is in the room; absence is not an error
 */
export function removeEntity(room: Room | null | undefined, entityId: string, kind: EntityKind): boolean {
    assertRoom(room);
    return detachEntity(room, entityId, kind) !== undefined;
}

export function removePlaceable(room: Room | null | undefined, entity: Placeable): boolean {
    return removeEntity(room, entity.id, entity.kind);
}

// ============================================================
// MOVE
// ============================================================

function relocate(room: Room, target: Placeable, newPosition: Position): Placeable {
    if (room.grid === null) {
        assertWholeCell(newPosition, 'move destination');
        setPosition(target, newPosition);
        return cloneEntity(target);
    }

    assertInBounds(room, newPosition, 'move destination');
    assertCellAvailable(room, newPosition, target.id);

    const from = target.position;
    releaseCell(room, from, target.id);
    writeCell(room.grid, newPosition, { type: target.kind, entityId: target.id });
    setPosition(target, newPosition);

    log.debug(
        `Moved ${describeEntity(target)} from (${from.x}, ${from.y}) to (${newPosition.x}, ${newPosition.y})`
    );
    return cloneEntity(target);
}

/**
 * Move the entity with the given ID, whatever its kind.
 *
 * Moving onto the entity's own cell is allowed. Gridless rooms only update
 * the stored position, without a bounds check; the destination must still
 * name a whole cell.
 *
 * @returns Copy of the moved entity
 */
export function moveEntity(room: Room | null | undefined, entityId: string, newPosition: Position): Placeable {
    assertRoom(room);

    const target = locateEntity(room, entityId);
    if (!target) {
        throw new RoomError('ENTITY_NOT_FOUND', `Entity with ID ${entityId} not found in room`, { entityId });
    }

    return relocate(room, target, newPosition);
}

/**
 * Move a placed entity, resolved by its kind and ID. On success the passed
 * entity's position is updated as well.
 */
export function movePlaceable(room: Room | null | undefined, entity: Placeable, newPosition: Position): Placeable {
    assertRoom(room);

    const collection: Placeable[] = collectionFor(room, entity.kind);
    const target = collection.find(candidate => candidate.id === entity.id);
    if (!target) {
        throw new RoomError(
            'ENTITY_NOT_FOUND',
            `${entity.kind} with ID ${entity.id} not found in room`,
            { entityId: entity.id, kind: entity.kind }
        );
    }

    const moved = relocate(room, target, newPosition);
    setPosition(entity, newPosition);
    return moved;
}

// ============================================================
// EMPTY CELLS
// ============================================================

/**
 * All empty cells in row-major order (y, then x). Empty for gridless rooms,
 * which cannot tell occupancy.
 *
 * Complexity: O(width × height)
 */
export function listEmptyPositions(room: Room | null | undefined): Position[] {
    assertRoom(room);
    if (room.grid === null) return [];

    const empty: Position[] = [];
    room.grid.forEach((row, y) => {
        row.forEach((cell, x) => {
            if (cell.type === 'empty') {
                empty.push({ x, y });
            }
        });
    });
    return empty;
}

/**
 * Pick a random empty cell.
 *
 * Gridless rooms get a uniformly random in-bounds position with no emptiness
 * guarantee. Gridded rooms pick uniformly among the empty cells and throw
 * `NO_EMPTY_POSITIONS` when there are none.
 *
 * Complexity: O(width × height)
 */
export function findEmptyPosition(room: Room | null | undefined, random: RandomSource = defaultRandom): Position {
    assertRoom(room);

    if (room.grid === null) {
        return {
            x: randomInt(random, room.width),
            y: randomInt(random, room.height)
        };
    }

    const empty = listEmptyPositions(room);
    if (empty.length === 0) {
        throw new RoomError('NO_EMPTY_POSITIONS', `No empty positions available in ${room.width}x${room.height} room`);
    }
    return pickOne(random, empty);
}
