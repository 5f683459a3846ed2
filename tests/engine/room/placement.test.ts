import {
    findEmptyPosition,
    listEmptyPositions,
    moveEntity,
    movePlaceable,
    placeEntity,
    removeEntity,
    removePlaceable
} from '../../../src/engine/room/placement.js';
import { createRoom, getCell } from '../../../src/engine/room/room.js';
import { isRoomError } from '../../../src/engine/room/errors.js';
import { createRandomSource, pickOne } from '../../../src/engine/room/random.js';
import {
    createItem,
    createMonster,
    createNpc,
    createObstacle,
    createPlayer,
    EntityKind,
    Placeable
} from '../../../src/schema/entities.js';
import { Position, positionKey } from '../../../src/schema/position.js';
import { gridViolations, occupiedCellCount } from '../../helpers/grid.js';

describe('placeEntity', () => {
    it('should store the entity and record it in its cell', () => {
        const room = createRoom({ width: 10, height: 10, useGrid: true });
        const goblin = createMonster({ name: 'Goblin', cr: 0.25, xp: 50, position: { x: 2, y: 3 } });

        const placed = placeEntity(room, goblin);

        expect(placed).toEqual(goblin);
        expect(room.monsters).toHaveLength(1);
        expect(getCell(room, { x: 2, y: 3 })).toEqual({ type: 'monster', entityId: goblin.id });
    });

    it('should keep its own copy of the entity', () => {
        const room = createRoom({ width: 10, height: 10, useGrid: true });
        const goblin = createMonster({ name: 'Goblin', position: { x: 2, y: 3 } });

        placeEntity(room, goblin);
        goblin.position.x = 9;
        goblin.name = 'Changed';

        expect(room.monsters[0].position).toEqual({ x: 2, y: 3 });
        expect(room.monsters[0].name).toBe('Goblin');
    });

    it.each([
        { x: 10, y: 0 },
        { x: 0, y: 10 },
        { x: -1, y: 4 }
    ])('should reject out-of-bounds position %o', position => {
        const room = createRoom({ width: 10, height: 10, useGrid: true });

        expect(() => placeEntity(room, createPlayer({ name: 'Aria', position }))).toThrow(
            expect.objectContaining({ code: 'INVALID_POSITION' })
        );
        expect(room.players).toHaveLength(0);
    });

    it('should name the position and bounds in the out-of-bounds message', () => {
        const room = createRoom({ width: 10, height: 8, useGrid: true });

        expect(() => placeEntity(room, createPlayer({ name: 'Aria', position: { x: 12, y: 3 } }))).toThrow(
            'Invalid position: (12, 3) is outside room bounds (10, 8)'
        );
    });

    it('should reject a fractional position and leave the room unchanged', () => {
        const room = createRoom({ width: 5, height: 5, useGrid: true });
        const aria = createPlayer({ name: 'Aria' });
        aria.position = { x: 1.5, y: 0 };

        expect(() => placeEntity(room, aria)).toThrow(
            expect.objectContaining({
                code: 'INVALID_POSITION',
                message: 'Invalid position: (1.5, 0) is not a whole cell'
            })
        );
        expect(room.players).toHaveLength(0);
        expect(occupiedCellCount(room)).toBe(0);
    });

    it('should reject a fractional position in a gridless room', () => {
        const room = createRoom({ width: 5, height: 5 });
        const aria = createPlayer({ name: 'Aria' });
        aria.position = { x: 0, y: 2.25 };

        expect(() => placeEntity(room, aria)).toThrow(
            expect.objectContaining({ code: 'INVALID_POSITION' })
        );
        expect(room.players).toHaveLength(0);
    });

    it('should reject an ID that is already in another cell', () => {
        const room = createRoom({ width: 5, height: 5, useGrid: true });
        const goblin = placeEntity(room, createMonster({ id: 'gob-1', name: 'Goblin', position: { x: 0, y: 0 } }));

        expect(() => placeEntity(room, createItem({ id: 'gob-1', name: 'Torch', position: { x: 3, y: 3 } }))).toThrow(
            expect.objectContaining({
                code: 'DUPLICATE_ENTITY_ID',
                message: 'Entity with ID gob-1 is already in room as monster "Goblin" (gob-1)'
            })
        );
        expect(room.items).toHaveLength(0);
        expect(getCell(room, { x: 3, y: 3 })).toEqual({ type: 'empty' });
        expect(getCell(room, { x: 0, y: 0 })).toEqual({ type: 'monster', entityId: goblin.id });
    });

    it('should reject a repeated placement in a gridless room', () => {
        const room = createRoom({ width: 5, height: 5 });
        const goblin = placeEntity(room, createMonster({ name: 'Goblin', position: { x: 1, y: 1 } }));

        expect(() => placeEntity(room, { ...goblin, position: { x: 2, y: 2 } })).toThrow(
            expect.objectContaining({ code: 'DUPLICATE_ENTITY_ID' })
        );
        expect(room.monsters).toHaveLength(1);
        expect(removeEntity(room, goblin.id, 'monster')).toBe(true);
        expect(room.monsters).toEqual([]);
    });

    it('should reject an occupied cell and leave the room unchanged', () => {
        const room = createRoom({ width: 5, height: 5, useGrid: true });
        const goblin = placeEntity(room, createMonster({ name: 'Goblin', position: { x: 1, y: 1 } }));

        expect(() => placeEntity(room, createItem({ name: 'Torch', position: { x: 1, y: 1 } }))).toThrow(
            expect.objectContaining({ code: 'CELL_OCCUPIED' })
        );
        expect(room.items).toHaveLength(0);
        expect(getCell(room, { x: 1, y: 1 })).toEqual({ type: 'monster', entityId: goblin.id });
    });

    it('should allow shared positions in a gridless room', () => {
        const room = createRoom({ width: 5, height: 5 });

        placeEntity(room, createMonster({ name: 'Goblin', position: { x: 1, y: 1 } }));
        placeEntity(room, createMonster({ name: 'Orc', position: { x: 1, y: 1 } }));

        expect(room.monsters.map(monster => monster.position)).toEqual([
            { x: 1, y: 1 },
            { x: 1, y: 1 }
        ]);
        expect(room.grid).toBeNull();
    });

    it('should write each kind as its own cell type', () => {
        const room = createRoom({ width: 5, height: 1, useGrid: true });
        const entities: Placeable[] = [
            createMonster({ name: 'Goblin', position: { x: 0, y: 0 } }),
            createPlayer({ name: 'Aria', position: { x: 1, y: 0 } }),
            createItem({ name: 'Torch', position: { x: 2, y: 0 } }),
            createNpc({ name: 'Merchant', position: { x: 3, y: 0 } }),
            createObstacle({ name: 'Pillar', position: { x: 4, y: 0 } })
        ];

        entities.forEach(entity => placeEntity(room, entity));

        expect(room.grid?.[0].map(cell => cell.type)).toEqual(['monster', 'player', 'item', 'npc', 'obstacle']);
    });

    it('should throw NIL_ROOM for a missing room', () => {
        expect(() => placeEntity(null, createPlayer({ name: 'Aria' }))).toThrow(
            expect.objectContaining({ code: 'NIL_ROOM' })
        );
    });
});

describe('removeEntity', () => {
    it('should undo a placement', () => {
        const room = createRoom({ width: 5, height: 5, useGrid: true });
        const goblin = placeEntity(room, createMonster({ name: 'Goblin', position: { x: 3, y: 4 } }));

        expect(removeEntity(room, goblin.id, 'monster')).toBe(true);
        expect(room.monsters).toEqual([]);
        expect(getCell(room, { x: 3, y: 4 })).toEqual({ type: 'empty' });
    });

    it('should report absence without throwing', () => {
        const room = createRoom({ width: 5, height: 5, useGrid: true });
        const goblin = placeEntity(room, createMonster({ name: 'Goblin', position: { x: 0, y: 0 } }));

        expect(removeEntity(room, 'missing', 'monster')).toBe(false);
        expect(removeEntity(room, goblin.id, 'item')).toBe(false);
        expect(room.monsters).toHaveLength(1);
    });

    it('should keep the remaining entities in order', () => {
        const room = createRoom({ width: 5, height: 5, useGrid: true });
        const [first, second, third] = ['Goblin', 'Orc', 'Ogre'].map((name, x) =>
            placeEntity(room, createMonster({ name, position: { x, y: 0 } }))
        );

        removeEntity(room, second.id, 'monster');

        expect(room.monsters.map(monster => monster.id)).toEqual([first.id, third.id]);
        expect(gridViolations(room)).toEqual([]);
    });

    it('should remove through the entity itself', () => {
        const room = createRoom({ width: 5, height: 5, useGrid: true });
        const merchant = placeEntity(room, createNpc({ name: 'Merchant', position: { x: 2, y: 2 } }));

        expect(removePlaceable(room, merchant)).toBe(true);
        expect(room.npcs).toEqual([]);
        expect(occupiedCellCount(room)).toBe(0);
    });

    it('should throw NIL_ROOM for a missing room', () => {
        expect(() => removeEntity(undefined, 'any', 'monster')).toThrow(
            expect.objectContaining({ code: 'NIL_ROOM' })
        );
    });
});

describe('moveEntity', () => {
    it('should move the entity and its cell together', () => {
        const room = createRoom({ width: 10, height: 10, useGrid: true });
        const aria = placeEntity(room, createPlayer({ name: 'Aria', position: { x: 1, y: 1 } }));

        const moved = moveEntity(room, aria.id, { x: 4, y: 6 });

        expect(moved.position).toEqual({ x: 4, y: 6 });
        expect(room.players[0].position).toEqual({ x: 4, y: 6 });
        expect(getCell(room, { x: 1, y: 1 })).toEqual({ type: 'empty' });
        expect(getCell(room, { x: 4, y: 6 })).toEqual({ type: 'player', entityId: aria.id });
    });

    it('should allow moving onto its own cell', () => {
        const room = createRoom({ width: 5, height: 5, useGrid: true });
        const aria = placeEntity(room, createPlayer({ name: 'Aria', position: { x: 2, y: 2 } }));

        expect(moveEntity(room, aria.id, { x: 2, y: 2 }).position).toEqual({ x: 2, y: 2 });
        expect(getCell(room, { x: 2, y: 2 })).toEqual({ type: 'player', entityId: aria.id });
    });

    it('should reject an occupied destination and leave both entities in place', () => {
        const room = createRoom({ width: 5, height: 5, useGrid: true });
        const aria = placeEntity(room, createPlayer({ name: 'Aria', position: { x: 0, y: 0 } }));
        const goblin = placeEntity(room, createMonster({ name: 'Goblin', position: { x: 1, y: 0 } }));

        expect(() => moveEntity(room, aria.id, { x: 1, y: 0 })).toThrow(
            expect.objectContaining({ code: 'CELL_OCCUPIED' })
        );
        expect(room.players[0].position).toEqual({ x: 0, y: 0 });
        expect(room.monsters[0].position).toEqual({ x: 1, y: 0 });
        expect(getCell(room, { x: 0, y: 0 })).toEqual({ type: 'player', entityId: aria.id });
        expect(getCell(room, { x: 1, y: 0 })).toEqual({ type: 'monster', entityId: goblin.id });
    });

    it('should reject an out-of-bounds destination', () => {
        const room = createRoom({ width: 5, height: 5, useGrid: true });
        const aria = placeEntity(room, createPlayer({ name: 'Aria', position: { x: 0, y: 0 } }));

        expect(() => moveEntity(room, aria.id, { x: 5, y: 0 })).toThrow(
            'Invalid move destination: (5, 0) is outside room bounds (5, 5)'
        );
        expect(room.players[0].position).toEqual({ x: 0, y: 0 });
    });

    it('should reject a fractional destination and leave the entity in place', () => {
        const room = createRoom({ width: 5, height: 5, useGrid: true });
        const aria = placeEntity(room, createPlayer({ name: 'Aria', position: { x: 0, y: 0 } }));

        expect(() => moveEntity(room, aria.id, { x: 1.5, y: 0 })).toThrow(
            expect.objectContaining({
                code: 'INVALID_POSITION',
                message: 'Invalid move destination: (1.5, 0) is not a whole cell'
            })
        );
        expect(room.players[0].position).toEqual({ x: 0, y: 0 });
        expect(getCell(room, { x: 0, y: 0 })).toEqual({ type: 'player', entityId: aria.id });
        expect(gridViolations(room)).toEqual([]);
    });

    it('should reject a fractional destination in a gridless room', () => {
        const room = createRoom({ width: 5, height: 5 });
        const goblin = placeEntity(room, createMonster({ name: 'Goblin', position: { x: 1, y: 1 } }));

        expect(() => moveEntity(room, goblin.id, { x: 2, y: 0.5 })).toThrow(
            expect.objectContaining({ code: 'INVALID_POSITION' })
        );
        expect(room.monsters[0].position).toEqual({ x: 1, y: 1 });
    });

    it('should throw ENTITY_NOT_FOUND for an unknown id', () => {
        const room = createRoom({ width: 5, height: 5, useGrid: true });

        expect(() => moveEntity(room, 'missing', { x: 1, y: 1 })).toThrow(
            expect.objectContaining({ code: 'ENTITY_NOT_FOUND' })
        );
    });

    it('should only update the stored position in a gridless room', () => {
        const room = createRoom({ width: 5, height: 5 });
        const goblin = placeEntity(room, createMonster({ name: 'Goblin', position: { x: 1, y: 1 } }));
        placeEntity(room, createMonster({ name: 'Orc', position: { x: 3, y: 3 } }));

        moveEntity(room, goblin.id, { x: 3, y: 3 });
        moveEntity(room, goblin.id, { x: 7, y: 9 });

        expect(room.monsters[0].position).toEqual({ x: 7, y: 9 });
    });

    it('should update the caller entity when moving through movePlaceable', () => {
        const room = createRoom({ width: 5, height: 5, useGrid: true });
        const torch = placeEntity(room, createItem({ name: 'Torch', position: { x: 0, y: 4 } }));

        movePlaceable(room, torch, { x: 4, y: 0 });

        expect(torch.position).toEqual({ x: 4, y: 0 });
        expect(room.items[0].position).toEqual({ x: 4, y: 0 });
    });

    it('should resolve movePlaceable by kind as well as id', () => {
        const room = createRoom({ width: 5, height: 5, useGrid: true });
        const torch = placeEntity(room, createItem({ name: 'Torch', position: { x: 0, y: 4 } }));
        const stranger = createMonster({ id: torch.id, name: 'Mimic', position: { x: 0, y: 4 } });

        expect(() => movePlaceable(room, stranger, { x: 1, y: 1 })).toThrow(
            expect.objectContaining({ code: 'ENTITY_NOT_FOUND' })
        );
    });
});

describe('findEmptyPosition', () => {
    it('should throw NO_EMPTY_POSITIONS once every cell is filled', () => {
        const room = createRoom({ width: 3, height: 2, useGrid: true });
        for (let y = 0; y < 2; y++) {
            for (let x = 0; x < 3; x++) {
                placeEntity(room, createObstacle({ name: 'Rubble', position: { x, y } }));
            }
        }

        expect(listEmptyPositions(room)).toEqual([]);
        expect(() => findEmptyPosition(room)).toThrow(
            expect.objectContaining({ code: 'NO_EMPTY_POSITIONS' })
        );
    });

    it('should return the only empty cell', () => {
        const room = createRoom({ width: 2, height: 2, useGrid: true });
        placeEntity(room, createObstacle({ name: 'Rubble', position: { x: 0, y: 0 } }));
        placeEntity(room, createObstacle({ name: 'Rubble', position: { x: 1, y: 0 } }));
        placeEntity(room, createObstacle({ name: 'Rubble', position: { x: 1, y: 1 } }));

        expect(findEmptyPosition(room)).toEqual({ x: 0, y: 1 });
    });

    it('should list empty cells in row-major order', () => {
        const room = createRoom({ width: 2, height: 2, useGrid: true });
        placeEntity(room, createObstacle({ name: 'Rubble', position: { x: 1, y: 0 } }));

        expect(listEmptyPositions(room)).toEqual([
            { x: 0, y: 0 },
            { x: 0, y: 1 },
            { x: 1, y: 1 }
        ]);
    });

    it('should pick among empty cells with the injected random source', () => {
        const room = createRoom({ width: 2, height: 2, useGrid: true });
        placeEntity(room, createObstacle({ name: 'Rubble', position: { x: 0, y: 0 } }));

        // Empty cells: (1,0), (0,1), (1,1)
        expect(findEmptyPosition(room, () => 0)).toEqual({ x: 1, y: 0 });
        expect(findEmptyPosition(room, () => 0.999)).toEqual({ x: 1, y: 1 });
    });

    it('should return an in-bounds position for a gridless room', () => {
        const room = createRoom({ width: 10, height: 4 });

        expect(findEmptyPosition(room, () => 0.5)).toEqual({ x: 5, y: 2 });
    });

    it('should return positions that are empty and in bounds', () => {
        const room = createRoom({ width: 4, height: 4, useGrid: true });
        const random = createRandomSource('find-empty');

        for (let i = 0; i < 16; i++) {
            const position = findEmptyPosition(room, random);
            expect(getCell(room, position)).toEqual({ type: 'empty' });
            placeEntity(room, createItem({ name: `Coin ${i}`, position }));
        }
        expect(() => findEmptyPosition(room, random)).toThrow(
            expect.objectContaining({ code: 'NO_EMPTY_POSITIONS' })
        );
    });
});

describe('grid consistency', () => {
    it('should hold after a long random sequence of operations', () => {
        const room = createRoom({ width: 6, height: 5, useGrid: true });
        const random = createRandomSource('grid-consistency');
        const kinds: EntityKind[] = ['monster', 'player', 'item', 'npc', 'obstacle'];
        const randomPosition = (): Position => ({
            x: Math.floor(random() * 8) - 1,
            y: Math.floor(random() * 7) - 1
        });
        const build = (kind: EntityKind, name: string, position: Position): Placeable => {
            switch (kind) {
                case 'monster': return createMonster({ name, position });
                case 'player': return createPlayer({ name, position });
                case 'item': return createItem({ name, position });
                case 'npc': return createNpc({ name, position });
                case 'obstacle': return createObstacle({ name, position });
            }
        };
        const expectedFailure = (error: unknown): boolean =>
            isRoomError(error, 'CELL_OCCUPIED') || isRoomError(error, 'INVALID_POSITION');

        for (let step = 0; step < 300; step++) {
            const live = [...room.monsters, ...room.players, ...room.items, ...room.npcs, ...room.obstacles];
            const roll = random();

            try {
                if (roll < 0.45 || live.length === 0) {
                    placeEntity(room, build(pickOne(random, kinds), `Entity ${step}`, randomPosition()));
                } else if (roll < 0.7) {
                    const target = pickOne(random, live);
                    expect(removeEntity(room, target.id, target.kind)).toBe(true);
                } else {
                    moveEntity(room, pickOne(random, live).id, randomPosition());
                }
            } catch (error) {
                if (!expectedFailure(error)) throw error;
            }

            expect(gridViolations(room)).toEqual([]);
        }
    });

    it('should never hold two entities in one cell', () => {
        const room = createRoom({ width: 3, height: 3, useGrid: true });
        const random = createRandomSource('no-double-placement');

        for (let i = 0; i < 40; i++) {
            const position = { x: Math.floor(random() * 3), y: Math.floor(random() * 3) };
            try {
                placeEntity(room, createMonster({ name: `Goblin ${i}`, position }));
            } catch (error) {
                if (!isRoomError(error, 'CELL_OCCUPIED')) throw error;
            }
        }

        const positions = room.monsters.map(monster => positionKey(monster.position));
        expect(new Set(positions).size).toBe(positions.length);
        expect(occupiedCellCount(room)).toBe(room.monsters.length);
    });
});
