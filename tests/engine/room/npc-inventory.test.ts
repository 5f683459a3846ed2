import {
    addItemToNpcInventory,
    getNpcInventory,
    removeItemFromNpcInventory
} from '../../../src/engine/room/npc-inventory.js';
import { placeEntity } from '../../../src/engine/room/placement.js';
import { createRoom } from '../../../src/engine/room/room.js';
import { createNpc } from '../../../src/schema/entities.js';
import { Room } from '../../../src/schema/room.js';
import { occupiedCellCount } from '../../helpers/grid.js';

describe('NPC inventory', () => {
    let room: Room;
    let merchantId: string;

    beforeEach(() => {
        room = createRoom({ width: 5, height: 5, useGrid: true });
        merchantId = placeEntity(room, createNpc({ name: 'Merchant', position: { x: 2, y: 2 } })).id;
    });

    it('should start empty', () => {
        expect(getNpcInventory(room, merchantId)).toEqual([]);
    });

    it('should add items without touching the grid or room items', () => {
        const dagger = addItemToNpcInventory(room, merchantId, {
            key: 'dagger',
            name: 'Dagger',
            type: 'weapon',
            category: 'simple-weapons',
            value: 2,
            damageDice: '1d4'
        });

        expect(dagger.id).toEqual(expect.any(String));
        expect(dagger.id.length).toBeGreaterThan(0);
        expect(getNpcInventory(room, merchantId)).toEqual([dagger]);
        expect(room.items).toEqual([]);
        expect(occupiedCellCount(room)).toBe(1);
    });

    it('should keep a supplied item id', () => {
        const rope = addItemToNpcInventory(room, merchantId, { id: 'rope-1', name: 'Rope' });
        expect(rope.id).toBe('rope-1');
    });

    it('should keep items in insertion order', () => {
        addItemToNpcInventory(room, merchantId, { name: 'Torch' });
        addItemToNpcInventory(room, merchantId, { name: 'Rope' });

        expect(getNpcInventory(room, merchantId).map(item => item.name)).toEqual(['Torch', 'Rope']);
    });

    it('should return a copy of the inventory', () => {
        addItemToNpcInventory(room, merchantId, { name: 'Torch' });

        getNpcInventory(room, merchantId)[0].name = 'Renamed';
        getNpcInventory(room, merchantId).pop();

        expect(getNpcInventory(room, merchantId).map(item => item.name)).toEqual(['Torch']);
    });

    it('should remove an item and return it', () => {
        const torch = addItemToNpcInventory(room, merchantId, { name: 'Torch' });
        addItemToNpcInventory(room, merchantId, { name: 'Rope' });

        const removed = removeItemFromNpcInventory(room, merchantId, torch.id);

        expect(removed).toEqual(torch);
        expect(getNpcInventory(room, merchantId).map(item => item.name)).toEqual(['Rope']);
    });

    it('should throw ENTITY_NOT_FOUND for an unknown item', () => {
        expect(() => removeItemFromNpcInventory(room, merchantId, 'missing')).toThrow(
            expect.objectContaining({ code: 'ENTITY_NOT_FOUND' })
        );
    });

    it('should throw ENTITY_NOT_FOUND for an unknown NPC', () => {
        const notFound = expect.objectContaining({ code: 'ENTITY_NOT_FOUND' });

        expect(() => getNpcInventory(room, 'missing')).toThrow(notFound);
        expect(() => addItemToNpcInventory(room, 'missing', { name: 'Torch' })).toThrow(notFound);
        expect(() => removeItemFromNpcInventory(room, 'missing', 'any')).toThrow(notFound);
    });

    it('should throw NIL_ROOM for a missing room', () => {
        expect(() => getNpcInventory(null, merchantId)).toThrow(
            expect.objectContaining({ code: 'NIL_ROOM' })
        );
    });
});
