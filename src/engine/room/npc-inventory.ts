/**
 * NPC inventory - the items an NPC carries.
 *
 * Inventory items are not independently placeable: none of these operations
 * touch the grid or the room's item collection.
 *
 * @module room/npc-inventory
 */

import { createItem, Item, ItemInput, Npc } from '../../schema/entities.js';
import { Room } from '../../schema/room.js';
import { createLogger } from '../../utils/logger.js';
import { RoomError } from './errors.js';
import { assertRoom } from './room.js';

const log = createLogger('NpcInventory');

function requireNpc(room: Room, npcId: string): Npc {
    const npc = room.npcs.find(candidate => candidate.id === npcId);
    if (!npc) {
        throw new RoomError('ENTITY_NOT_FOUND', `NPC with ID ${npcId} not found in room`, { npcId });
    }
    return npc;
}

export function getNpcInventory(room: Room | null | undefined, npcId: string): Item[] {
    assertRoom(room);
    return structuredClone(requireNpc(room, npcId).inventory);
}

/**
 * Append an item to an NPC's inventory. Items without an ID get a fresh one.
 *
 * @returns Copy of the stored item
 */
export function addItemToNpcInventory(room: Room | null | undefined, npcId: string, item: ItemInput): Item {
    assertRoom(room);
    const npc = requireNpc(room, npcId);

    const stored = createItem(item);
    npc.inventory.push(stored);

    log.debug(`Added item "${stored.name}" (${stored.id}) to NPC "${npc.name}"`);
    return structuredClone(stored);
}

export function removeItemFromNpcInventory(room: Room | null | undefined, npcId: string, itemId: string): Item {
    assertRoom(room);
    const npc = requireNpc(room, npcId);

    const index = npc.inventory.findIndex(item => item.id === itemId);
    if (index === -1) {
        throw new RoomError(
            'ENTITY_NOT_FOUND',
            `Item with ID ${itemId} not found in inventory of NPC ${npcId}`,
            { npcId, itemId }
        );
    }

    const [removed] = npc.inventory.splice(index, 1);
    log.debug(`Removed item "${removed.name}" (${removed.id}) from NPC "${npc.name}"`);
    return removed;
}
