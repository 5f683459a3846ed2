import { EntityKind, EntityKindSchema, Placeable } from '../../schema/entities.js';
import { CellType, Room } from '../../schema/room.js';
import { createLogger } from '../../utils/logger.js';
import { RoomError } from './errors.js';
import { detachEntity } from './placement.js';
import { assertRoom, collectionFor } from './room.js';

const log = createLogger('Cleanup');

export interface CleanupResult {
    /** XP of removed monsters; always 0 for other kinds */
    totalXP: number;
    /** Requested IDs with no matching entity of the kind */
    notRemoved: string[];
    removed: Placeable[];
}

/**
 * Remove entities of one kind and total the XP of removed monsters.
 *
 * An empty `ids` list removes every entity of the kind. Otherwise only the
 * listed IDs are removed; those not found are returned in `notRemoved`
 * rather than raised.
 */
export function cleanupRoom(
    room: Room | null | undefined,
    cellType: CellType,
    ids: readonly string[] = []
): CleanupResult {
    assertRoom(room);

    const parsedKind = EntityKindSchema.safeParse(cellType);
    if (!parsedKind.success) {
        throw new RoomError('UNSUPPORTED_ENTITY_TYPE', `Unsupported entity type for cleanup: ${cellType}`, {
            cellType
        });
    }
    const kind: EntityKind = parsedKind.data;

    // Snapshot the IDs so removal does not disturb iteration
    const targets = ids.length === 0
        ? collectionFor(room, kind).map(entity => entity.id)
        : [...ids];

    const result: CleanupResult = { totalXP: 0, notRemoved: [], removed: [] };

    for (const id of targets) {
        const removed = detachEntity(room, id, kind);
        if (!removed) {
            result.notRemoved.push(id);
            continue;
        }
        if (removed.kind === 'monster') {
            result.totalXP += removed.xp;
        }
        result.removed.push(removed);
    }

    log.debug(
        `Cleaned ${result.removed.length} ${kind} entities from room ${room.id} ` +
        `(${result.totalXP} XP, ${result.notRemoved.length} not found)`
    );
    return result;
}
