/**
 * Encounter room generator - public API
 *
 * Rooms are plain values; mutate them only through the operations exported
 * here so the grid stays consistent with the entity collections.
 */

// Schemas and types
export * from './schema/position.js';
export * from './schema/entities.js';
export * from './schema/room.js';
export * from './schema/placement.js';
export * from './schema/party.js';
export * from './schema/catalog.js';

// Room core
export { RoomError, isRoomError } from './engine/room/errors.js';
export type { RoomErrorCode } from './engine/room/errors.js';
export { createRandomSource, defaultRandom } from './engine/room/random.js';
export type { RandomSource } from './engine/room/random.js';
export {
    ENTITY_KINDS_BY_PRIORITY,
    createRoom,
    initializeGrid,
    isInBounds,
    getCell,
    getEntityAt,
    findEntity,
    listEntities,
    calculateDistance
} from './engine/room/room.js';
export { getId, getPosition, setPosition, getCellType } from './engine/room/placeable.js';
export {
    placeEntity,
    removeEntity,
    removePlaceable,
    moveEntity,
    movePlaceable,
    findEmptyPosition,
    listEmptyPositions
} from './engine/room/placement.js';
export { PLACEMENT_PRIORITY, addPlaceablesToRoom } from './engine/room/batch-placement.js';
export type {
    BatchPlacementOptions,
    BatchPlacementResult,
    Displacement,
    PlacementFailure
} from './engine/room/batch-placement.js';
export { cleanupRoom } from './engine/room/cleanup.js';
export type { CleanupResult } from './engine/room/cleanup.js';
export {
    getNpcInventory,
    addItemToNpcInventory,
    removeItemFromNpcInventory
} from './engine/room/npc-inventory.js';

// Encounter balancing
export * from './engine/encounter/balancer.js';

// Catalog and service
export { getDb, closeDb, migrate, seedCatalog } from './storage/index.js';
export { CatalogError } from './storage/errors.js';
export { MonsterCatalogRepository } from './storage/repos/monster-catalog.repo.js';
export { ItemCatalogRepository } from './storage/repos/item-catalog.repo.js';
export { RoomService } from './services/room.service.js';
export type {
    MonsterDataSource,
    ItemDataSource,
    RoomServiceOptions,
    PopulatedRoom
} from './services/room.service.js';

export { loadConfig, resolveCatalogPath } from './config.js';
export type { RoomgenConfig, LogLevel } from './config.js';
export { createLogger, setLogLevel, resetLogLevel, getErrorMessage, logError } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
