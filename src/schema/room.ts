import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import {
    EntityKindSchema,
    MonsterSchema,
    PlayerSchema,
    ItemSchema,
    NpcSchema,
    ObstacleSchema
} from './entities.js';

export const CellTypeSchema = z.enum(['empty', 'monster', 'item', 'player', 'npc', 'obstacle']);
export type CellType = z.infer<typeof CellTypeSchema>;

/**
 * One grid unit. An empty cell carries no entity ID.
 */
export const CellSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('empty') }),
    z.object({ type: EntityKindSchema, entityId: z.string().min(1) })
]);
export type Cell = z.infer<typeof CellSchema>;

export const EMPTY_CELL: Cell = Object.freeze({ type: 'empty' as const });

export const LightLevelSchema = z.enum(['bright', 'dim', 'dark']);
export type LightLevel = z.infer<typeof LightLevelSchema>;

export const RoomTypeSchema = z.enum([
    'combat',   // monsters for an encounter
    'treasure'  // loot, optionally guarded
]);
export type RoomType = z.infer<typeof RoomTypeSchema>;

export const RoomConfigSchema = z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    lightLevel: LightLevelSchema.default('bright'),
    description: z.string().default(''),
    useGrid: z.boolean().default(false)
        .describe('Back the room with an occupancy grid (enables collision detection)'),
    roomType: RoomTypeSchema.default('combat')
});
export type RoomConfig = z.input<typeof RoomConfigSchema>;

/**
 * A rectangular room. `grid` is indexed `grid[y][x]`; a null grid means the
 * room is gridless and entity positions are advisory only.
 */
export const RoomSchema = z.object({
    id: z.string().default(() => uuidv4()),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    lightLevel: LightLevelSchema,
    description: z.string(),
    roomType: RoomTypeSchema,
    monsters: z.array(MonsterSchema),
    players: z.array(PlayerSchema),
    items: z.array(ItemSchema),
    npcs: z.array(NpcSchema),
    obstacles: z.array(ObstacleSchema),
    grid: z.array(z.array(CellSchema)).nullable()
});
export type Room = z.infer<typeof RoomSchema>;
