import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { PositionSchema } from './position.js';

/**
 * Entity kinds that can occupy a cell. The kind of an entity doubles as the
 * cell type it writes into the grid.
 */
export const EntityKindSchema = z.enum(['monster', 'item', 'player', 'npc', 'obstacle']);
export type EntityKind = z.infer<typeof EntityKindSchema>;

const entityId = () => z.string().min(1).default(() => uuidv4());
const origin = () => PositionSchema.default({ x: 0, y: 0 });

export const MonsterSchema = z.object({
    kind: z.literal('monster'),
    id: entityId(),
    key: z.string().default('')
        .describe('Reference key into the monster catalog'),
    name: z.string().min(1, 'Monster name cannot be empty'),
    cr: z.number().min(0).default(0)
        .describe('Challenge Rating; stored, never interpreted by placement'),
    xp: z.number().int().min(0).default(0)
        .describe('Experience awarded when the monster is removed during cleanup'),
    position: origin()
});
export type Monster = z.infer<typeof MonsterSchema>;

export const PlayerSchema = z.object({
    kind: z.literal('player'),
    id: entityId(),
    name: z.string().min(1, 'Player name cannot be empty'),
    level: z.number().int().min(1).max(20).default(1),
    position: origin()
});
export type Player = z.infer<typeof PlayerSchema>;

export const ItemSchema = z.object({
    kind: z.literal('item'),
    id: entityId(),
    key: z.string().default(''),
    name: z.string().min(1, 'Item name cannot be empty'),
    type: z.string().default('equipment'),        // equipment, weapon, armor
    category: z.string().default(''),             // e.g. simple-weapons, light-armor
    value: z.number().int().min(0).default(0),
    valueUnit: z.string().default('gp'),
    weight: z.number().min(0).default(0),
    position: origin(),

    // Weapon details
    properties: z.array(z.string()).default([]),
    damageDice: z.string().optional(),
    damageType: z.string().optional(),

    // Armor details
    armorClass: z.number().int().min(0).optional(),
    stealthDisadvantage: z.boolean().default(false)
});
export type Item = z.infer<typeof ItemSchema>;

export const NpcSchema = z.object({
    kind: z.literal('npc'),
    id: entityId(),
    key: z.string().default(''),
    name: z.string().min(1, 'NPC name cannot be empty'),
    inventory: z.array(ItemSchema).default([]),
    position: origin()
});
export type Npc = z.infer<typeof NpcSchema>;

export const ObstacleSchema = z.object({
    kind: z.literal('obstacle'),
    id: entityId(),
    key: z.string().default(''),
    name: z.string().min(1, 'Obstacle name cannot be empty'),
    blocking: z.boolean().default(true)
        .describe('Whether the obstacle blocks movement'),
    position: origin()
});
export type Obstacle = z.infer<typeof ObstacleSchema>;

export const PlaceableSchema = z.discriminatedUnion('kind', [
    MonsterSchema,
    PlayerSchema,
    ItemSchema,
    NpcSchema,
    ObstacleSchema
]);
export type Placeable = z.infer<typeof PlaceableSchema>;
export type EntityOf<K extends EntityKind> = Extract<Placeable, { kind: K }>;

// Factory inputs: everything but the discriminant, with IDs optional
export type MonsterInput = Omit<z.input<typeof MonsterSchema>, 'kind'>;
export type PlayerInput = Omit<z.input<typeof PlayerSchema>, 'kind'>;
export type ItemInput = Omit<z.input<typeof ItemSchema>, 'kind'>;
export type NpcInput = Omit<z.input<typeof NpcSchema>, 'kind'>;
export type ObstacleInput = Omit<z.input<typeof ObstacleSchema>, 'kind'>;

export function createMonster(input: MonsterInput): Monster {
    return MonsterSchema.parse({ ...input, kind: 'monster' });
}

export function createPlayer(input: PlayerInput): Player {
    return PlayerSchema.parse({ ...input, kind: 'player' });
}

export function createItem(input: ItemInput): Item {
    return ItemSchema.parse({ ...input, kind: 'item' });
}

export function createNpc(input: NpcInput): Npc {
    return NpcSchema.parse({ ...input, kind: 'npc' });
}

export function createObstacle(input: ObstacleInput): Obstacle {
    return ObstacleSchema.parse({ ...input, kind: 'obstacle' });
}
