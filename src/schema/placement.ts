import { z } from 'zod';
import { PositionSchema } from './position.js';
import {
    MonsterSchema,
    PlayerSchema,
    ItemSchema,
    NpcSchema,
    ObstacleSchema
} from './entities.js';

/**
 * Placement fields shared by every config. `position` is only read when
 * `randomPlace` is false; `count` copies each receive their own ID.
 */
const placementFields = {
    randomPlace: z.boolean().default(false),
    position: PositionSchema.optional(),
    count: z.number().int().min(1, 'count must be at least 1').default(1)
};

export const MonsterConfigSchema = MonsterSchema
    .omit({ id: true, position: true })
    .extend(placementFields);

export const PlayerConfigSchema = PlayerSchema
    .omit({ id: true, position: true })
    .extend(placementFields);

export const ItemConfigSchema = ItemSchema
    .omit({ id: true, position: true })
    .extend(placementFields);

export const NpcConfigSchema = NpcSchema
    .omit({ id: true, position: true })
    .extend(placementFields);

export const ObstacleConfigSchema = ObstacleSchema
    .omit({ id: true, position: true })
    .extend(placementFields);

export const PlaceableConfigSchema = z.discriminatedUnion('kind', [
    MonsterConfigSchema,
    PlayerConfigSchema,
    ItemConfigSchema,
    NpcConfigSchema,
    ObstacleConfigSchema
]).superRefine((config, ctx) => {
    if (!config.randomPlace && config.position === undefined) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['position'],
            message: `${config.kind} "${config.name}" must have a position when randomPlace is false`
        });
    }
});

/** Config as written by callers (defaults not yet applied) */
export type PlaceableConfig = z.input<typeof PlaceableConfigSchema>;
/** Config after validation */
export type ResolvedPlaceableConfig = z.infer<typeof PlaceableConfigSchema>;

export type MonsterConfig = z.input<typeof MonsterConfigSchema>;
export type PlayerConfig = z.input<typeof PlayerConfigSchema>;
export type ItemConfig = z.input<typeof ItemConfigSchema>;
export type NpcConfig = z.input<typeof NpcConfigSchema>;
export type ObstacleConfig = z.input<typeof ObstacleConfigSchema>;
