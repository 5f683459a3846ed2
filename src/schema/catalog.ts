import { z } from 'zod';
import { ItemSchema } from './entities.js';

/**
 * Monster entry in the content catalog. Entities built from it copy `xp`
 * so cleanup can total rewards without another lookup.
 */
export const MonsterTemplateSchema = z.object({
    key: z.string().min(1),
    name: z.string().min(1),
    cr: z.number().min(0),
    xp: z.number().int().min(0),
    type: z.string().default('humanoid'),
    size: z.enum(['tiny', 'small', 'medium', 'large', 'huge', 'gargantuan']).default('medium')
});
export type MonsterTemplate = z.infer<typeof MonsterTemplateSchema>;
export type MonsterTemplateInput = z.input<typeof MonsterTemplateSchema>;

/**
 * Item entry in the content catalog: an item without identity or position
 */
export const ItemTemplateSchema = ItemSchema.omit({ kind: true, id: true, position: true })
    .extend({ key: z.string().min(1) });
export type ItemTemplate = z.infer<typeof ItemTemplateSchema>;
export type ItemTemplateInput = z.input<typeof ItemTemplateSchema>;
