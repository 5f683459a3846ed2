import { z } from 'zod';

export const EncounterDifficultySchema = z.enum(['easy', 'medium', 'hard', 'deadly']);
export type EncounterDifficulty = z.infer<typeof EncounterDifficultySchema>;

export const PartyMemberSchema = z.object({
    name: z.string().min(1),
    level: z.number().int().min(1).max(20)
});
export type PartyMember = z.infer<typeof PartyMemberSchema>;

/**
 * Ordered list of player characters an encounter is balanced against
 */
export const PartySchema = z.object({
    members: z.array(PartyMemberSchema)
});
export type Party = z.infer<typeof PartySchema>;
