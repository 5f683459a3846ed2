/**
 * Encounter balancer - Challenge Rating arithmetic against a party
 *
 * Pure functions over Party and monster data; placement never depends on
 * this module. The service layer calls it before configs reach the batch
 * placement engine.
 *
 * Target CR = average party level × difficulty multiplier × party-size
 * adjustment, rounded to the nearest quarter.
 *
 * @module encounter/balancer
 */

import { EncounterDifficulty, EncounterDifficultySchema, Party } from '../../schema/party.js';
import { Monster, Player } from '../../schema/entities.js';
import { MonsterConfig } from '../../schema/placement.js';
import { RoomError } from '../room/errors.js';

export const DIFFICULTY_MULTIPLIERS: Record<EncounterDifficulty, number> = {
    easy: 0.5,
    medium: 0.75,
    hard: 1.0,
    deadly: 1.5
};

/** Party sizes past the last entry use the last entry */
const PARTY_SIZE_ADJUSTMENTS: readonly number[] = [
    0.5,  // solo
    0.75, // two
    1.0,  // three
    1.0,  // four (baseline)
    1.25, // five
    1.5   // six or more
];

/** Configs within this fraction of the target CR are left alone */
const BALANCE_TOLERANCE = 0.1;

// ============================================================
// PARTY
// ============================================================

export function partySize(party: Party): number {
    return party.members.length;
}

export function averageLevel(party: Party): number {
    if (party.members.length === 0) return 0;
    const total = party.members.reduce((sum, member) => sum + member.level, 0);
    return total / party.members.length;
}

export function playersToParty(players: readonly Player[]): Party {
    return { members: players.map(player => ({ name: player.name, level: player.level })) };
}

export function partySizeAdjustment(size: number): number {
    if (size <= 0) return 1.0;
    return PARTY_SIZE_ADJUSTMENTS[Math.min(size, PARTY_SIZE_ADJUSTMENTS.length) - 1];
}

function requireParty(party: Party): void {
    if (party.members.length === 0) {
        throw new RoomError('EMPTY_PARTY');
    }
}

function requireDifficulty(difficulty: string): EncounterDifficulty {
    const parsed = EncounterDifficultySchema.safeParse(difficulty);
    if (!parsed.success) {
        throw new RoomError('INVALID_DIFFICULTY', `Invalid difficulty: ${difficulty}`, { difficulty });
    }
    return parsed.data;
}

// ============================================================
// CR ARITHMETIC
// ============================================================

export function calculateTargetCR(party: Party, difficulty: EncounterDifficulty): number {
    requireParty(party);
    const multiplier = DIFFICULTY_MULTIPLIERS[requireDifficulty(difficulty)];

    const target = averageLevel(party) * multiplier * partySizeAdjustment(partySize(party));
    return Math.round(target * 4) / 4;
}

export function totalCR(monsters: readonly Pick<Monster, 'cr'>[]): number {
    return monsters.reduce((sum, monster) => sum + monster.cr, 0);
}

/**
 * Highest difficulty band whose multiplier the monsters' CR ratio reaches.
 * Ratios below the easy band still count as easy.
 */
export function determineEncounterDifficulty(
    monsters: readonly Pick<Monster, 'cr'>[],
    party: Party
): EncounterDifficulty {
    requireParty(party);

    const ratio = totalCR(monsters) / (averageLevel(party) * partySizeAdjustment(partySize(party)));
    const bands: EncounterDifficulty[] = ['deadly', 'hard', 'medium', 'easy'];
    return bands.find(band => ratio >= DIFFICULTY_MULTIPLIERS[band]) ?? 'easy';
}

/**
 * Scale monster counts toward the target CR for the party and difficulty.
 *
 * Configs already within 10% of the target come back unchanged. Otherwise
 * every count is multiplied by target / current and rounded; a config that
 * had any monsters keeps at least one.
 */
export function adjustMonsterSelection<T extends MonsterConfig>(
    configs: readonly T[],
    party: Party,
    difficulty: EncounterDifficulty
): T[] {
    requireParty(party);
    const target = calculateTargetCR(party, difficulty);

    const current = configs.reduce((sum, config) => sum + (config.cr ?? 0) * (config.count ?? 1), 0);
    if (current === 0 || (target > 0 && Math.abs(current - target) / target < BALANCE_TOLERANCE)) {
        return configs.map(config => ({ ...config }));
    }

    const scale = target / current;
    return configs.map(config => {
        const count = config.count ?? 1;
        let adjusted = Math.round(count * scale);
        if (count > 0 && adjusted < 1) {
            adjusted = 1;
        }
        return { ...config, count: adjusted };
    });
}
