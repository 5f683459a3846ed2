/**
 * Monster catalog seed
 *
 * CR and XP follow the D&D 5e experience-by-challenge-rating table.
 */

import type { MonsterTemplateInput } from '../schema/catalog.js';

export const MONSTER_CATALOG: MonsterTemplateInput[] = [
    { key: 'kobold', name: 'Kobold', cr: 0.125, xp: 25, type: 'humanoid', size: 'small' },
    { key: 'goblin', name: 'Goblin', cr: 0.25, xp: 50, type: 'humanoid', size: 'small' },
    { key: 'skeleton', name: 'Skeleton', cr: 0.25, xp: 50, type: 'undead' },
    { key: 'zombie', name: 'Zombie', cr: 0.25, xp: 50, type: 'undead' },
    { key: 'orc', name: 'Orc', cr: 0.5, xp: 100, type: 'humanoid' },
    { key: 'gnoll', name: 'Gnoll', cr: 0.5, xp: 100, type: 'humanoid' },
    { key: 'bugbear', name: 'Bugbear', cr: 1, xp: 200, type: 'humanoid' },
    { key: 'ghoul', name: 'Ghoul', cr: 1, xp: 200, type: 'undead' },
    { key: 'ogre', name: 'Ogre', cr: 2, xp: 450, type: 'giant', size: 'large' },
    { key: 'owlbear', name: 'Owlbear', cr: 3, xp: 700, type: 'monstrosity', size: 'large' },
    { key: 'troll', name: 'Troll', cr: 5, xp: 1800, type: 'giant', size: 'large' },
    { key: 'young-red-dragon', name: 'Young Red Dragon', cr: 10, xp: 5900, type: 'dragon', size: 'large' },
    { key: 'adult-blue-dragon', name: 'Adult Blue Dragon', cr: 16, xp: 15000, type: 'dragon', size: 'huge' }
];
