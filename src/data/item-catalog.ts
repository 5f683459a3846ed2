/**
 * Item catalog seed
 *
 * Categories match what treasure generation asks for: weapon and armor
 * tiers, potions and adventuring gear. Values are in the listed unit.
 */

import type { ItemTemplateInput } from '../schema/catalog.js';

// ═══════════════════════════════════════════════════════════════════════════
// WEAPONS
// ═══════════════════════════════════════════════════════════════════════════

const WEAPONS: ItemTemplateInput[] = [
    {
        key: 'dagger', name: 'Dagger', type: 'weapon', category: 'simple-weapons',
        value: 2, weight: 1, damageDice: '1d4', damageType: 'piercing',
        properties: ['finesse', 'light', 'thrown']
    },
    {
        key: 'club', name: 'Club', type: 'weapon', category: 'simple-weapons',
        value: 1, valueUnit: 'sp', weight: 2, damageDice: '1d4', damageType: 'bludgeoning',
        properties: ['light']
    },
    {
        key: 'quarterstaff', name: 'Quarterstaff', type: 'weapon', category: 'simple-weapons',
        value: 2, valueUnit: 'sp', weight: 4, damageDice: '1d6', damageType: 'bludgeoning',
        properties: ['versatile']
    },
    {
        key: 'longsword', name: 'Longsword', type: 'weapon', category: 'martial-weapons',
        value: 15, weight: 3, damageDice: '1d8', damageType: 'slashing',
        properties: ['versatile']
    },
    {
        key: 'battleaxe', name: 'Battleaxe', type: 'weapon', category: 'martial-weapons',
        value: 10, weight: 4, damageDice: '1d8', damageType: 'slashing',
        properties: ['versatile']
    },
    {
        key: 'rapier', name: 'Rapier', type: 'weapon', category: 'martial-weapons',
        value: 25, weight: 2, damageDice: '1d8', damageType: 'piercing',
        properties: ['finesse']
    }
];

// ═══════════════════════════════════════════════════════════════════════════
// ARMOR
// ═══════════════════════════════════════════════════════════════════════════

const ARMOR: ItemTemplateInput[] = [
    { key: 'padded-armor', name: 'Padded Armor', type: 'armor', category: 'light-armor', value: 5, weight: 8, armorClass: 11, stealthDisadvantage: true },
    { key: 'leather-armor', name: 'Leather Armor', type: 'armor', category: 'light-armor', value: 10, weight: 10, armorClass: 11 },
    { key: 'hide-armor', name: 'Hide Armor', type: 'armor', category: 'medium-armor', value: 10, weight: 12, armorClass: 12 },
    { key: 'chain-shirt', name: 'Chain Shirt', type: 'armor', category: 'medium-armor', value: 50, weight: 20, armorClass: 13 },
    { key: 'chain-mail', name: 'Chain Mail', type: 'armor', category: 'heavy-armor', value: 75, weight: 55, armorClass: 16, stealthDisadvantage: true },
    { key: 'plate-armor', name: 'Plate Armor', type: 'armor', category: 'heavy-armor', value: 1500, weight: 65, armorClass: 18, stealthDisadvantage: true }
];

// ═══════════════════════════════════════════════════════════════════════════
// POTIONS AND GEAR
// ═══════════════════════════════════════════════════════════════════════════

const CONSUMABLES_AND_GEAR: ItemTemplateInput[] = [
    { key: 'potion-of-healing', name: 'Potion of Healing', type: 'equipment', category: 'potion', value: 50, weight: 0.5 },
    { key: 'potion-of-climbing', name: 'Potion of Climbing', type: 'equipment', category: 'potion', value: 180, weight: 0.5 },
    { key: 'rope-hempen-50-feet', name: 'Rope, hempen (50 feet)', type: 'equipment', category: 'adventuring-gear', value: 1, weight: 10 },
    { key: 'torch', name: 'Torch', type: 'equipment', category: 'adventuring-gear', value: 1, valueUnit: 'cp', weight: 1 },
    { key: 'crowbar', name: 'Crowbar', type: 'equipment', category: 'adventuring-gear', value: 2, weight: 5 }
];

export const ITEM_CATALOG: ItemTemplateInput[] = [
    ...WEAPONS,
    ...ARMOR,
    ...CONSUMABLES_AND_GEAR
];
