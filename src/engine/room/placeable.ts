import { EntityKind, Placeable } from '../../schema/entities.js';
import { Position } from '../../schema/position.js';

// Uniform identity/position access over the closed entity union

export function getId(entity: Placeable): string {
    return entity.id;
}

export function getPosition(entity: Placeable): Position {
    return { ...entity.position };
}

export function setPosition(entity: Placeable, position: Position): void {
    entity.position = { x: position.x, y: position.y };
}

export function getCellType(entity: Placeable): EntityKind {
    return entity.kind;
}

export function describeEntity(entity: Placeable): string {
    return `${entity.kind} "${entity.name}" (${entity.id})`;
}
