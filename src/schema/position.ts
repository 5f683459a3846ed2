import { z } from 'zod';

/**
 * Integer grid coordinate. Validity is relative to a room, not to the schema.
 */
export const PositionSchema = z.object({
    x: z.number().int(),
    y: z.number().int()
});
export type Position = z.infer<typeof PositionSchema>;

export function positionKey(position: Position): string {
    return `${position.x},${position.y}`;
}

export function samePosition(a: Position, b: Position): boolean {
    return a.x === b.x && a.y === b.y;
}
