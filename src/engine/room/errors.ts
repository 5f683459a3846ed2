/**
 * Error kinds raised by room, placement and encounter operations.
 *
 * Not-found during removal and cleanup is reported through return values,
 * never through these errors.
 */
export type RoomErrorCode =
    | 'NIL_ROOM'
    | 'INVALID_POSITION'
    | 'CELL_OCCUPIED'
    | 'NO_EMPTY_POSITIONS'
    | 'ENTITY_NOT_FOUND'
    | 'DUPLICATE_ENTITY_ID'
    | 'INVALID_DIMENSIONS'
    | 'INVALID_DIFFICULTY'
    | 'EMPTY_PARTY'
    | 'MALFORMED_CONFIG'
    | 'UNSUPPORTED_ENTITY_TYPE'
    | 'INSUFFICIENT_SPACE';

const DEFAULT_MESSAGES: Record<RoomErrorCode, string> = {
    NIL_ROOM: 'room is nil',
    INVALID_POSITION: 'position is outside room boundaries',
    CELL_OCCUPIED: 'cell is already occupied',
    NO_EMPTY_POSITIONS: 'no empty positions available in room',
    ENTITY_NOT_FOUND: 'entity not found in room',
    DUPLICATE_ENTITY_ID: 'entity ID is already in room',
    INVALID_DIMENSIONS: 'room dimensions must be positive integers',
    INVALID_DIFFICULTY: 'invalid encounter difficulty',
    EMPTY_PARTY: 'party cannot be empty',
    MALFORMED_CONFIG: 'malformed placement config',
    UNSUPPORTED_ENTITY_TYPE: 'unsupported entity type',
    INSUFFICIENT_SPACE: 'not enough space in room'
};

export class RoomError extends Error {
    constructor(
        public readonly code: RoomErrorCode,
        message: string = DEFAULT_MESSAGES[code],
        public readonly details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'RoomError';
    }

    toString(): string {
        return `${this.name} [${this.code}]: ${this.message}`;
    }
}

export function isRoomError(error: unknown, code?: RoomErrorCode): error is RoomError {
    return error instanceof RoomError && (code === undefined || error.code === code);
}
