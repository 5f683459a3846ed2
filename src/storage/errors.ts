export type CatalogErrorCode = 'MONSTER_NOT_FOUND' | 'ITEM_NOT_FOUND';

/**
 * Raised by catalog lookups for keys the catalog does not hold
 */
export class CatalogError extends Error {
    constructor(
        public readonly code: CatalogErrorCode,
        public readonly key: string
    ) {
        super(code === 'MONSTER_NOT_FOUND'
            ? `Monster not found in catalog: ${key}`
            : `Item not found in catalog: ${key}`);
        this.name = 'CatalogError';
    }
}
