/**
 * Whether `JSON.stringify` would render the value faithfully: nothing dropped
 * silently apart from `undefined` object members, and no throw.
 */
export function isJsonSerializable(value: unknown): boolean {
    return checkSerializable(value, new Set<object>());
}

function checkSerializable(value: unknown, seen: Set<object>): boolean {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') return true;
    if (typeof value === 'number') return Number.isFinite(value);
    // undefined, bigint, symbol, function
    if (typeof value !== 'object' || value === null) return false;

    if (value instanceof Date) return !Number.isNaN(value.getTime());
    if (seen.has(value)) return false;
    seen.add(value);

    try {
        if (Array.isArray(value)) {
            return value.every(item => checkSerializable(item, seen));
        }
        if (!isPlainObject(value)) return false;
        return Object.values(value).every(member => member === undefined || checkSerializable(member, seen));
    } finally {
        seen.delete(value);
    }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}
