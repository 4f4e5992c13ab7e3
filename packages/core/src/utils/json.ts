import { type JsonValue, type SessionState } from '../entities/session';

/**
 * Returns the path of the first value that is not strictly JSON-serializable
 * (functions, class instances, undefined, Sets, Maps, non-finite numbers...),
 * or null when the whole value is valid.
 */
export function findNonJsonPath(path: string, value: unknown): string | null {
    if (value === null) return null;
    const t = typeof value;
    if (t === 'string' || t === 'boolean') return null;
    if (t === 'number') return Number.isFinite(value) ? null : path;
    if (Array.isArray(value)) {
        for (let i = 0; i < value.length; i++) {
            const bad = findNonJsonPath(`${path}[${i}]`, value[i]);
            if (bad !== null) return bad;
        }
        return null;
    }
    if (typeof value === 'object' && isPlainObject(value)) {
        for (const [k, v] of Object.entries(value)) {
            const bad = findNonJsonPath(`${path}.${k}`, v);
            if (bad !== null) return bad;
        }
        return null;
    }
    return path;
}

export function isJsonValue(value: unknown): value is JsonValue {
    return findNonJsonPath('$', value) === null;
}

export function isSessionState(value: unknown): value is SessionState {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && isJsonValue(value);
}

function isPlainObject(value: object): boolean {
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}
