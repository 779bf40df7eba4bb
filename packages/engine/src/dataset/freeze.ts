/**
 * @fileoverview Read-only collections
 *
 * Object.freeze does not stop Map.set or Set.add, so the dataset uses
 * subclasses whose mutators throw once construction is done.
 *
 * @module @resistome/engine/dataset/freeze
 */

export class FrozenMap<K, V> extends Map<K, V> {
    private sealed: boolean;

    constructor(entries: Iterable<readonly [K, V]> = []) {
        super(entries);
        this.sealed = true;
    }

    override set(key: K, value: V): this {
        if (this.sealed) {
            throw new TypeError("Cannot modify a frozen map");
        }
        return super.set(key, value);
    }

    override delete(_key: K): boolean {
        throw new TypeError("Cannot modify a frozen map");
    }

    override clear(): void {
        throw new TypeError("Cannot modify a frozen map");
    }
}

export class FrozenSet<T> extends Set<T> {
    private sealed: boolean;

    constructor(values: Iterable<T> = []) {
        super(values);
        this.sealed = true;
    }

    override add(value: T): this {
        if (this.sealed) {
            throw new TypeError("Cannot modify a frozen set");
        }
        return super.add(value);
    }

    override delete(_value: T): boolean {
        throw new TypeError("Cannot modify a frozen set");
    }

    override clear(): void {
        throw new TypeError("Cannot modify a frozen set");
    }
}

/**
 * Freeze an object graph in place. Map and Set contents are frozen too,
 * but the collections themselves must already be FrozenMap / FrozenSet.
 */
export function deepFreeze<T>(value: T, seen: WeakSet<object> = new WeakSet()): T {
    if (typeof value !== "object" || value === null || seen.has(value)) {
        return value;
    }
    seen.add(value);

    if (value instanceof Map) {
        for (const [key, entry] of value) {
            deepFreeze(key, seen);
            deepFreeze(entry, seen);
        }
    }
    else if (value instanceof Set) {
        for (const entry of value) {
            deepFreeze(entry, seen);
        }
    }
    else {
        for (const entry of Object.values(value)) {
            deepFreeze(entry, seen);
        }
    }

    return Object.freeze(value);
}
