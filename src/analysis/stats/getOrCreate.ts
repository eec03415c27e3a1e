/**
 * Return the entry stored under `key`, first storing a fresh one from `create`
 * when there is none
 */
export function getOrCreate<K, V>(map: Map<K, V>, key: K, create: (key: K) => V): V {
    const existing = map.get(key);
    if (existing !== undefined) {
        return existing;
    }

    const created = create(key);
    map.set(key, created);
    return created;
}
