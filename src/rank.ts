import { Entry } from "./nodes";

export type Comparator<TKey> = (a: TKey, b: TKey) => number;

/** Binary search over a node's entries.
 * @returns on = true with the index of a matching entry, or on = false with the index the key would be inserted at
 * 	(the count of entries less than the key). */
export function rank<TKey>(entries: readonly Entry<TKey, unknown>[], key: TKey, compare: Comparator<TKey>): [on: boolean, index: number] {
	let lo = 0;
	let hi = entries.length - 1;
	let split = 0;
	let result = -1;

	while (lo <= hi) {
		split = (lo + hi) >>> 1;
		result = compare(key, entries[split].key);

		if (result === 0)
			return [true, split];
		else if (result < 0)
			hi = split - 1;
		else
			lo = split + 1;
	}

	return [false, lo];
}
