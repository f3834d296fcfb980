export class Entry<TKey, TValue> {
	constructor(
		public readonly key: TKey,
		public value: TValue,
	) { }
}

/**
 * A tree node.  Entries are kept in ascending key order; an internal node has exactly one more child than it has entries,
 * a leaf has no children.  Nodes own their children exclusively - anything moved between nodes is removed from its source first.
 */
export class TreeNode<TKey, TValue> {
	constructor(
		public entries: Entry<TKey, TValue>[] = [],
		public children: TreeNode<TKey, TValue>[] = [],	// children[i] holds keys between entries[i - 1] and entries[i]
	) { }

	get isLeaf() {
		return this.children.length === 0;
	}

	get count() {
		return this.entries.length;
	}

	insertEntry(index: number, entry: Entry<TKey, TValue>) {
		if (index < 0 || index > this.entries.length) {
			throw new Error(`Entry insert index out of range: ${index}`);
		}
		this.entries.splice(index, 0, entry);
	}

	removeEntry(index: number): Entry<TKey, TValue> {
		if (index < 0 || index >= this.entries.length) {
			throw new Error(`Entry remove index out of range: ${index}`);
		}
		return this.entries.splice(index, 1)[0];
	}

	insertChild(index: number, child: TreeNode<TKey, TValue>) {
		if (index < 0 || index > this.children.length) {
			throw new Error(`Child insert index out of range: ${index}`);
		}
		this.children.splice(index, 0, child);
	}

	removeChild(index: number): TreeNode<TKey, TValue> {
		if (index < 0 || index >= this.children.length) {
			throw new Error(`Child remove index out of range: ${index}`);
		}
		return this.children.splice(index, 1)[0];
	}

	/** Moves all of sibling's entries and children, then the separator, in front of this node's own.  Sibling is left empty. */
	absorbLeft(sibling: TreeNode<TKey, TValue>, separator: Entry<TKey, TValue>) {
		this.entries.unshift(...sibling.entries.splice(0), separator);
		this.children.unshift(...sibling.children.splice(0));
	}
}
