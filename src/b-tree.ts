import { TreeLogger } from "./logger";
import { Entry, TreeNode } from "./nodes";
import { Comparator, rank } from "./rank";

/** Minimum degree used when none is given */
export const DefaultMinDegree = 4;

/**
 * Represents a classical in-memory B-tree (entries in every node, not just the leaves).
 * Every non-root node holds between d - 1 and 2d - 1 entries, where d is the minimum degree, and all leaves sit at the same depth.
 * Splits happen on the way back up from an insertion; deletion rotates or merges children on the way down so it never has to climb back up.
 * Not safe for concurrent mutation.
 * @template TKey The type of keys, ordered by the comparison function.
 * @template TValue The type of the stored values.  Opaque to the tree.
 */
export class BTree<TKey, TValue> {
	private _root = new TreeNode<TKey, TValue>();
	private _size = 0;
	private _height = 0;
	private readonly keyCompare: Comparator<TKey> = (a, b) => this.compareKeys(a, b);

	/**
	 * @param [minDegree=DefaultMinDegree] the minimum number of children of a non-root branch; an integer of at least 2.
	 * @param [compare=(a: TKey, b: TKey) => a < b ? -1 : a > b ? 1 : 0] a comparison function for keys.  The default uses < and > operators.
	 * @param logger optional sink for structural events (splits, rotations, merges).
	 */
	constructor(
		public readonly minDegree = DefaultMinDegree,
		private readonly compare: Comparator<TKey> = (a: TKey, b: TKey) => a < b ? -1 : a > b ? 1 : 0,
		private readonly logger?: TreeLogger,
	) {
		if (!Number.isInteger(minDegree) || minDegree < 2) {
			throw new Error("Minimum degree must be an integer of at least 2");
		}
	}

	/** Most entries a node may hold (2d - 1) */
	get maxEntries() {
		return 2 * this.minDegree - 1;
	}

	/** Fewest entries a non-root node may hold (d - 1) */
	get minEntries() {
		return this.minDegree - 1;
	}

	/** @returns the number of stored entries */
	size(): number {
		return this._size;
	}

	/** @returns number of edges from the root to any leaf; 0 while the root is the only node */
	height(): number {
		return this._height;
	}

	/** @returns the value stored for the given key; undefined if not found. */
	get(key: TKey): TValue | undefined {
		return this.findEntry(this._root, key)?.value;
	}

	/** @returns true if an entry with the given key exists, even one holding undefined. */
	has(key: TKey): boolean {
		return this.findEntry(this._root, key) !== undefined;
	}

	/**
	 * Adds an entry.  Existing keys are not checked for: inserting a key that is already present stores a second entry
	 * and grows the size.  Use upsert to overwrite instead.
	 */
	insert(key: TKey, value: TValue) {
		const split = this.internalInsert(this._root, new Entry(key, value), this._height);
		if (split) {
			this._root = new TreeNode([split.entry], [split.left, this._root]);
			++this._height;
			this.logger?.debug("root.grow", { height: this._height });
		}
		++this._size;
	}

	/** Overwrites the value of an existing key.  Does nothing if the key is absent. */
	update(key: TKey, value: TValue) {
		const entry = this.findEntry(this._root, key);
		if (entry) {
			entry.value = value;
		}
	}

	/** Overwrites the value if the key exists; inserts it otherwise. */
	upsert(key: TKey, value: TValue) {
		const entry = this.findEntry(this._root, key);
		if (entry) {
			entry.value = value;
		} else {
			this.insert(key, value);
		}
	}

	/**
	 * Removes the entry with the given key.
	 * Even when the key is absent, the children visited on the way down may have been rebalanced.
	 * @returns the removed value; undefined if the key wasn't found.
	 */
	delete(key: TKey): TValue | undefined {
		const removed = this.internalDelete(this._root, key, this._height);
		if (!removed) {
			return undefined;
		}
		--this._size;
		return removed.value;
	}

	/** Drops all entries. */
	clear() {
		this._root = new TreeNode();
		this._size = 0;
		this._height = 0;
	}

	/** @returns a snapshot of all key/value pairs in ascending key order. */
	entries(): [key: TKey, value: TValue][] {
		const result: [key: TKey, value: TValue][] = [];
		this.collect(this._root, result);
		return result;
	}

	/** In-order "key:value" pairs, followed by the entry count and height on their own lines.  For debugging only. */
	toString(): string {
		const pairs = this.entries().map(([key, value]) => `${key}:${value}`).join(" ");
		return `${pairs}\ncount: ${this._size}\nheight: ${this._height}`;
	}

	/** Walks the whole tree, throwing on the first broken invariant.  O(n); meant for tests and diagnostics. */
	checkValid() {
		const count = this.checkNode(this._root, this._height, undefined, undefined);
		if (count !== this._size) {
			throw new Error(`Size mismatch: counted ${count} entries, size is ${this._size}`);
		}
	}

	/**
	 * Three-way comparison through the user's function, checked for symmetry: a non-zero result must flip sign when the operands swap.
	 * Called on every step of every search.  Subclasses that trust their comparator may override this to skip the second call.
	 */
	protected compareKeys(a: TKey, b: TKey): number {
		const result = this.compare(a, b);
		if (result !== 0 && result === this.compare(b, a)) {
			throw new Error("Inconsistent comparison function for given values");
		}
		return result;
	}

	private findEntry(node: TreeNode<TKey, TValue>, key: TKey): Entry<TKey, TValue> | undefined {
		const [on, index] = rank(node.entries, key, this.keyCompare);
		if (on) {
			return node.entries[index];
		}
		return node.isLeaf ? undefined : this.findEntry(node.children[index], key);
	}

	private internalInsert(node: TreeNode<TKey, TValue>, entry: Entry<TKey, TValue>, height: number): Split<TKey, TValue> | undefined {
		const [, index] = rank(node.entries, entry.key, this.keyCompare);
		if (height === 0) {
			node.insertEntry(index, entry);
		} else {
			const split = this.internalInsert(node.children[index], entry, height - 1);
			if (!split) {
				return undefined;
			}
			// The child kept the upper half, so the new left part goes in front of it
			node.insertEntry(index, split.entry);
			node.insertChild(index, split.left);
		}
		return this.split(node, height);
	}

	/** Splits an overflowing node around its middle entry.  The node keeps the upper part; the lower part becomes a new left sibling. */
	private split(node: TreeNode<TKey, TValue>, height: number): Split<TKey, TValue> | undefined {
		if (node.count <= this.maxEntries) {
			return undefined;
		}

		const middle = this.maxEntries >>> 1;
		const childCount = node.isLeaf ? 0 : middle + 1;
		const left = new TreeNode(node.entries.splice(0, middle), node.children.splice(0, childCount));
		const entry = node.removeEntry(0);
		this.logger?.debug("split", { height, left: left.count, right: node.count });
		return new Split(entry, left);
	}

	private internalDelete(node: TreeNode<TKey, TValue>, key: TKey, height: number): Entry<TKey, TValue> | undefined {
		const [on, index] = rank(node.entries, key, this.keyCompare);
		if (height === 0) {
			return on ? node.removeEntry(index) : undefined;
		}

		if (on) {	// Replace with predecessor, then go remove the predecessor from the left subtree
			const target = node.entries[index];
			const predecessor = this.lastEntry(node.children[index]);
			node.entries[index] = predecessor;
			this.internalDelete(this.reinforceFromRight(node, index), predecessor.key, height - 1);
			return target;
		}

		if (index === node.count) {
			return this.internalDelete(this.reinforceFromLeft(node, index), key, height - 1);
		}
		if (index === 0) {
			return this.internalDelete(this.reinforceFromRight(node, index), key, height - 1);
		}
		return this.internalDelete(this.reinforce(node, index), key, height - 1);
	}

	private hasSpare(node: TreeNode<TKey, TValue>) {
		return node.count > this.minEntries;
	}

	/** Ensures child at index has a spare entry using only its right sibling.
	 * @returns the node to descend into */
	private reinforceFromRight(parent: TreeNode<TKey, TValue>, index: number): TreeNode<TKey, TValue> {
		const child = parent.children[index];
		if (this.hasSpare(child)) {
			return child;
		}
		if (this.hasSpare(parent.children[index + 1])) {
			this.rotateLeft(parent, index);
			return child;
		}
		return this.merge(parent, index);
	}

	/** Ensures the last child (at index) has a spare entry using its left sibling.
	 * @returns the node to descend into */
	private reinforceFromLeft(parent: TreeNode<TKey, TValue>, index: number): TreeNode<TKey, TValue> {
		const child = parent.children[index];
		if (this.hasSpare(child)) {
			return child;
		}
		if (this.hasSpare(parent.children[index - 1])) {
			this.rotateRight(parent, index - 1);
			return child;
		}
		return this.merge(parent, index - 1);
	}

	/** Ensures an inner child has a spare entry: borrow right, else borrow left, else merge right.
	 * @returns the node to descend into */
	private reinforce(parent: TreeNode<TKey, TValue>, index: number): TreeNode<TKey, TValue> {
		const child = parent.children[index];
		if (this.hasSpare(child)) {
			return child;
		}
		if (this.hasSpare(parent.children[index + 1])) {
			this.rotateLeft(parent, index);
			return child;
		}
		if (this.hasSpare(parent.children[index - 1])) {
			this.rotateRight(parent, index - 1);
			return child;
		}
		return this.merge(parent, index);
	}

	/** Moves the separator at index down to the end of the left child, and the right child's first entry up to replace it. */
	private rotateLeft(parent: TreeNode<TKey, TValue>, index: number) {
		const left = parent.children[index];
		const right = parent.children[index + 1];
		left.insertEntry(left.count, parent.entries[index]);
		if (!right.isLeaf) {
			left.insertChild(left.children.length, right.removeChild(0));
		}
		parent.entries[index] = right.removeEntry(0);
		this.logger?.debug("rotate.left", { index });
	}

	/** Moves the separator at index down to the front of the right child, and the left child's last entry up to replace it. */
	private rotateRight(parent: TreeNode<TKey, TValue>, index: number) {
		const left = parent.children[index];
		const right = parent.children[index + 1];
		right.insertEntry(0, parent.entries[index]);
		if (!left.isLeaf) {
			right.insertChild(0, left.removeChild(left.children.length - 1));
		}
		parent.entries[index] = left.removeEntry(left.count - 1);
		this.logger?.debug("rotate.right", { index });
	}

	/** Pulls the separator at index and the whole left child into the right child; the left child is discarded.
	 * @returns the merged node, which replaces the root if the root was emptied. */
	private merge(parent: TreeNode<TKey, TValue>, index: number): TreeNode<TKey, TValue> {
		const left = parent.children[index];
		const right = parent.children[index + 1];
		right.absorbLeft(left, parent.removeEntry(index));
		parent.removeChild(index);
		this.logger?.debug("merge", { index, count: right.count });

		if (parent.count === 0 && parent === this._root) {
			this._root = right;
			--this._height;
			this.logger?.debug("root.shrink", { height: this._height });
		}
		return right;
	}

	private lastEntry(node: TreeNode<TKey, TValue>): Entry<TKey, TValue> {
		while (!node.isLeaf) {
			node = node.children[node.count];
		}
		return node.entries[node.count - 1];
	}

	private collect(node: TreeNode<TKey, TValue>, result: [key: TKey, value: TValue][]) {
		node.entries.forEach((entry, i) => {
			if (!node.isLeaf) {
				this.collect(node.children[i], result);
			}
			result.push([entry.key, entry.value]);
		});
		if (!node.isLeaf) {
			this.collect(node.children[node.count], result);
		}
	}

	/** @returns the number of entries in the subtree */
	private checkNode(
		node: TreeNode<TKey, TValue>,
		height: number,
		low: Entry<TKey, TValue> | undefined,
		high: Entry<TKey, TValue> | undefined,
	): number {
		const isRoot = node === this._root;
		if (node.count > this.maxEntries) {
			throw new Error(`Node overflow: ${node.count} entries at height ${height}`);
		}
		if (!isRoot && node.count < this.minEntries) {
			throw new Error(`Node underflow: ${node.count} entries at height ${height}`);
		}
		if (height === 0) {
			if (!node.isLeaf) {
				throw new Error("Branch found at leaf depth");
			}
		} else {
			if (node.count === 0) {
				throw new Error(`Empty branch at height ${height}`);
			}
			if (node.children.length !== node.count + 1) {
				throw new Error(`Child count mismatch: ${node.children.length} children for ${node.count} entries at height ${height}`);
			}
		}

		let prior = low;
		for (const entry of node.entries) {
			if (prior && this.compareKeys(prior.key, entry.key) >= 0) {
				throw new Error(`Order violation: ${prior.key} is not less than ${entry.key}`);
			}
			prior = entry;
		}
		if (prior && high && this.compareKeys(prior.key, high.key) >= 0) {
			throw new Error(`Order violation: ${prior.key} is not less than ${high.key}`);
		}

		let count = node.count;
		if (height > 0) {
			node.children.forEach((child, i) => {
				count += this.checkNode(child, height - 1, i === 0 ? low : node.entries[i - 1], i === node.count ? high : node.entries[i]);
			});
		}
		return count;
	}
}

/** Result of splitting a node: the entry handed up to the parent and the new sibling to its left. */
class Split<TKey, TValue> {
	constructor(
		public entry: Entry<TKey, TValue>,
		public left: TreeNode<TKey, TValue>,
	) { }
}
