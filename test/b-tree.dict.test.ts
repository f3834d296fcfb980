import { BTree } from '../src';

describe.each([2, 3, 4, 7])('BTree of minimum degree %i', (minDegree) => {
	const count = 1000;
	let tree: BTree<number, string>;

	beforeEach(() => {
		tree = new BTree<number, string>(minDegree);
	});

	it('build and gut a large tree randomly', () => {
		addRandom(0, count - 1);
		expect(tree.size()).toBe(count);
		expect(tree.entries()).toStrictEqual([...Array(count).keys()].map(i => [i, i.toString()]));
		deleteRandom(0, count - 1);
		expect(tree.size()).toBe(0);
		expect(tree.height()).toBe(0);
	});

	it('keeps other keys intact while deleting', () => {
		addRandom(0, count - 1);
		const evens = [...Array(count / 2).keys()].map(i => i * 2);
		for (const n of evens) {
			expect(tree.delete(n)).toBe(n.toString());
			expect(tree.get(n)).toBeUndefined();
		}
		tree.checkValid();
		expect(tree.size()).toBe(count / 2);
		for (let n = 0; n < count; ++n) {
			expect(tree.get(n)).toBe(n % 2 ? n.toString() : undefined);
		}
	});

	it('build ascending and gut from the left', () => {
		addRange(0, count);
		tree.checkValid();
		for (let n = 0; n < count; ++n) {
			expect(tree.delete(n)).toBe(n.toString());
			tree.checkValid();
		}
		expect(tree.size()).toBe(0);
	});

	it('build descending and gut from the right', () => {
		addRange(count - 1, -count);
		tree.checkValid();
		for (let n = count - 1; n >= 0; --n) {
			expect(tree.delete(n)).toBe(n.toString());
			tree.checkValid();
		}
		expect(tree.size()).toBe(0);
	});

	it('height stays logarithmic', () => {
		addRange(0, count);
		// Every non-root node has at least minDegree children
		expect(tree.height()).toBeLessThanOrEqual(Math.floor(Math.log((count + 1) / 2) / Math.log(minDegree)));
	});

	it('reflects updates after reshaping', () => {
		addRandom(0, count - 1);
		for (let n = 0; n < count; n += 3) {
			tree.update(n, `u${n}`);
		}
		deleteRange(1, count / 2);
		for (let n = count / 2 + 1; n < count; ++n) {
			expect(tree.get(n)).toBe(n % 3 ? n.toString() : `u${n}`);
		}
		tree.checkValid();
	});

	function addRandom(start: number, end: number) {
		const range = [...Array(end - start + 1).keys()].map(i => i + start);
		while (range.length) {
			const index = Math.floor(Math.random() * range.length);
			const n = range.splice(index, 1)[0];
			tree.insert(n, n.toString());
			tree.checkValid();
		}
	}

	function deleteRandom(start: number, end: number) {
		const range = [...Array(end - start + 1).keys()].map(i => i + start);
		while (range.length) {
			const index = Math.floor(Math.random() * range.length);
			const n = range.splice(index, 1)[0];
			if (tree.delete(n) !== n.toString()) {
				throw new Error("Failed to delete " + n);
			}
			tree.checkValid();
		}
	}

	function addRange(starting: number, count: number) {
		const s = Math.sign(count);
		for (let i = 0; i !== count; i += s) {
			tree.insert(starting + i, (starting + i).toString());
		}
	}

	function deleteRange(starting: number, count: number) {
		for (let i = 0; i < count; ++i) {
			tree.delete(starting + i);
		}
	}
});
