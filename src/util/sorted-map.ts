/**
 * @file sorted-map.ts
 * @description Red-black tree backed SortedMap<K,V> used for the address
 * indices of the record store.
 *
 * Keys are never removed: an address, once known, stays known for the whole
 * run.  Supported operations:
 *   - O(log n) insert, replace, get, floor (greatest key ≤ k), higher (least
 *     key > k)
 *   - In-order iteration of entries, keys and values
 *
 * Red-black invariants maintained after every insert:
 *   1. Every node is red or black.
 *   2. The root is black.
 *   3. A red node has no red child.
 *   4. Every path from a node down to a missing child has the same number of
 *      black nodes.
 */

// ---------------------------------------------------------------------------
// Internal node type
// ---------------------------------------------------------------------------

const enum Color {
  RED = 0,
  BLACK = 1,
}

class RBNode<K, V> {
  color: Color = Color.RED;
  left: RBNode<K, V> | null = null;
  right: RBNode<K, V> | null = null;
  parent: RBNode<K, V> | null = null;

  constructor(
    readonly key: K,
    public value: V,
  ) {}
}

function isRed<K, V>(node: RBNode<K, V> | null): boolean {
  return node !== null && node.color === Color.RED;
}

function subtreeMin<K, V>(node: RBNode<K, V>): RBNode<K, V> {
  while (node.left !== null) {
    node = node.left;
  }
  return node;
}

/** In-order successor.  Returns null when node is the maximum. */
function successor<K, V>(node: RBNode<K, V>): RBNode<K, V> | null {
  if (node.right !== null) {
    return subtreeMin(node.right);
  }
  let child = node;
  let p = node.parent;
  while (p !== null && child === p.right) {
    child = p;
    p = p.parent;
  }
  return p;
}

// ---------------------------------------------------------------------------
// SortedMap<K, V>
// ---------------------------------------------------------------------------

/** Comparator function: negative ⇒ a < b, 0 ⇒ equal, positive ⇒ a > b. */
export type Comparator<T> = (a: T, b: T) => number;

/** Natural order of numeric keys. */
export const numericOrder: Comparator<number> = (a, b) => a - b;

/**
 * A sorted map with unique keys and no removal.  Inserting an existing key is
 * rejected and leaves the stored value untouched, the same first-writer-wins
 * rule the record store applies to addresses.
 */
export class SortedMap<K, V> {
  private root: RBNode<K, V> | null = null;
  private count = 0;
  private readonly cmp: Comparator<K>;

  constructor(comparator: Comparator<K>) {
    this.cmp = comparator;
  }

  /** Number of entries. */
  get size(): number {
    return this.count;
  }

  /** True when the map holds no entries. */
  get empty(): boolean {
    return this.count === 0;
  }

  // -- Lookup -------------------------------------------------------------

  private findNode(key: K): RBNode<K, V> | null {
    let node = this.root;
    while (node !== null) {
      const c = this.cmp(key, node.key);
      if (c < 0) {
        node = node.left;
      } else if (c > 0) {
        node = node.right;
      } else {
        return node;
      }
    }
    return null;
  }

  /** Value stored under `key`, or undefined. */
  get(key: K): V | undefined {
    return this.findNode(key)?.value;
  }

  has(key: K): boolean {
    return this.findNode(key) !== null;
  }

  /**
   * Entry with the greatest key ≤ `key`, or undefined when every key is
   * greater.
   */
  floor(key: K): [K, V] | undefined {
    let node = this.root;
    let result: RBNode<K, V> | null = null;
    while (node !== null) {
      const c = this.cmp(key, node.key);
      if (c < 0) {
        node = node.left;
      } else {
        // node.key <= key: candidate
        result = node;
        if (c === 0) break;
        node = node.right;
      }
    }
    return result === null ? undefined : [result.key, result.value];
  }

  /**
   * Entry with the least key > `key`, or undefined when no key is greater.
   * Equivalent to dereferencing C++ `std::map::upper_bound`.
   */
  higher(key: K): [K, V] | undefined {
    let node = this.root;
    let result: RBNode<K, V> | null = null;
    while (node !== null) {
      if (this.cmp(key, node.key) < 0) {
        // node.key > key: candidate
        result = node;
        node = node.left;
      } else {
        node = node.right;
      }
    }
    return result === null ? undefined : [result.key, result.value];
  }

  // -- Modifiers ----------------------------------------------------------

  /**
   * Add `key` → `value`.
   * @returns true if the entry was added, false if the key already existed
   */
  insert(key: K, value: V): boolean {
    let parent: RBNode<K, V> | null = null;
    let node = this.root;
    let c = 0;
    while (node !== null) {
      parent = node;
      c = this.cmp(key, node.key);
      if (c < 0) {
        node = node.left;
      } else if (c > 0) {
        node = node.right;
      } else {
        return false;
      }
    }

    const z = new RBNode(key, value);
    z.parent = parent;
    if (parent === null) {
      this.root = z;
    } else if (c < 0) {
      parent.left = z;
    } else {
      parent.right = z;
    }
    this.count++;
    this.insertFixup(z);
    return true;
  }

  /**
   * Store `value` under an existing `key`.
   * @returns false, changing nothing, if the key is absent
   */
  replace(key: K, value: V): boolean {
    const node = this.findNode(key);
    if (node === null) return false;
    node.value = value;
    return true;
  }

  // -- ES iteration -------------------------------------------------------

  /** Iterate `[key, value]` pairs in key order. */
  *entries(): IterableIterator<[K, V]> {
    let node = this.root === null ? null : subtreeMin(this.root);
    while (node !== null) {
      yield [node.key, node.value];
      node = successor(node);
    }
  }

  *keys(): IterableIterator<K> {
    for (const [k] of this.entries()) yield k;
  }

  *values(): IterableIterator<V> {
    for (const [, v] of this.entries()) yield v;
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  // -- Red-black tree internals -------------------------------------------

  private rotateLeft(x: RBNode<K, V>): void {
    const y = x.right;
    if (y === null) return;
    x.right = y.left;
    if (y.left !== null) {
      y.left.parent = x;
    }
    y.parent = x.parent;
    if (x.parent === null) {
      this.root = y;
    } else if (x === x.parent.left) {
      x.parent.left = y;
    } else {
      x.parent.right = y;
    }
    y.left = x;
    x.parent = y;
  }

  private rotateRight(x: RBNode<K, V>): void {
    const y = x.left;
    if (y === null) return;
    x.left = y.right;
    if (y.right !== null) {
      y.right.parent = x;
    }
    y.parent = x.parent;
    if (x.parent === null) {
      this.root = y;
    } else if (x === x.parent.right) {
      x.parent.right = y;
    } else {
      x.parent.left = y;
    }
    y.right = x;
    x.parent = y;
  }

  /** Restore red-black properties after insertion. */
  private insertFixup(z: RBNode<K, V>): void {
    let parent = z.parent;
    while (parent !== null && parent.color === Color.RED) {
      // A red parent is never the root, so the grandparent exists.
      const grand = parent.parent;
      if (grand === null) break;
      if (parent === grand.left) {
        const uncle = grand.right;
        if (uncle !== null && isRed(uncle)) {
          parent.color = Color.BLACK;
          uncle.color = Color.BLACK;
          grand.color = Color.RED;
          z = grand;
        } else {
          if (z === parent.right) {
            z = parent;
            this.rotateLeft(z);
          }
          const p = z.parent;
          if (p === null || p.parent === null) break;
          p.color = Color.BLACK;
          p.parent.color = Color.RED;
          this.rotateRight(p.parent);
        }
      } else {
        const uncle = grand.left;
        if (uncle !== null && isRed(uncle)) {
          parent.color = Color.BLACK;
          uncle.color = Color.BLACK;
          grand.color = Color.RED;
          z = grand;
        } else {
          if (z === parent.left) {
            z = parent;
            this.rotateRight(z);
          }
          const p = z.parent;
          if (p === null || p.parent === null) break;
          p.color = Color.BLACK;
          p.parent.color = Color.RED;
          this.rotateLeft(p.parent);
        }
      }
      parent = z.parent;
    }
    if (this.root !== null) {
      this.root.color = Color.BLACK;
    }
  }

  /** @internal Verify the tree invariants; returns the black height. */
  checkInvariants(): number {
    if (isRed(this.root)) throw new Error('red root');
    const walk = (node: RBNode<K, V> | null): number => {
      if (node === null) return 1;
      if (isRed(node) && (isRed(node.left) || isRed(node.right))) {
        throw new Error('red node with red child');
      }
      const lh = walk(node.left);
      const rh = walk(node.right);
      if (lh !== rh) throw new Error('unequal black height');
      return lh + (node.color === Color.BLACK ? 1 : 0);
    };
    return walk(this.root);
  }
}
