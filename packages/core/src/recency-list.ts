type Node<K> = {
  key: K;
  prev: Node<K> | null;
  next: Node<K> | null;
};

/**
 * Keys ordered by last access: the head is the least recently used, the tail
 * the most recently used. Every operation is O(1).
 */
export class RecencyList<K> {
  private head: Node<K> | null = null;

  private tail: Node<K> | null = null;

  private readonly nodes = new Map<K, Node<K>>();

  get size(): number {
    return this.nodes.size;
  }

  has(key: K): boolean {
    return this.nodes.has(key);
  }

  /** Mark `key` as most recently used, inserting it if absent. */
  touch(key: K): void {
    const existing = this.nodes.get(key);
    if (existing) {
      this.unlink(existing);
      this.append(existing);
      return;
    }
    const node: Node<K> = { key, prev: null, next: null };
    this.nodes.set(key, node);
    this.append(node);
  }

  /** Returns true if the key was present. */
  remove(key: K): boolean {
    const node = this.nodes.get(key);
    if (!node) return false;
    this.unlink(node);
    this.nodes.delete(key);
    return true;
  }

  /** The least recently used key, or null when empty. */
  oldest(): K | null {
    return this.head ? this.head.key : null;
  }

  /** Keys from least to most recently used. */
  keys(): K[] {
    const result: K[] = [];
    for (let node = this.head; node; node = node.next) {
      result.push(node.key);
    }
    return result;
  }

  clear(): void {
    this.nodes.clear();
    this.head = null;
    this.tail = null;
  }

  private append(node: Node<K>): void {
    node.prev = this.tail;
    node.next = null;
    if (this.tail) {
      this.tail.next = node;
    } else {
      this.head = node;
    }
    this.tail = node;
  }

  private unlink(node: Node<K>): void {
    if (node.prev) node.prev.next = node.next;
    if (node.next) node.next.prev = node.prev;
    if (this.head === node) this.head = node.next;
    if (this.tail === node) this.tail = node.prev;
    node.prev = null;
    node.next = null;
  }
}
