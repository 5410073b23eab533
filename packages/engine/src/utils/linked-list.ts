import type { Logger } from 'winston';

/**
 * @private
 * Internal node class used by the eviction policies. Should not be used outside of tests.
 */
export class Node {
  prev: Node | null;

  next: Node | null;

  key: string;

  constructor(key: string, prev: Node | null = null, next: Node | null = null) {
    this.key = key;
    this.prev = prev;
    this.next = next;
  }
}

/**
 * Doubly linked list of unique keys, ordered from the oldest to the newest node. Every operation is O(1).
 */
export class LinkedList {
  private _newest: Node | null = null;

  private _oldest: Node | null = null;

  private _nodeMap: Map<string, Node> = new Map();

  private _logger: Logger;

  constructor(logger: Logger) {
    this._logger = logger;
  }

  get newest(): Node | null {
    return this._newest;
  }

  get oldest(): Node | null {
    return this._oldest;
  }

  get nodeMap(): Map<string, Node> {
    return this._nodeMap;
  }

  get size(): number {
    return this._nodeMap.size;
  }

  has(key: string): boolean {
    return this._nodeMap.has(key);
  }

  /**
   * Appends a new node at the newest end of the list.
   * @param key - The key the node will use.
   * @returns Whether the node has been added.
   */
  add(key: string): boolean {
    if (this._nodeMap.has(key)) return false;

    const node = new Node(key);

    // Link the current newest node to the new one. The first node is also the oldest one
    if (this._newest !== null) {
      this._newest.next = node;
      node.prev = this._newest;
    }

    this._newest = node;
    if (this._oldest === null) this._oldest = node;

    this._nodeMap.set(key, node);
    return true;
  }

  /**
   * Removes the node with the given key from the list.
   * @param key - The key of the node to remove.
   * @returns Whether the node has been removed.
   */
  remove(key: string): boolean {
    const node = this._nodeMap.get(key);
    if (node === undefined) return false;

    this._logger.debug(`Unlinking node ${key}`);
    // Plug the gap by linking the nodes before and after the removed one
    if (this._oldest === node) this._oldest = node.next;
    if (this._newest === node) this._newest = node.prev;
    if (node.prev !== null) node.prev.next = node.next;
    if (node.next !== null) node.next.prev = node.prev;
    node.prev = null;
    node.next = null;

    this._nodeMap.delete(key);
    return true;
  }

  /**
   * Moves a node to the newest end of the list.
   * @param key - The key of the node to move.
   * @returns Whether the node has been moved. Nodes which already are the newest ones are not moved.
   */
  moveToNewest(key: string): boolean {
    const node = this._nodeMap.get(key);
    if (node === undefined) return false;
    if (node === this._newest) return false;

    if (node.next !== null) node.next.prev = node.prev;
    if (node.prev !== null) node.prev.next = node.next;
    if (this._oldest === node) this._oldest = node.next;

    if (this._newest !== null) {
      this._newest.next = node;
      node.prev = this._newest;
    }

    this._newest = node;
    node.next = null;
    return true;
  }

  /**
   * Removes the oldest node from the list.
   * @returns The key of the removed node or `null` if the list is empty.
   */
  shift(): string | null {
    if (this._oldest === null) return null;

    const { key } = this._oldest;
    this.remove(key);
    return key;
  }

  clear(): void {
    this._nodeMap.clear();
    this._newest = null;
    this._oldest = null;
  }

  /**
   * Iterates over all keys from the oldest to the newest one.
   */
  *keys(): IterableIterator<string> {
    let node = this._oldest;

    while (node !== null) {
      yield node.key;
      node = node.next;
    }
  }
}
