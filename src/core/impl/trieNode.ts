import type { Token } from "../types.js";
import type { TrieNodeMut, TrieNodeView } from "../trie.js";

/**
 * One vertex of a trie: a token, an optional payload and the children keyed by token.
 * Each node is owned by exactly one parent; the root's token is "".
 */
export class TrieNode<T> implements TrieNodeView<T> {
  payload: T | undefined = undefined;
  isKeyEnd = false;
  keyCount = 0;
  readonly children = new Map<Token, TrieNode<T>>();

  constructor(readonly token: Token = "") {}

  /** A node with no payload, no key flag and no children can be pruned. */
  get occupied(): boolean {
    return this.isKeyEnd || this.payload !== undefined || this.children.size > 0;
  }

  childTokens(): Token[] {
    return Array.from(this.children.keys()).sort();
  }

  childOrCreate(token: Token): TrieNode<T> {
    let next = this.children.get(token);
    if (!next) {
      next = new TrieNode<T>(token);
      this.children.set(token, next);
    }
    return next;
  }

  reset(): void {
    this.payload = undefined;
    this.isKeyEnd = false;
    this.keyCount = 0;
    this.children.clear();
  }
}

/**
 * Public handle for `getMut`: exposes the node read-only except for `payload`,
 * so key flags and counts stay under the trie's control.
 */
export class TrieNodeHandle<T> implements TrieNodeMut<T> {
  constructor(private readonly node: TrieNode<T>) {}

  get token(): Token {
    return this.node.token;
  }

  get payload(): T | undefined {
    return this.node.payload;
  }

  set payload(value: T | undefined) {
    this.node.payload = value;
  }

  get isKeyEnd(): boolean {
    return this.node.isKeyEnd;
  }

  get keyCount(): number {
    return this.node.keyCount;
  }

  get children(): ReadonlyMap<Token, TrieNodeView<T>> {
    return this.node.children;
  }

  childTokens(): Token[] {
    return this.node.childTokens();
  }
}
