import type { Token } from "./types.js";
import type { Tokenizer } from "./tokenizer.js";

/** Read-only view of a sub-trie rooted at one token. */
export interface TrieNodeView<T> {
  readonly token: Token;
  readonly payload: T | undefined;
  /** Set when a key was explicitly added ending at this node. */
  readonly isKeyEnd: boolean;
  /** Stored keys at or below this node. */
  readonly keyCount: number;
  readonly children: ReadonlyMap<Token, TrieNodeView<T>>;

  /** Child tokens in sorted order. */
  childTokens(): Token[];
}

/** Node handle returned by `getMut`; the payload can be replaced in place. */
export interface TrieNodeMut<T> extends TrieNodeView<T> {
  payload: T | undefined;
}

/**
 * Prefix tree keyed by tokenizer output.
 */
export interface Trie<T> {
  readonly tokenizer: Tokenizer;
  readonly size: number;

  add(key: string, payload?: T): void;
  remove(key: string): void;
  clear(): void;

  exists(key: string): boolean;
  get(key: string): TrieNodeView<T> | undefined;
  getMut(key: string): TrieNodeMut<T> | undefined;

  /** Stored keys starting with `prefix`, matched on whole tokens. */
  getKeysUnderPrefix(prefix: string): string[];
  /** Children of the parent path whose token starts with the last token of `key`. */
  fuzzyGet(key: string): TrieNodeView<T>[];
  /** Stored keys containing `fragment` anywhere. */
  getKeysByPartialPath(fragment: string): string[];
  keys(): string[];

  /** Empty trie sharing this trie's tokenizer. */
  newFromCurrent(): Trie<T>;
}
