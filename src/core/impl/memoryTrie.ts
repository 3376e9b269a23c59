import type { DetokenizeFn, Token, TokenizeFn } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { Trie, TrieNodeMut, TrieNodeView } from "../trie.js";
import type { Logger } from "../logger.js";
import { TrieNode, TrieNodeHandle } from "./trieNode.js";
import { SliceTokenizer } from "./sliceTokenizer.js";
import { DelimiterTokenizer } from "./delimiterTokenizer.js";
import { CustomTokenizer } from "./customTokenizer.js";
import { createLogger } from "./createLogger.js";

export interface MemoryTrieOptions {
  logger?: Logger;
}

type Frame<T> = { node: TrieNode<T>; tokens: Token[] };

/**
 * In-memory trie whose levels are the tokens produced by a pluggable tokenizer.
 *
 * Data structure:
 * - root node (token "") owning a token -> child map, recursively
 * - `isKeyEnd` marks explicitly added keys, independent of the payload
 * - the tokenizer is shared, never copied, by tries made with `newFromCurrent()`
 *
 * Query results are sorted (code unit order) so output is stable.
 */
export class MemoryTrie<T> implements Trie<T> {
  private readonly root = new TrieNode<T>();
  private readonly logger: Logger;

  constructor(
    readonly tokenizer: Tokenizer = new SliceTokenizer(1),
    options?: MemoryTrieOptions,
  ) {
    this.logger = options?.logger ?? createLogger();
  }

  static withSlice<T>(length: number, options?: MemoryTrieOptions): MemoryTrie<T> {
    return new MemoryTrie<T>(new SliceTokenizer(length), options);
  }

  static withDelimiter<T>(delimiter: string, options?: MemoryTrieOptions): MemoryTrie<T> {
    return new MemoryTrie<T>(new DelimiterTokenizer(delimiter), options);
  }

  static withCustomTokenization<T>(
    tokenize: TokenizeFn,
    detokenize: DetokenizeFn,
    options?: MemoryTrieOptions,
  ): MemoryTrie<T> {
    return new MemoryTrie<T>(new CustomTokenizer(tokenize, detokenize), options);
  }

  newFromCurrent(): MemoryTrie<T> {
    return new MemoryTrie<T>(this.tokenizer, { logger: this.logger });
  }

  get size(): number {
    return this.root.keyCount;
  }

  add(key: string, payload?: T): void {
    const path: TrieNode<T>[] = [this.root];
    let cur = this.root;
    for (const token of this.tokenizer.tokenize(key)) {
      cur = cur.childOrCreate(token);
      path.push(cur);
    }

    if (!cur.isKeyEnd) {
      for (const node of path) node.keyCount++;
    }
    cur.isKeyEnd = true;
    cur.payload = payload;
  }

  remove(key: string): void {
    const path = this.resolvePath(this.tokenizer.tokenize(key));
    const terminal = path ? path[path.length - 1] : undefined;
    if (!path || !terminal?.isKeyEnd) {
      this.logger.debug({ key }, "remove: key not stored");
      return;
    }

    terminal.isKeyEnd = false;
    terminal.payload = undefined;
    for (const node of path) node.keyCount--;

    // walk back up; path[0] is the root and is never detached
    for (let i = path.length - 1; i > 0; i--) {
      const node = path[i]!;
      if (node.occupied) break;
      path[i - 1]!.children.delete(node.token);
      this.logger.debug({ token: node.token, depth: i }, "pruned node");
    }
  }

  clear(): void {
    this.root.reset();
  }

  exists(key: string): boolean {
    return this.resolve(this.tokenizer.tokenize(key))?.isKeyEnd ?? false;
  }

  get(key: string): TrieNodeView<T> | undefined {
    return this.getMut(key);
  }

  getMut(key: string): TrieNodeMut<T> | undefined {
    const node = this.resolve(this.tokenizer.tokenize(key));
    return node ? new TrieNodeHandle(node) : undefined;
  }

  getKeysUnderPrefix(prefix: string): string[] {
    const tokens = this.tokenizer.tokenize(prefix);
    const start = this.resolve(tokens);
    if (!start) return [];

    const out: string[] = [];
    this.walk(start, tokens, (node, nodeTokens) => {
      if (node.isKeyEnd) out.push(this.tokenizer.detokenize(nodeTokens));
    });
    return out.sort();
  }

  fuzzyGet(key: string): TrieNodeView<T>[] {
    const tokens = this.tokenizer.tokenize(key);
    const last = tokens[tokens.length - 1];
    if (last === undefined) return [];

    const parent = this.resolve(tokens.slice(0, -1));
    if (!parent) return [];

    const out: TrieNodeView<T>[] = [];
    for (const token of parent.childTokens()) {
      const child = parent.children.get(token);
      if (child && token.startsWith(last)) out.push(new TrieNodeHandle(child));
    }
    return out;
  }

  getKeysByPartialPath(fragment: string): string[] {
    const out: string[] = [];
    this.walk(this.root, [], (node, nodeTokens) => {
      if (!node.isKeyEnd) return;
      const key = this.tokenizer.detokenize(nodeTokens);
      if (key.includes(fragment)) out.push(key);
    });
    return out.sort();
  }

  keys(): string[] {
    return this.getKeysByPartialPath("");
  }

  private resolve(tokens: readonly Token[]): TrieNode<T> | undefined {
    let cur = this.root;
    for (const token of tokens) {
      const next = cur.children.get(token);
      if (!next) return undefined;
      cur = next;
    }
    return cur;
  }

  /** Nodes from the root to the end of `tokens`, or undefined if any token is missing. */
  private resolvePath(tokens: readonly Token[]): TrieNode<T>[] | undefined {
    const path: TrieNode<T>[] = [this.root];
    let cur = this.root;
    for (const token of tokens) {
      const next = cur.children.get(token);
      if (!next) return undefined;
      path.push(next);
      cur = next;
    }
    return path;
  }

  /** Depth-first, children visited in sorted token order. */
  private walk(start: TrieNode<T>, startTokens: Token[], visit: (node: TrieNode<T>, tokens: Token[]) => void): void {
    const stack: Frame<T>[] = [{ node: start, tokens: startTokens }];

    while (stack.length) {
      const frame = stack.pop();
      if (!frame) break;
      visit(frame.node, frame.tokens);

      // push in reverse so pop() yields sorted order
      const childTokens = frame.node.childTokens().reverse();
      for (const token of childTokens) {
        const child = frame.node.children.get(token);
        if (child) stack.push({ node: child, tokens: [...frame.tokens, token] });
      }
    }
  }
}
