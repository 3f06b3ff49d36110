import type { CandidateIndex, CandidateIndexStats } from './candidate-index';
import { RankBitset } from './rank-bitset';

interface TrieNode {
  label: string;
  /** Keyed by the first code point of the child's label. */
  children: Map<number, TrieNode>;
  ranks: number[];
}

const createNode = (label: string): TrieNode => ({ label, children: new Map(), ranks: [] });

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff;

/**
 * Compressed radix trie over literal prefixes. Each node holds the ranks of
 * the endpoints whose prefix ends exactly there, so walking a path collects
 * every endpoint whose prefix starts it.
 */
export class TrieCandidateIndex implements CandidateIndex {
  readonly kind = 'trie';
  private readonly capacity: number;
  private readonly root: TrieNode = createNode('');

  constructor(prefixes: readonly string[]) {
    prefixes.forEach((prefix, rank) => this.insert(prefix, rank));
    this.capacity = prefixes.length;
    this.freeze();
  }

  *candidates(path: string): IterableIterator<number> {
    const found = new RankBitset(this.capacity);
    let node = this.root;
    let offset = 0;

    for (;;) {
      for (const rank of node.ranks) {
        found.mark(rank);
      }
      if (offset >= path.length) {
        break;
      }
      const key = path.codePointAt(offset);
      const child = key === undefined ? undefined : node.children.get(key);
      if (!child || !path.startsWith(child.label, offset)) {
        break;
      }
      node = child;
      offset += child.label.length;
    }

    yield* found.values();
  }

  stats(): CandidateIndexStats {
    let nodes = 0;
    let depth = 0;
    const stack: Array<[TrieNode, number]> = [[this.root, 0]];

    for (let entry = stack.pop(); entry; entry = stack.pop()) {
      const [node, level] = entry;
      nodes++;
      depth = Math.max(depth, level);
      for (const child of node.children.values()) {
        stack.push([child, level + 1]);
      }
    }

    return { nodes, depth };
  }

  private insert(prefix: string, rank: number): void {
    let node = this.root;
    let offset = 0;

    for (;;) {
      if (offset === prefix.length) {
        node.ranks.push(rank);
        return;
      }

      const key = prefix.codePointAt(offset);
      if (key === undefined) {
        return;
      }
      const child = node.children.get(key);
      if (!child) {
        const leaf = createNode(prefix.slice(offset));
        leaf.ranks.push(rank);
        node.children.set(key, leaf);
        return;
      }

      const common = splitPoint(child.label, prefix, offset);
      if (common < child.label.length) {
        const middle = createNode(child.label.slice(0, common));
        child.label = child.label.slice(common);
        const childKey = child.label.codePointAt(0);
        if (childKey !== undefined) {
          middle.children.set(childKey, child);
        }
        node.children.set(key, middle);
        node = middle;
      } else {
        node = child;
      }
      offset += common;
    }
  }

  private freeze(): void {
    const stack: TrieNode[] = [this.root];
    for (let node = stack.pop(); node; node = stack.pop()) {
      Object.freeze(node.ranks);
      Object.freeze(node);
      for (const child of node.children.values()) {
        stack.push(child);
      }
    }
  }
}

/**
 * Length of the common prefix of `label` and `text.slice(offset)`, never
 * ending between the two halves of a surrogate pair in `label`.
 */
function splitPoint(label: string, text: string, offset: number): number {
  const limit = Math.min(label.length, text.length - offset);
  let common = 0;
  while (common < limit && label.charCodeAt(common) === text.charCodeAt(offset + common)) {
    common++;
  }
  if (
    common > 0 &&
    common < label.length &&
    isHighSurrogate(label.charCodeAt(common - 1)) &&
    isLowSurrogate(label.charCodeAt(common))
  ) {
    common--;
  }
  return common;
}
