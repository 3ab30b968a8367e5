/** Read-only view of one outgoing edge. */
export interface RadixEdge {
  readonly label: string;
  readonly successor: RadixTree;
}

/** Length of the longest common prefix of `a` and `b`. */
function commonPrefixLength(a: string, b: string): number {
  const max = Math.min(a.length, b.length);
  let i = 0;
  while (i < max && a.charCodeAt(i) === b.charCodeAt(i)) i++;
  return i;
}

/**
 * Prefix-compressed tree of strings.
 *
 * Every node maps edge labels to the child node the edge leads to. Sibling
 * labels never share a leading character, so each shared prefix is stored
 * once. A node with no edges is a leaf and ends a stored string. An edge
 * labelled `""` marks that the path to its parent is itself a stored string
 * while longer strings continue below it.
 */
export class RadixTree {
  private readonly children = new Map<string, RadixTree>();

  static from(words: Iterable<string>): RadixTree {
    const tree = new RadixTree();
    for (const word of words) tree.insert(word);
    return tree;
  }

  isLeaf(): boolean {
    return this.children.size === 0;
  }

  insert(word: string): void {
    // edge sharing the longest common prefix with `word`
    let leading: RadixEdge | undefined;
    let rootLength = 0;

    for (const [label, successor] of this.children) {
      const length = commonPrefixLength(label, word);
      if (length > rootLength) {
        leading = { label, successor };
        rootLength = length;
      }
    }

    if (leading === undefined) {
      // "" is the only label that can already exist here
      if (!this.children.has(word)) this.children.set(word, new RadixTree());
      return;
    }

    const { label, successor } = leading;

    if (rootLength === label.length) {
      const suffix = word.slice(rootLength);

      if (suffix === "") {
        // the path exists; a node with children needs an explicit end marker
        if (!successor.isLeaf()) successor.insert("");
        return;
      }

      // keep the shorter word that used to end at this leaf
      if (successor.isLeaf()) successor.insert("");
      successor.insert(suffix);
      return;
    }

    const branch = new RadixTree();
    branch.children.set(word.slice(rootLength), new RadixTree());
    branch.children.set(label.slice(rootLength), successor);

    this.children.delete(label);
    this.children.set(word.slice(0, rootLength), branch);
  }

  contains(word: string): boolean {
    const exact = this.children.get(word);
    if (exact !== undefined) return exact.isLeaf() || exact.contains("");

    let best: RadixEdge | undefined;
    for (const [label, successor] of this.children) {
      if (word.startsWith(label) && label.length > (best?.label.length ?? 0)) {
        best = { label, successor };
      }
    }

    return best !== undefined && best.successor.contains(word.slice(best.label.length));
  }

  *edges(): IterableIterator<RadixEdge> {
    for (const [label, successor] of this.children) yield { label, successor };
  }

  /** Every stored string, depth first in edge order. */
  words(): IterableIterator<string> {
    return this.collect("");
  }

  private *collect(prefix: string): IterableIterator<string> {
    for (const [label, successor] of this.children) {
      if (successor.isLeaf()) yield prefix + label;
      else yield* successor.collect(prefix + label);
    }
  }

  toString(): string {
    if (this.isLeaf()) return "Ø";
    const edges = [...this.children].map(([label, successor]) =>
      `${label === "" ? "λ" : `"${label}"`} → ${successor.toString()}`
    );
    return `{${edges.join(", ")}}`;
  }

  [Symbol.for("nodejs.util.inspect.custom")]() { return this.toString(); }
}
