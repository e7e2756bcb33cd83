import type { DocId, Term } from "../types.js";
import type { PrefixCompletion, PrefixTree, PrefixTreeNodeView } from "../prefixTree.js";

type Edge = { label: string; child: number };

type Node = {
  /** keyed by the first character of the edge label */
  edges: Map<string, Edge>;
  terminal: boolean;
  documents: Set<DocId>;
};

type Step = { parent: number; key: string };

const ROOT = 0;
const NO_DOCUMENTS: ReadonlySet<DocId> = new Set();

function makeNode(): Node {
  return { edges: new Map(), terminal: false, documents: new Set() };
}

function commonPrefixLength(a: string, b: string): number {
  const limit = Math.min(a.length, b.length);
  let i = 0;
  while (i < limit && a.charCodeAt(i) === b.charCodeAt(i)) i++;
  return i;
}

/**
 * Edge-compressed trie stored in an arena.
 *
 * Nodes are addressed by their slot in `nodes`; splitting or merging an edge
 * only reassigns slot numbers. Released slots are reused by later inserts.
 */
export class RadixTree implements PrefixTree {
  private readonly nodes: Array<Node | undefined> = [makeNode()];
  private readonly freeSlots: number[] = [];

  insert(term: Term, docId: DocId): void {
    if (!term) return;

    let cur = ROOT;
    let rest = term;

    while (rest.length > 0) {
      const node = this.node(cur);
      const key = rest.charAt(0);
      const edge = node.edges.get(key);

      if (!edge) {
        const leaf = this.alloc();
        node.edges.set(key, { label: rest, child: leaf });
        cur = leaf;
        break;
      }

      const common = commonPrefixLength(edge.label, rest);
      if (common < edge.label.length) {
        // split: shared prefix stays on the edge, the old subtree hangs off the remainder
        const mid = this.alloc();
        const tail = edge.label.slice(common);
        this.node(mid).edges.set(tail.charAt(0), { label: tail, child: edge.child });
        edge.label = edge.label.slice(0, common);
        edge.child = mid;
      }

      cur = edge.child;
      rest = rest.slice(common);
    }

    const target = this.node(cur);
    target.terminal = true;
    target.documents.add(docId);
  }

  remove(term: Term, docId: DocId): boolean {
    if (!term) return false;
    const found = this.locate(term);
    if (!found) return false;

    const target = this.node(found.id);
    if (!target.documents.delete(docId)) return false;
    if (target.documents.size === 0) target.terminal = false;

    this.collapse(found.id, found.path);
    return true;
  }

  has(term: Term): boolean {
    if (!term) return false;
    const found = this.locate(term);
    return !!found && this.node(found.id).terminal;
  }

  documents(term: Term): ReadonlySet<DocId> {
    const found = term ? this.locate(term) : undefined;
    return found ? this.node(found.id).documents : NO_DOCUMENTS;
  }

  complete(prefix: string, limit: number = 10): PrefixCompletion[] {
    if (limit <= 0) return [];

    let cur = ROOT;
    let rest = prefix;
    let spelled = "";

    while (rest.length > 0) {
      const edge = this.node(cur).edges.get(rest.charAt(0));
      if (!edge) return [];

      const common = commonPrefixLength(edge.label, rest);
      if (common < rest.length && common < edge.label.length) return [];

      // the prefix may end in the middle of this edge
      spelled += edge.label;
      cur = edge.child;
      rest = rest.slice(Math.min(common, rest.length));
      if (common === edge.label.length) continue;
      break;
    }

    const out: PrefixCompletion[] = [];
    const stack: Array<{ id: number; term: string }> = [{ id: cur, term: spelled }];

    while (stack.length) {
      const top = stack.pop();
      if (!top) break;
      const node = this.node(top.id);
      if (node.terminal) out.push({ term: top.term, weight: node.documents.size });
      for (const edge of node.edges.values()) {
        stack.push({ id: edge.child, term: top.term + edge.label });
      }
    }

    out.sort((a, b) => b.weight - a.weight || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0));
    return out.slice(0, limit);
  }

  nodeCount(): number {
    return this.nodes.length - this.freeSlots.length;
  }

  view(): PrefixTreeNodeView {
    return this.viewOf(ROOT);
  }

  private viewOf(id: number): PrefixTreeNodeView {
    const node = this.node(id);
    const children = Array.from(node.edges.values())
      .sort((a, b) => (a.label < b.label ? -1 : 1))
      .map((edge) => ({ label: edge.label, node: this.viewOf(edge.child) }));
    return { terminal: node.terminal, documents: Array.from(node.documents).sort(), children };
  }

  /** Walks `term` edge by edge; undefined when it ends off the tree or mid-edge. */
  private locate(term: Term): { id: number; path: Step[] } | undefined {
    let cur = ROOT;
    let rest = term;
    const path: Step[] = [];

    while (rest.length > 0) {
      const key = rest.charAt(0);
      const edge = this.node(cur).edges.get(key);
      if (!edge || !rest.startsWith(edge.label)) return undefined;
      path.push({ parent: cur, key });
      cur = edge.child;
      rest = rest.slice(edge.label.length);
    }

    return { id: cur, path };
  }

  /**
   * Restores the invariants bottom-up after a removal: prunes childless
   * non-terminal nodes and folds a non-terminal single child into its parent edge.
   */
  private collapse(id: number, path: Step[]): void {
    let cur = id;

    for (let i = path.length - 1; i >= 0; i--) {
      const step = path[i];
      if (!step) return;

      const node = this.node(cur);
      if (node.terminal) return;

      const parentEdges = this.node(step.parent).edges;

      if (node.edges.size === 0) {
        parentEdges.delete(step.key);
        this.release(cur);
        cur = step.parent;
        continue;
      }

      if (node.edges.size === 1) {
        const edge = parentEdges.get(step.key);
        const [only] = node.edges.values();
        if (edge && only) {
          edge.label += only.label;
          edge.child = only.child;
          this.release(cur);
        }
      }
      return;
    }
  }

  private node(id: number): Node {
    const node = this.nodes[id];
    if (!node) throw new Error(`prefix tree: slot ${id} is not allocated`);
    return node;
  }

  private alloc(): number {
    const slot = this.freeSlots.pop();
    if (slot !== undefined) {
      this.nodes[slot] = makeNode();
      return slot;
    }
    this.nodes.push(makeNode());
    return this.nodes.length - 1;
  }

  private release(id: number): void {
    this.nodes[id] = undefined;
    this.freeSlots.push(id);
  }
}
