/**
 * Goal Hierarchy
 *
 * Pure functions over dot-delimited goal ids. The hierarchy is structural:
 * an id's ancestors are its prefixes, whether or not goals exist for them.
 * Functions that take `known` only ever return ids from that list.
 */

const SEP = ".";

export interface GoalTreeNode {
  id: string;
  children: GoalTreeNode[];
}

/** Structural parent, or undefined at the root. */
export function parentOf(id: string): string | undefined {
  const cut = id.lastIndexOf(SEP);
  return cut === -1 ? undefined : id.slice(0, cut);
}

/** Structural ancestors, nearest first. */
export function ancestorsOf(id: string): string[] {
  const out: string[] = [];
  for (let p = parentOf(id); p !== undefined; p = parentOf(p)) {
    out.push(p);
  }
  return out;
}

/** True when `b` is `a` followed by one or more further segments. */
export function isAncestor(a: string, b: string): boolean {
  return b.length > a.length + 1 && b.startsWith(a + SEP);
}

/** Known descendants of `a` with no other known id between them and `a`. */
export function childrenOf(a: string, known: readonly string[]): string[] {
  const set = new Set(known);
  return unique(known).filter(id =>
    isAncestor(a, id) && !ancestorsOf(id).some(p => p !== a && isAncestor(a, p) && set.has(p)),
  );
}

/** `a` followed by every known descendant, in input order. */
export function rollup(a: string, known: readonly string[]): string[] {
  return [a, ...unique(known).filter(id => isAncestor(a, id))];
}

/** Known ids sharing `a`'s structural parent, excluding `a`. */
export function siblingsOf(a: string, known: readonly string[]): string[] {
  const parent = parentOf(a);
  return unique(known).filter(id => id !== a && parentOf(id) === parent);
}

/** Nearest ancestor of `id` that appears in `known`. */
export function nearestKnownAncestor(id: string, known: ReadonlySet<string>): string | undefined {
  return ancestorsOf(id).find(p => known.has(p));
}

/**
 * Forest of known ids. Each id hangs off its nearest known ancestor;
 * ids with none are roots. Input order is kept among siblings.
 */
export function buildGoalTree(known: readonly string[]): GoalTreeNode[] {
  const ids = unique(known);
  const set = new Set(ids);
  const nodes = new Map<string, GoalTreeNode>();
  for (const id of ids) nodes.set(id, { id, children: [] });

  const roots: GoalTreeNode[] = [];
  for (const id of ids) {
    const node = nodes.get(id);
    if (!node) continue;
    const parentId = nearestKnownAncestor(id, set);
    const parent = parentId === undefined ? undefined : nodes.get(parentId);
    if (parent) parent.children.push(node);
    else roots.push(node);
  }
  return roots;
}

function unique(ids: readonly string[]): string[] {
  return [...new Set(ids)];
}
