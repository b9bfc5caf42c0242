/**
 * Dependency resolution over scanned images.
 *
 * Nodes are keyed by short name; a node's dependencies are short names too.
 * Everything here is synchronous and works on any node type exposing the
 * few fields below, so the same code orders ImageRecords and test doubles.
 */

import { DependencyLoopError, MissingDependencyError } from "./errors.js";
import { ImageState } from "./image-record.js";
import { fnmatch } from "./utils/fnmatch.js";

export interface GraphNode {
  readonly shortName: string;
  readonly label: { readonly full: string };
  readonly dependencies: readonly string[];
  state: ImageState;
}

/**
 * True when no selection is given or the full label matches it.
 */
export function matchesGlob(label: string, glob: string | null): boolean {
  return glob === null || fnmatch(label, glob);
}

function sortedByName<N extends GraphNode>(nodes: Iterable<N>): N[] {
  return [...nodes].sort((a, b) => (a.shortName < b.shortName ? -1 : a.shortName > b.shortName ? 1 : 0));
}

/**
 * Images to build, dependencies first.
 *
 * Starts from every TO_BUILD image matching the selection and pulls in the
 * dependencies that are themselves TO_BUILD. Dependencies that are unknown
 * or already available are skipped.
 *
 * @throws DependencyLoopError when an image is reached again while its own
 *   dependencies are still being resolved.
 */
export function buildChain<N extends GraphNode>(nodes: ReadonlyMap<string, N>, selection: string | null): N[] {
  const chain: N[] = [];
  const visiting = new Set<string>();
  const visited = new Set<string>();

  const visit = (node: N): void => {
    if (visited.has(node.shortName)) {
      return;
    }
    if (visiting.has(node.shortName)) {
      throw new DependencyLoopError(node.label.full);
    }
    visiting.add(node.shortName);
    for (const dependency of node.dependencies) {
      const parent = nodes.get(dependency);
      if (parent === undefined || parent.state !== ImageState.TO_BUILD) {
        continue;
      }
      visit(parent);
    }
    visiting.delete(node.shortName);
    visited.add(node.shortName);
    chain.push(node);
  };

  const seeds = sortedByName(nodes.values()).filter(
    (node) => node.state === ImageState.TO_BUILD && matchesGlob(node.label.full, selection)
  );
  for (const seed of seeds) {
    visit(seed);
  }
  return chain;
}

/**
 * Images to prune, dependents first.
 *
 * Selected images are marked TO_BUILD and every other TO_BUILD image BUILT,
 * so the chain covers exactly the selection; the result is that build chain
 * reversed. Every node gets its own state back before this returns.
 */
export function pruneChain<N extends GraphNode>(nodes: ReadonlyMap<string, N>, selection: string | null): N[] {
  const saved = new Map<N, ImageState>();
  for (const node of nodes.values()) {
    saved.set(node, node.state);
    if (matchesGlob(node.label.full, selection)) {
      node.state = ImageState.TO_BUILD;
    } else if (node.state === ImageState.TO_BUILD) {
      node.state = ImageState.BUILT;
    }
  }

  try {
    return buildChain(nodes, selection).reverse();
  } finally {
    for (const [node, state] of saved) {
      node.state = state;
    }
  }
}

/**
 * Reverse edges: for every image, the images that depend on it.
 *
 * @throws MissingDependencyError for a dependency that was not scanned.
 */
export function buildChildren<N extends GraphNode>(nodes: ReadonlyMap<string, N>): Map<string, Set<string>> {
  const children = new Map<string, Set<string>>();
  for (const name of nodes.keys()) {
    children.set(name, new Set());
  }
  for (const node of sortedByName(nodes.values())) {
    for (const dependency of node.dependencies) {
      const dependents = children.get(dependency);
      if (dependents === undefined) {
        throw new MissingDependencyError(dependency, node.shortName);
      }
      dependents.add(node.shortName);
    }
  }
  return children;
}

/**
 * The images matching the selection plus everything that transitively
 * depends on them, in breadth-first order.
 */
export function descendants<N extends GraphNode>(nodes: ReadonlyMap<string, N>, selection: string | null): N[] {
  const children = buildChildren(nodes);
  const result: N[] = [];
  const seen = new Set<string>();
  const queue = sortedByName(nodes.values()).filter((node) => matchesGlob(node.label.full, selection));

  for (let node = queue.shift(); node !== undefined; node = queue.shift()) {
    if (seen.has(node.shortName)) {
      continue;
    }
    seen.add(node.shortName);
    result.push(node);
    for (const childName of [...(children.get(node.shortName) ?? [])].sort()) {
      const child = nodes.get(childName);
      if (child !== undefined && !seen.has(childName)) {
        queue.push(child);
      }
    }
  }
  return result;
}
