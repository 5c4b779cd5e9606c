import { sortStubTree, type StubTree } from "./stub-tree.js";

/**
 * Overlay layers in ascending precedence: later layers win on identical paths.
 */
export const OVERLAY_LAYERS = ["generated", "user-global", "project-local"] as const;

export type OverlayLayer = (typeof OVERLAY_LAYERS)[number];

export interface LayerInput {
  layer: OverlayLayer;
  tree: StubTree;
}

/**
 * Left fold over `layers`: each layer inserts or replaces entries by path, and paths
 * a later layer does not mention are kept as they were.
 */
export function mergeLayerSequence(layers: readonly StubTree[]): StubTree {
  const acc = new Map<string, string>();
  for (const tree of layers) {
    for (const [relativePath, content] of tree) {
      acc.set(relativePath, content);
    }
  }
  return sortStubTree(acc);
}

export function mergeLayers(generated: StubTree, userGlobal: StubTree, projectLocal: StubTree): StubTree {
  return mergeLayerSequence([generated, userGlobal, projectLocal]);
}

/**
 * For each output path, the layer whose entry survived the merge.
 */
export function describeMerge(layers: readonly LayerInput[]): Map<string, OverlayLayer> {
  const winners = new Map<string, OverlayLayer>();
  for (const { layer, tree } of layers) {
    for (const relativePath of tree.keys()) {
      winners.set(relativePath, layer);
    }
  }
  return new Map([...winners.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export function countOverrides(layers: readonly LayerInput[]): Record<OverlayLayer, number> {
  const counts: Record<OverlayLayer, number> = { generated: 0, "user-global": 0, "project-local": 0 };
  for (const layer of describeMerge(layers).values()) {
    counts[layer] += 1;
  }
  return counts;
}
