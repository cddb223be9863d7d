import { AllocationMode, ResourceMetric, ResourceVector } from "../types";

export type CandidateNode = {
  nodeId: string;
  free: ResourceVector;
};

export type PlacementStrategy = {
  rankNodes(metric: ResourceMetric, nodes: CandidateNode[]): CandidateNode[];
};

const byNodeId = (a: CandidateNode, b: CandidateNode): number =>
  a.nodeId < b.nodeId ? -1 : a.nodeId > b.nodeId ? 1 : 0;

/**
 * Balanced spreads load: most free first.
 * Compacted packs: least free first.
 * Ties always fall back to ascending nodeId.
 */
export const placementStrategies: Record<AllocationMode, PlacementStrategy> = {
  "single-metric-balanced": {
    rankNodes: (metric, nodes) =>
      [...nodes].sort(
        (a, b) => b.free[metric] - a.free[metric] || byNodeId(a, b)
      ),
  },
  "single-metric-compacted": {
    rankNodes: (metric, nodes) =>
      [...nodes].sort(
        (a, b) => a.free[metric] - b.free[metric] || byNodeId(a, b)
      ),
  },
};
