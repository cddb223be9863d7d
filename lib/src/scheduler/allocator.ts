/**
 * Allocator
 * What it does?
 * 1) Ranks the ready nodes with the strategy of the allocation mode
 * 2) Places every request, oldest first, on the first ranked node that fits
 *    it on all dimensions
 * 3) Reserves on a simulated overlay so later requests see less free capacity
 *
 * Greedy first fit, no backtracking. The catalog snapshot is never touched.
 **/

import {
  AllocationMode,
  Node,
  PlacementPlan,
  PlacementRequest,
  ResourceMetric,
} from "../types";
import { fits, getFreeResources, subtractResources } from "../utils/resources";
import { CandidateNode, placementStrategies } from "./strategies";

export type AllocationOptions = {
  mode: AllocationMode;
  metric: ResourceMetric;
};

export const allocate = (
  requests: PlacementRequest[],
  snapshot: Node[],
  { mode, metric }: AllocationOptions
): PlacementPlan => {
  const strategy = placementStrategies[mode];
  let overlay: CandidateNode[] = snapshot
    .filter((node) => node.status === "ready")
    .map((node) => ({ nodeId: node.nodeId, free: getFreeResources(node) }));

  const plan: PlacementPlan = { assignments: [], infeasible: [] };

  requests.forEach((request) => {
    const target = strategy
      .rankNodes(metric, overlay)
      .find((candidate) => fits(request.resourceRequest, candidate.free));

    if (!target) {
      plan.infeasible.push(request.instanceId);
      return;
    }

    plan.assignments.push({
      instanceId: request.instanceId,
      nodeId: target.nodeId,
    });
    overlay = overlay.map((candidate) =>
      candidate.nodeId === target.nodeId
        ? {
            nodeId: candidate.nodeId,
            free: subtractResources(candidate.free, request.resourceRequest),
          }
        : candidate
    );
  });

  return plan;
};
