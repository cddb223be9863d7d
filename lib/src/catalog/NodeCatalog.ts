import * as _ from "lodash";
import { InvariantViolationError } from "../errors";
import {
  CapacityFailure,
  CapacityOutcome,
  Node,
  ReservationOutcome,
  ResourceVector,
} from "../types";
import {
  addResources,
  fits,
  formatResources,
  getFreeResources,
  subtractResources,
  ZERO_RESOURCES,
} from "../utils/resources";

const unknownNode = (nodeId: string): CapacityFailure => ({
  ok: false,
  kind: "UnknownNode",
  message: `Node "${nodeId}" is not in the catalog`,
});

/**
 * Cluster-wide capacity bookkeeping, shared by every schedule loop.
 *
 * All mutators are synchronous so a call can never interleave with another
 * loop's call; the catalog is effectively a single-writer actor on the event
 * loop. Planning reads go through snapshot() and are re-validated by
 * reserve() when applied.
 */
export class NodeCatalog {
  private nodes = new Map<string, Node>();
  private incarnations = 0;

  /**
   * Registers a node on its first heartbeat, refreshes it afterwards.
   * A heartbeat brings an unreachable node back to ready; a draining node
   * stays draining.
   */
  upsertNode(
    nodeId: string,
    capacity: ResourceVector,
    now: number
  ): CapacityOutcome {
    const existing = this.nodes.get(nodeId);
    if (!existing) {
      this.nodes.set(nodeId, {
        nodeId,
        totalCapacity: capacity,
        allocated: ZERO_RESOURCES,
        status: "ready",
        incarnation: ++this.incarnations,
        lastHeartbeatAt: now,
      });
      return { ok: true };
    }

    if (!fits(existing.allocated, capacity)) {
      return {
        ok: false,
        kind: "InsufficientCapacity",
        message: `Node "${nodeId}" cannot shrink to ${formatResources(
          capacity
        )} while ${formatResources(existing.allocated)} is allocated`,
      };
    }
    existing.totalCapacity = capacity;
    existing.lastHeartbeatAt = now;
    if (existing.status === "unreachable") {
      existing.status = "ready";
    }
    return { ok: true };
  }

  markUnreachable(nodeId: string): boolean {
    const node = this.nodes.get(nodeId);
    if (!node || node.status === "unreachable") {
      return false;
    }
    node.status = "unreachable";
    return true;
  }

  markDraining(nodeId: string): boolean {
    const node = this.nodes.get(nodeId);
    if (!node || node.status !== "ready") {
      return false;
    }
    node.status = "draining";
    return true;
  }

  removeNode(nodeId: string): boolean {
    return this.nodes.delete(nodeId);
  }

  /**
   * Marks nodes whose last heartbeat is older than the timeout as unreachable.
   * @returns ids of the nodes that changed status
   */
  sweepHeartbeats(now: number, timeoutMs: number): string[] {
    const stale = [...this.nodes.values()].filter(
      (node) =>
        node.status !== "unreachable" && now - node.lastHeartbeatAt > timeoutMs
    );
    stale.forEach((node) => (node.status = "unreachable"));
    return _.sortBy(
      stale.map((node) => node.nodeId),
      (id) => id
    );
  }

  hasNode(nodeId: string): boolean {
    return this.nodes.has(nodeId);
  }

  getNode(nodeId: string): Node | undefined {
    const node = this.nodes.get(nodeId);
    return node ? _.cloneDeep(node) : undefined;
  }

  // Point-in-time copy, ascending nodeId
  snapshot(): Node[] {
    return _.sortBy(
      [...this.nodes.values()].map((node) => _.cloneDeep(node)),
      (node) => node.nodeId
    );
  }

  /**
   * Re-validates against current free capacity; a stale plan fails here with
   * InsufficientCapacity instead of overcommitting the node.
   */
  reserve(nodeId: string, amount: ResourceVector): ReservationOutcome {
    const node = this.nodes.get(nodeId);
    if (!node) {
      return unknownNode(nodeId);
    }
    const free = getFreeResources(node);
    if (!fits(amount, free)) {
      return {
        ok: false,
        kind: "InsufficientCapacity",
        message: `Node "${nodeId}" has ${formatResources(
          free
        )} free, ${formatResources(amount)} requested`,
      };
    }
    node.allocated = addResources(node.allocated, amount);
    return { ok: true, incarnation: node.incarnation };
  }

  /**
   * @param incarnation when given, capacity reserved on an earlier
   * registration of the same id is not taken from the current one
   */
  release(
    nodeId: string,
    amount: ResourceVector,
    incarnation?: number
  ): CapacityOutcome {
    const node = this.nodes.get(nodeId);
    if (
      !node ||
      (incarnation !== undefined && node.incarnation !== incarnation)
    ) {
      return unknownNode(nodeId);
    }
    if (!fits(amount, node.allocated)) {
      throw new InvariantViolationError(
        `Releasing ${formatResources(amount)} from node "${nodeId}" with only ${formatResources(
          node.allocated
        )} allocated`
      );
    }
    node.allocated = subtractResources(node.allocated, amount);
    return { ok: true };
  }
}
