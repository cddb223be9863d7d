import { ResourceVector } from "./Resources";

export type NodeStatus = "ready" | "draining" | "unreachable";

export type Node = {
  nodeId: string;
  totalCapacity: ResourceVector;
  // Sum of the requests of every instance placed on this node
  allocated: ResourceVector;
  status: NodeStatus;
  // Changes when a node id is removed and registered again
  incarnation: number;
  // Epoch millis of the last heartbeat
  lastHeartbeatAt: number;
};

export type NodeEvent = "unreachable" | "removed";

// ClusterState feed
export type ClusterEvent =
  | { type: "heartbeat"; nodeId: string; capacity: ResourceVector }
  | { type: "drain"; nodeId: string }
  | { type: "unreachable"; nodeId: string }
  | { type: "removed"; nodeId: string };

export type CapacityFailure = {
  ok: false;
  kind: "InsufficientCapacity" | "UnknownNode";
  message: string;
};

export type CapacityOutcome = { ok: true } | CapacityFailure;

export type ReservationOutcome = { ok: true; incarnation: number } | CapacityFailure;
