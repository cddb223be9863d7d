import { ResourceVector } from "./Resources";

export type InstanceState =
  | "Pending"
  | "Launching"
  | "Running"
  | "Failed"
  | "Terminated";

export type Instance = {
  instanceId: string;
  componentName: string;
  // Null while pending
  nodeId: string | null;
  // Incarnation of the node the capacity was reserved on
  nodeIncarnation: number | null;
  resourceRequest: ResourceVector;
  state: InstanceState;
  attemptCount: number;
  // Bumped on every placement so late agent reports can be told apart
  generation: number;
  // Creation order, oldest first
  createdSeq: number;
  // Earliest time the instance may be placed again
  notBefore: number;
  launchedAt?: number;
  infeasibleTicks: number;
  lastError?: string;
};

export type InstanceReport =
  | "started"
  | "exited-ok"
  | "exited-error"
  | "crashed";

export type InstanceReportEvent = {
  report: InstanceReport;
  // Placement the report refers to, as handed to the agent in INSTANCE_GENERATION
  generation: number;
  reason?: string;
};

export type InstanceEvent = {
  scheduleName: string;
  instanceId: string;
  componentName: string;
  oldState: InstanceState | null;
  newState: InstanceState;
  timestamp: number;
  reason: string;
};

export type PlacementRequest = {
  instanceId: string;
  componentName: string;
  resourceRequest: ResourceVector;
};

export type PlacementAssignment = {
  instanceId: string;
  nodeId: string;
};

export type PlacementPlan = {
  assignments: PlacementAssignment[];
  infeasible: string[];
};
