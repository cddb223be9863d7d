import { ResourceMetric, ResourceVector } from "./Resources";

export type AllocationMode =
  | "single-metric-balanced"
  | "single-metric-compacted";

export type ComponentSpec = {
  readonly name: string;
  readonly image: string;
  readonly resourceRequest: ResourceVector;
  readonly replicaCount: number;
  readonly mountTarget: string;
  readonly launchCommandTemplate: string;
  // Jobs that run this component. Undefined means every job.
  readonly jobs?: readonly string[];
};

export type ScheduleSpec = {
  readonly scheduleName: string;
  readonly allocationMode: AllocationMode;
  readonly balancingMetric: ResourceMetric;
  readonly jobNames: readonly string[];
  readonly components: Readonly<Record<string, ComponentSpec>>;
};

export type LaunchCommand = {
  image: string;
  command: string;
  mountTarget: string;
  environment: Record<string, string>;
};

/**
 * Shape of the declarative schedule document before normalization.
 * Memory may be given as "4096m" / "8g" or a bare number of MB.
 */
export type ScheduleDescriptor = {
  name: string;
  allocation: {
    mode: AllocationMode;
    metric: ResourceMetric;
  };
  job_names: string[];
  components: Record<string, ComponentDescriptor>;
};

export type ComponentDescriptor = {
  image: string;
  resources: {
    cpu: number;
    memory: string | number;
    gpu: number;
  };
  num: number;
  mount: { target: string };
  command: string;
  jobs?: string[];
};

export type ScheduleState = "Active" | "Draining" | "Completed" | "Failed";

export type ComponentStatus = {
  desired: number;
  pending: number;
  launching: number;
  running: number;
  failed: number;
  succeeded: number;
  terminatedWithError: number;
  // Last reason the component could not make progress
  blockingReason?: string;
};

export type ScheduleStatus = {
  scheduleName: string;
  state: ScheduleState;
  components: Record<string, ComponentStatus>;
  reason?: string;
};
