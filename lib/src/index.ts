// Core API
export { ScheduleController, ScheduleControllerOptions } from "./core/ScheduleController";
export { ScheduleLoop, LoopEvent } from "./core/ScheduleLoop";
export { InstanceSupervisor, SupervisorOptions } from "./core/InstanceSupervisor";
export { EventQueue } from "./core/EventQueue";
export { NodeCatalog } from "./catalog/NodeCatalog";

// Types
export * from "./types";
export * from "./errors";

// Placement
export { allocate, AllocationOptions } from "./scheduler/allocator";
export { placementStrategies, PlacementStrategy, CandidateNode } from "./scheduler/strategies";

// Utilities
export * from "./utils/resources";
export {
  buildLaunchCommand,
  getActiveComponents,
  getDesiredReplicaCounts,
  getScheduleFromDescriptor,
  parseMemory,
  ScheduleDescriptorSchema,
} from "./utils/schedule";
