export type ResourceMetric = "cpu" | "memory" | "gpu";

export const RESOURCE_METRICS: readonly ResourceMetric[] = [
  "cpu",
  "memory",
  "gpu",
];

export type ResourceVector = {
  // Cores
  readonly cpu: number;
  // MB
  readonly memory: number;
  // Cards
  readonly gpu: number;
};
