import { InvariantViolationError } from "../errors";
import { RESOURCE_METRICS, ResourceMetric, ResourceVector } from "../types";

const assertQuantity = (metric: ResourceMetric, value: number): void => {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvariantViolationError(
      `Resource ${metric} must be a non-negative integer, got ${value}`
    );
  }
};

export const createResources = (
  cpu: number,
  memory: number,
  gpu: number
): ResourceVector => {
  const vector = { cpu, memory, gpu };
  RESOURCE_METRICS.forEach((metric) => assertQuantity(metric, vector[metric]));
  return Object.freeze(vector);
};

export const ZERO_RESOURCES: ResourceVector = createResources(0, 0, 0);

export const addResources = (
  a: ResourceVector,
  b: ResourceVector
): ResourceVector =>
  createResources(a.cpu + b.cpu, a.memory + b.memory, a.gpu + b.gpu);

/**
 * Componentwise a - b. Going below zero on any dimension is a bookkeeping bug.
 */
export const subtractResources = (
  a: ResourceVector,
  b: ResourceVector
): ResourceVector => {
  if (!fits(b, a)) {
    throw new InvariantViolationError(
      `Cannot subtract ${formatResources(b)} from ${formatResources(a)}`
    );
  }
  return createResources(a.cpu - b.cpu, a.memory - b.memory, a.gpu - b.gpu);
};

// request <= free on every dimension
export const fits = (request: ResourceVector, free: ResourceVector): boolean =>
  RESOURCE_METRICS.every((metric) => request[metric] <= free[metric]);

export const isZeroResources = (vector: ResourceVector): boolean =>
  RESOURCE_METRICS.every((metric) => vector[metric] === 0);

export const sumResources = (vectors: ResourceVector[]): ResourceVector =>
  vectors.reduce(addResources, ZERO_RESOURCES);

export const getFreeResources = (node: {
  totalCapacity: ResourceVector;
  allocated: ResourceVector;
}): ResourceVector => subtractResources(node.totalCapacity, node.allocated);

export const formatResources = (vector: ResourceVector): string =>
  `cpu=${vector.cpu} memory=${vector.memory}MB gpu=${vector.gpu}`;
