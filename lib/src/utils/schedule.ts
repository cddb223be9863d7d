import * as _ from "lodash";
import { z } from "zod";
import { DescriptorValidationError } from "../errors";
import {
  ComponentSpec,
  Instance,
  LaunchCommand,
  ScheduleDescriptor,
  ScheduleSpec,
} from "../types";
import { createResources } from "./resources";

const MEMORY_PATTERN = /^(\d+)\s*([mMgG]?)$/;

/**
 * Normalizes a memory quantity to MB. "4096m" and 4096 are both 4096 MB,
 * "8g" is 8192 MB.
 */
export const parseMemory = (value: string | number): number => {
  if (typeof value === "number") {
    return value;
  }
  const match = MEMORY_PATTERN.exec(value.trim());
  if (!match) {
    throw new DescriptorValidationError(`Invalid memory quantity "${value}"`);
  }
  const amount = Number(match[1]);
  return match[2].toLowerCase() === "g" ? amount * 1024 : amount;
};

const quantity = z.number().int().nonnegative();

const ComponentDescriptorSchema = z.object({
  image: z.string().min(1),
  resources: z.object({
    cpu: quantity,
    memory: z.union([z.string(), quantity]),
    gpu: quantity,
  }),
  num: z.number().int().min(1),
  mount: z.object({ target: z.string() }),
  command: z.string().min(1),
  jobs: z.array(z.string()).optional(),
});

export const ScheduleDescriptorSchema = z.object({
  name: z.string().min(1),
  allocation: z.object({
    mode: z.enum(["single-metric-balanced", "single-metric-compacted"]),
    metric: z.enum(["cpu", "memory", "gpu"]),
  }),
  job_names: z.array(z.string().min(1)),
  components: z.record(ComponentDescriptorSchema),
});

const deepFreeze = <T>(value: T): T => {
  if (_.isObject(value) && !Object.isFrozen(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
};

/**
 * Validates a schedule document and turns it into an immutable ScheduleSpec.
 * @throws DescriptorValidationError on any schema violation
 */
export const getScheduleFromDescriptor = (raw: unknown): ScheduleSpec => {
  const result = ScheduleDescriptorSchema.safeParse(raw);
  if (!result.success) {
    throw new DescriptorValidationError(
      result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join(", ")
    );
  }
  const descriptor: ScheduleDescriptor = result.data;

  const duplicates = _.uniq(
    descriptor.job_names.filter(
      (name, index) => descriptor.job_names.indexOf(name) !== index
    )
  );
  if (duplicates.length > 0) {
    throw new DescriptorValidationError(
      `Duplicate job names: ${duplicates.join(", ")}`
    );
  }

  const components = _.mapValues(
    descriptor.components,
    (component, name): ComponentSpec => ({
      name,
      image: component.image,
      resourceRequest: createResources(
        component.resources.cpu,
        parseMemory(component.resources.memory),
        component.resources.gpu
      ),
      replicaCount: component.num,
      mountTarget: component.mount.target,
      launchCommandTemplate: component.command,
      ...(component.jobs ? { jobs: component.jobs } : {}),
    })
  );

  return deepFreeze({
    scheduleName: descriptor.name,
    allocationMode: descriptor.allocation.mode,
    balancingMetric: descriptor.allocation.metric,
    jobNames: descriptor.job_names,
    components,
  });
};

/**
 * Components reachable through the schedule's job names. A component without
 * a jobs list belongs to every job, so it is active whenever any job is.
 */
export const getActiveComponents = (spec: ScheduleSpec): ComponentSpec[] =>
  _.sortBy(Object.values(spec.components), (component) => component.name).filter(
    (component) =>
      component.jobs === undefined
        ? spec.jobNames.length > 0
        : component.jobs.some((job) => spec.jobNames.includes(job))
  );

export const getDesiredReplicaCounts = (
  spec: ScheduleSpec
): Record<string, number> => {
  const active = getActiveComponents(spec).map((component) => component.name);
  return _.mapValues(spec.components, (component) =>
    active.includes(component.name) ? component.replicaCount : 0
  );
};

export const buildLaunchCommand = (
  spec: ScheduleSpec,
  component: ComponentSpec,
  instance: Pick<Instance, "instanceId" | "attemptCount" | "generation">
): LaunchCommand => ({
  image: component.image,
  command: component.launchCommandTemplate,
  mountTarget: component.mountTarget,
  environment: {
    SCHEDULE_NAME: spec.scheduleName,
    COMPONENT_NAME: component.name,
    INSTANCE_ID: instance.instanceId,
    ATTEMPT: String(instance.attemptCount),
    INSTANCE_GENERATION: String(instance.generation),
    JOB_NAMES: spec.jobNames.join(","),
  },
});
