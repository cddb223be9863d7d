import * as _ from "lodash";
import { NodeCatalog } from "../catalog/NodeCatalog";
import { InfeasiblePlacementError, InvariantViolationError } from "../errors";
import { allocate } from "../scheduler/allocator";
import {
  ComponentStatus,
  Instance,
  InstanceEvent,
  InstanceReportEvent,
  InstanceState,
  Logger,
  Node,
  NodeAgent,
  NodeEvent,
  PlacementRequest,
  ScheduleSpec,
  SchedulerConfig,
} from "../types";
import { buildLaunchCommand } from "../utils/schedule";

export type SupervisorOptions = {
  spec: ScheduleSpec;
  catalog: NodeCatalog;
  agent: NodeAgent;
  config: SchedulerConfig;
  logger: Logger;
  emit: (event: InstanceEvent) => void;
  // Hands an agent result back to the owning loop's queue
  post: (instanceId: string, event: InstanceReportEvent) => void;
  now: () => number;
};

// Removal order on scale-down
const SCALE_DOWN_ORDER: InstanceState[] = ["Pending", "Launching", "Running"];

const placementKey = (instanceId: string, generation: number): string =>
  `${instanceId}#${generation}`;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Owns the authoritative instance map of one schedule. Every method is meant
 * to be called from that schedule's event queue only, one at a time.
 */
export class InstanceSupervisor {
  private spec: ScheduleSpec;
  private instances = new Map<string, Instance>();
  private seq = 0;
  private succeeded: Record<string, number> = {};
  private terminatedWithError: Record<string, number> = {};
  private blockingReasons: Record<string, string> = {};
  private inFlight = new Set<Promise<void>>();
  // Placements given up while their launch call was still out
  private abandoned = new Set<string>();

  constructor(private readonly options: SupervisorOptions) {
    this.spec = options.spec;
  }

  get scheduleName(): string {
    return this.spec.scheduleName;
  }

  setSpec(spec: ScheduleSpec): void {
    this.spec = spec;
  }

  getInstance(instanceId: string): Instance | undefined {
    const instance = this.instances.get(instanceId);
    return instance ? _.cloneDeep(instance) : undefined;
  }

  listInstances(): Instance[] {
    return _.sortBy(
      [...this.instances.values()].map((instance) => _.cloneDeep(instance)),
      (instance) => instance.createdSeq
    );
  }

  get liveCount(): number {
    return this.instances.size;
  }

  /**
   * Brings live instance counts in line with the desired counts, then places
   * every Pending instance that is due.
   */
  reconcile(desired: Record<string, number>, snapshot: Node[]): void {
    const now = this.options.now();
    const componentNames = _.uniq([
      ...Object.keys(desired),
      ...[...this.instances.values()].map((instance) => instance.componentName),
    ]).sort();

    componentNames.forEach((componentName) => {
      const component = this.spec.components[componentName];
      const wanted = component ? desired[componentName] ?? 0 : 0;
      const target = Math.max(
        0,
        wanted -
          (this.succeeded[componentName] ?? 0) -
          (this.terminatedWithError[componentName] ?? 0)
      );
      const live = this.instancesOf(componentName);

      if (live.length < target) {
        _.times(target - live.length, () =>
          this.createInstance(componentName, now)
        );
      } else if (live.length > target) {
        const victims = _.sortBy(live, [
          (instance) => SCALE_DOWN_ORDER.indexOf(instance.state),
          (instance) => -instance.createdSeq,
        ]).slice(0, live.length - target);
        victims.forEach((instance) => this.terminate(instance, "scaled down"));
      }
    });

    this.placePending(snapshot, now);
  }

  handleNodeEvent(nodeId: string, event: NodeEvent): void {
    const now = this.options.now();
    const residents = _.sortBy(
      [...this.instances.values()].filter(
        (instance) =>
          instance.nodeId === nodeId &&
          (instance.state === "Launching" || instance.state === "Running")
      ),
      (instance) => instance.createdSeq
    );

    residents.forEach((instance) => {
      const oldState = instance.state;
      this.releaseCapacity(instance);
      instance.state = "Pending";
      instance.nodeId = null;
      instance.nodeIncarnation = null;
      instance.launchedAt = undefined;
      instance.notBefore = now;
      this.emit(instance, oldState, `node ${nodeId} ${event}`);
    });

    if (residents.length > 0) {
      this.options.logger.warn(
        `[${this.scheduleName}] node ${nodeId} ${event}, rescheduling ${residents.length} instance(s)`
      );
    }
  }

  /**
   * Folds an agent report into the state machine. Reports for a placement
   * that has since been replaced are dropped.
   */
  handleInstanceEvent(instanceId: string, event: InstanceReportEvent): void {
    const instance = this.instances.get(instanceId);
    if (!instance) {
      return;
    }
    if (event.generation !== instance.generation) {
      return;
    }

    switch (event.report) {
      case "started":
        if (instance.state === "Launching") {
          instance.state = "Running";
          this.emit(instance, "Launching", event.reason ?? "started");
        }
        return;
      case "exited-ok":
        if (instance.state === "Launching" || instance.state === "Running") {
          this.succeeded[instance.componentName] =
            (this.succeeded[instance.componentName] ?? 0) + 1;
          this.remove(instance, event.reason ?? "exited ok");
        }
        return;
      case "exited-error":
      case "crashed":
        if (instance.state === "Launching" || instance.state === "Running") {
          this.fail(instance, event.reason ?? event.report);
        }
        return;
    }
  }

  // Launching past the timeout counts as a failed launch
  checkLaunchTimeouts(): void {
    const now = this.options.now();
    const { launchTimeoutMs } = this.options.config;
    const expired = [...this.instances.values()].filter(
      (instance) =>
        instance.state === "Launching" &&
        instance.launchedAt !== undefined &&
        now - instance.launchedAt >= launchTimeoutMs
    );
    expired.forEach((instance) => {
      this.kill(instance);
      this.abandon(instance);
      this.handleInstanceEvent(instance.instanceId, {
        report: "exited-error",
        generation: instance.generation,
        reason: `launch timed out after ${launchTimeoutMs}ms`,
      });
    });
  }

  status(desired: Record<string, number>): Record<string, ComponentStatus> {
    const componentNames = _.uniq([
      ...Object.keys(this.spec.components),
      ...[...this.instances.values()].map((instance) => instance.componentName),
    ]).sort();

    return componentNames.reduce<Record<string, ComponentStatus>>(
      (acc, componentName) => {
        const counts = _.countBy(this.instancesOf(componentName), "state");
        const status: ComponentStatus = {
          desired: desired[componentName] ?? 0,
          pending: counts.Pending ?? 0,
          launching: counts.Launching ?? 0,
          running: counts.Running ?? 0,
          failed: counts.Failed ?? 0,
          succeeded: this.succeeded[componentName] ?? 0,
          terminatedWithError: this.terminatedWithError[componentName] ?? 0,
        };
        const blockingReason = this.blockingReasons[componentName];
        if (blockingReason) {
          status.blockingReason = blockingReason;
        }
        acc[componentName] = status;
        return acc;
      },
      {}
    );
  }

  get pendingAgentCalls(): number {
    return this.inFlight.size;
  }

  // Resolves when every agent call issued so far has been answered
  async settled(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private instancesOf(componentName: string): Instance[] {
    return [...this.instances.values()].filter(
      (instance) => instance.componentName === componentName
    );
  }

  private createInstance(componentName: string, now: number): void {
    const component = this.spec.components[componentName];
    const seq = ++this.seq;
    const instanceId = `${this.scheduleName}-${componentName}-${seq}`;
    if (this.instances.has(instanceId)) {
      throw new InvariantViolationError(`Duplicate instance id ${instanceId}`);
    }
    const instance: Instance = {
      instanceId,
      componentName,
      nodeId: null,
      nodeIncarnation: null,
      resourceRequest: component.resourceRequest,
      state: "Pending",
      attemptCount: 0,
      generation: 0,
      createdSeq: seq,
      notBefore: now,
      infeasibleTicks: 0,
    };
    this.instances.set(instanceId, instance);
    this.emit(instance, null, "replica created");
  }

  private placePending(snapshot: Node[], now: number): void {
    const due = _.sortBy(
      [...this.instances.values()].filter(
        (instance) => instance.state === "Pending" && instance.notBefore <= now
      ),
      (instance) => instance.createdSeq
    );
    if (due.length === 0) {
      return;
    }

    const requests: PlacementRequest[] = due.map((instance) => ({
      instanceId: instance.instanceId,
      componentName: instance.componentName,
      resourceRequest: instance.resourceRequest,
    }));
    const plan = allocate(requests, snapshot, {
      mode: this.spec.allocationMode,
      metric: this.spec.balancingMetric,
    });

    plan.assignments.forEach(({ instanceId, nodeId }) => {
      const instance = this.instances.get(instanceId);
      if (!instance) {
        return;
      }
      const reservation = this.options.catalog.reserve(
        nodeId,
        instance.resourceRequest
      );
      if (!reservation.ok) {
        // Snapshot went stale; try again next tick
        this.options.logger.info(
          `[${this.scheduleName}] ${instanceId} not placed: ${reservation.message}`
        );
        return;
      }
      instance.nodeId = nodeId;
      instance.nodeIncarnation = reservation.incarnation;
      instance.generation += 1;
      instance.state = "Launching";
      instance.launchedAt = now;
      instance.infeasibleTicks = 0;
      delete this.blockingReasons[instance.componentName];
      this.emit(instance, "Pending", `placed on ${nodeId}`);
      this.launch(instance);
    });

    const { infeasibleWarnAfterTicks } = this.options.config;
    plan.infeasible.forEach((instanceId) => {
      const instance = this.instances.get(instanceId);
      if (!instance) {
        return;
      }
      instance.infeasibleTicks += 1;
      instance.notBefore = now + this.backoff(instance.infeasibleTicks);
      if (instance.infeasibleTicks >= infeasibleWarnAfterTicks) {
        const error = new InfeasiblePlacementError(
          instance.componentName,
          instance.infeasibleTicks
        );
        this.blockingReasons[instance.componentName] = error.message;
        if (instance.infeasibleTicks === infeasibleWarnAfterTicks) {
          this.options.logger.warn(`[${this.scheduleName}] ${error.message}`);
        }
      }
    });
  }

  private fail(instance: Instance, reason: string): void {
    const { maxAttempts } = this.options.config;
    const oldState = instance.state;
    this.releaseCapacity(instance);
    instance.nodeId = null;
    instance.nodeIncarnation = null;
    instance.launchedAt = undefined;
    instance.state = "Failed";
    instance.attemptCount += 1;
    instance.lastError = reason;
    this.emit(instance, oldState, reason);

    if (instance.attemptCount < maxAttempts) {
      instance.state = "Pending";
      instance.notBefore =
        this.options.now() + this.backoff(instance.attemptCount);
      this.emit(
        instance,
        "Failed",
        `retry ${instance.attemptCount}/${maxAttempts - 1}`
      );
      return;
    }

    this.terminatedWithError[instance.componentName] =
      (this.terminatedWithError[instance.componentName] ?? 0) + 1;
    this.blockingReasons[instance.componentName] = reason;
    this.options.logger.warn(
      `[${this.scheduleName}] ${instance.instanceId} gave up after ${instance.attemptCount} attempts: ${reason}`
    );
    this.remove(instance, `retries exhausted: ${reason}`);
  }

  /**
   * A Launching instance is not killed right away: the kill could reach the
   * agent ahead of the launch. It is killed once its launch call answers.
   */
  private terminate(instance: Instance, reason: string): void {
    if (instance.state === "Running") {
      this.kill(instance);
    } else if (instance.state === "Launching") {
      this.abandon(instance);
    }
    this.remove(instance, reason);
  }

  private abandon(instance: Instance): void {
    if (instance.nodeId !== null) {
      this.abandoned.add(placementKey(instance.instanceId, instance.generation));
    }
  }

  // Terminated instances leave the map and give their capacity back
  private remove(instance: Instance, reason: string): void {
    const oldState = instance.state;
    this.releaseCapacity(instance);
    this.instances.delete(instance.instanceId);
    instance.state = "Terminated";
    this.emit(instance, oldState, reason);
  }

  private releaseCapacity(instance: Instance): void {
    if (instance.nodeId === null || instance.nodeIncarnation === null) {
      return;
    }
    // An unknown node took its reservations with it
    this.options.catalog.release(
      instance.nodeId,
      instance.resourceRequest,
      instance.nodeIncarnation
    );
    instance.nodeIncarnation = null;
  }

  private launch(instance: Instance): void {
    const { instanceId, generation, nodeId } = instance;
    const component = this.spec.components[instance.componentName];
    if (nodeId === null || !component) {
      return;
    }
    const command = buildLaunchCommand(this.spec, component, instance);
    this.track(
      this.options.agent
        .launch(nodeId, instanceId, command, instance.resourceRequest)
        .then(
          (result) => {
            if (this.abandoned.delete(placementKey(instanceId, generation))) {
              if (result.ok) {
                this.sendKill(nodeId, instanceId);
              }
              return;
            }
            this.options.post(
              instanceId,
              result.ok
                ? { report: "started", generation }
                : {
                    report: "exited-error",
                    generation,
                    reason: `LaunchFailure: ${result.reason}`,
                  }
            );
          },
          (error: unknown) => {
            if (this.abandoned.delete(placementKey(instanceId, generation))) {
              return;
            }
            this.options.post(instanceId, {
              report: "exited-error",
              generation,
              reason: `AgentUnreachable: ${errorMessage(error)}`,
            });
          }
        )
    );
  }

  private kill(instance: Instance): void {
    if (instance.nodeId !== null) {
      this.sendKill(instance.nodeId, instance.instanceId);
    }
  }

  private sendKill(nodeId: string, instanceId: string): void {
    const { logger } = this.options;
    this.track(
      this.options.agent.kill(nodeId, instanceId).then(
        (result) => {
          if (!result.ok) {
            logger.warn(
              `[${this.scheduleName}] kill ${instanceId} on ${nodeId} failed: ${result.reason}`
            );
          }
        },
        (error: unknown) =>
          logger.warn(
            `[${this.scheduleName}] kill ${instanceId} on ${nodeId} failed: ${errorMessage(error)}`
          )
      )
    );
  }

  private track(call: Promise<void>): void {
    const tracked: Promise<void> = call.finally(() =>
      this.inFlight.delete(tracked)
    );
    this.inFlight.add(tracked);
  }

  private backoff(attempt: number): number {
    const { retryBackoffMs, maxRetryBackoffMs } = this.options.config;
    return Math.min(maxRetryBackoffMs, retryBackoffMs * 2 ** (attempt - 1));
  }

  private emit(
    instance: Instance,
    oldState: InstanceState | null,
    reason: string
  ): void {
    this.options.emit({
      scheduleName: this.scheduleName,
      instanceId: instance.instanceId,
      componentName: instance.componentName,
      oldState,
      newState: instance.state,
      timestamp: this.options.now(),
      reason,
    });
  }
}
