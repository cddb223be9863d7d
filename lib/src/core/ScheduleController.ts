import { EventEmitter } from "events";
import * as _ from "lodash";
import { NodeCatalog } from "../catalog/NodeCatalog";
import { ScheduleConflictError, ScheduleNotFoundError } from "../errors";
import {
  CapacityOutcome,
  Clock,
  ClusterEvent,
  DEFAULT_SCHEDULER_CONFIG,
  Instance,
  InstanceEvent,
  InstanceReportEvent,
  Logger,
  NodeAgent,
  NodeEvent,
  ScheduleSpec,
  ScheduleStatus,
  SchedulerConfig,
} from "../types";
import { ScheduleLoop } from "./ScheduleLoop";

export type ScheduleControllerOptions = {
  agent: NodeAgent;
  config?: Partial<SchedulerConfig>;
  logger?: Logger;
  now?: Clock;
  // Shared with other controllers when given
  catalog?: NodeCatalog;
};

type ControllerEvents = {
  instance: [InstanceEvent];
  schedule: [ScheduleStatus];
};

/**
 * Top-level driver. Owns the cluster-wide NodeCatalog, feeds it from the
 * ClusterState stream and runs one ScheduleLoop per active schedule.
 */
export class ScheduleController {
  readonly catalog: NodeCatalog;
  readonly config: SchedulerConfig;
  private readonly agent: NodeAgent;
  private readonly logger: Logger;
  private readonly now: Clock;
  private readonly loops = new Map<string, ScheduleLoop>();
  // Loops that reached Completed or Failed, kept for inspection
  private readonly finished = new Map<string, ScheduleLoop>();
  // Finished loops that may still have kill calls outstanding
  private retired: ScheduleLoop[] = [];
  private readonly emitter = new EventEmitter();
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: ScheduleControllerOptions) {
    this.agent = options.agent;
    this.config = _.defaults({}, options.config, DEFAULT_SCHEDULER_CONFIG);
    this.logger = options.logger ?? console;
    this.now = options.now ?? Date.now;
    this.catalog = options.catalog ?? new NodeCatalog();
    this.emitter.setMaxListeners(100);
  }

  on<K extends keyof ControllerEvents>(
    event: K,
    listener: (...args: ControllerEvents[K]) => void
  ): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends keyof ControllerEvents>(
    event: K,
    listener: (...args: ControllerEvents[K]) => void
  ): this {
    this.emitter.off(event, listener);
    return this;
  }

  // Periodic heartbeat sweep; schedule loops run their own ticks
  start(): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(
      () => this.sweepHeartbeats(),
      this.config.tickIntervalMs
    );
    this.sweepTimer.unref();
  }

  /**
   * Starts a control loop for the schedule. A name is free again once its
   * previous run has finished without leaving instances placed; a loop
   * stopped on a broken invariant keeps its instances and its name.
   */
  activate(spec: ScheduleSpec): ScheduleStatus {
    if (this.loops.has(spec.scheduleName)) {
      throw new ScheduleConflictError(
        `Schedule "${spec.scheduleName}" is already active`
      );
    }
    const previous = this.finished.get(spec.scheduleName);
    if (previous && previous.liveCount > 0) {
      throw new ScheduleConflictError(
        `Schedule "${spec.scheduleName}" stopped with ${previous.liveCount} instance(s) still placed`
      );
    }
    this.finished.delete(spec.scheduleName);

    const loop = new ScheduleLoop(spec, {
      catalog: this.catalog,
      agent: this.agent,
      config: this.config,
      logger: this.logger,
      now: this.now,
      onInstanceEvent: (event) => this.emitter.emit("instance", event),
      onStatusChange: (status) => this.handleStatusChange(status),
    });
    this.loops.set(spec.scheduleName, loop);
    this.logger.info(
      `[${spec.scheduleName}] activated with jobs ${spec.jobNames.join(", ")}`
    );
    loop.start();
    return loop.getStatus();
  }

  /**
   * Swaps in a new version of an active schedule, e.g. with different job
   * names. Components leaving the active set are scaled down to zero.
   */
  update(spec: ScheduleSpec): void {
    this.getLoop(spec.scheduleName).enqueue({ type: "update", spec });
  }

  // Re-cancelling, or cancelling a finished schedule, is a no-op
  cancel(scheduleName: string): void {
    if (this.finished.has(scheduleName)) {
      return;
    }
    this.getLoop(scheduleName).enqueue({ type: "cancel" });
  }

  reportInstanceEvent(
    scheduleName: string,
    instanceId: string,
    event: InstanceReportEvent
  ): void {
    if (this.finished.has(scheduleName)) {
      return;
    }
    this.getLoop(scheduleName).enqueue({ type: "instance", instanceId, event });
  }

  applyClusterEvent(event: ClusterEvent): CapacityOutcome {
    switch (event.type) {
      case "heartbeat": {
        const known = this.catalog.getNode(event.nodeId);
        const outcome = this.catalog.upsertNode(
          event.nodeId,
          event.capacity,
          this.now()
        );
        if (!outcome.ok) {
          this.logger.warn(`Heartbeat rejected: ${outcome.message}`);
          return outcome;
        }
        if (!known || known.status === "unreachable") {
          this.logger.info(`Node ${event.nodeId} ready`);
          this.wakeAll();
        }
        return outcome;
      }
      case "drain":
        if (!this.catalog.hasNode(event.nodeId)) {
          return this.unknownNode(event.nodeId);
        }
        this.catalog.markDraining(event.nodeId);
        return { ok: true };
      case "unreachable":
        if (!this.catalog.hasNode(event.nodeId)) {
          return this.unknownNode(event.nodeId);
        }
        if (this.catalog.markUnreachable(event.nodeId)) {
          this.broadcastNodeEvent(event.nodeId, "unreachable");
        }
        return { ok: true };
      case "removed":
        if (!this.catalog.removeNode(event.nodeId)) {
          return this.unknownNode(event.nodeId);
        }
        this.logger.info(`Node ${event.nodeId} removed`);
        this.broadcastNodeEvent(event.nodeId, "removed");
        return { ok: true };
    }
  }

  // Nodes silent past the heartbeat timeout become unreachable
  sweepHeartbeats(): string[] {
    const stale = this.catalog.sweepHeartbeats(
      this.now(),
      this.config.heartbeatTimeoutMs
    );
    stale.forEach((nodeId) => {
      this.logger.warn(`Node ${nodeId} missed heartbeats, marking unreachable`);
      this.broadcastNodeEvent(nodeId, "unreachable");
    });
    return stale;
  }

  // Wakes every loop without waiting for its timer
  tick(): void {
    this.wakeAll();
  }

  status(scheduleName: string): ScheduleStatus {
    return this.findLoop(scheduleName).getStatus();
  }

  listStatuses(): ScheduleStatus[] {
    return _.sortBy(
      [...this.loops.values(), ...this.finished.values()].map((loop) =>
        loop.getStatus()
      ),
      (status) => status.scheduleName
    );
  }

  // Also answers for finished schedules
  listInstances(scheduleName: string): Instance[] {
    return this.findLoop(scheduleName).listInstances();
  }

  // Resolves once every loop has drained its queue and agent calls
  async idle(): Promise<void> {
    await Promise.all(
      [...this.loops.values(), ...this.retired].map((loop) => loop.idle())
    );
    this.retired = [];
  }

  shutdown(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.loops.forEach((loop) => loop.stop());
  }

  private getLoop(scheduleName: string): ScheduleLoop {
    const loop = this.loops.get(scheduleName);
    if (!loop) {
      throw new ScheduleNotFoundError(scheduleName);
    }
    return loop;
  }

  private findLoop(scheduleName: string): ScheduleLoop {
    const loop =
      this.loops.get(scheduleName) ?? this.finished.get(scheduleName);
    if (!loop) {
      throw new ScheduleNotFoundError(scheduleName);
    }
    return loop;
  }

  private wakeAll(): void {
    this.loops.forEach((loop) => loop.enqueue({ type: "tick" }));
  }

  private broadcastNodeEvent(nodeId: string, event: NodeEvent): void {
    this.loops.forEach((loop) => loop.enqueue({ type: "node", nodeId, event }));
  }

  private handleStatusChange(status: ScheduleStatus): void {
    if (status.state === "Completed" || status.state === "Failed") {
      const loop = this.loops.get(status.scheduleName);
      if (loop) {
        this.retired.push(loop);
        this.loops.delete(status.scheduleName);
        this.finished.set(status.scheduleName, loop);
      }
      const message = `[${status.scheduleName}] ${status.state}${
        status.reason ? `: ${status.reason}` : ""
      }`;
      if (status.state === "Failed") {
        this.logger.warn(message);
      } else {
        this.logger.info(message);
      }
    }
    this.emitter.emit("schedule", status);
  }

  private unknownNode(nodeId: string): CapacityOutcome {
    return {
      ok: false,
      kind: "UnknownNode",
      message: `Node "${nodeId}" is not in the catalog`,
    };
  }
}
