import * as _ from "lodash";
import { NodeCatalog } from "../catalog/NodeCatalog";
import {
  Instance,
  InstanceEvent,
  InstanceReportEvent,
  Logger,
  NodeAgent,
  NodeEvent,
  ScheduleSpec,
  ScheduleState,
  ScheduleStatus,
  SchedulerConfig,
} from "../types";
import { getDesiredReplicaCounts } from "../utils/schedule";
import { EventQueue } from "./EventQueue";
import { InstanceSupervisor } from "./InstanceSupervisor";

export type LoopEvent =
  | { type: "tick" }
  | { type: "node"; nodeId: string; event: NodeEvent }
  | { type: "instance"; instanceId: string; event: InstanceReportEvent }
  | { type: "cancel" }
  | { type: "update"; spec: ScheduleSpec };

export type ScheduleLoopOptions = {
  catalog: NodeCatalog;
  agent: NodeAgent;
  config: SchedulerConfig;
  logger: Logger;
  now: () => number;
  onInstanceEvent: (event: InstanceEvent) => void;
  onStatusChange: (status: ScheduleStatus) => void;
};

const TERMINAL_STATES: ScheduleState[] = ["Completed", "Failed"];

/**
 * Control loop of one schedule. Ticks, node churn, agent reports and
 * operator requests all go through one FIFO, so the supervisor only ever
 * sees one event at a time.
 */
export class ScheduleLoop {
  private spec: ScheduleSpec;
  private readonly supervisor: InstanceSupervisor;
  private readonly queue: EventQueue<LoopEvent>;
  private timer: NodeJS.Timeout | null = null;
  private state: ScheduleState = "Active";
  private cancelled = false;
  private reason: string | undefined;

  constructor(
    spec: ScheduleSpec,
    private readonly options: ScheduleLoopOptions
  ) {
    this.spec = spec;
    this.supervisor = new InstanceSupervisor({
      spec,
      catalog: options.catalog,
      agent: options.agent,
      config: options.config,
      logger: options.logger,
      now: options.now,
      emit: options.onInstanceEvent,
      post: (instanceId, event) =>
        this.enqueue({ type: "instance", instanceId, event }),
    });
    this.queue = new EventQueue<LoopEvent>(
      (event) => this.handle(event),
      (error) => this.freeze(error)
    );
  }

  get scheduleName(): string {
    return this.spec.scheduleName;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATES.includes(this.state);
  }

  // Instances not yet terminated; non-zero after a freeze
  get liveCount(): number {
    return this.supervisor.liveCount;
  }

  start(): void {
    if (this.timer || this.isTerminal) {
      return;
    }
    this.timer = setInterval(
      () => this.enqueue({ type: "tick" }),
      this.options.config.tickIntervalMs
    );
    this.timer.unref();
    this.enqueue({ type: "tick" });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  enqueue(event: LoopEvent): void {
    if (!this.isTerminal) {
      this.queue.enqueue(event);
    }
  }

  getDesiredReplicaCounts(): Record<string, number> {
    const desired = getDesiredReplicaCounts(this.spec);
    return this.cancelled ? _.mapValues(desired, () => 0) : desired;
  }

  getStatus(): ScheduleStatus {
    const status: ScheduleStatus = {
      scheduleName: this.scheduleName,
      state: this.state,
      components: this.supervisor.status(this.getDesiredReplicaCounts()),
    };
    if (this.reason) {
      status.reason = this.reason;
    }
    return status;
  }

  listInstances(): Instance[] {
    return this.supervisor.listInstances();
  }

  // Resolves once no event is queued and no agent call is outstanding
  async idle(): Promise<void> {
    while (this.queue.busy || this.supervisor.pendingAgentCalls > 0) {
      await this.queue.idle();
      await this.supervisor.settled();
    }
  }

  private handle(event: LoopEvent): void {
    if (this.isTerminal) {
      return;
    }
    switch (event.type) {
      case "tick":
        break;
      case "node":
        this.supervisor.handleNodeEvent(event.nodeId, event.event);
        break;
      case "instance":
        this.supervisor.handleInstanceEvent(event.instanceId, event.event);
        break;
      case "cancel":
        this.cancel("cancelled");
        break;
      case "update":
        if (event.spec.scheduleName === this.scheduleName && !this.cancelled) {
          this.spec = event.spec;
          this.supervisor.setSpec(event.spec);
        }
        break;
    }

    this.supervisor.checkLaunchTimeouts();
    this.supervisor.reconcile(
      this.getDesiredReplicaCounts(),
      this.options.catalog.snapshot()
    );
    this.evaluate();
  }

  // Idempotent; in-flight agent calls finish on their own
  private cancel(reason: string): void {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;
    this.reason = reason;
    this.options.logger.info(`[${this.scheduleName}] ${reason}, draining`);
  }

  private evaluate(): void {
    const components = this.supervisor.status(this.getDesiredReplicaCounts());
    const exhausted = Object.entries(components).filter(
      ([, component]) =>
        component.desired > 0 &&
        component.terminatedWithError >= component.desired
    );
    if (exhausted.length > 0 && !this.cancelled) {
      this.cancel(
        exhausted
          .map(
            ([name, component]) =>
              `${name}: ${component.blockingReason ?? "retries exhausted"}`
          )
          .join("; ")
      );
      this.supervisor.reconcile(
        this.getDesiredReplicaCounts(),
        this.options.catalog.snapshot()
      );
    }

    let next: ScheduleState = this.cancelled ? "Draining" : "Active";
    if (this.supervisor.liveCount === 0) {
      const errored = Object.entries(components).filter(
        ([, component]) => component.terminatedWithError > 0
      );
      if (errored.length > 0) {
        next = "Failed";
        if (!this.reason || this.reason === "cancelled") {
          this.reason = errored
            .map(
              ([name, component]) =>
                `${name}: ${component.blockingReason ?? "retries exhausted"}`
            )
            .join("; ");
        }
      } else if (
        Object.values(components).every(
          (component) =>
            component.desired === 0 || component.succeeded >= component.desired
        )
      ) {
        next = "Completed";
      }
    }
    this.transition(next);
  }

  /**
   * A broken invariant stops this schedule only. State is left as it was
   * for inspection.
   */
  private freeze(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.options.logger.error(
      `[${this.scheduleName}] control loop stopped: ${message}`
    );
    this.reason = message;
    this.transition("Failed");
  }

  private transition(next: ScheduleState): void {
    if (next === this.state) {
      return;
    }
    this.state = next;
    if (this.isTerminal) {
      this.stop();
      this.queue.close();
    }
    this.options.onStatusChange(this.getStatus());
  }
}
