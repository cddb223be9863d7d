import { NodeCatalog } from "../src/catalog/NodeCatalog";
import { InstanceSupervisor } from "../src/core/InstanceSupervisor";
import {
  AgentResult,
  DEFAULT_SCHEDULER_CONFIG,
  InstanceEvent,
  InstanceReportEvent,
  SchedulerConfig,
  ScheduleSpec,
} from "../src/types";
import { createResources } from "../src/utils/resources";
import { getScheduleFromDescriptor } from "../src/utils/schedule";
import {
  createLogger,
  FakeNodeAgent,
  ManualClock,
  trainingDescriptor,
  trainingSchedule,
} from "./helpers";

type Posted = { instanceId: string; event: InstanceReportEvent };

describe("InstanceSupervisor", () => {
  let catalog: NodeCatalog;
  let agent: FakeNodeAgent;
  let clock: ManualClock;
  let logger: ReturnType<typeof createLogger>;
  let events: InstanceEvent[];
  let posted: Posted[];

  const createSupervisor = (
    spec: ScheduleSpec = trainingSchedule(),
    config: Partial<SchedulerConfig> = {}
  ) =>
    new InstanceSupervisor({
      spec,
      catalog,
      agent,
      config: { ...DEFAULT_SCHEDULER_CONFIG, ...config },
      logger,
      now: clock.now,
      emit: (event) => events.push(event),
      post: (instanceId, event) => posted.push({ instanceId, event }),
    });

  // Hands every posted agent result back to the supervisor
  const deliver = async (supervisor: InstanceSupervisor) => {
    await supervisor.settled();
    posted
      .splice(0, posted.length)
      .forEach(({ instanceId, event }) =>
        supervisor.handleInstanceEvent(instanceId, event)
      );
  };

  const desired = { actor: 2, learner: 1 };

  beforeEach(() => {
    catalog = new NodeCatalog();
    agent = new FakeNodeAgent();
    clock = new ManualClock();
    logger = createLogger();
    events = [];
    posted = [];
    catalog.upsertNode("node-a", createResources(8, 32768, 0), 0);
  });

  it("should create, place and launch every desired replica", async () => {
    const supervisor = createSupervisor();
    supervisor.reconcile(desired, catalog.snapshot());

    expect(agent.launches.map((call) => [call.nodeId, call.instanceId])).toEqual([
      ["node-a", "train-actor-1"],
      ["node-a", "train-actor-2"],
      ["node-a", "train-learner-3"],
    ]);
    expect(catalog.getNode("node-a")?.allocated).toEqual({
      cpu: 8,
      memory: 16384,
      gpu: 0,
    });
    expect(supervisor.status(desired).actor).toEqual({
      desired: 2,
      pending: 0,
      launching: 2,
      running: 0,
      failed: 0,
      succeeded: 0,
      terminatedWithError: 0,
    });

    await deliver(supervisor);
    expect(supervisor.status(desired).actor.running).toBe(2);
    expect(supervisor.status(desired).learner.running).toBe(1);
    expect(events.slice(0, 2)).toEqual([
      {
        scheduleName: "train",
        instanceId: "train-actor-1",
        componentName: "actor",
        oldState: null,
        newState: "Pending",
        timestamp: 0,
        reason: "replica created",
      },
      {
        scheduleName: "train",
        instanceId: "train-actor-2",
        componentName: "actor",
        oldState: null,
        newState: "Pending",
        timestamp: 0,
        reason: "replica created",
      },
    ]);
  });

  it("should not issue agent calls when nothing changed", async () => {
    const supervisor = createSupervisor();
    supervisor.reconcile(desired, catalog.snapshot());
    supervisor.reconcile(desired, catalog.snapshot());
    expect(agent.launches).toHaveLength(3);

    await deliver(supervisor);
    supervisor.reconcile(desired, catalog.snapshot());
    expect(agent.launches).toHaveLength(3);
    expect(agent.kills).toHaveLength(0);
  });

  it("should reschedule every resident of a removed node exactly once", async () => {
    catalog.upsertNode("node-b", createResources(4, 16384, 0), 0);
    const supervisor = createSupervisor();
    supervisor.reconcile(desired, catalog.snapshot());
    await deliver(supervisor);
    // balanced on cpu: actor-1 -> a (8), actor-2 -> a (6 vs 4), learner-3 -> a (4 vs 4, by id)
    expect(
      supervisor.listInstances().map((instance) => instance.nodeId)
    ).toEqual(["node-a", "node-a", "node-a"]);

    catalog.removeNode("node-a");
    events = [];
    supervisor.handleNodeEvent("node-a", "removed");

    expect(
      events.map((event) => [event.instanceId, event.oldState, event.newState])
    ).toEqual([
      ["train-actor-1", "Running", "Pending"],
      ["train-actor-2", "Running", "Pending"],
      ["train-learner-3", "Running", "Pending"],
    ]);
    supervisor.handleNodeEvent("node-a", "removed");
    expect(events).toHaveLength(3);

    supervisor.reconcile(desired, catalog.snapshot());
    const instances = supervisor.listInstances();
    expect(instances.map((instance) => instance.instanceId)).toEqual([
      "train-actor-1",
      "train-actor-2",
      "train-learner-3",
    ]);
    expect(instances.map((instance) => [instance.state, instance.nodeId])).toEqual([
      ["Launching", "node-b"],
      ["Launching", "node-b"],
      ["Pending", null],
    ]);
    expect(catalog.getNode("node-b")?.allocated.cpu).toBe(4);
  });

  it("should release the capacity of an unreachable node", async () => {
    const supervisor = createSupervisor();
    supervisor.reconcile(desired, catalog.snapshot());
    await deliver(supervisor);

    catalog.markUnreachable("node-a");
    supervisor.handleNodeEvent("node-a", "unreachable");

    expect(catalog.getNode("node-a")?.allocated).toEqual({ cpu: 0, memory: 0, gpu: 0 });
    expect(supervisor.status(desired).actor.pending).toBe(2);
    expect(logger.warn).toHaveBeenCalledWith(
      "[train] node node-a unreachable, rescheduling 3 instance(s)"
    );
  });

  it("should retry failures and give up after the last attempt", () => {
    const spec = getScheduleFromDescriptor({
      ...trainingDescriptor(),
      components: { learner: trainingDescriptor().components.learner },
    });
    const supervisor = createSupervisor(spec, { maxAttempts: 3, retryBackoffMs: 0 });
    const want = { learner: 1 };

    for (let attempt = 1; attempt <= 3; attempt++) {
      supervisor.reconcile(want, catalog.snapshot());
      supervisor.handleInstanceEvent("train-learner-1", {
        report: "crashed",
        generation: attempt,
        reason: "segfault",
      });
    }

    expect(supervisor.liveCount).toBe(0);
    expect(supervisor.status(want).learner).toEqual({
      desired: 1,
      pending: 0,
      launching: 0,
      running: 0,
      failed: 0,
      succeeded: 0,
      terminatedWithError: 1,
      blockingReason: "segfault",
    });
    expect(events[events.length - 1]).toMatchObject({
      instanceId: "train-learner-1",
      oldState: "Failed",
      newState: "Terminated",
      reason: "retries exhausted: segfault",
    });
    expect(catalog.getNode("node-a")?.allocated.cpu).toBe(0);

    // never resurrected
    supervisor.reconcile(want, catalog.snapshot());
    expect(supervisor.liveCount).toBe(0);
    expect(agent.launches).toHaveLength(3);
  });

  it("should hold a failed instance back for the retry backoff", () => {
    const supervisor = createSupervisor(trainingSchedule(), { retryBackoffMs: 1000 });
    const want = { actor: 1 };
    supervisor.reconcile(want, catalog.snapshot());
    supervisor.handleInstanceEvent("train-actor-1", {
      report: "exited-error",
      generation: 1,
    });

    const [instance] = supervisor.listInstances();
    expect(instance).toMatchObject({
      state: "Pending",
      attemptCount: 1,
      notBefore: 1000,
      lastError: "exited-error",
    });

    supervisor.reconcile(want, catalog.snapshot());
    expect(agent.launches).toHaveLength(1);

    clock.advance(1000);
    supervisor.reconcile(want, catalog.snapshot());
    expect(agent.launches).toHaveLength(2);
    expect(agent.launches[1].launchCommand.environment.ATTEMPT).toBe("1");
  });

  it("should ignore reports about an earlier placement", () => {
    const supervisor = createSupervisor(trainingSchedule(), { retryBackoffMs: 0 });
    const want = { actor: 1 };
    supervisor.reconcile(want, catalog.snapshot());
    supervisor.handleInstanceEvent("train-actor-1", { report: "crashed", generation: 1 });
    supervisor.reconcile(want, catalog.snapshot());

    supervisor.handleInstanceEvent("train-actor-1", { report: "started", generation: 1 });
    expect(supervisor.getInstance("train-actor-1")).toMatchObject({
      state: "Launching",
      generation: 2,
    });

    supervisor.handleInstanceEvent("train-actor-1", { report: "started", generation: 2 });
    expect(supervisor.getInstance("train-actor-1")?.state).toBe("Running");
  });

  it("should treat a launch that never answers as a failure", () => {
    agent.launchResult = () => new Promise(() => undefined);
    const supervisor = createSupervisor(trainingSchedule(), { launchTimeoutMs: 1000 });
    supervisor.reconcile({ actor: 1 }, catalog.snapshot());

    clock.advance(999);
    supervisor.checkLaunchTimeouts();
    expect(supervisor.getInstance("train-actor-1")?.state).toBe("Launching");

    clock.advance(1);
    supervisor.checkLaunchTimeouts();
    expect(agent.kills).toEqual([{ nodeId: "node-a", instanceId: "train-actor-1" }]);
    expect(supervisor.getInstance("train-actor-1")).toMatchObject({
      state: "Pending",
      attemptCount: 1,
      nodeId: null,
      lastError: "launch timed out after 1000ms",
    });
    expect(catalog.getNode("node-a")?.allocated.cpu).toBe(0);
  });

  it("should fold agent launch failures into the retry policy", async () => {
    agent.launchResult = async () => ({ ok: false, reason: "image not found" });
    const supervisor = createSupervisor();
    supervisor.reconcile({ actor: 1 }, catalog.snapshot());
    await deliver(supervisor);

    expect(supervisor.getInstance("train-actor-1")).toMatchObject({
      state: "Pending",
      attemptCount: 1,
      lastError: "LaunchFailure: image not found",
    });
  });

  it("should report an agent that throws as unreachable", async () => {
    agent.launchResult = async () => {
      throw new Error("connection refused");
    };
    const supervisor = createSupervisor();
    supervisor.reconcile({ actor: 1 }, catalog.snapshot());
    await deliver(supervisor);

    expect(supervisor.getInstance("train-actor-1")?.lastError).toBe(
      "AgentUnreachable: connection refused"
    );
  });

  it("should keep unplaceable instances pending and warn when it persists", () => {
    const supervisor = createSupervisor(trainingSchedule(), {
      retryBackoffMs: 0,
      infeasibleWarnAfterTicks: 2,
    });
    catalog.reserve("node-a", createResources(6, 0, 0));
    const before = catalog.snapshot();

    supervisor.reconcile({ learner: 1 }, catalog.snapshot());
    expect(supervisor.getInstance("train-learner-1")).toMatchObject({
      state: "Pending",
      infeasibleTicks: 1,
    });
    expect(catalog.snapshot()).toEqual(before);
    expect(logger.warn).not.toHaveBeenCalled();

    supervisor.reconcile({ learner: 1 }, catalog.snapshot());
    supervisor.reconcile({ learner: 1 }, catalog.snapshot());
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(supervisor.status({ learner: 1 }).learner.blockingReason).toBe(
      'No node can host a replica of "learner" (unplaced for 3 ticks)'
    );
    expect(agent.launches).toHaveLength(0);
  });

  it("should put an instance back to pending when its plan went stale", () => {
    const supervisor = createSupervisor();
    const stale = catalog.snapshot();
    // another schedule takes the node in between
    catalog.reserve("node-a", createResources(8, 0, 0));

    supervisor.reconcile({ actor: 1 }, stale);
    expect(supervisor.getInstance("train-actor-1")?.state).toBe("Pending");
    expect(agent.launches).toHaveLength(0);
    expect(logger.info).toHaveBeenCalledWith(
      '[train] train-actor-1 not placed: Node "node-a" has cpu=0 memory=32768MB gpu=0 free, cpu=2 memory=4096MB gpu=0 requested'
    );
  });

  it("should scale down the newest instances first", async () => {
    const supervisor = createSupervisor();
    supervisor.reconcile({ actor: 2 }, catalog.snapshot());
    await deliver(supervisor);

    supervisor.reconcile({ actor: 1 }, catalog.snapshot());
    expect(agent.kills).toEqual([{ nodeId: "node-a", instanceId: "train-actor-2" }]);
    expect(supervisor.listInstances().map((instance) => instance.instanceId)).toEqual([
      "train-actor-1",
    ]);
    expect(catalog.getNode("node-a")?.allocated.cpu).toBe(2);
  });

  it("should kill a replica removed mid-launch once its launch answers", async () => {
    let answer: (result: AgentResult) => void = () => undefined;
    agent.launchResult = () =>
      new Promise<AgentResult>((resolve) => {
        answer = resolve;
      });
    const supervisor = createSupervisor();
    supervisor.reconcile({ actor: 1 }, catalog.snapshot());
    supervisor.reconcile({ actor: 0 }, catalog.snapshot());

    expect(agent.kills).toEqual([]);
    expect(supervisor.liveCount).toBe(0);
    expect(catalog.getNode("node-a")?.allocated.cpu).toBe(0);

    answer({ ok: true });
    await supervisor.settled();

    expect(agent.kills).toEqual([{ nodeId: "node-a", instanceId: "train-actor-1" }]);
    expect(posted).toEqual([]);
  });

  it("should not kill a replica removed mid-launch whose launch failed", async () => {
    let answer: (result: AgentResult) => void = () => undefined;
    agent.launchResult = () =>
      new Promise<AgentResult>((resolve) => {
        answer = resolve;
      });
    const supervisor = createSupervisor();
    supervisor.reconcile({ actor: 1 }, catalog.snapshot());
    supervisor.reconcile({ actor: 0 }, catalog.snapshot());

    answer({ ok: false, reason: "image not found" });
    await supervisor.settled();

    expect(agent.kills).toEqual([]);
    expect(posted).toEqual([]);
  });

  it("should count a clean exit as done and not replace it", async () => {
    const supervisor = createSupervisor();
    supervisor.reconcile({ actor: 1 }, catalog.snapshot());
    await deliver(supervisor);

    supervisor.handleInstanceEvent("train-actor-1", { report: "exited-ok", generation: 1 });
    supervisor.reconcile({ actor: 1 }, catalog.snapshot());

    expect(supervisor.liveCount).toBe(0);
    expect(supervisor.status({ actor: 1 }).actor.succeeded).toBe(1);
    expect(agent.launches).toHaveLength(1);
  });
});
