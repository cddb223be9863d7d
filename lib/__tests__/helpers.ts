import {
  AgentResult,
  getScheduleFromDescriptor,
  LaunchCommand,
  Logger,
  Node,
  NodeAgent,
  ResourceVector,
  ScheduleDescriptor,
  ScheduleSpec,
} from "../src";
import { createResources, ZERO_RESOURCES } from "../src/utils/resources";

export type LaunchCall = {
  nodeId: string;
  instanceId: string;
  launchCommand: LaunchCommand;
};

export class FakeNodeAgent implements NodeAgent {
  launches: LaunchCall[] = [];
  kills: Array<{ nodeId: string; instanceId: string }> = [];
  launchResult: (nodeId: string, instanceId: string) => Promise<AgentResult> =
    async () => ({ ok: true });

  async launch(
    nodeId: string,
    instanceId: string,
    launchCommand: LaunchCommand,
    _resourceRequest: ResourceVector
  ): Promise<AgentResult> {
    this.launches.push({ nodeId, instanceId, launchCommand });
    return this.launchResult(nodeId, instanceId);
  }

  async kill(nodeId: string, instanceId: string): Promise<AgentResult> {
    this.kills.push({ nodeId, instanceId });
    return { ok: true };
  }
}

export class ManualClock {
  time = 0;
  now = (): number => this.time;
  advance(ms: number): void {
    this.time += ms;
  }
}

export const createLogger = (): jest.Mocked<Logger> => ({
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
});

export const makeNode = (
  nodeId: string,
  total: ResourceVector,
  overrides: Partial<Node> = {}
): Node => ({
  nodeId,
  totalCapacity: total,
  allocated: ZERO_RESOURCES,
  status: "ready",
  incarnation: 1,
  lastHeartbeatAt: 0,
  ...overrides,
});

export const cpuNode = (nodeId: string, cpu: number): Node =>
  makeNode(nodeId, createResources(cpu, 65536, 4));

export const trainingDescriptor = (): ScheduleDescriptor => ({
  name: "train",
  allocation: { mode: "single-metric-balanced", metric: "cpu" },
  job_names: ["job-a"],
  components: {
    actor: {
      image: "trainer:latest",
      resources: { cpu: 2, memory: "4096m", gpu: 0 },
      num: 2,
      mount: { target: "/mnt/data" },
      command: "python /mnt/data/run_actor.py",
    },
    learner: {
      image: "trainer:latest",
      resources: { cpu: 4, memory: "8192m", gpu: 0 },
      num: 1,
      mount: { target: "/mnt/data" },
      command: "python /mnt/data/run_learner.py",
    },
  },
});

export const trainingSchedule = (
  overrides: Partial<ScheduleDescriptor> = {}
): ScheduleSpec =>
  getScheduleFromDescriptor({ ...trainingDescriptor(), ...overrides });
