import { ResourceVector } from "./Resources";
import { LaunchCommand } from "./Schedule";

export type AgentResult = { ok: true } | { ok: false; reason: string };

/**
 * Capability that starts and stops instances on a node. Implementations
 * report failures through the result, the supervisor folds them in.
 */
export interface NodeAgent {
  launch(
    nodeId: string,
    instanceId: string,
    launchCommand: LaunchCommand,
    resourceRequest: ResourceVector
  ): Promise<AgentResult>;
  kill(nodeId: string, instanceId: string): Promise<AgentResult>;
}
