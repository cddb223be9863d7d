import {
  AgentResult,
  LaunchCommand,
  NodeAgent,
  ResourceVector,
} from "cluster-scheduler";

export type AddressResolver = (nodeId: string) => string | undefined;

/**
 * Talks to the agent server running on every node:
 *   POST   {address}/containers
 *   DELETE {address}/containers/:name
 * Network errors reject and are reported by the supervisor as an unreachable
 * agent.
 */
export class HttpNodeAgent implements NodeAgent {
  constructor(
    private readonly resolveAddress: AddressResolver,
    private readonly timeoutMs: number
  ) {}

  async launch(
    nodeId: string,
    instanceId: string,
    launchCommand: LaunchCommand,
    resourceRequest: ResourceVector
  ): Promise<AgentResult> {
    const address = this.resolveAddress(nodeId);
    if (!address) {
      return { ok: false, reason: `no agent address for node ${nodeId}` };
    }
    const response = await fetch(`${address}/containers`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        name: instanceId,
        image: launchCommand.image,
        command: launchCommand.command,
        mount_target: launchCommand.mountTarget,
        environment: launchCommand.environment,
        resources: resourceRequest,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    return toResult(response);
  }

  async kill(nodeId: string, instanceId: string): Promise<AgentResult> {
    const address = this.resolveAddress(nodeId);
    if (!address) {
      return { ok: false, reason: `no agent address for node ${nodeId}` };
    }
    const response = await fetch(
      `${address}/containers/${encodeURIComponent(instanceId)}`,
      { method: "DELETE", signal: AbortSignal.timeout(this.timeoutMs) }
    );
    return toResult(response);
  }
}

const toResult = async (response: Response): Promise<AgentResult> => {
  if (response.ok) {
    return { ok: true };
  }
  const body = await response.text();
  return {
    ok: false,
    reason: `HTTP ${response.status}${body ? `: ${body}` : ""}`,
  };
};
