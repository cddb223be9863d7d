import { ScheduleController } from "cluster-scheduler";
import { createApp } from "./app";
import { loadServiceConfig } from "./config";
import { HttpNodeAgent } from "./nodeAgent";

const config = loadServiceConfig();

const agentAddresses = new Map<string, string>();
const controller = new ScheduleController({
  agent: new HttpNodeAgent(
    (nodeId) => agentAddresses.get(nodeId),
    config.agentRequestTimeoutMs
  ),
  config: config.scheduler,
});

controller.on("instance", (event) => {
  console.log(
    `[${event.scheduleName}] ${event.instanceId} ${event.oldState ?? "-"} -> ${event.newState} (${event.reason})`
  );
});
controller.on("schedule", (status) => {
  console.log(`[${status.scheduleName}] schedule ${status.state}`);
});
controller.start();

const app = createApp(controller, agentAddresses);

app.listen(config.port, () => {
  console.log(`Scheduler master listening on port ${config.port}`);
  console.log(`Health check: http://localhost:${config.port}/status`);
  console.log(`Schedules API: http://localhost:${config.port}/schedules`);
});
