import express, { Response } from "express";
import { z } from "zod";
import {
  createResources,
  getScheduleFromDescriptor,
  parseMemory,
  ScheduleController,
  SchedulerError,
} from "cluster-scheduler";

const ResourcesSchema = z.object({
  cpu: z.number().int().nonnegative(),
  memory: z.union([z.string(), z.number().int().nonnegative()]),
  gpu: z.number().int().nonnegative(),
});

const NodeBodySchema = z.object({
  nodeId: z.string().min(1),
  // Base URL of the agent server on that node
  address: z.string().url().optional(),
  resources: ResourcesSchema,
});

const HeartbeatBodySchema = z.object({
  resources: ResourcesSchema.optional(),
});

const InstanceEventBodySchema = z.object({
  report: z.enum(["started", "exited-ok", "exited-error", "crashed"]),
  generation: z.number().int().positive(),
  reason: z.string().optional(),
});

const STATUS_BY_CODE: Record<string, number> = {
  DESCRIPTOR_VALIDATION: 400,
  INVARIANT_VIOLATION: 400,
  SCHEDULE_NOT_FOUND: 404,
  SCHEDULE_CONFLICT: 409,
};

const sendError = (res: Response, error: unknown) => {
  if (error instanceof z.ZodError) {
    return res.status(400).json({
      success: false,
      error: error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join(", "),
    });
  }
  if (error instanceof SchedulerError) {
    return res
      .status(STATUS_BY_CODE[error.code] ?? 500)
      .json({ success: false, error: error.message, code: error.code });
  }
  console.error("Unexpected error:", error);
  return res.status(500).json({
    success: false,
    error: error instanceof Error ? error.message : "Internal server error",
  });
};

const toResources = (resources: z.infer<typeof ResourcesSchema>) =>
  createResources(resources.cpu, parseMemory(resources.memory), resources.gpu);

/**
 * Master API: node membership in, schedules and instance reports in,
 * statuses out.
 * @param agentAddresses node id -> agent base URL, shared with the HttpNodeAgent
 */
export const createApp = (
  controller: ScheduleController,
  agentAddresses: Map<string, string>
) => {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/status", (req, res) => {
    res.json({ status: "OK", time: Date.now() });
  });

  // Nodes

  app.get("/nodes", (req, res) => {
    res.json({ success: true, data: controller.catalog.snapshot() });
  });

  app.get("/nodes/:nodeId", (req, res) => {
    const node = controller.catalog.getNode(req.params.nodeId);
    if (!node) {
      return res
        .status(404)
        .json({ success: false, error: `Node "${req.params.nodeId}" not found` });
    }
    return res.json({ success: true, data: node });
  });

  app.post("/nodes", (req, res) => {
    try {
      const body = NodeBodySchema.parse(req.body);
      const outcome = controller.applyClusterEvent({
        type: "heartbeat",
        nodeId: body.nodeId,
        capacity: toResources(body.resources),
      });
      if (!outcome.ok) {
        return res.status(409).json({ success: false, error: outcome.message });
      }
      if (body.address) {
        agentAddresses.set(body.nodeId, body.address);
      }
      return res
        .status(201)
        .json({ success: true, data: controller.catalog.getNode(body.nodeId) });
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.post("/nodes/:nodeId/heartbeat", (req, res) => {
    try {
      const { nodeId } = req.params;
      const body = HeartbeatBodySchema.parse(req.body ?? {});
      const capacity = body.resources
        ? toResources(body.resources)
        : controller.catalog.getNode(nodeId)?.totalCapacity;
      if (!capacity) {
        return res
          .status(404)
          .json({ success: false, error: `Node "${nodeId}" not found` });
      }
      const outcome = controller.applyClusterEvent({
        type: "heartbeat",
        nodeId,
        capacity,
      });
      if (!outcome.ok) {
        return res.status(409).json({ success: false, error: outcome.message });
      }
      return res.json({ success: true });
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.post("/nodes/:nodeId/drain", (req, res) => {
    const outcome = controller.applyClusterEvent({
      type: "drain",
      nodeId: req.params.nodeId,
    });
    if (!outcome.ok) {
      return res.status(404).json({ success: false, error: outcome.message });
    }
    return res.json({ success: true });
  });

  app.delete("/nodes/:nodeId", (req, res) => {
    const { nodeId } = req.params;
    const outcome = controller.applyClusterEvent({ type: "removed", nodeId });
    if (!outcome.ok) {
      return res.status(404).json({ success: false, error: outcome.message });
    }
    agentAddresses.delete(nodeId);
    return res.json({ success: true });
  });

  // Schedules

  app.get("/schedules", (req, res) => {
    res.json({ success: true, data: controller.listStatuses() });
  });

  app.post("/schedules", (req, res) => {
    try {
      const spec = getScheduleFromDescriptor(req.body);
      const status = controller.activate(spec);
      return res.status(201).json({ success: true, data: status });
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.put("/schedules/:name", (req, res) => {
    try {
      const spec = getScheduleFromDescriptor(req.body);
      if (spec.scheduleName !== req.params.name) {
        return res.status(400).json({
          success: false,
          error: `Schedule name "${spec.scheduleName}" does not match "${req.params.name}"`,
        });
      }
      controller.update(spec);
      return res.status(202).json({ success: true });
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.get("/schedules/:name", (req, res) => {
    try {
      return res.json({ success: true, data: controller.status(req.params.name) });
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.get("/schedules/:name/instances", (req, res) => {
    try {
      return res.json({
        success: true,
        data: controller.listInstances(req.params.name),
      });
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.delete("/schedules/:name", (req, res) => {
    try {
      controller.cancel(req.params.name);
      return res.status(202).json({ success: true });
    } catch (error) {
      return sendError(res, error);
    }
  });

  // Reports from node agents
  app.post("/schedules/:name/instances/:instanceId/events", (req, res) => {
    try {
      const event = InstanceEventBodySchema.parse(req.body);
      controller.reportInstanceEvent(
        req.params.name,
        req.params.instanceId,
        event
      );
      return res.status(202).json({ success: true });
    } catch (error) {
      return sendError(res, error);
    }
  });

  return app;
};
