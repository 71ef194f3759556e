import type { FastifyInstance } from "fastify";
import { fail, ok } from "../http/envelope.js";
import type { AgentManager } from "../runtime/agent-manager.js";

interface AgentParams {
  id: string;
}

interface ExecutionQuery {
  limit?: string;
}

const MAX_EXECUTIONS = 500;

/** Read-only views over the manager; every mutation goes through the WebSocket protocol. */
export async function registerAgentRoutes(app: FastifyInstance, manager: AgentManager): Promise<void> {
  app.get("/api/agents", async (request) => {
    return ok(request, { agents: manager.list() });
  });

  app.get<{ Params: AgentParams }>("/api/agents/:id", async (request, reply) => {
    try {
      return ok(request, { agent: await manager.get(request.params.id) });
    } catch (error) {
      return fail(request, reply, error);
    }
  });

  app.get<{ Params: AgentParams; Querystring: ExecutionQuery }>(
    "/api/agents/:id/executions",
    async (request, reply) => {
      const requested = Number(request.query.limit);
      const limit =
        Number.isInteger(requested) && requested > 0 ? Math.min(requested, MAX_EXECUTIONS) : undefined;
      try {
        return ok(request, { executions: await manager.executions(request.params.id, limit) });
      } catch (error) {
        return fail(request, reply, error);
      }
    }
  );
}
