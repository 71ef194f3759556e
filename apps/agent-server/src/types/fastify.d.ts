import type { AgentManager } from "../runtime/agent-manager.js";

declare module "fastify" {
  interface FastifyInstance {
    agents: AgentManager;
  }
}
