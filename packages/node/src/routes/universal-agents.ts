/**
 * Universal agent routes.
 *
 * GET    /api/v1/universal-agents                     — List universal agents
 * POST   /api/v1/universal-agents                     — Add (universal-agent manager)
 * DELETE /api/v1/universal-agents/:agent              — Remove (universal-agent manager)
 * GET    /api/v1/universal-agents/managers            — List managers
 * POST   /api/v1/universal-agents/managers            — Add (authorizer-gated)
 * DELETE /api/v1/universal-agents/managers/:manager   — Remove (authorizer-gated)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema, AgentSchema, ManagerSchema } from "../types/dto.js";
import { callerOf } from "../middleware/caller.js";
import { parseInput, validateBody } from "../middleware/validate.js";

export function createUniversalAgentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Managers ──────────────────────────────────────────────────────

  routes.get("/managers", (c) => {
    return c.json({ data: c.get("service").vault.getUniversalAgentManagers() });
  });

  routes.post("/managers", validateBody(ManagerSchema), (c) => {
    const service = c.get("service");
    service.vault.addUniversalAgentManager(callerOf(c), c.get("validatedBody").manager);
    return c.json({ data: service.vault.getUniversalAgentManagers() });
  });

  routes.delete("/managers/:manager", (c) => {
    const service = c.get("service");
    const manager = parseInput(AddressSchema, c.req.param("manager"), "manager");
    service.vault.removeUniversalAgentManager(callerOf(c), manager);
    return c.json({ data: service.vault.getUniversalAgentManagers() });
  });

  // ─── Agents ────────────────────────────────────────────────────────

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").vault.getUniversalAgents() });
  });

  routes.post("/", validateBody(AgentSchema), (c) => {
    const service = c.get("service");
    service.vault.addUniversalAgent(callerOf(c), c.get("validatedBody").agent);
    return c.json({ data: service.vault.getUniversalAgents() });
  });

  routes.delete("/:agent", (c) => {
    const service = c.get("service");
    const agent = parseInput(AddressSchema, c.req.param("agent"), "agent");
    service.vault.removeUniversalAgent(callerOf(c), agent);
    return c.json({ data: service.vault.getUniversalAgents() });
  });

  return routes;
}
