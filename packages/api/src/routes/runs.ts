import { startRunSchema, updateRunStatusSchema } from "@statement-agents/utils";
import type { ApiContext } from "../context.js";
import { validateBody } from "../middleware/validate.js";

export async function createRun(request: Request, ctx: ApiContext) {
  const body = await validateBody(request, startRunSchema);
  const run = await ctx.agents.startAgentRun(body);
  return Response.json(run);
}

/** Out-of-band hook for whoever tracks run progress; this service never polls. */
export async function updateRunStatus(request: Request, ctx: ApiContext, runId: string) {
  const body = await validateBody(request, updateRunStatusSchema);
  const updated = await ctx.store.updateRunStatus(runId, body.status);
  return Response.json({ ok: true, updated });
}
