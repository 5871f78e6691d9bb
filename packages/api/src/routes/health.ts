import type { ApiContext } from "../context.js";

export async function getHealth(_request: Request, ctx: ApiContext) {
  return Response.json({ status: "ok", environment: ctx.settings.environment });
}
