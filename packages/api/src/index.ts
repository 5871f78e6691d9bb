export { getResponseFormat, type ResponseFormat } from "./agents/index.js";
export { type Settings, loadSettings } from "./config.js";
export type { ApiContext } from "./context.js";
export { createApiHandler } from "./handler.js";
export { AgentService, type AgentSettings } from "./services/agent-service.js";
export { type FetchLike, OpenAIClient } from "./services/openai.js";
