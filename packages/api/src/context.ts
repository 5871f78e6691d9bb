import type { MetadataStore } from "@statement-agents/db";
import type { Settings } from "./config.js";
import type { AgentService } from "./services/agent-service.js";

export interface ApiContext {
  settings: Settings;
  store: MetadataStore;
  agents: AgentService;
}
