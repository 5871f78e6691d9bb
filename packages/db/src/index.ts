export { type ConnectionOptions, type Database, createDb, withConnection } from "./client.js";
export { ensureSchema } from "./init.js";
export * from "./repositories/index.js";
export * from "./schema/index.js";
export { MetadataStore, type MetadataStoreOptions, type WriteErrorHandler } from "./store.js";
