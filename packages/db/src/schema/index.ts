export * from "./runs.js";
export * from "./uploads.js";
