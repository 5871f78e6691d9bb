export { DEFAULT_RUN_INSTRUCTIONS, REVIEW_MESSAGE } from "./instructions.js";
export { type ResponseFormat, getResponseFormat } from "./schemas.js";
