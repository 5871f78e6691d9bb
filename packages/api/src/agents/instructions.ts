export const REVIEW_MESSAGE =
  "Please review the attached spreadsheets. Follow the run instructions to generate the required financial summaries.";

export const DEFAULT_RUN_INSTRUCTIONS =
  "Read the uploaded spreadsheets and produce the structured JSON outputs defined by the schema.";
