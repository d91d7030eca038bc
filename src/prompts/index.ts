export { buildDocumentPrompt, solveLinearSystemPrompt } from "./templates.ts";
