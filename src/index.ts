export * from "./core/analyzer.js";
export * from "./core/errors.js";
export * from "./core/json.js";
export * from "./core/llm.js";
export { CodexClient, type CodexClientOptions } from "./core/codex.js";
export * from "./core/prompts.js";
export * from "./core/retry.js";
export * from "./core/scheduler.js";
export * from "./core/task.js";
export * from "./core/runs.js";
export * from "./core/examples.js";
export { loadConfig, type Config } from "./core/config.js";
export * from "./schemas/task.js";
export * from "./schemas/plan.js";
