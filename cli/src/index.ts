/**
 * Public API of the draftline package
 */

export * from "./errors.js";
export * from "./clock.js";
export * from "./schedule.js";
export * from "./review-stages.js";
export * from "./relocation.js";
export * from "./config.js";
export * from "./template-file.js";
export { initDatabase, closeDatabase, getDatabaseInfo } from "./db.js";
export type { DatabaseConfig } from "./db.js";
export * from "./operations/templates.js";
export * from "./operations/projects.js";
export * from "./operations/people.js";
export * from "./operations/project-workflow.js";
export * from "./operations/reviews.js";
export { WorkflowCoordinator } from "./orchestration.js";
export type { WorkflowCoordinatorOptions } from "./orchestration.js";
export type * from "@draftline/types";
