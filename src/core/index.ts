export * from "./scope.js";
export * from "./owned.js";
export * from "./signal.js";
export * from "./stream.js";

export * from "./dev.js";

export { batch, configureScheduler, getSchedulerConfig } from "./scheduler.js";
