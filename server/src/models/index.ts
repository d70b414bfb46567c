export * from "./goal.js";
export * from "./task.js";
export * from "./template.js";
