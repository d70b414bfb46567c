export { Tool } from "./tool.js";
export { ToolSet } from "./tool-set.js";
export { createToolSet } from "./core-registry.js";
export { manifestToNativeTools } from "./manifest.js";
export { generateCompactCatalog, mutatingTools } from "./catalog.js";
export type { ToolManifestEntry, ParameterDescription, ParameterShape, ToolCategory, ToolOperation, ToolOptions } from "./types.js";
export type { ToolContext } from "./definitions/context.js";
