/**
 * Tool Loop — Public API
 */

export { runToolLoop } from "./loop.js";
export { sanitizeMessages } from "./sanitize.js";
export { ok, fail, serialize } from "./respond.js";
export type { OkEnvelope, ErrEnvelope, ErrorDetail, ToolEnvelope } from "./respond.js";
export type { ToolCallRecord, ToolLoopOptions, ToolLoopResult } from "./types.js";
