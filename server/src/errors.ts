/**
 * Error Kinds
 *
 * Everything the tool layer and the domain operations throw on purpose.
 * Construction-time errors (unknown/duplicate field, duplicate tool) mean
 * the catalog itself is wrong; the rest are reported back to the LLM as a
 * tool result so it can correct itself.
 */

export type ErrorKind =
  | "UnknownFieldError"
  | "DuplicateFieldError"
  | "DuplicateToolError"
  | "UnknownToolError"
  | "ValidationError"
  | "NotFoundError"
  | "ConflictError"
  | "DependencyError"
  | "DomainError"
  | "ConfigError";

export class WaypointError extends Error {
  public readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = kind;
    this.kind = kind;
  }
}

// ============================================
// CONSTRUCTION TIME
// ============================================

export class UnknownFieldError extends WaypointError {
  public readonly schema: string;
  public readonly field: string;

  constructor(schema: string, field: string) {
    super("UnknownFieldError", `Field "${field}" does not exist on ${schema}`);
    this.schema = schema;
    this.field = field;
  }
}

export class DuplicateFieldError extends WaypointError {
  public readonly field: string;

  constructor(schema: string, field: string) {
    super("DuplicateFieldError", `Field "${field}" is already defined on ${schema}`);
    this.field = field;
  }
}

export class DuplicateToolError extends WaypointError {
  public readonly toolName: string;

  constructor(toolName: string) {
    super("DuplicateToolError", `Tool "${toolName}" is registered more than once`);
    this.toolName = toolName;
  }
}

// ============================================
// DISPATCH TIME
// ============================================

export class UnknownToolError extends WaypointError {
  public readonly toolName: string;

  constructor(toolName: string, available: readonly string[]) {
    super("UnknownToolError", `Unknown tool "${toolName}". Available tools: ${available.join(", ")}`);
    this.toolName = toolName;
  }
}

export interface ValidationIssue {
  /** Dotted path of the offending parameter; "(arguments)" for the whole input */
  field: string;
  reason: string;
}

export class ValidationError extends WaypointError {
  public readonly issues: ValidationIssue[];

  constructor(target: string, issues: ValidationIssue[]) {
    const summary = issues.map(i => `${i.field}: ${i.reason}`).join("; ");
    super("ValidationError", `Invalid arguments for ${target}: ${summary}`);
    this.issues = issues;
  }
}

// ============================================
// DOMAIN
// ============================================

export class NotFoundError extends WaypointError {
  constructor(entity: string, id: string) {
    super("NotFoundError", `${entity} "${id}" not found`);
  }
}

export class ConflictError extends WaypointError {
  constructor(entity: string, id: string) {
    super("ConflictError", `${entity} "${id}" already exists`);
  }
}

export class DependencyError extends WaypointError {
  public readonly taskId: string;
  public readonly blocking: string[];

  constructor(taskId: string, blocking: string[], message: string) {
    super("DependencyError", message);
    this.taskId = taskId;
    this.blocking = blocking;
  }
}

export class DomainError extends WaypointError {
  constructor(message: string) {
    super("DomainError", message);
  }
}

export class ConfigError extends WaypointError {
  constructor(message: string) {
    super("ConfigError", message);
  }
}
