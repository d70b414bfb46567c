/**
 * LLM Type Definitions
 *
 * Pure types and interfaces for talking to a chat-completions model with
 * native function calling. No runtime values.
 */

// ============================================
// CORE TYPES
// ============================================

export interface LLMMessage {
  role: "system" | "user" | "assistant" | "tool";
  content: string;
  /** Tool calls made by the assistant (only on assistant messages) */
  tool_calls?: ToolCall[];
  /** ID of the tool call this message is a result for (only on tool messages) */
  tool_call_id?: string;
}

// ============================================
// NATIVE FUNCTION CALLING TYPES
// ============================================

/** A JSON Schema object describing a function's parameters */
export interface JsonSchemaObject {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
  additionalProperties?: boolean;
}

export interface JsonSchemaProperty {
  type: "string" | "integer" | "number" | "boolean" | "array" | "object";
  description?: string;
  format?: string;
  enum?: string[];
  default?: unknown;
  minimum?: number;
  minLength?: number;
  pattern?: string;
  items?: JsonSchemaProperty;
  properties?: Record<string, JsonSchemaProperty>;
  required?: string[];
}

export interface ToolDefinition {
  type: "function";
  function: {
    name: string;
    description?: string;
    parameters: JsonSchemaObject;
  };
}

export interface ToolCall {
  id: string;
  type: "function";
  function: {
    name: string;
    arguments: string; // JSON string
  };
}

export interface LLMRequestOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Native tool definitions; omitted means a text-only answer is requested */
  tools?: ToolDefinition[];
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
  /** Structured tool calls from native function calling (if any) */
  toolCalls?: ToolCall[];
}

// ============================================
// LLM CLIENT INTERFACE
// ============================================

export interface ILLMClient {
  readonly name: string;
  chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse>;
}
