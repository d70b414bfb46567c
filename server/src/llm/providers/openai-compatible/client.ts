/**
 * OpenAI-Compatible LLM Client
 *
 * Works with any provider that implements the OpenAI chat completions API:
 * OpenAI, xAI, DeepSeek, LM Studio, vLLM, etc.
 */

import type {
  ILLMClient,
  LLMMessage,
  LLMRequestOptions,
  LLMResponse,
  ToolDefinition,
} from "../../types.js";
import { formatMessagesForAPI, parseCompletion, type ApiMessage } from "./format.js";

export interface OpenAICompatibleOptions {
  apiKey: string;
  baseUrl: string;
  defaultModel: string;
  /** Request timeout in ms (default: 120s) */
  timeoutMs?: number;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
}

interface ChatRequestBody {
  model: string;
  messages: ApiMessage[];
  temperature: number;
  max_tokens: number;
  stream: false;
  tools?: ToolDefinition[];
}

export class OpenAICompatibleClient implements ILLMClient {
  readonly name = "openai-compatible";
  private apiKey: string;
  private baseUrl: string;
  private defaultModel: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(options: OpenAICompatibleOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.defaultModel = options.defaultModel;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    const model = options?.model || this.defaultModel;

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };

    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    const body: ChatRequestBody = {
      model,
      messages: formatMessagesForAPI(messages),
      temperature: options?.temperature ?? 0.3,
      max_tokens: options?.maxTokens ?? 4096,
      stream: false,
    };

    if (options?.tools?.length) {
      body.tools = options.tools;
    }

    const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`LLM API error: ${response.status} ${await response.text()}`);
    }

    const data: unknown = await response.json();
    const parsed = parseCompletion(data);

    return {
      content: parsed.content,
      model,
      usage: {
        inputTokens: parsed.inputTokens,
        outputTokens: parsed.outputTokens,
      },
      toolCalls: parsed.toolCalls.length ? parsed.toolCalls : undefined,
    };
  }
}
