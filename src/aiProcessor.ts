import { ChatOpenAI } from "@langchain/openai";
import { HumanMessage, SystemMessage } from "@langchain/core/messages";
import type { MessageContent } from "@langchain/core/messages";
import { logger } from "./config.js";

export interface CompletionRequest {
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Black-box text completion: a system and a user instruction in, generated text out.
 * Implementations reject on any transport, auth or response failure.
 */
export interface CompletionBackend {
  complete(request: CompletionRequest): Promise<string>;
}

export interface OpenAICompletionOptions {
  timeoutMs?: number;
  maxRetries?: number;
}

/**
 * Flatten LangChain message content into plain text
 */
export function contentToText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .map((part) => ("text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}

/**
 * Completion backend on OpenAI chat models via LangChain
 */
export class OpenAICompletionBackend implements CompletionBackend {
  private apiKey: string;
  private modelName: string;
  private options: Required<OpenAICompletionOptions>;
  // One client per sampling setup; ChatOpenAI fixes temperature at construction
  private models = new Map<string, ChatOpenAI>();

  constructor(
    apiKey: string,
    modelName: string = "gpt-4.1-mini",
    options: OpenAICompletionOptions = {}
  ) {
    this.apiKey = apiKey;
    this.modelName = modelName;
    this.options = {
      timeoutMs: options.timeoutMs ?? 30000,
      maxRetries: options.maxRetries ?? 2,
    };
    logger.info(`AI completion backend initialized with ${this.modelName}`);
  }

  private modelFor(temperature: number, maxTokens: number): ChatOpenAI {
    const key = `${temperature}:${maxTokens}`;
    let model = this.models.get(key);
    if (!model) {
      model = new ChatOpenAI({
        openAIApiKey: this.apiKey,
        modelName: this.modelName,
        temperature,
        maxTokens,
        timeout: this.options.timeoutMs,
        maxRetries: this.options.maxRetries,
      });
      this.models.set(key, model);
    }
    return model;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const model = this.modelFor(request.temperature, request.maxTokens);
    const response = await model.invoke([
      new SystemMessage(request.system),
      new HumanMessage(request.user),
    ]);

    const text = contentToText(response.content);
    if (text.trim() === "") {
      throw new Error("Empty response from completion backend");
    }
    return text;
  }
}
