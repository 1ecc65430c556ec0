import { z } from "zod";
import {
  ChatCompletion,
  ChatCompletionRequest,
  ChatMessage,
  ChatModel,
  EmbeddingClient,
  ToolCall,
} from "./types.js";

interface OpenAiClientOptions {
  apiKey: string | null;
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable().optional(),
        tool_calls: z
          .array(
            z.object({
              id: z.string(),
              function: z.object({
                name: z.string(),
                arguments: z.string(),
              }),
            }),
          )
          .optional(),
      }),
    }),
  ),
});

const toolArgumentsSchema = z.record(z.unknown());

export class OpenAiClient implements ChatModel, EmbeddingClient {
  constructor(private readonly options: OpenAiClientOptions) {}

  isEmbeddingConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.post("/embeddings", {
      model: this.options.embeddingModel,
      input: texts,
    });

    if (!response.ok) {
      throw new Error(
        `OpenAI embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = embeddingResponseSchema.parse(await response.json());
    return data.data
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embedTexts([query]);
    if (!embedding) {
      throw new Error("OpenAI embeddings returned no vector.");
    }
    return embedding;
  }

  async complete(request: ChatCompletionRequest): Promise<ChatCompletion> {
    const tools = request.tools ?? [];
    const response = await this.post("/chat/completions", {
      model: this.options.chatModel,
      temperature: 0,
      max_tokens: 800,
      messages: [
        { role: "system", content: request.system },
        ...request.messages.map(toOpenAiMessage),
      ],
      ...(tools.length > 0
        ? {
            tools: tools.map((tool) => ({
              type: "function",
              function: {
                name: tool.name,
                description: tool.description,
                parameters: tool.inputSchema,
              },
            })),
            tool_choice: "auto",
          }
        : {}),
    });

    if (!response.ok) {
      throw new Error(`OpenAI chat failed (${response.status}): ${await response.text()}`);
    }

    const data = chatResponseSchema.parse(await response.json());
    const message = data.choices[0]?.message;
    const toolCalls: ToolCall[] = (message?.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      input: parseToolArguments(call.function.name, call.function.arguments),
    }));

    return {
      text: message?.content?.trim() ?? "",
      toolCalls,
    };
  }

  private post(endpoint: string, body: unknown): Promise<Response> {
    return fetch(`${this.options.baseUrl}${endpoint}`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.requireApiKey()}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
    });
  }

  private requireApiKey(): string {
    if (!this.options.apiKey) {
      throw new Error("OPENAI_API_KEY is required for OpenAI operations.");
    }
    return this.options.apiKey;
  }
}

function toOpenAiMessage(message: ChatMessage) {
  switch (message.role) {
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return {
        role: "assistant",
        content: message.content || null,
        ...(message.toolCalls.length > 0
          ? {
              tool_calls: message.toolCalls.map((call) => ({
                id: call.id,
                type: "function",
                function: { name: call.name, arguments: JSON.stringify(call.input) },
              })),
            }
          : {}),
      };
    case "tool":
      return { role: "tool", tool_call_id: message.toolCallId, content: message.content };
  }
}

function parseToolArguments(toolName: string, raw: string): Record<string, unknown> {
  if (!raw.trim()) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`OpenAI returned malformed arguments for '${toolName}': ${reason}`);
  }
  return toolArgumentsSchema.parse(parsed);
}
