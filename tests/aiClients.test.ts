import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../src/config/env.js";
import { DefaultAiClient } from "../src/infra/ai/defaultAiClient.js";
import { OllamaClient } from "../src/infra/ai/ollamaClient.js";
import { OpenAiClient } from "../src/infra/ai/openAiClient.js";
import { ToolDefinition } from "../src/infra/ai/types.js";

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

function stubFetch(payload: unknown, status = 200) {
  const fetchMock = vi.fn(async (..._args: FetchArgs) =>
    new Response(typeof payload === "string" ? payload : JSON.stringify(payload), { status }),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function requestBody(args: FetchArgs | undefined): unknown {
  const body = args?.[1]?.body;
  if (typeof body !== "string") {
    throw new Error("expected a JSON string body");
  }
  return JSON.parse(body);
}

const SEARCH_TOOL: ToolDefinition = {
  name: "search_course_content",
  description: "Search course materials",
  inputSchema: { type: "object", properties: { query: { type: "string" } }, required: ["query"] },
};

const openAi = new OpenAiClient({
  apiKey: "test-secret",
  baseUrl: "https://llm.example.test/v1",
  embeddingModel: "embed-small",
  chatModel: "chat-small",
});

const ollama = new OllamaClient({
  baseUrl: "http://ollama.example.test",
  chatModel: "local-chat",
  embeddingModel: "local-embed",
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OpenAiClient", () => {
  it("returns embeddings in input order", async () => {
    const fetchMock = stubFetch({
      data: [
        { embedding: [0, 2], index: 1 },
        { embedding: [1, 0], index: 0 },
      ],
    });

    expect(await openAi.embedTexts(["first", "second"])).toEqual([
      [1, 0],
      [0, 2],
    ]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://llm.example.test/v1/embeddings");
    expect(new Headers(init?.headers).get("authorization")).toBe("Bearer test-secret");
    expect(requestBody(fetchMock.mock.calls[0])).toEqual({
      model: "embed-small",
      input: ["first", "second"],
    });
  });

  it("offers tools and parses tool calls", async () => {
    const fetchMock = stubFetch({
      choices: [
        {
          message: {
            content: null,
            tool_calls: [
              {
                id: "call_a",
                function: { name: "search_course_content", arguments: '{"query":"ranking"}' },
              },
            ],
          },
        },
      ],
    });

    const completion = await openAi.complete({
      system: "be brief",
      messages: [{ role: "user", content: "what is ranking?" }],
      tools: [SEARCH_TOOL],
    });

    expect(completion).toEqual({
      text: "",
      toolCalls: [{ id: "call_a", name: "search_course_content", input: { query: "ranking" } }],
    });
    expect(requestBody(fetchMock.mock.calls[0])).toMatchObject({
      model: "chat-small",
      tool_choice: "auto",
      messages: [
        { role: "system", content: "be brief" },
        { role: "user", content: "what is ranking?" },
      ],
      tools: [{ type: "function", function: { name: "search_course_content" } }],
    });
  });

  it("sends tool results back with their call ids", async () => {
    const fetchMock = stubFetch({ choices: [{ message: { content: " done " } }] });

    const completion = await openAi.complete({
      system: "be brief",
      messages: [
        { role: "user", content: "q" },
        {
          role: "assistant",
          content: "",
          toolCalls: [{ id: "call_a", name: "search_course_content", input: { query: "q" } }],
        },
        { role: "tool", toolCallId: "call_a", name: "search_course_content", content: "found" },
      ],
    });

    expect(completion).toEqual({ text: "done", toolCalls: [] });
    const body = requestBody(fetchMock.mock.calls[0]);
    expect(body).toMatchObject({
      messages: [
        { role: "system" },
        { role: "user" },
        {
          role: "assistant",
          content: null,
          tool_calls: [
            {
              id: "call_a",
              type: "function",
              function: { name: "search_course_content", arguments: '{"query":"q"}' },
            },
          ],
        },
        { role: "tool", tool_call_id: "call_a", content: "found" },
      ],
    });
    expect(body).not.toHaveProperty("tools");
  });

  it("rejects malformed tool arguments", async () => {
    stubFetch({
      choices: [
        {
          message: {
            tool_calls: [{ id: "call_a", function: { name: "search_course_content", arguments: "{" } }],
          },
        },
      ],
    });

    await expect(
      openAi.complete({ system: "s", messages: [{ role: "user", content: "q" }] }),
    ).rejects.toThrow("OpenAI returned malformed arguments for 'search_course_content'");
  });

  it("surfaces HTTP failures", async () => {
    stubFetch("upstream down", 503);

    await expect(
      openAi.complete({ system: "s", messages: [{ role: "user", content: "q" }] }),
    ).rejects.toThrow("OpenAI chat failed (503): upstream down");
  });
});

describe("OllamaClient", () => {
  it("numbers tool calls and names tool results", async () => {
    const fetchMock = stubFetch({
      message: {
        content: "",
        tool_calls: [
          { function: { name: "search_course_content", arguments: { query: "a" } } },
          { function: { name: "get_course_outline", arguments: { course_name: "b" } } },
        ],
      },
    });

    const completion = await ollama.complete({
      system: "s",
      messages: [{ role: "tool", toolCallId: "call_0", name: "search_course_content", content: "x" }],
      tools: [SEARCH_TOOL],
    });

    expect(completion.toolCalls).toEqual([
      { id: "call_0", name: "search_course_content", input: { query: "a" } },
      { id: "call_1", name: "get_course_outline", input: { course_name: "b" } },
    ]);
    expect(fetchMock.mock.calls[0][0]).toBe("http://ollama.example.test/api/chat");
    expect(requestBody(fetchMock.mock.calls[0])).toMatchObject({
      model: "local-chat",
      stream: false,
      messages: [
        { role: "system", content: "s" },
        { role: "tool", tool_name: "search_course_content", content: "x" },
      ],
    });
  });

  it("rejects an empty embedding", async () => {
    stubFetch({ embedding: [] });

    await expect(ollama.embedQuery("q")).rejects.toThrow("Ollama embeddings returned empty vector.");
  });
});

describe("DefaultAiClient", () => {
  it("runs without providers", async () => {
    const client = new DefaultAiClient(loadConfig({}));

    expect(client.isEmbeddingConfigured()).toBe(false);
    expect(client.getChatModel()).toBeNull();
    expect(client.getGenerationProvider()).toBe("extractive");
    expect(await client.embedTexts(["a"])).toEqual([]);
    await expect(client.embedQuery("a")).rejects.toThrow("Embedding provider is disabled.");
  });

  it("routes to the configured providers", () => {
    const openAiBacked = new DefaultAiClient(loadConfig({ OPENAI_API_KEY: "test-secret" }));
    const ollamaBacked = new DefaultAiClient(
      loadConfig({ EMBEDDING_PROVIDER: "ollama", GENERATION_PROVIDER: "ollama" }),
    );

    expect(openAiBacked.isEmbeddingConfigured()).toBe(true);
    expect(openAiBacked.getChatModel()).toBeInstanceOf(OpenAiClient);
    expect(openAiBacked.getGenerationProvider()).toBe("openai");
    expect(ollamaBacked.getGenerationProvider()).toBe("ollama");
    expect(ollamaBacked.isEmbeddingConfigured()).toBe(true);
    expect(ollamaBacked.getChatModel()).toBeInstanceOf(OllamaClient);
  });
});
