import { describe, expect, it, vi } from "vitest";
import { ChatCompletion, ChatCompletionRequest, ChatModel } from "../src/infra/ai/types.js";
import { buildExtractiveAnswer, EMPTY_QUERY_ANSWER, ExtractiveGenerator } from "../src/pipelines/answering.js";
import { buildSystemPrompt, ToolCallingGenerator } from "../src/pipelines/generation.js";
import { CourseSearchTool } from "../src/tools/courseSearchTool.js";
import { ToolManager } from "../src/tools/toolManager.js";
import { Tool } from "../src/tools/types.js";
import { createSeededStore, noEmbeddings } from "./helpers.js";

class ScriptedModel implements ChatModel {
  readonly requests: ChatCompletionRequest[] = [];

  constructor(private readonly next: (callIndex: number) => ChatCompletion) {}

  async complete(request: ChatCompletionRequest): Promise<ChatCompletion> {
    this.requests.push({ ...request, messages: [...request.messages] });
    return this.next(this.requests.length - 1);
  }
}

function echoTool(execute: Tool["execute"]): Tool {
  return {
    definition: {
      name: "search_course_content",
      description: "test search",
      inputSchema: { type: "object", properties: { query: { type: "string" } }, required: ["query"] },
    },
    execute,
  };
}

const toolCall = (id: string): ChatCompletion => ({
  text: "",
  toolCalls: [{ id, name: "search_course_content", input: { query: "rankings" } }],
});

describe("ToolCallingGenerator", () => {
  it("returns the text of a reply that needs no tools", async () => {
    const model = new ScriptedModel(() => ({ text: "BM25 is a ranking function.", toolCalls: [] }));
    const generator = new ToolCallingGenerator(model, { maxToolRounds: 2 });
    const toolManager = new ToolManager().register(echoTool(async () => "unused"));

    const answer = await generator.generateResponse({
      query: "What is BM25?",
      conversationHistory: null,
      toolManager,
    });

    expect(answer).toBe("BM25 is a ranking function.");
    expect(model.requests).toHaveLength(1);
    expect(model.requests[0].system).toBe(buildSystemPrompt(2));
    expect(model.requests[0].messages).toEqual([
      { role: "user", content: "Answer this question about course materials: What is BM25?" },
    ]);
    expect(model.requests[0].tools?.map((tool) => tool.name)).toEqual(["search_course_content"]);
  });

  it("appends prior conversation to the system prompt", async () => {
    const model = new ScriptedModel(() => ({ text: "ok", toolCalls: [] }));
    const generator = new ToolCallingGenerator(model, { maxToolRounds: 2 });

    await generator.generateResponse({
      query: "And lesson 2?",
      conversationHistory: "User: hi\nAssistant: hello",
      toolManager: new ToolManager(),
    });

    expect(model.requests[0].system).toBe(
      `${buildSystemPrompt(2)}\n\nPrevious conversation:\nUser: hi\nAssistant: hello`,
    );
  });

  it("states the configured round limit in the system prompt", async () => {
    const model = new ScriptedModel(() => ({ text: "ok", toolCalls: [] }));

    await new ToolCallingGenerator(model, { maxToolRounds: 3 }).generateResponse({
      query: "q",
      conversationHistory: null,
      toolManager: new ToolManager(),
    });

    expect(model.requests[0].system).toContain("Maximum 3 rounds of tool usage per query");
    expect(buildSystemPrompt(1)).toContain("Maximum 1 round of tool usage per query");
  });

  it("stops after maxToolRounds and makes a final call without tools", async () => {
    const model = new ScriptedModel((callIndex) =>
      callIndex < 2 ? toolCall(`call_${callIndex}`) : { text: "final answer", toolCalls: [] },
    );
    const execute = vi.fn(async () => "tool output");
    const generator = new ToolCallingGenerator(model, { maxToolRounds: 2 });

    const answer = await generator.generateResponse({
      query: "Compare the lessons",
      conversationHistory: null,
      toolManager: new ToolManager().register(echoTool(execute)),
    });

    expect(answer).toBe("final answer");
    expect(execute).toHaveBeenCalledTimes(2);
    expect(execute).toHaveBeenCalledWith({ query: "rankings" });
    expect(model.requests).toHaveLength(3);
    expect(model.requests[2].tools).toBeUndefined();
    expect(model.requests[2].messages).toEqual([
      { role: "user", content: "Answer this question about course materials: Compare the lessons" },
      { role: "assistant", content: "", toolCalls: toolCall("call_0").toolCalls },
      { role: "tool", toolCallId: "call_0", name: "search_course_content", content: "tool output" },
      { role: "assistant", content: "", toolCalls: toolCall("call_1").toolCalls },
      { role: "tool", toolCallId: "call_1", name: "search_course_content", content: "tool output" },
    ]);
  });

  it("reports a failing tool to the model and ends the tool rounds", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const model = new ScriptedModel((callIndex) =>
      callIndex === 0 ? toolCall("call_0") : { text: "sorry", toolCalls: [] },
    );
    const generator = new ToolCallingGenerator(model, { maxToolRounds: 3 });

    const answer = await generator.generateResponse({
      query: "Anything",
      conversationHistory: null,
      toolManager: new ToolManager().register(
        echoTool(async () => {
          throw new Error("kaput");
        }),
      ),
    });

    expect(answer).toBe("sorry");
    expect(model.requests).toHaveLength(2);
    expect(model.requests[1].tools).toBeUndefined();
    expect(model.requests[1].messages[2]).toEqual({
      role: "tool",
      toolCallId: "call_0",
      name: "search_course_content",
      content: "Tool execution error: kaput",
    });
    warn.mockRestore();
  });
});

describe("ExtractiveGenerator", () => {
  it("quotes the top search hits without the chunk prefix", () => {
    const answer = buildExtractiveAnswer(
      "[A - Lesson 1]\nCourse A Lesson 1 content: Hello world.\n\n[B]\nCourse B content: Bye.",
    );

    expect(answer).toBe("Relevant course material:\n1. Hello world. (A - Lesson 1)\n2. Bye. (B)");
  });

  it("passes tool messages through unchanged", () => {
    expect(buildExtractiveAnswer("No relevant content found.")).toBe("No relevant content found.");
  });

  it("answers from the search tool and leaves its sources behind", async () => {
    const toolManager = new ToolManager().register(
      new CourseSearchTool(await createSeededStore(), noEmbeddings, { maxResults: 5 }),
    );

    const answer = await new ExtractiveGenerator().generateResponse({
      query: "reciprocal rank fusion",
      conversationHistory: null,
      toolManager,
    });

    expect(answer).toBe(
      "Relevant course material:\n1. Reciprocal rank fusion merges keyword and vector rankings. (Building Retrieval Pipelines - Lesson 2)",
    );
    expect(toolManager.getLastSources()).toEqual([
      { text: "Building Retrieval Pipelines - Lesson 2", link: "https://example.com/retrieval" },
    ]);
  });

  it("asks for a question when the query is blank", async () => {
    const toolManager = new ToolManager().register(
      new CourseSearchTool(await createSeededStore(), noEmbeddings, { maxResults: 5 }),
    );

    const answer = await new ExtractiveGenerator().generateResponse({
      query: "  ",
      conversationHistory: null,
      toolManager,
    });

    expect(answer).toBe(EMPTY_QUERY_ANSWER);
    expect(toolManager.getLastSources()).toEqual([]);
  });
});
