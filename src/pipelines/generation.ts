import { ChatMessage, ChatModel } from "../infra/ai/types.js";
import { ToolManager } from "../tools/toolManager.js";

export interface GenerateResponseInput {
  query: string;
  conversationHistory: string | null;
  toolManager: ToolManager;
}

export interface AnswerGenerator {
  generateResponse(input: GenerateResponseInput): Promise<string>;
}

export function buildSystemPrompt(maxToolRounds: number): string {
  return `You are an AI assistant specialized in course materials and educational content with access to tools for course information.

Available Tools:
1. search_course_content: search specific course content or detailed educational materials
2. get_course_outline: get a course's title, link, instructor and complete lesson list

Tool Usage Guidelines:
- Course outline or structure questions: use get_course_outline
- Content-specific questions: use search_course_content
- You may use tools in multiple rounds when the first results show you need more information. Maximum ${maxToolRounds} ${maxToolRounds === 1 ? "round" : "rounds"} of tool usage per query
- For comparisons or multi-part questions, gather each part before answering
- Synthesize tool results into accurate, fact-based responses
- If tools yield no results, say so clearly without offering alternatives

Response Protocol:
- General knowledge questions: answer from existing knowledge without tools
- Course-specific questions: use the tools first, then answer
- No meta-commentary: give the direct answer only. Do not describe your reasoning or the tools, and do not say "based on the search results"

For course outline responses, always include the course title, the course link and every lesson with its number and title.

All responses must be brief, educational and clear, with examples where they aid understanding.
Provide only the direct answer to what was asked.`;
}

export interface ToolCallingGeneratorOptions {
  maxToolRounds: number;
}

/**
 * Lets the model call tools for up to `maxToolRounds` rounds, then asks for
 * the answer with tools withheld so the exchange always ends in text.
 */
export class ToolCallingGenerator implements AnswerGenerator {
  private readonly systemPrompt: string;

  constructor(
    private readonly model: ChatModel,
    private readonly options: ToolCallingGeneratorOptions,
  ) {
    this.systemPrompt = buildSystemPrompt(options.maxToolRounds);
  }

  async generateResponse({
    query,
    conversationHistory,
    toolManager,
  }: GenerateResponseInput): Promise<string> {
    const system = conversationHistory
      ? `${this.systemPrompt}\n\nPrevious conversation:\n${conversationHistory}`
      : this.systemPrompt;
    const messages: ChatMessage[] = [
      { role: "user", content: `Answer this question about course materials: ${query}` },
    ];
    const tools = toolManager.getToolDefinitions();

    for (let round = 0; round < this.options.maxToolRounds; round += 1) {
      const completion = await this.model.complete({ system, messages, tools });
      if (completion.toolCalls.length === 0) {
        return completion.text;
      }

      messages.push({ role: "assistant", content: completion.text, toolCalls: completion.toolCalls });

      let failed = false;
      for (const call of completion.toolCalls) {
        let content: string;
        try {
          content = await toolManager.executeTool(call.name, call.input);
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          console.warn(`[generation] tool '${call.name}' failed: ${reason}`);
          content = `Tool execution error: ${reason}`;
          failed = true;
        }
        messages.push({ role: "tool", toolCallId: call.id, name: call.name, content });
      }

      if (failed) {
        break;
      }
    }

    const final = await this.model.complete({ system, messages });
    return final.text;
  }
}
