import { truncate } from "../utils/text.js";
import { AnswerGenerator, GenerateResponseInput } from "./generation.js";

const CHUNK_PREFIX = /^Course .+? content: /;
const MAX_POINTS = 3;
const POINT_CHARS = 240;

export const EMPTY_QUERY_ANSWER = "Please ask a question about the course materials.";

/**
 * Answers without an LLM by quoting the best search hits. Used when no chat
 * provider is configured, so the chatbot still returns grounded text.
 */
export class ExtractiveGenerator implements AnswerGenerator {
  async generateResponse({ query, toolManager }: GenerateResponseInput): Promise<string> {
    if (!query.trim()) {
      return EMPTY_QUERY_ANSWER;
    }
    const result = await toolManager.executeTool("search_course_content", { query });
    return buildExtractiveAnswer(result);
  }
}

export function buildExtractiveAnswer(searchResult: string): string {
  const blocks = parseResultBlocks(searchResult);
  if (blocks.length === 0) {
    return searchResult;
  }

  const lines = ["Relevant course material:"];
  for (let i = 0; i < Math.min(blocks.length, MAX_POINTS); i += 1) {
    const block = blocks[i];
    lines.push(`${i + 1}. ${truncate(block.content.replace(CHUNK_PREFIX, ""), POINT_CHARS)} (${block.label})`);
  }
  return lines.join("\n");
}

function parseResultBlocks(searchResult: string): Array<{ label: string; content: string }> {
  const blocks: Array<{ label: string; content: string }> = [];
  for (const raw of searchResult.split("\n\n")) {
    const match = /^\[([^\]\n]+)\]\n([\s\S]+)$/.exec(raw);
    if (match) {
      blocks.push({ label: match[1], content: match[2] });
    }
  }
  return blocks;
}
