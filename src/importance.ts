import { CompletionError } from "./errors.js";
import type { CompletionClient } from "./completion.js";

const ROLE = "You are a memory management specialist for a team of AI agents.";

function buildPrompt(content: string): string {
  return `Rate how important it is to remember the following information for future work.
Consider whether it is a durable fact, a preference, a decision, or a passing remark.

Respond ONLY with a number between 0 and 1 (for example 0.75), no explanation.

Information:
${content}`;
}

/** Pulls the first number out of a reply and checks it lies in [0,1]. */
export function parseImportance(reply: string): number {
  const match = /-?\d+(?:\.\d+)?/.exec(reply);
  if (!match) {
    throw new CompletionError(`Could not read an importance score from: ${reply.slice(0, 80)}`);
  }
  const value = Number(match[0]);
  if (!(value >= 0 && value <= 1)) {
    throw new CompletionError(`Importance score ${value} is outside [0,1]`);
  }
  return value;
}

/** Asks an LLM how durable a piece of content is. */
export class LlmImportanceAssessor {
  constructor(
    private readonly client: CompletionClient,
    private readonly options: { temperature?: number; maxTokens?: number } = {},
  ) {}

  async assess(content: string): Promise<number> {
    const reply = await this.client.complete({
      prompt: buildPrompt(content),
      role: ROLE,
      temperature: this.options.temperature ?? 0.3,
      maxTokens: this.options.maxTokens ?? 16,
    });
    return parseImportance(reply);
  }
}
