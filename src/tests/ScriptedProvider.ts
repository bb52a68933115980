/**
 * ScriptedProvider - in-process AIProvider for tests.
 *
 * Replies are queued per system prompt, so one provider can stand behind
 * every agent of a team. An Error in the queue is thrown instead of answered.
 * Running out of replies fails the call with the prompt that was unscripted.
 */

import { AIProvider, CompletionResult, Message, QueryOptions } from '../providers/AIProvider';

export interface RecordedCall {
  systemPrompt: string;
  messages: Message[];
}

export class ScriptedProvider extends AIProvider {
  readonly name = 'openai' as const;
  readonly displayName = 'Scripted';

  readonly calls: RecordedCall[] = [];
  private readonly replies = new Map<string, Array<string | Error>>();

  script(systemPrompt: string, ...replies: Array<string | Error>): this {
    const queue = this.replies.get(systemPrompt) ?? [];
    queue.push(...replies);
    this.replies.set(systemPrompt, queue);
    return this;
  }

  callsTo(systemPrompt: string): RecordedCall[] {
    return this.calls.filter((call) => call.systemPrompt === systemPrompt);
  }

  /** Last user message sent to the agent with this system prompt. */
  lastPromptTo(systemPrompt: string): string {
    const calls = this.callsTo(systemPrompt);
    const last = calls[calls.length - 1];
    return last ? last.messages[last.messages.length - 1].content : '';
  }

  async complete(messages: Message[], options: QueryOptions = {}): Promise<CompletionResult> {
    const systemPrompt = options.systemPrompt ?? '';
    this.calls.push({ systemPrompt, messages: [...messages] });

    const next = this.replies.get(systemPrompt)?.shift();
    if (next === undefined) {
      throw new Error(`No scripted reply for prompt: ${systemPrompt.trim().slice(0, 60)}`);
    }
    if (next instanceof Error) {
      throw next;
    }

    return {
      content: next,
      model: 'scripted',
      provider: this.name,
      usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
      finishReason: 'stop',
      latencyMs: 0,
    };
  }
}
