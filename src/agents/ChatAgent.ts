/**
 * ChatAgent - a role-scoped wrapper around one LLM provider with fixed
 * instructions.
 *
 * send() returns the reply text together with a new AgentThread. Threads are
 * immutable: passing one back continues that conversation, omitting it starts
 * a fresh one.
 */

import { AIProvider, Message, QueryOptions } from '../providers/AIProvider';
import { Logger } from '../utils/logger';

export interface AgentThread {
  readonly agentName: string;
  readonly messages: readonly Message[];
}

export interface AgentResponse {
  content: string;
  thread: AgentThread;
}

export interface ChatAgentOptions {
  temperature?: number;
  maxTokens?: number;
}

export class ChatAgent {
  readonly name: string;
  readonly instructions: string;

  private readonly provider: AIProvider;
  private readonly options: ChatAgentOptions;

  constructor(name: string, instructions: string, provider: AIProvider, options: ChatAgentOptions = {}) {
    this.name = name;
    this.instructions = instructions;
    this.provider = provider;
    this.options = options;
  }

  async send(prompt: string, thread?: AgentThread): Promise<AgentResponse> {
    const history = thread && thread.agentName === this.name ? thread.messages : [];
    const messages: Message[] = [...history, { role: 'user', content: prompt }];

    const queryOptions: QueryOptions = {
      systemPrompt: this.instructions,
      ...(this.options.temperature !== undefined && { temperature: this.options.temperature }),
      ...(this.options.maxTokens !== undefined && { maxTokens: this.options.maxTokens }),
    };

    const result = await this.provider.complete(messages, queryOptions);
    const content = result.content ?? '';

    Logger.agent(this.name, 'Response received', {
      provider: result.provider,
      outputTokens: result.usage.outputTokens,
      latencyMs: result.latencyMs,
      continued: history.length > 0,
    });

    return {
      content,
      thread: {
        agentName: this.name,
        messages: [...messages, { role: 'assistant', content }],
      },
    };
  }
}
