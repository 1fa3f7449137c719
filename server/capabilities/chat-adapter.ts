import type { LlmClient } from '../utils/llm-router.js';
import { toChatMessages, type HistoryMessage } from '../conversations/session-context.js';
import { BaseCapabilityAdapter } from './base-adapter.js';

export interface ChatParams {
  operation: 'chat';
  message: string;
  history: HistoryMessage[];
}

export interface ChatPayload {
  reply: string;
  model: string;
}

const CHAT_SYSTEM_PROMPT = `You are a helpful assistant inside a multi-capability workspace.

Besides conversation, the workspace can:
- manage GitHub repositories (create, list, create and list branches)
- generate, explain and optimize code
- build plans and break tasks down into steps
- answer questions against a PostgreSQL database
- analyze multi-service workflows

Be concise and concrete. Refer back to earlier turns when relevant, and
suggest one of the capabilities above when the user's request would be
better served by it (for example "create repository my-project").`;

export class ChatAdapter extends BaseCapabilityAdapter<ChatParams, ChatPayload> {
  readonly tag = 'general_conversation' as const;
  readonly service = 'llm_chat';

  constructor(private llm: LlmClient) {
    super('ChatAdapter');
  }

  isAvailable(): boolean {
    return this.llm.isAvailable('chat');
  }

  protected async execute(params: ChatParams): Promise<ChatPayload> {
    const messages = toChatMessages(params.history, params.message);

    const response = await this.llm.call('chat', {
      systemPrompt: CHAT_SYSTEM_PROMPT,
      messages,
      maxTokens: 2048,
      temperature: 0.3,
    });

    if (!response.content.trim()) {
      throw new Error('Chat model returned an empty response');
    }

    return { reply: response.content, model: response.model };
  }

  protected describeRequest(params: ChatParams): unknown {
    return { message: params.message, historyTurns: params.history.length };
  }
}
