import { randomUUID } from 'crypto';
import { ChatAction, ChatFile, ChatMessage, ChatSession } from '../../types/chat';

export const SYSTEM_AUTHOR = 'System';

/**
 * Collects the replies of one user turn. Files are kept on the session so
 * the chat API can serve them later; a new file replaces an older one of
 * the same name.
 */
export class ChatTurn {
  readonly messages: ChatMessage[] = [];

  constructor(readonly session: ChatSession) {}

  say(
    author: string,
    content: string,
    extras: { actions?: ChatAction[]; files?: Array<Omit<ChatFile, 'id'>> } = {}
  ): void {
    const message: ChatMessage = { author, content };

    if (extras.actions && extras.actions.length > 0) {
      message.actions = extras.actions;
    }

    if (extras.files && extras.files.length > 0) {
      message.files = extras.files.map((file) => {
        const stored: ChatFile = { id: randomUUID(), ...file };
        for (const [id, existing] of this.session.files) {
          if (existing.name === stored.name) {
            this.session.files.delete(id);
          }
        }
        this.session.files.set(stored.id, stored);
        return { id: stored.id, name: stored.name, mimeType: stored.mimeType };
      });
    }

    this.messages.push(message);
  }

  system(content: string, actions?: ChatAction[]): void {
    this.say(SYSTEM_AUTHOR, content, { actions });
  }

  offeredActions(): ChatAction[] {
    return this.messages.flatMap((message) => message.actions ?? []);
  }
}
