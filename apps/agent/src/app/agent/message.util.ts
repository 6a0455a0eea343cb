import {
  AIMessage,
  type BaseMessage,
  HumanMessage,
  type MessageContent
} from '@langchain/core/messages';

import { Message } from '../common/interfaces';

/** Plain text of a model message; non-text content parts are dropped. */
export function messageText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) =>
      part.type === 'text' && 'text' in part && typeof part.text === 'string'
        ? part.text
        : ''
    )
    .join('');
}

/**
 * Stored history as chat-model input. Tool outputs are summarized on the
 * agent message that used them, so standalone `tool` entries are skipped.
 */
export function toChatHistory(messages: Message[]): BaseMessage[] {
  const history: BaseMessage[] = [];
  for (const message of messages) {
    if (message.role === 'user') history.push(new HumanMessage(message.content));
    else if (message.role === 'agent') history.push(new AIMessage(message.content));
  }
  return history;
}
