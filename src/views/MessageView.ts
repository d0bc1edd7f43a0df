import { BaseView } from './BaseView';
import type { BaseResponseDTO } from './BaseView';
import type { Message, MessageOrigin, SendMessageResult } from '../types';

export interface MessageResponseDTO {
  id: number;
  userId: number;
  origin: MessageOrigin;
  content: string;
  time: string;
}

export interface MessageReceivedDTO {
  message: MessageResponseDTO;
  response: MessageResponseDTO | null;
}

export class MessageView extends BaseView<Message, MessageResponseDTO> {
  format(message: Message): MessageResponseDTO {
    return {
      id: message.id,
      userId: message.userId,
      origin: message.origin,
      content: message.content,
      time: message.time,
    };
  }

  formatReceived(result: SendMessageResult, startTime?: number): BaseResponseDTO<MessageReceivedDTO> {
    return this.formatResponse(
      {
        message: this.format(result.message),
        response: result.response ? this.format(result.response) : null,
      },
      startTime
    );
  }
}
