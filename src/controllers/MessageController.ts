import type { Request, Response, NextFunction } from 'express';
import type { BotRegistry } from '../services/registry/BotRegistry';
import { parseId } from '../utils/ids';
import type { MessageView } from '../views/MessageView';

export class MessageController {
  constructor(
    private readonly registry: BotRegistry,
    private readonly messageView: MessageView
  ) {}

  listMessages = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const startTime = Date.now();
    try {
      const messages = await this.registry.listMessages(parseId(req.params.userId, 'User'));
      res.json(this.messageView.formatList(messages, startTime));
    } catch (error) {
      next(error);
    }
  };

  sendMessage = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const startTime = Date.now();
    try {
      const userId = parseId(req.params.userId, 'User');
      const result = await this.registry.sendMessage(userId, req.body.content);
      res
        .status(201)
        .location(`${req.baseUrl}/${result.message.id}`)
        .json(this.messageView.formatReceived(result, startTime));
    } catch (error) {
      next(error);
    }
  };

  getMessage = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const startTime = Date.now();
    try {
      const message = await this.registry.getMessage(
        parseId(req.params.userId, 'User'),
        parseId(req.params.messageId, 'Message')
      );
      res.json(this.messageView.formatSingle(message, startTime));
    } catch (error) {
      next(error);
    }
  };
}
