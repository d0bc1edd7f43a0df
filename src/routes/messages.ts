import { Router } from 'express';
import { MessageController } from '../controllers/MessageController';
import { requireJson } from '../middleware/validation/contentType';
import { validateMessage } from '../middleware/validation/messageValidator';
import type { BotRegistry } from '../services/registry/BotRegistry';
import { MessageView } from '../views/MessageView';

// Mounted under /users/:userId/messages
export function createMessageRoutes(registry: BotRegistry): Router {
  const router = Router({ mergeParams: true });
  const messageController = new MessageController(registry, new MessageView());

  router.get('/', messageController.listMessages);
  router.post('/', requireJson, validateMessage, messageController.sendMessage);
  router.get('/:messageId', messageController.getMessage);

  return router;
}
