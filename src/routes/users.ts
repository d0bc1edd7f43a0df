import { Router } from 'express';
import { UserController } from '../controllers/UserController';
import { requireJson } from '../middleware/validation/contentType';
import { validateUserCreate, validateUserUpdate } from '../middleware/validation/userValidator';
import type { BotRegistry } from '../services/registry/BotRegistry';
import { UserView } from '../views/UserView';
import { createMessageRoutes } from './messages';

export function createUserRoutes(registry: BotRegistry): Router {
  const router = Router();
  const userController = new UserController(registry, new UserView());

  router.get('/', userController.listUsers);
  router.post('/', requireJson, validateUserCreate, userController.createUser);

  router.use('/:userId/messages', createMessageRoutes(registry));

  router.get('/:userId', userController.getUser);
  router.put('/:userId', requireJson, validateUserUpdate, userController.updateUser);

  return router;
}
