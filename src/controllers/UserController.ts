import type { Request, Response, NextFunction } from 'express';
import type { BotRegistry } from '../services/registry/BotRegistry';
import { parseId } from '../utils/ids';
import type { UserView } from '../views/UserView';

export class UserController {
  constructor(
    private readonly registry: BotRegistry,
    private readonly userView: UserView
  ) {}

  listUsers = async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    const startTime = Date.now();
    try {
      const users = await this.registry.listUsers();
      res.json(this.userView.formatList(users, startTime));
    } catch (error) {
      next(error);
    }
  };

  createUser = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const startTime = Date.now();
    try {
      const user = await this.registry.createUser({ name: req.body.name });
      res
        .status(201)
        .location(`${req.baseUrl}/${user.id}`)
        .json(this.userView.formatSingle(user, startTime));
    } catch (error) {
      next(error);
    }
  };

  getUser = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const startTime = Date.now();
    try {
      const user = await this.registry.getUser(parseId(req.params.userId, 'User'));
      res.json(this.userView.formatSingle(user, startTime));
    } catch (error) {
      next(error);
    }
  };

  updateUser = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const startTime = Date.now();
    try {
      const user = await this.registry.renameUser(parseId(req.params.userId, 'User'), req.body.name);
      res.json(this.userView.formatSingle(user, startTime));
    } catch (error) {
      next(error);
    }
  };
}
