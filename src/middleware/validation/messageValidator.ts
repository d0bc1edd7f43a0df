import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';

// Clients may only post their own side of the conversation
export const messageCreateSchema = z
  .object({
    content: z.string().trim().min(1, 'Message content must not be empty'),
    origin: z.literal('user').optional(),
  })
  .strict();

export const validateMessage = (req: Request, res: Response, next: NextFunction) => {
  try {
    const { content } = messageCreateSchema.parse(req.body);
    req.body = { content };
    next();
  } catch (error) {
    if (error instanceof z.ZodError) {
      res.status(400).json({
        error: {
          message: 'Invalid message data',
          code: 'VALIDATION_ERROR',
          details: error.errors,
        },
      });
      return;
    }
    next(error);
  }
};
