import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';

const userName = z.string().trim().min(1, 'Name must not be empty');

export const userCreateSchema = z
  .object({
    name: userName,
  })
  .strict();

export const userUpdateSchema = z
  .object({
    id: z.number().int().positive().optional(),
    name: userName,
  })
  .strict();

const rejectInvalid = (res: Response, message: string, details: unknown) => {
  res.status(400).json({
    error: {
      message,
      code: 'VALIDATION_ERROR',
      details,
    },
  });
};

export const validateUserCreate = (req: Request, res: Response, next: NextFunction) => {
  try {
    req.body = userCreateSchema.parse(req.body);
    next();
  } catch (error) {
    if (error instanceof z.ZodError) {
      rejectInvalid(res, 'Invalid user data', error.errors);
      return;
    }
    next(error);
  }
};

export const validateUserUpdate = (req: Request, res: Response, next: NextFunction) => {
  try {
    const validatedData = userUpdateSchema.parse(req.body);
    if (validatedData.id !== undefined && String(validatedData.id) !== req.params.userId) {
      rejectInvalid(res, 'User id in body does not match the path', [
        { path: ['id'], message: `Expected ${req.params.userId}` },
      ]);
      return;
    }
    req.body = { name: validatedData.name };
    next();
  } catch (error) {
    if (error instanceof z.ZodError) {
      rejectInvalid(res, 'Invalid user data', error.errors);
      return;
    }
    next(error);
  }
};
