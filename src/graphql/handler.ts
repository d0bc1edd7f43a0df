import type { Request, Response, NextFunction, RequestHandler } from 'express';
import {
  execute,
  getOperationAST,
  GraphQLError,
  parse,
  validate,
  type DocumentNode,
  type GraphQLFormattedError,
  type GraphQLSchema,
} from 'graphql';
import { z } from 'zod';
import { AppError } from '../middleware/error/errorHandler';
import type { BotRegistry } from '../services/registry/BotRegistry';
import { logger } from '../services/logging/logger';
import { buildGraphQLSchema } from './schema';

const variablesSchema = z.record(z.unknown()).nullable().optional();

const requestSchema = z.object({
  query: z.string().min(1),
  variables: variablesSchema,
  operationName: z.string().nullable().optional(),
});

type GraphQLParams = z.infer<typeof requestSchema>;

const queryString = z.string().optional();

function readParams(req: Request): GraphQLParams {
  if (req.method === 'GET') {
    const query = queryString.parse(req.query.query);
    const variables = queryString.parse(req.query.variables);
    const operationName = queryString.parse(req.query.operationName);

    let parsedVariables: unknown = undefined;
    if (variables) {
      try {
        parsedVariables = JSON.parse(variables);
      } catch {
        throw new GraphQLError('Variables are invalid JSON.');
      }
    }
    return requestSchema.parse({ query, variables: parsedVariables, operationName });
  }
  return requestSchema.parse(req.body);
}

export type GraphQLErrorCode =
  | 'BAD_REQUEST'
  | 'GRAPHQL_PARSE_FAILED'
  | 'GRAPHQL_VALIDATION_FAILED'
  | 'BAD_USER_INPUT'
  | 'INTERNAL_SERVER_ERROR';

/**
 * Errors raised by the registry keep their own code and details. Any other
 * error thrown from a resolver is masked; the remaining GraphQL errors get
 * `code`.
 */
export function formatGraphQLError(
  error: GraphQLError,
  code: GraphQLErrorCode = 'INTERNAL_SERVER_ERROR'
): GraphQLFormattedError {
  const original = error.originalError;
  const formatted: GraphQLFormattedError = {
    message: error.message,
    ...(error.locations ? { locations: error.locations } : {}),
    ...(error.path ? { path: error.path } : {}),
  };

  if (original instanceof AppError) {
    return {
      ...formatted,
      extensions: {
        code: original.code,
        ...(original.details !== undefined ? { details: original.details } : {}),
      },
    };
  }

  // thrown from a resolver but not one of ours: don't leak internals
  if (original && !(original instanceof GraphQLError)) {
    logger.error('GraphQL resolver failed', {
      message: original.message,
      stack: original.stack,
      path: error.path,
    });
    return {
      ...formatted,
      message: 'Internal server error',
      extensions: { code: 'INTERNAL_SERVER_ERROR' },
    };
  }

  return {
    ...formatted,
    extensions: { code, ...error.extensions },
  };
}

function sendErrors(
  res: Response,
  status: number,
  errors: readonly GraphQLError[],
  code: GraphQLErrorCode
) {
  res.status(status).json({ errors: errors.map((error) => formatGraphQLError(error, code)) });
}

/**
 * GraphQL over HTTP: GET for queries (parameters in the query string), POST
 * with a JSON body for queries and mutations.
 */
export function createGraphQLHandler(
  registry: BotRegistry,
  schema: GraphQLSchema = buildGraphQLSchema()
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      let params: GraphQLParams;
      try {
        params = readParams(req);
      } catch (error) {
        if (error instanceof z.ZodError) {
          const missingQuery = error.issues.some((issue) => issue.path[0] === 'query');
          sendErrors(
            res,
            400,
            [new GraphQLError(missingQuery ? 'Must provide query string.' : 'Invalid GraphQL request parameters.')],
            'BAD_REQUEST'
          );
          return;
        }
        if (error instanceof GraphQLError) {
          sendErrors(res, 400, [error], 'BAD_REQUEST');
          return;
        }
        throw error;
      }

      let document: DocumentNode;
      try {
        document = parse(params.query);
      } catch (error) {
        if (error instanceof GraphQLError) {
          sendErrors(res, 400, [error], 'GRAPHQL_PARSE_FAILED');
          return;
        }
        throw error;
      }

      const validationErrors = validate(schema, document);
      if (validationErrors.length > 0) {
        sendErrors(res, 400, validationErrors, 'GRAPHQL_VALIDATION_FAILED');
        return;
      }

      const operationName = params.operationName ?? undefined;
      if (req.method === 'GET') {
        const operation = getOperationAST(document, operationName);
        if (operation && operation.operation !== 'query') {
          res.setHeader('Allow', 'POST');
          sendErrors(
            res,
            405,
            [new GraphQLError(`Can only perform a ${operation.operation} operation from a POST request.`)],
            'BAD_REQUEST'
          );
          return;
        }
      }

      const result = await execute({
        schema,
        document,
        contextValue: { registry },
        variableValues: params.variables ?? undefined,
        operationName,
      });

      // request errors (e.g. variable coercion) stop execution before any data
      if (result.data === undefined && result.errors) {
        sendErrors(res, 400, result.errors, 'BAD_USER_INPUT');
        return;
      }

      res.json({
        ...(result.errors ? { errors: result.errors.map((error) => formatGraphQLError(error)) } : {}),
        data: result.data ?? null,
      });
    } catch (error) {
      next(error);
    }
  };
}
