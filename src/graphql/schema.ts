import { readFileSync } from 'fs';
import { makeExecutableSchema } from '@graphql-tools/schema';
import type { GraphQLSchema } from 'graphql';
import { resolvers } from './resolvers';

export const SCHEMA_FILE = new URL('./schema.graphql', import.meta.url);

export function buildGraphQLSchema(): GraphQLSchema {
  return makeExecutableSchema({
    typeDefs: readFileSync(SCHEMA_FILE, 'utf-8'),
    resolvers,
  });
}
