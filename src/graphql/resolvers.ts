import type { BotRegistry } from '../services/registry/BotRegistry';
import type { Message, MessageFilter, MessageOrigin, User } from '../types';

export interface GraphQLContext {
  registry: BotRegistry;
}

type Nullable<T> = { [K in keyof T]?: T[K] | null };

type MessageFilterArgs = Nullable<MessageFilter>;

interface UsersArgs {
  id?: number | null;
  name?: string | null;
}

// Explicit nulls from the client mean "no filter", same as leaving the argument out
function toMessageFilter(args: MessageFilterArgs): MessageFilter {
  const filter: MessageFilter = {};
  if (args.id != null) filter.id = args.id;
  if (args.origin != null) filter.origin = args.origin;
  if (args.content != null) filter.content = args.content;
  if (args.after != null) filter.after = args.after;
  if (args.before != null) filter.before = args.before;
  if (args.pattern != null) filter.pattern = args.pattern;
  return filter;
}

export const resolvers = {
  MessageOrigin: {
    USER: 'user' satisfies MessageOrigin,
    BOT: 'bot' satisfies MessageOrigin,
  },

  Query: {
    user: (_: unknown, { id }: { id: number }, { registry }: GraphQLContext) =>
      registry.getUser(id),

    users: (_: unknown, { id, name }: UsersArgs, { registry }: GraphQLContext) =>
      registry.listUsers({ id: id ?? undefined, name: name ?? undefined }),

    messages: (
      _: unknown,
      { userId, ...filter }: MessageFilterArgs & { userId: number },
      { registry }: GraphQLContext
    ) => registry.listMessages(userId, toMessageFilter(filter)),

    message: (_: unknown, { userId, id }: { userId: number; id: number }, { registry }: GraphQLContext) =>
      registry.getMessage(userId, id),
  },

  Mutation: {
    createUser: (_: unknown, { name }: { name: string }, { registry }: GraphQLContext) =>
      registry.createUser({ name }),

    setUserName: (_: unknown, { id, name }: { id: number; name: string }, { registry }: GraphQLContext) =>
      registry.renameUser(id, name),

    sendMessage: (
      _: unknown,
      { userId, content }: { userId: number; content: string },
      { registry }: GraphQLContext
    ) => registry.sendMessage(userId, content),
  },

  User: {
    messages: (user: User, args: MessageFilterArgs, { registry }: GraphQLContext) =>
      registry.listMessages(user.id, toMessageFilter(args)),
  },

  Message: {
    user: (message: Message, _: unknown, { registry }: GraphQLContext) =>
      registry.getUser(message.userId),
  },
};
