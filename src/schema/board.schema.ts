import {
  GraphQLInt,
  GraphQLList,
  GraphQLNonNull,
  GraphQLObjectType,
  GraphQLSchema,
  GraphQLString,
} from 'graphql';
import { BoardService } from './board.service';

async function* countdown(from: number): AsyncGenerator<number, void, void> {
  for (let n = from; n > 0; n--) yield n;
}

export function createBoardSchema(board: BoardService): GraphQLSchema {
  return new GraphQLSchema({
    query: new GraphQLObjectType({
      name: 'Query',
      fields: {
        messages: {
          type: new GraphQLNonNull(new GraphQLList(new GraphQLNonNull(GraphQLString))),
          resolve: () => board.list(),
        },
      },
    }),
    mutation: new GraphQLObjectType({
      name: 'Mutation',
      fields: {
        postMessage: {
          type: new GraphQLNonNull(GraphQLString),
          args: { text: { type: new GraphQLNonNull(GraphQLString) } },
          resolve: (_source: unknown, args: { text: string }) => board.post(args.text),
        },
      },
    }),
    subscription: new GraphQLObjectType({
      name: 'Subscription',
      fields: {
        messagePosted: {
          type: new GraphQLNonNull(GraphQLString),
          subscribe: () => board.watch(),
          resolve: (text: unknown) => text,
        },
        countdown: {
          type: new GraphQLNonNull(GraphQLInt),
          args: { from: { type: new GraphQLNonNull(GraphQLInt) } },
          subscribe: (_source: unknown, args: { from: number }) => countdown(args.from),
          resolve: (n: unknown) => n,
        },
      },
    }),
  });
}
