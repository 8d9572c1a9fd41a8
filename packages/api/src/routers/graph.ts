import { z } from "zod";
import { router, publicProcedure } from "../trpc.js";

const userId = z.number().int().min(0);

export const graphRouter = router({
  getUsers: publicProcedure
    .input(
      z.object({
        offset: z.number().int().min(0).default(0),
        limit: z.number().int().min(1).max(1000).default(100),
      }),
    )
    .query(({ ctx, input }) => {
      return ctx.simulation.getUsers(input.offset, input.limit);
    }),

  getUser: publicProcedure
    .input(z.object({ id: userId }))
    .query(({ ctx, input }) => {
      return ctx.simulation.getUser(input.id);
    }),

  getFollowers: publicProcedure
    .input(z.object({ id: userId }))
    .query(({ ctx, input }) => {
      return ctx.simulation.getFollowers(input.id);
    }),

  getFollowing: publicProcedure
    .input(z.object({ id: userId }))
    .query(({ ctx, input }) => {
      return ctx.simulation.getFollowing(input.id);
    }),

  getRelationship: publicProcedure
    .input(z.object({ a: userId, b: userId }))
    .query(({ ctx, input }) => {
      return ctx.simulation.getRelationship(input.a, input.b);
    }),

  getViralUsers: publicProcedure.query(({ ctx }) => {
    return ctx.simulation.getViralUsers();
  }),
});
