import { z } from "zod";
import { router, publicProcedure } from "../trpc.js";

const day = z.number().int().min(0);
const userId = z.number().int().min(0);
// calendar day, optionally followed by an ISO time
const SNAPSHOT_DATE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/;

export const simulationRouter = router({
  advanceDay: publicProcedure.mutation(async ({ ctx }) => {
    return ctx.simulation.advanceDay();
  }),

  runToEnd: publicProcedure.mutation(async ({ ctx }) => {
    return ctx.simulation.runToEnd();
  }),

  getCurrentDay: publicProcedure.query(({ ctx }) => {
    return {
      day: ctx.simulation.currentDay,
      date: ctx.simulation.currentDate,
      dayCount: ctx.simulation.dayCount,
      finished: ctx.simulation.isFinished,
    };
  }),

  getSummary: publicProcedure.query(({ ctx }) => {
    return ctx.simulation.getSummary();
  }),

  getEventLog: publicProcedure
    .input(
      z.object({
        userId: userId.optional(),
        fromDay: day.optional(),
        toDay: day.optional(),
      }),
    )
    .query(({ ctx, input }) => {
      return ctx.simulation.getEventLog(input.userId, input.fromDay, input.toDay);
    }),

  getPairEvents: publicProcedure
    .input(z.object({ a: userId, b: userId }))
    .query(({ ctx, input }) => {
      return ctx.simulation.getPairEvents(input.a, input.b);
    }),

  getEventCounts: publicProcedure
    .input(z.object({ fromDay: day.optional(), toDay: day.optional() }))
    .query(({ ctx, input }) => {
      return ctx.simulation.getEventCounts(input.fromDay, input.toDay);
    }),

  getSnapshotDates: publicProcedure.query(async ({ ctx }) => {
    return ctx.simulation.getSnapshotDates();
  }),

  getSnapshotMetadata: publicProcedure
    .input(z.object({ date: z.string().regex(SNAPSHOT_DATE) }))
    .query(async ({ ctx, input }) => {
      return ctx.simulation.getSnapshotMetadata(input.date);
    }),
});
