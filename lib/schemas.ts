import { z } from "zod";

const tournamentName = z.string().trim().min(1).max(200);
const playerName = z.string().trim().min(1).max(100);
const pin = z.string().min(4).max(32);

export const tournamentIdSchema = z.string().uuid();

export const createTournamentSchema = z.object({
  name: tournamentName,
  pin
});

export const renameTournamentSchema = z.object({
  name: tournamentName
});

export const unlockSchema = z.object({
  pin
});

export const playersMutationSchema = z.discriminatedUnion("action", [
  z.object({
    action: z.literal("register"),
    name: playerName
  }),
  z.object({
    action: z.literal("reset")
  })
]);

export const pairingsRequestSchema = z.object({
  strategy: z.enum(["forward", "backtrack"]).optional()
});

/** Unless `draw` is true, `player1Id` is the winner. */
export const reportMatchSchema = z.object({
  player1Id: z.string().uuid(),
  player2Id: z.string().uuid(),
  draw: z.boolean().optional()
});

export const awardByeSchema = z.object({
  playerId: z.string().uuid()
});
