import { PlayerNotFoundError, TournamentNotFoundError } from "@/lib/errors";
import { pairRound, type PairingStrategy } from "@/lib/pairing";
import {
  applyBye,
  applyMatchResult,
  buildFinalRankings,
  computeOppWin,
  rankPlayers
} from "@/lib/standings";
import type { TournamentStore } from "@/lib/store";
import { logTournamentEvent, summarizePairings, summarizePlayers } from "@/lib/tournamentDebug";
import type { MatchResult, PairingPlan } from "@/lib/types";

async function requireTournament(store: TournamentStore, tournamentId: string) {
  const tournament = await store.getTournament(tournamentId);
  if (!tournament) {
    throw new TournamentNotFoundError(tournamentId);
  }

  return tournament;
}

export async function rank(store: TournamentStore, tournamentId: string) {
  await requireTournament(store, tournamentId);
  const players = await store.listPlayers(tournamentId);
  return rankPlayers(players);
}

export async function finalRankings(store: TournamentStore, tournamentId: string) {
  await requireTournament(store, tournamentId);
  const players = await store.listPlayers(tournamentId);
  return buildFinalRankings(players);
}

/**
 * Suggests the next round without writing anything. The bye, if any, is
 * applied with {@link awardBye} and each pair with {@link reportMatch} once
 * its result is known.
 */
export async function nextRoundPairings(
  store: TournamentStore,
  tournamentId: string,
  strategy?: PairingStrategy
): Promise<PairingPlan> {
  await requireTournament(store, tournamentId);
  const players = await store.listPlayers(tournamentId);
  const plan = pairRound(players, { strategy });

  logTournamentEvent("pairings", {
    tournamentId,
    strategy: strategy ?? "backtrack",
    players: summarizePlayers(players),
    ...summarizePairings(plan)
  });

  return plan;
}

export async function reportMatch(
  store: TournamentStore,
  tournamentId: string,
  result: MatchResult
) {
  return store.withTournament(tournamentId, async (tx) => {
    const players = await tx.listPlayers();
    const change = applyMatchResult(players, result);

    const match = await tx.insertMatch(result);
    await tx.savePlayers(change.changed);

    logTournamentEvent("match_reported", {
      tournamentId,
      matchId: match.id,
      player1Id: result.player1Id,
      player2Id: result.player2Id,
      draw: result.draw,
      refreshed: change.changed.map((player) => player.id)
    });

    return { match, standings: rankPlayers(change.players) };
  });
}

export async function awardBye(store: TournamentStore, tournamentId: string, playerId: string) {
  return store.withTournament(tournamentId, async (tx) => {
    const players = await tx.listPlayers();
    const change = applyBye(players, playerId);
    await tx.savePlayers(change.changed);

    logTournamentEvent("bye_awarded", {
      tournamentId,
      playerId,
      refreshed: change.changed.map((player) => player.id)
    });

    return { standings: rankPlayers(change.players) };
  });
}

export async function recomputeOppWin(store: TournamentStore, playerId: string) {
  const player = await store.getPlayer(playerId);
  if (!player) {
    throw new PlayerNotFoundError(playerId);
  }

  return store.withTournament(player.tournament_id, async (tx) => {
    const players = await tx.listPlayers();
    const current = players.find((candidate) => candidate.id === playerId);
    if (!current) {
      throw new PlayerNotFoundError(playerId);
    }

    const pointsById = new Map(players.map((candidate) => [candidate.id, candidate.points]));
    const updated = { ...current, opp_win: computeOppWin(current, pointsById) };
    await tx.savePlayers([updated]);
    return updated;
  });
}
