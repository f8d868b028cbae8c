import {
  ByeNotAllowedError,
  InvalidMatchError,
  PlayerNotFoundError,
  RematchError
} from "@/lib/errors";
import type { FinalRanking, MatchResult, Player, StandingRow } from "@/lib/types";

export const WIN_POINTS = 1;
export const DRAW_POINTS = 0.5;
export const LOSS_POINTS = 0;
export const BYE_POINTS = 1;

export interface StateChange {
  /** Every player of the tournament after the change. */
  players: Player[];
  /** Players whose stored row differs from before. */
  changed: Player[];
}

export function compareStanding(a: Player, b: Player) {
  if (b.points !== a.points) {
    return b.points - a.points;
  }

  return compareNameThenId(a, b);
}

export function compareWithTieBreak(a: Player, b: Player) {
  if (b.points !== a.points) {
    return b.points - a.points;
  }

  const byOppWin = compareOppWin(a.opp_win, b.opp_win);
  if (byOppWin !== 0) {
    return byOppWin;
  }

  return compareNameThenId(a, b);
}

export function rankPlayers(players: Player[]) {
  return [...players].sort(compareStanding);
}

export function toStandingRows(players: Player[]): StandingRow[] {
  return rankPlayers(players).map((player) => ({
    player_id: player.id,
    name: player.name,
    points: player.points,
    matches_played: player.matches_played
  }));
}

export function haveMet(a: Player, b: Player) {
  return a.prev_opponents.includes(b.id) || b.prev_opponents.includes(a.id);
}

export function computeOppWin(player: Player, pointsById: Map<string, number>) {
  const opponentPoints: number[] = [];
  for (const opponentId of player.prev_opponents) {
    const points = pointsById.get(opponentId);
    if (points !== undefined) {
      opponentPoints.push(points);
    }
  }

  if (opponentPoints.length === 0) {
    return null;
  }

  return opponentPoints.reduce((sum, points) => sum + points, 0) / opponentPoints.length;
}

/**
 * Recomputes `opp_win` for the players that need it after the points of
 * `touchedIds` changed: the touched players themselves and anyone who has
 * faced one of them.
 */
export function refreshOppWin(players: Player[], touchedIds: string[]): StateChange {
  const touched = new Set(touchedIds);
  const pointsById = new Map(players.map((player) => [player.id, player.points]));
  const changed: Player[] = [];

  const next = players.map((player) => {
    const affected =
      touched.has(player.id) || player.prev_opponents.some((id) => touched.has(id));
    if (!affected) {
      return player;
    }

    const oppWin = computeOppWin(player, pointsById);
    if (oppWin === player.opp_win && !touched.has(player.id)) {
      return player;
    }

    const updated = { ...player, opp_win: oppWin };
    changed.push(updated);
    return updated;
  });

  return { players: next, changed };
}

export function applyMatchResult(players: Player[], result: MatchResult): StateChange {
  const { player1Id, player2Id, draw } = result;
  if (player1Id === player2Id) {
    throw new InvalidMatchError(player1Id);
  }

  const first = findPlayer(players, player1Id);
  const second = findPlayer(players, player2Id);

  if (haveMet(first, second)) {
    throw new RematchError(player1Id, player2Id);
  }

  const firstPoints = draw ? DRAW_POINTS : WIN_POINTS;
  const secondPoints = draw ? DRAW_POINTS : LOSS_POINTS;

  const played = players.map((player) => {
    if (player.id === player1Id) {
      return recordGame(player, player2Id, firstPoints);
    }

    if (player.id === player2Id) {
      return recordGame(player, player1Id, secondPoints);
    }

    return player;
  });

  return refreshOppWin(played, [player1Id, player2Id]);
}

export function applyBye(players: Player[], playerId: string): StateChange {
  const player = findPlayer(players, playerId);
  if (player.had_bye) {
    throw new ByeNotAllowedError(playerId, "already-awarded");
  }

  if (players.length % 2 === 0) {
    throw new ByeNotAllowedError(playerId, "even-field");
  }

  const awarded = players.map((candidate) =>
    candidate.id === playerId
      ? {
          ...candidate,
          points: candidate.points + BYE_POINTS,
          matches_played: candidate.matches_played + 1,
          had_bye: true
        }
      : candidate
  );

  return refreshOppWin(awarded, [playerId]);
}

export function buildFinalRankings(players: Player[]): FinalRanking[] {
  const fresh = refreshOppWin(
    players,
    players.map((player) => player.id)
  ).players.sort(compareWithTieBreak);

  const rankings: FinalRanking[] = [];

  for (let index = 0; index < fresh.length; index += 1) {
    const player = fresh[index];
    const previous = index > 0 ? fresh[index - 1] : null;
    // Players level on points and opp_win share a rank; the next rank skips.
    const tied =
      previous !== null &&
      previous.points === player.points &&
      previous.opp_win === player.opp_win;

    rankings.push({
      rank: tied ? rankings[index - 1].rank : index + 1,
      player_id: player.id,
      name: player.name,
      points: player.points,
      matches_played: player.matches_played,
      opp_win: player.opp_win
    });
  }

  return rankings;
}

function recordGame(player: Player, opponentId: string, points: number): Player {
  return {
    ...player,
    points: player.points + points,
    matches_played: player.matches_played + 1,
    prev_opponents: player.prev_opponents.includes(opponentId)
      ? player.prev_opponents
      : [...player.prev_opponents, opponentId]
  };
}

function findPlayer(players: Player[], playerId: string) {
  const player = players.find((candidate) => candidate.id === playerId);
  if (!player) {
    throw new PlayerNotFoundError(playerId);
  }

  return player;
}

function compareOppWin(a: number | null, b: number | null) {
  if (a === b) {
    return 0;
  }

  if (a === null) {
    return 1;
  }

  if (b === null) {
    return -1;
  }

  return b - a;
}

function compareNameThenId(a: Player, b: Player) {
  if (a.name !== b.name) {
    return a.name < b.name ? -1 : 1;
  }

  if (a.id === b.id) {
    return 0;
  }

  return a.id < b.id ? -1 : 1;
}
