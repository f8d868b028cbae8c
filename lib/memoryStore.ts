import { randomUUID } from "node:crypto";
import { TournamentNotFoundError } from "@/lib/errors";
import { toStandingRows } from "@/lib/standings";
import type { TournamentStore, TournamentTransaction } from "@/lib/store";
import type { Match, MatchResult, Player, Tournament, TournamentWithPin } from "@/lib/types";

interface MemoryState {
  tournaments: Map<string, TournamentWithPin>;
  players: Map<string, Player>;
  matches: Match[];
}

export function createMemoryStore(): TournamentStore {
  let state: MemoryState = {
    tournaments: new Map(),
    players: new Map(),
    matches: []
  };
  // Transactions run one at a time, mirroring the row lock of the SQL store.
  let queue: Promise<unknown> = Promise.resolve();

  function playersOf(snapshot: MemoryState, tournamentId: string) {
    return [...snapshot.players.values()]
      .filter((player) => player.tournament_id === tournamentId)
      .map(clonePlayer);
  }

  function enqueue<T>(work: (draft: MemoryState) => Promise<T>): Promise<T> {
    const run = queue.then(() => {
      const draft = cloneState(state);
      return work(draft).then((result) => {
        state = draft;
        return result;
      });
    });

    // The caller sees the failure through `run`; the queue only needs to move on.
    queue = run.catch(() => undefined);
    return run;
  }

  function transact<T>(tournamentId: string, work: (draft: MemoryState) => Promise<T>) {
    return enqueue((draft) => {
      if (!draft.tournaments.has(tournamentId)) {
        throw new TournamentNotFoundError(tournamentId);
      }

      return work(draft);
    });
  }

  function withTournament<T>(
    tournamentId: string,
    work: (tx: TournamentTransaction) => Promise<T>
  ): Promise<T> {
    return enqueue((draft) => {
      const tournament = draft.tournaments.get(tournamentId);
      if (!tournament) {
        throw new TournamentNotFoundError(tournamentId);
      }

      return work({
        tournament: publicTournament(tournament),
        async listPlayers() {
          return playersOf(draft, tournamentId);
        },
        async insertMatch(result: MatchResult) {
          const match: Match = {
            id: randomUUID(),
            tournament_id: tournamentId,
            player1_id: result.player1Id,
            player2_id: result.player2Id,
            draw: result.draw,
            created_at: nextTimestamp(draft.matches)
          };
          draft.matches.push(match);
          return { ...match };
        },
        async savePlayers(players: Player[]) {
          for (const player of players) {
            if (draft.players.get(player.id)?.tournament_id === tournamentId) {
              draft.players.set(player.id, clonePlayer(player));
            }
          }
        }
      });
    });
  }

  return {
    async createTournament({ name, pinHash }) {
      const tournament: TournamentWithPin = {
        id: randomUUID(),
        name,
        pin_hash: pinHash,
        created_at: new Date().toISOString()
      };
      await enqueue(async (draft) => {
        draft.tournaments.set(tournament.id, tournament);
      });
      return publicTournament(tournament);
    },

    async getTournament(tournamentId) {
      const tournament = state.tournaments.get(tournamentId);
      return tournament ? publicTournament(tournament) : null;
    },

    async getTournamentWithPin(tournamentId) {
      const tournament = state.tournaments.get(tournamentId);
      return tournament ? { ...tournament } : null;
    },

    async listTournaments() {
      return [...state.tournaments.values()]
        .map(publicTournament)
        .sort((a, b) => b.created_at.localeCompare(a.created_at));
    },

    renameTournament(tournamentId, name) {
      return enqueue(async (draft) => {
        const tournament = draft.tournaments.get(tournamentId);
        if (!tournament) {
          return null;
        }

        const renamed = { ...tournament, name };
        draft.tournaments.set(tournamentId, renamed);
        return publicTournament(renamed);
      });
    },

    deleteTournament(tournamentId) {
      return enqueue(async (draft) => {
        if (!draft.tournaments.delete(tournamentId)) {
          return false;
        }

        for (const player of [...draft.players.values()]) {
          if (player.tournament_id === tournamentId) {
            draft.players.delete(player.id);
          }
        }
        draft.matches = draft.matches.filter((match) => match.tournament_id !== tournamentId);
        return true;
      });
    },

    registerPlayer({ tournamentId, name }) {
      return transact(tournamentId, async (draft) => {
        const player: Player = {
          id: randomUUID(),
          tournament_id: tournamentId,
          name,
          points: 0,
          matches_played: 0,
          prev_opponents: [],
          had_bye: false,
          opp_win: null
        };
        draft.players.set(player.id, player);
        return clonePlayer(player);
      });
    },

    async getPlayer(playerId) {
      const player = state.players.get(playerId);
      return player ? clonePlayer(player) : null;
    },

    async listPlayers(tournamentId) {
      return playersOf(state, tournamentId).sort(compareByName);
    },

    async countPlayers(tournamentId) {
      return playersOf(state, tournamentId).length;
    },

    async standings(tournamentId) {
      return toStandingRows(playersOf(state, tournamentId));
    },

    async listMatches(tournamentId) {
      return state.matches
        .filter((match) => match.tournament_id === tournamentId)
        .map((match) => ({ ...match }))
        .reverse();
    },

    async resetResults(tournamentId) {
      await transact(tournamentId, async (draft) => {
        for (const player of playersOf(draft, tournamentId)) {
          draft.players.set(player.id, freshStanding(player));
        }
        draft.matches = draft.matches.filter((match) => match.tournament_id !== tournamentId);
      });
    },

    async deleteAllPlayers(tournamentId) {
      await enqueue(async (draft) => {
        for (const player of [...draft.players.values()]) {
          if (tournamentId === undefined || player.tournament_id === tournamentId) {
            draft.players.delete(player.id);
          }
        }

        draft.matches = draft.matches.filter(
          (match) => draft.players.has(match.player1_id) && draft.players.has(match.player2_id)
        );
      });
    },

    withTournament
  };
}

function freshStanding(player: Player): Player {
  return {
    ...player,
    points: 0,
    matches_played: 0,
    prev_opponents: [],
    had_bye: false,
    opp_win: null
  };
}

function compareByName(a: Player, b: Player) {
  if (a.name !== b.name) {
    return a.name < b.name ? -1 : 1;
  }

  return a.id < b.id ? -1 : 1;
}

function publicTournament(tournament: TournamentWithPin): Tournament {
  return {
    id: tournament.id,
    name: tournament.name,
    created_at: tournament.created_at
  };
}

function clonePlayer(player: Player): Player {
  return { ...player, prev_opponents: [...player.prev_opponents] };
}

function cloneState(state: MemoryState): MemoryState {
  return {
    tournaments: new Map(state.tournaments),
    players: new Map([...state.players].map(([id, player]) => [id, clonePlayer(player)])),
    matches: state.matches.map((match) => ({ ...match }))
  };
}

// Keeps listMatches newest-first even when two results land in the same millisecond.
function nextTimestamp(matches: Match[]) {
  const now = Date.now();
  const latest = matches.reduce((max, match) => Math.max(max, Date.parse(match.created_at)), 0);
  return new Date(Math.max(now, latest + 1)).toISOString();
}
