import type postgres from "postgres";
import type { Sql } from "@/lib/db";
import { TournamentNotFoundError } from "@/lib/errors";
import type { TournamentStore, TournamentTransaction } from "@/lib/store";
import type {
  Match,
  MatchResult,
  Player,
  StandingRow,
  Tournament,
  TournamentWithPin
} from "@/lib/types";

interface TournamentRow {
  id: string;
  name: string;
  created_at: Date | string;
}

interface TournamentWithPinRow extends TournamentRow {
  pin_hash: string;
}

interface PlayerRow {
  id: string;
  tournament_id: string;
  name: string;
  points: number;
  matches_played: number;
  prev_opponents: string[] | null;
  had_bye: boolean;
  opp_win: number | null;
}

interface MatchRow {
  id: string;
  tournament_id: string;
  player1_id: string;
  player2_id: string;
  draw: boolean;
  created_at: Date | string;
}

const PLAYER_COLUMNS = `
  id,
  tournament_id,
  name,
  points::float8 as points,
  matches_played,
  coalesce(prev_opponents, '{}'::uuid[]) as prev_opponents,
  had_bye,
  opp_win::float8 as opp_win
`;

const MATCH_COLUMNS = `
  id,
  tournament_id,
  player1_id,
  player2_id,
  draw,
  created_at
`;

export function createPostgresStore(sql: Sql): TournamentStore {
  return {
    async createTournament({ name, pinHash }) {
      const rows = await sql<TournamentRow[]>`
        insert into tournaments (name, pin_hash)
        values (${name}, ${pinHash})
        returning id, name, created_at
      `;

      return normalizeTournament(rows[0]);
    },

    async getTournament(tournamentId) {
      const rows = await sql<TournamentRow[]>`
        select id, name, created_at
        from tournaments
        where id = ${tournamentId}
        limit 1
      `;

      return rows[0] ? normalizeTournament(rows[0]) : null;
    },

    async getTournamentWithPin(tournamentId) {
      const rows = await sql<TournamentWithPinRow[]>`
        select id, name, created_at, pin_hash
        from tournaments
        where id = ${tournamentId}
        limit 1
      `;

      const row = rows[0];
      if (!row) {
        return null;
      }

      const tournament: TournamentWithPin = {
        ...normalizeTournament(row),
        pin_hash: row.pin_hash
      };
      return tournament;
    },

    async listTournaments() {
      const rows = await sql<TournamentRow[]>`
        select id, name, created_at
        from tournaments
        order by created_at desc, id desc
      `;

      return rows.map(normalizeTournament);
    },

    async renameTournament(tournamentId, name) {
      const rows = await sql<TournamentRow[]>`
        update tournaments
        set name = ${name}
        where id = ${tournamentId}
        returning id, name, created_at
      `;

      return rows[0] ? normalizeTournament(rows[0]) : null;
    },

    async deleteTournament(tournamentId) {
      const rows = await sql<Array<{ id: string }>>`
        delete from tournaments
        where id = ${tournamentId}
        returning id
      `;

      return rows.length > 0;
    },

    async registerPlayer({ tournamentId, name }) {
      const rows = await sql.unsafe<PlayerRow[]>(
        `
          insert into players (tournament_id, name)
          select id, $2
          from tournaments
          where id = $1
          returning ${PLAYER_COLUMNS}
        `,
        [tournamentId, name]
      );

      const row = rows[0];
      if (!row) {
        throw new TournamentNotFoundError(tournamentId);
      }

      return normalizePlayer(row);
    },

    async getPlayer(playerId) {
      const rows = await sql.unsafe<PlayerRow[]>(
        `
          select ${PLAYER_COLUMNS}
          from players
          where id = $1
          limit 1
        `,
        [playerId]
      );

      return rows[0] ? normalizePlayer(rows[0]) : null;
    },

    async listPlayers(tournamentId) {
      const rows = await sql.unsafe<PlayerRow[]>(
        `
          select ${PLAYER_COLUMNS}
          from players
          where tournament_id = $1
          order by name collate "C" asc, id asc
        `,
        [tournamentId]
      );

      return rows.map(normalizePlayer);
    },

    async countPlayers(tournamentId) {
      const rows = await sql<Array<{ count: number }>>`
        select count(*)::int as count
        from players
        where tournament_id = ${tournamentId}
      `;

      return rows[0]?.count ?? 0;
    },

    async standings(tournamentId) {
      const rows = await sql<StandingRow[]>`
        select player_id, name, points, matches_played
        from tournament_standings(${tournamentId})
      `;

      return rows.map((row) => ({
        player_id: row.player_id,
        name: row.name,
        points: Number(row.points),
        matches_played: Number(row.matches_played)
      }));
    },

    async listMatches(tournamentId) {
      const rows = await sql.unsafe<MatchRow[]>(
        `
          select ${MATCH_COLUMNS}
          from matches
          where tournament_id = $1
          order by created_at desc, id desc
        `,
        [tournamentId]
      );

      return rows.map(normalizeMatch);
    },

    async resetResults(tournamentId) {
      await sql.begin(async (tx) => {
        await lockTournament(tx, tournamentId);

        await tx.unsafe(`delete from matches where tournament_id = $1`, [tournamentId]);
        await tx.unsafe(
          `
            update players
            set
              points = 0,
              matches_played = 0,
              prev_opponents = '{}'::uuid[],
              had_bye = false,
              opp_win = null
            where tournament_id = $1
          `,
          [tournamentId]
        );
      });
    },

    async deleteAllPlayers(tournamentId) {
      // Matches go with their players through the foreign key cascade.
      if (tournamentId === undefined) {
        await sql`delete from players`;
        return;
      }

      await sql`delete from players where tournament_id = ${tournamentId}`;
    },

    async withTournament<T>(
      tournamentId: string,
      work: (tx: TournamentTransaction) => Promise<T>
    ): Promise<T> {
      const outcome: { settled?: { value: T } } = {};

      await sql.begin(async (tx) => {
        const tournament = await lockTournament(tx, tournamentId);
        outcome.settled = { value: await work(bindTransaction(tx, tournament)) };
      });

      if (!outcome.settled) {
        throw new Error("Tournament transaction finished without a result");
      }

      return outcome.settled.value;
    }
  };
}

async function lockTournament(tx: postgres.TransactionSql, tournamentId: string) {
  const rows = await tx.unsafe<TournamentRow[]>(
    `
      select id, name, created_at
      from tournaments
      where id = $1
      for update
    `,
    [tournamentId]
  );

  const row = rows[0];
  if (!row) {
    throw new TournamentNotFoundError(tournamentId);
  }

  return normalizeTournament(row);
}

function bindTransaction(tx: postgres.TransactionSql, tournament: Tournament): TournamentTransaction {
  return {
    tournament,

    async listPlayers() {
      const rows = await tx.unsafe<PlayerRow[]>(
        `
          select ${PLAYER_COLUMNS}
          from players
          where tournament_id = $1
          order by name collate "C" asc, id asc
          for update
        `,
        [tournament.id]
      );

      return rows.map(normalizePlayer);
    },

    async insertMatch(result: MatchResult) {
      const rows = await tx.unsafe<MatchRow[]>(
        `
          insert into matches (tournament_id, player1_id, player2_id, draw)
          values ($1, $2, $3, $4)
          returning ${MATCH_COLUMNS}
        `,
        [tournament.id, result.player1Id, result.player2Id, result.draw]
      );

      const row = rows[0];
      if (!row) {
        throw new Error("Match insert returned no row");
      }

      return normalizeMatch(row);
    },

    async savePlayers(players: Player[]) {
      for (const player of players) {
        await tx.unsafe(
          `
            update players
            set
              points = $1,
              matches_played = $2,
              prev_opponents = $3::uuid[],
              had_bye = $4,
              opp_win = $5
            where id = $6
              and tournament_id = $7
          `,
          [
            player.points,
            player.matches_played,
            player.prev_opponents,
            player.had_bye,
            player.opp_win,
            player.id,
            tournament.id
          ]
        );
      }
    }
  };
}

function normalizeTournament(row: TournamentRow): Tournament {
  return {
    id: row.id,
    name: row.name,
    created_at: toIsoString(row.created_at)
  };
}

function normalizePlayer(row: PlayerRow): Player {
  return {
    id: row.id,
    tournament_id: row.tournament_id,
    name: row.name,
    points: Number(row.points),
    matches_played: Number(row.matches_played),
    prev_opponents: [...new Set(row.prev_opponents ?? [])],
    had_bye: row.had_bye,
    opp_win: row.opp_win === null ? null : Number(row.opp_win)
  };
}

function normalizeMatch(row: MatchRow): Match {
  return {
    id: row.id,
    tournament_id: row.tournament_id,
    player1_id: row.player1_id,
    player2_id: row.player2_id,
    draw: row.draw,
    created_at: toIsoString(row.created_at)
  };
}

function toIsoString(value: Date | string) {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}
