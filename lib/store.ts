import type {
  Match,
  MatchResult,
  Player,
  StandingRow,
  Tournament,
  TournamentWithPin
} from "@/lib/types";

/**
 * Work done while a tournament is locked. Writes become visible together when
 * the work resolves and are discarded when it throws.
 */
export interface TournamentTransaction {
  readonly tournament: Tournament;
  listPlayers(): Promise<Player[]>;
  insertMatch(result: MatchResult): Promise<Match>;
  savePlayers(players: Player[]): Promise<void>;
}

export interface TournamentStore {
  createTournament(input: { name: string; pinHash: string }): Promise<Tournament>;
  getTournament(tournamentId: string): Promise<Tournament | null>;
  getTournamentWithPin(tournamentId: string): Promise<TournamentWithPin | null>;
  listTournaments(): Promise<Tournament[]>;
  renameTournament(tournamentId: string, name: string): Promise<Tournament | null>;
  /** Removes the tournament with its players and matches. */
  deleteTournament(tournamentId: string): Promise<boolean>;

  registerPlayer(input: { tournamentId: string; name: string }): Promise<Player>;
  getPlayer(playerId: string): Promise<Player | null>;
  listPlayers(tournamentId: string): Promise<Player[]>;
  countPlayers(tournamentId: string): Promise<number>;
  /** Ordered by points desc, then name, then id. */
  standings(tournamentId: string): Promise<StandingRow[]>;

  listMatches(tournamentId: string): Promise<Match[]>;
  /** Deletes the tournament's matches and returns every player to a fresh standing. */
  resetResults(tournamentId: string): Promise<void>;
  /** Without a tournament id every player of every tournament is removed. */
  deleteAllPlayers(tournamentId?: string): Promise<void>;

  withTournament<T>(
    tournamentId: string,
    work: (tx: TournamentTransaction) => Promise<T>
  ): Promise<T>;
}
