export interface Tournament {
  id: string;
  name: string;
  created_at: string;
}

export interface TournamentWithPin extends Tournament {
  pin_hash: string;
}

export interface Player {
  id: string;
  tournament_id: string;
  name: string;
  points: number;
  matches_played: number;
  prev_opponents: string[];
  had_bye: boolean;
  opp_win: number | null;
}

export interface Match {
  id: string;
  tournament_id: string;
  player1_id: string;
  player2_id: string;
  draw: boolean;
  created_at: string;
}

export interface MatchResult {
  player1Id: string;
  player2Id: string;
  draw: boolean;
}

export interface StandingRow {
  player_id: string;
  name: string;
  points: number;
  matches_played: number;
}

export interface FinalRanking {
  rank: number;
  player_id: string;
  name: string;
  points: number;
  matches_played: number;
  opp_win: number | null;
}

export interface Pairing {
  player1Id: string;
  player1Name: string;
  player2Id: string;
  player2Name: string;
}

export interface PairingPlan {
  pairings: Pairing[];
  bye: { playerId: string; name: string } | null;
}
