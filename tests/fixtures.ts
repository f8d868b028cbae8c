import type { Player } from "../lib/types";

export function player(id: string, overrides: Partial<Player> = {}): Player {
  return {
    id,
    tournament_id: "t1",
    name: id.toUpperCase(),
    points: 0,
    matches_played: 0,
    prev_opponents: [],
    had_bye: false,
    opp_win: null,
    ...overrides
  };
}

export function byId(players: Player[], id: string) {
  const found = players.find((candidate) => candidate.id === id);
  if (!found) {
    throw new Error(`missing player ${id}`);
  }

  return found;
}
