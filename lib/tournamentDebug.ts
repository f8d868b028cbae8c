import { readConfig } from "@/lib/config";
import type { PairingPlan, Player } from "@/lib/types";

export function isTournamentDebugEnabled() {
  return readConfig().TOURNAMENT_DEBUG === "1";
}

export function logTournamentEvent(event: string, payload: Record<string, unknown>) {
  if (!isTournamentDebugEnabled()) {
    return;
  }

  const envelope = {
    ts: new Date().toISOString(),
    pid: process.pid,
    db: resolveDebugDbTarget(readConfig().DATABASE_URL),
    event,
    ...payload
  };

  console.log(`[tournament-debug] ${JSON.stringify(envelope)}`);
}

export function pairKey(a: string, b: string) {
  return [a, b].sort().join(":");
}

export function summarizePairings(plan: PairingPlan) {
  return {
    pairs: plan.pairings.map((pairing) => pairKey(pairing.player1Id, pairing.player2Id)),
    bye: plan.bye?.playerId ?? null
  };
}

export function summarizePlayers(players: Player[]) {
  return players.map((player) => ({
    id: player.id,
    name: player.name,
    points: player.points,
    matches_played: player.matches_played,
    opponents: player.prev_opponents.length,
    had_bye: player.had_bye
  }));
}

export function resolveDebugDbTarget(raw: string | undefined) {
  if (!raw) {
    return "memory";
  }

  try {
    const parsed = new URL(raw);
    const dbName = parsed.pathname.replace(/^\/+/, "") || "unknown";
    return `${parsed.hostname}:${parsed.port || "5432"}/${dbName}`;
  } catch {
    return "invalid-url";
  }
}
