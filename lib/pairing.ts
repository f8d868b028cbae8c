import { NoEligiblePlayerForByeError, PairingConflictError } from "@/lib/errors";
import { compareWithTieBreak, haveMet } from "@/lib/standings";
import type { Pairing, PairingPlan, Player } from "@/lib/types";

export type PairingStrategy = "forward" | "backtrack";

export interface PairingOptions {
  strategy?: PairingStrategy;
}

function orderForPairing(players: Player[]) {
  return [...players].sort(compareWithTieBreak);
}

/** Bye candidates in the order they are tried: lowest ranked first. */
function byeCandidates(ordered: Player[]) {
  return ordered.filter((player) => !player.had_bye).reverse();
}

export function pairRound(players: Player[], options: PairingOptions = {}): PairingPlan {
  const strategy = options.strategy ?? "backtrack";
  const ordered = orderForPairing(players);

  if (ordered.length % 2 === 0) {
    return { pairings: pairPool(ordered, strategy), bye: null };
  }

  const candidates = byeCandidates(ordered);
  if (candidates.length === 0) {
    throw new NoEligiblePlayerForByeError();
  }

  if (strategy === "forward") {
    const byePlayer = candidates[0];
    return {
      pairings: forwardPairing(withoutPlayer(ordered, byePlayer.id)),
      bye: { playerId: byePlayer.id, name: byePlayer.name }
    };
  }

  let firstConflict: PairingConflictError | null = null;
  // Pools that cannot be paired stay unpairable whoever sits out.
  const failedPools = new Set<string>();

  for (const byePlayer of candidates) {
    try {
      return {
        pairings: backtrackPairing(withoutPlayer(ordered, byePlayer.id), failedPools),
        bye: { playerId: byePlayer.id, name: byePlayer.name }
      };
    } catch (error) {
      if (!(error instanceof PairingConflictError)) {
        throw error;
      }

      if (!firstConflict) {
        firstConflict = error;
      }
    }
  }

  throw firstConflict ?? new PairingConflictError(candidates[0].id);
}

/**
 * Recommended number of rounds: enough for a single undefeated player to
 * emerge in a field of `playerCount`.
 */
export function swissRoundCount(playerCount: number) {
  if (playerCount < 2) {
    return 0;
  }

  return Math.ceil(Math.log2(playerCount));
}

function pairPool(pool: Player[], strategy: PairingStrategy) {
  return strategy === "forward" ? forwardPairing(pool) : backtrackPairing(pool, new Set());
}

function forwardPairing(pool: Player[]) {
  const remaining = [...pool];
  const pairings: Pairing[] = [];

  while (remaining.length > 1) {
    const top = remaining[0];
    const opponentIndex = remaining.findIndex(
      (candidate, index) => index > 0 && !haveMet(top, candidate)
    );

    if (opponentIndex === -1) {
      throw new PairingConflictError(top.id);
    }

    pairings.push(toPairing(top, remaining[opponentIndex]));
    remaining.splice(opponentIndex, 1);
    remaining.shift();
  }

  return pairings;
}

/**
 * Depth-first search over the same preference order as the forward scan, so
 * its first complete answer equals the forward scan whenever that succeeds.
 * Pools already known to fail are skipped.
 */
function backtrackPairing(pool: Player[], failedPools: Set<string>) {
  const pairings = searchPairings(pool, failedPools);
  if (!pairings) {
    throw new PairingConflictError(leftOverPlayer(pool)?.id ?? pool[0].id);
  }

  return pairings;
}

function searchPairings(pool: Player[], failedPools: Set<string>): Pairing[] | null {
  if (pool.length === 0) {
    return [];
  }

  const key = poolKey(pool);
  if (failedPools.has(key)) {
    return null;
  }

  if (leftOverPlayer(pool)) {
    failedPools.add(key);
    return null;
  }

  const [top, ...rest] = pool;

  for (let index = 0; index < rest.length; index += 1) {
    const candidate = rest[index];
    if (haveMet(top, candidate)) {
      continue;
    }

    const remainder = searchPairings(
      [...rest.slice(0, index), ...rest.slice(index + 1)],
      failedPools
    );
    if (remainder) {
      return [toPairing(top, candidate), ...remainder];
    }
  }

  failedPools.add(key);
  return null;
}

/**
 * Splits the pool into groups linked by games not yet played. A group with an
 * odd head count has met everyone outside it, so one of its members is always
 * left without an opponent; that member is returned.
 */
function leftOverPlayer(pool: Player[]) {
  const grouped = new Set<string>();

  for (const start of pool) {
    if (grouped.has(start.id)) {
      continue;
    }

    const group = [start];
    grouped.add(start.id);

    for (let index = 0; index < group.length; index += 1) {
      for (const other of pool) {
        if (!grouped.has(other.id) && !haveMet(group[index], other)) {
          grouped.add(other.id);
          group.push(other);
        }
      }
    }

    if (group.length % 2 === 1) {
      return start;
    }
  }

  return undefined;
}

function poolKey(pool: Player[]) {
  return pool
    .map((player) => player.id)
    .sort()
    .join(",");
}

function withoutPlayer(players: Player[], playerId: string) {
  return players.filter((player) => player.id !== playerId);
}

function toPairing(first: Player, second: Player): Pairing {
  return {
    player1Id: first.id,
    player1Name: first.name,
    player2Id: second.id,
    player2Name: second.name
  };
}
