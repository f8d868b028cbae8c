import test from "node:test";
import assert from "node:assert/strict";
import {
  ByeNotAllowedError,
  InvalidMatchError,
  RematchError,
  TournamentNotFoundError
} from "../lib/errors";
import { createMemoryStore } from "../lib/memoryStore";
import type { TournamentStore } from "../lib/store";
import {
  awardBye,
  finalRankings,
  nextRoundPairings,
  rank,
  recomputeOppWin,
  reportMatch
} from "../lib/tournament";
import type { PairingPlan } from "../lib/types";

async function setup(names: string[]) {
  const store = createMemoryStore();
  const tournament = await store.createTournament({ name: "Club Night", pinHash: "hash" });
  const ids: Record<string, string> = {};

  for (const name of names) {
    const registered = await store.registerPlayer({ tournamentId: tournament.id, name });
    ids[name] = registered.id;
  }

  return { store, tournamentId: tournament.id, ids };
}

function pairNames(plan: PairingPlan) {
  return plan.pairings.map((pairing) => [pairing.player1Name, pairing.player2Name]);
}

async function snapshot(store: TournamentStore, tournamentId: string) {
  return {
    players: await store.listPlayers(tournamentId),
    matches: await store.listMatches(tournamentId)
  };
}

test("four-player tournament runs two rounds without a rematch", async () => {
  const { store, tournamentId, ids } = await setup(["A", "B", "C", "D"]);

  const first = await nextRoundPairings(store, tournamentId);
  assert.deepEqual(pairNames(first), [
    ["A", "B"],
    ["C", "D"]
  ]);
  assert.equal(first.bye, null);

  await reportMatch(store, tournamentId, { player1Id: ids.A, player2Id: ids.B, draw: false });
  await reportMatch(store, tournamentId, { player1Id: ids.C, player2Id: ids.D, draw: true });

  const standings = await rank(store, tournamentId);
  assert.deepEqual(
    standings.map((player) => [player.name, player.points]),
    [
      ["A", 1],
      ["C", 0.5],
      ["D", 0.5],
      ["B", 0]
    ]
  );

  const second = await nextRoundPairings(store, tournamentId);
  assert.deepEqual(pairNames(second), [
    ["A", "C"],
    ["D", "B"]
  ]);
});

test("rank is stable when nothing is written in between", async () => {
  const { store, tournamentId, ids } = await setup(["Kim", "Lee", "Ana", "Bo"]);
  await reportMatch(store, tournamentId, { player1Id: ids.Lee, player2Id: ids.Ana, draw: true });

  const once = await rank(store, tournamentId);
  const twice = await rank(store, tournamentId);

  assert.deepEqual(once, twice);
  assert.deepEqual(
    once.map((player) => player.name),
    ["Ana", "Lee", "Bo", "Kim"]
  );
});

test("the standings view matches rank", async () => {
  const { store, tournamentId, ids } = await setup(["A", "B", "C"]);
  await reportMatch(store, tournamentId, { player1Id: ids.C, player2Id: ids.A, draw: false });

  const rows = await store.standings(tournamentId);
  const ranked = await rank(store, tournamentId);

  assert.deepEqual(
    rows.map((row) => row.player_id),
    ranked.map((player) => player.id)
  );
  assert.deepEqual(rows[0], { player_id: ids.C, name: "C", points: 1, matches_played: 1 });
});

test("reporting the same pair again is rejected as a rematch", async () => {
  const { store, tournamentId, ids } = await setup(["A", "B"]);
  await reportMatch(store, tournamentId, { player1Id: ids.A, player2Id: ids.B, draw: false });

  await assert.rejects(
    reportMatch(store, tournamentId, { player1Id: ids.A, player2Id: ids.B, draw: false }),
    RematchError
  );
  await assert.rejects(
    reportMatch(store, tournamentId, { player1Id: ids.B, player2Id: ids.A, draw: true }),
    RematchError
  );
  assert.equal((await store.listMatches(tournamentId)).length, 1);
});

test("a rejected report leaves players and matches untouched", async () => {
  const { store, tournamentId, ids } = await setup(["A", "B", "C", "D"]);
  await reportMatch(store, tournamentId, { player1Id: ids.A, player2Id: ids.B, draw: false });
  const before = await snapshot(store, tournamentId);

  await assert.rejects(
    reportMatch(store, tournamentId, { player1Id: ids.C, player2Id: ids.C, draw: false }),
    InvalidMatchError
  );

  assert.deepEqual(await snapshot(store, tournamentId), before);
});

test("work that fails after writing inside a transaction is rolled back", async () => {
  const { store, tournamentId, ids } = await setup(["A", "B"]);
  const before = await snapshot(store, tournamentId);

  await assert.rejects(
    store.withTournament(tournamentId, async (tx) => {
      await tx.insertMatch({ player1Id: ids.A, player2Id: ids.B, draw: false });
      const players = await tx.listPlayers();
      await tx.savePlayers(players.map((player) => ({ ...player, points: 9 })));
      throw new Error("boom");
    }),
    /boom/
  );

  assert.deepEqual(await snapshot(store, tournamentId), before);
});

test("five players: bye to the lowest ranked, then points add up", async () => {
  const { store, tournamentId, ids } = await setup(["A", "B", "C", "D", "E"]);

  const plan = await nextRoundPairings(store, tournamentId);
  assert.deepEqual(plan.bye, { playerId: ids.E, name: "E" });
  assert.deepEqual(pairNames(plan), [
    ["A", "B"],
    ["C", "D"]
  ]);

  await awardBye(store, tournamentId, ids.E);
  await reportMatch(store, tournamentId, { player1Id: ids.A, player2Id: ids.B, draw: false });
  await reportMatch(store, tournamentId, { player1Id: ids.D, player2Id: ids.C, draw: false });

  const players = await rank(store, tournamentId);
  const total = players.reduce((sum, player) => sum + player.points, 0);
  assert.equal(total, 3);

  const e = players.find((player) => player.id === ids.E);
  assert.equal(e?.had_bye, true);
  assert.equal(e?.matches_played, 1);
  assert.deepEqual(e?.prev_opponents, []);

  await assert.rejects(awardBye(store, tournamentId, ids.E), ByeNotAllowedError);

  const next = await nextRoundPairings(store, tournamentId);
  assert.notEqual(next.bye?.playerId, ids.E);
});

test("recomputing opp_win is idempotent and uses opponents' current points", async () => {
  const { store, tournamentId, ids } = await setup(["A", "B", "C", "D"]);
  await reportMatch(store, tournamentId, { player1Id: ids.A, player2Id: ids.B, draw: false });
  await reportMatch(store, tournamentId, { player1Id: ids.C, player2Id: ids.D, draw: false });
  await reportMatch(store, tournamentId, { player1Id: ids.A, player2Id: ids.C, draw: true });

  const first = await recomputeOppWin(store, ids.A);
  const second = await recomputeOppWin(store, ids.A);

  // A faced B (0 points) and C (1.5 points).
  assert.equal(first.opp_win, 0.75);
  assert.equal(second.opp_win, 0.75);

  const b = (await store.getPlayer(ids.B))?.opp_win;
  assert.equal(b, 1.5);
});

test("final rankings order players level on points by opp_win", async () => {
  const { store, tournamentId, ids } = await setup(["Yara", "Bob", "Abe", "Dan"]);
  await reportMatch(store, tournamentId, { player1Id: ids.Yara, player2Id: ids.Bob, draw: false });
  await reportMatch(store, tournamentId, { player1Id: ids.Abe, player2Id: ids.Dan, draw: false });
  await reportMatch(store, tournamentId, { player1Id: ids.Yara, player2Id: ids.Abe, draw: true });
  await reportMatch(store, tournamentId, { player1Id: ids.Bob, player2Id: ids.Dan, draw: false });

  const rankings = await finalRankings(store, tournamentId);

  assert.deepEqual(
    rankings.map((row) => [row.rank, row.name, row.points, row.opp_win]),
    [
      [1, "Yara", 1.5, 1.25],
      [2, "Abe", 1.5, 0.75],
      [3, "Bob", 1, 0.75],
      [4, "Dan", 0, 1.25]
    ]
  );
});

test("reset returns every player to a fresh standing and clears matches", async () => {
  const { store, tournamentId, ids } = await setup(["A", "B", "C"]);
  await awardBye(store, tournamentId, ids.C);
  await reportMatch(store, tournamentId, { player1Id: ids.A, player2Id: ids.B, draw: false });

  await store.resetResults(tournamentId);

  const players = await store.listPlayers(tournamentId);
  assert.ok(
    players.every(
      (player) =>
        player.points === 0 &&
        player.matches_played === 0 &&
        player.prev_opponents.length === 0 &&
        !player.had_bye &&
        player.opp_win === null
    )
  );
  assert.deepEqual(await store.listMatches(tournamentId), []);
});

test("deleting a tournament removes its players and matches", async () => {
  const { store, tournamentId, ids } = await setup(["A", "B"]);
  await reportMatch(store, tournamentId, { player1Id: ids.A, player2Id: ids.B, draw: false });

  assert.equal(await store.deleteTournament(tournamentId), true);
  assert.equal(await store.deleteTournament(tournamentId), false);
  assert.equal(await store.getPlayer(ids.A), null);
  assert.deepEqual(await store.listMatches(tournamentId), []);
  await assert.rejects(rank(store, tournamentId), TournamentNotFoundError);
  await assert.rejects(
    reportMatch(store, tournamentId, { player1Id: ids.A, player2Id: ids.B, draw: false }),
    TournamentNotFoundError
  );
});

test("deleteAllPlayers without a tournament clears every roster", async () => {
  const store = createMemoryStore();
  const first = await store.createTournament({ name: "One", pinHash: "hash" });
  const second = await store.createTournament({ name: "Two", pinHash: "hash" });
  await store.registerPlayer({ tournamentId: first.id, name: "A" });
  await store.registerPlayer({ tournamentId: second.id, name: "B" });

  await store.deleteAllPlayers();

  assert.equal(await store.countPlayers(first.id), 0);
  assert.equal(await store.countPlayers(second.id), 0);
  assert.deepEqual(
    (await store.listTournaments()).map((tournament) => tournament.name).sort(),
    ["One", "Two"]
  );
});

test("renaming keeps the id and the pin hash stays out of public reads", async () => {
  const { store, tournamentId } = await setup([]);

  const renamed = await store.renameTournament(tournamentId, "Finals");
  assert.equal(renamed?.id, tournamentId);
  assert.equal(renamed?.name, "Finals");
  assert.equal(renamed && "pin_hash" in renamed, false);
  assert.equal((await store.getTournamentWithPin(tournamentId))?.pin_hash, "hash");
});

test("results reported at the same time are applied one after another", async () => {
  const { store, tournamentId, ids } = await setup(["A", "B", "C", "D"]);

  await Promise.all([
    reportMatch(store, tournamentId, { player1Id: ids.A, player2Id: ids.B, draw: false }),
    reportMatch(store, tournamentId, { player1Id: ids.C, player2Id: ids.D, draw: false }),
    reportMatch(store, tournamentId, { player1Id: ids.B, player2Id: ids.A, draw: false }).catch(
      (error: unknown) => error
    )
  ]);

  const players = await rank(store, tournamentId);
  assert.deepEqual(
    players.map((player) => [player.name, player.points]),
    [
      ["A", 1],
      ["C", 1],
      ["B", 0],
      ["D", 0]
    ]
  );
  assert.equal((await store.listMatches(tournamentId)).length, 2);
});
