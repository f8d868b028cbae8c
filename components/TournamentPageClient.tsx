"use client";

import { useEffect, useMemo, useRef, useState } from "react";

type Tournament = {
  id: string;
  name: string;
  created_at: string;
};

type Player = {
  id: string;
  name: string;
  points: number;
  matches_played: number;
  prev_opponents: string[];
  had_bye: boolean;
  opp_win: number | null;
};

type Match = {
  id: string;
  player1_id: string;
  player2_id: string;
  draw: boolean;
  created_at: string;
};

type Pairing = {
  player1Id: string;
  player1Name: string;
  player2Id: string;
  player2Name: string;
};

type PairingPlan = {
  strategy: "forward" | "backtrack";
  pairings: Pairing[];
  bye: { playerId: string; name: string } | null;
};

type FinalRanking = {
  rank: number;
  player_id: string;
  name: string;
  points: number;
  matches_played: number;
  opp_win: number | null;
};

type Outcome = "player1" | "draw" | "player2";

function authHeaders(token: string | null): Record<string, string> {
  return token ? { Authorization: `Bearer ${token}` } : {};
}

export default function TournamentPageClient({ tournamentId }: { tournamentId: string }) {
  const [tournament, setTournament] = useState<Tournament | null>(null);
  const [players, setPlayers] = useState<Player[]>([]);
  const [matches, setMatches] = useState<Match[]>([]);
  const [recommendedRounds, setRecommendedRounds] = useState(0);
  const [token, setToken] = useState<string | null>(null);
  const [pin, setPin] = useState("");
  const [newPlayerName, setNewPlayerName] = useState("");
  const [renameDraft, setRenameDraft] = useState("");
  const [plan, setPlan] = useState<PairingPlan | null>(null);
  const [reportedKeys, setReportedKeys] = useState<string[]>([]);
  const [byeAwarded, setByeAwarded] = useState(false);
  const [rankings, setRankings] = useState<FinalRanking[] | null>(null);
  const [activeArea, setActiveArea] = useState<"round" | "setup">("round");
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const refreshSeqRef = useRef(0);

  const unlocked = Boolean(token);
  const storageKey = `swiss-editor:${tournamentId}`;

  const nameById = useMemo(() => {
    const map = new Map<string, string>();
    for (const player of players) {
      map.set(player.id, player.name);
    }
    return map;
  }, [players]);

  const roundComplete = Boolean(
    plan &&
      plan.pairings.every((pairing) => reportedKeys.includes(pairKey(pairing))) &&
      (!plan.bye || byeAwarded)
  );

  useEffect(() => {
    const stored = safeStorageGet(storageKey);
    if (stored) {
      setToken(stored);
    }
  }, [storageKey]);

  useEffect(() => {
    setTournament(null);
    setPlayers([]);
    setMatches([]);
    setPlan(null);
    setRankings(null);
    setError(null);
    void refreshTournament();
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [tournamentId]);

  async function refreshTournament() {
    const requestSeq = ++refreshSeqRef.current;

    try {
      const res = await fetch(`/api/tournament/${tournamentId}`, { cache: "no-store" });
      const data = await res.json().catch(() => ({}));
      if (requestSeq !== refreshSeqRef.current) {
        return;
      }

      if (!res.ok) {
        setError(data.error ?? "Failed to load tournament");
        return;
      }

      setTournament(data.tournament);
      setRenameDraft(data.tournament?.name ?? "");
      setPlayers(data.players ?? []);
      setMatches(data.matches ?? []);
      setRecommendedRounds(data.recommendedRounds ?? 0);
    } catch {
      if (requestSeq === refreshSeqRef.current) {
        setError("Failed to load tournament");
      }
    }
  }

  async function editorRequest(path: string, method: string, body?: unknown) {
    setLoading(true);
    setError(null);

    try {
      const res = await fetch(`/api/tournament/${tournamentId}${path}`, {
        method,
        headers: {
          "Content-Type": "application/json",
          ...authHeaders(token)
        },
        body: body === undefined ? undefined : JSON.stringify(body)
      });
      const data = await res.json().catch(() => ({}));

      if (res.status === 401) {
        setToken(null);
        safeStorageRemove(storageKey);
      }

      if (!res.ok) {
        setError(data.error ?? "Request failed");
        return null;
      }

      return data;
    } catch {
      setError("Request failed");
      return null;
    } finally {
      setLoading(false);
    }
  }

  async function unlockEditor() {
    setLoading(true);
    setError(null);

    try {
      const res = await fetch(`/api/tournament/${tournamentId}/unlock`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ pin })
      });
      const data = await res.json().catch(() => ({}));
      if (!res.ok) {
        setError(data.error ?? "Unlock failed");
        return;
      }

      setToken(data.token);
      safeStorageSet(storageKey, data.token);
      setPin("");
    } finally {
      setLoading(false);
    }
  }

  async function registerPlayer() {
    const name = newPlayerName.trim();
    if (!name) {
      return;
    }

    const data = await editorRequest("/players", "POST", { action: "register", name });
    if (data) {
      setPlayers(data.players ?? []);
      setNewPlayerName("");
      setPlan(null);
    }
  }

  async function generatePairings() {
    const data = await editorRequest("/pairings", "POST", {});
    if (data) {
      setPlan({
        strategy: data.strategy,
        pairings: data.pairings ?? [],
        bye: data.bye ?? null
      });
      setReportedKeys([]);
      setByeAwarded(false);
      setRankings(null);
    }
  }

  async function reportResult(pairing: Pairing, outcome: Outcome) {
    const body =
      outcome === "player2"
        ? { player1Id: pairing.player2Id, player2Id: pairing.player1Id, draw: false }
        : { player1Id: pairing.player1Id, player2Id: pairing.player2Id, draw: outcome === "draw" };

    const data = await editorRequest("/report", "POST", body);
    if (data) {
      setPlayers(data.players ?? players);
      setReportedKeys((current) => [...current, pairKey(pairing)]);
      if (data.match) {
        setMatches((current) => [data.match, ...current]);
      }
    }
  }

  async function awardBye(playerId: string) {
    const data = await editorRequest("/bye", "POST", { playerId });
    if (data) {
      setPlayers(data.players ?? players);
      setByeAwarded(true);
    }
  }

  async function loadRankings() {
    setError(null);
    try {
      const res = await fetch(`/api/tournament/${tournamentId}/rankings`, { cache: "no-store" });
      const data = await res.json().catch(() => ({}));
      if (!res.ok) {
        setError(data.error ?? "Could not load rankings");
        return;
      }

      setRankings(data.rankings ?? []);
    } catch {
      setError("Could not load rankings");
    }
  }

  async function renameTournament() {
    const data = await editorRequest("", "PATCH", { name: renameDraft.trim() });
    if (data) {
      setTournament(data.tournament);
    }
  }

  async function resetResults() {
    if (!window.confirm("Delete every result and return all players to zero points?")) {
      return;
    }

    const data = await editorRequest("/players", "POST", { action: "reset" });
    if (data) {
      setPlayers(data.players ?? []);
      setPlan(null);
      setRankings(null);
      await refreshTournament();
    }
  }

  async function deleteTournament() {
    if (!window.confirm("Delete this tournament with all players and matches?")) {
      return;
    }

    const data = await editorRequest("", "DELETE");
    if (data) {
      safeStorageRemove(storageKey);
      window.location.assign("/");
    }
  }

  return (
    <main>
      <h1>{tournament?.name ?? "Tournament"}</h1>
      <p className="small">
        {players.length} players · {matches.length} matches reported · {recommendedRounds} rounds
        recommended
      </p>

      {error && <p className="error">{error}</p>}

      <div className="row" style={{ marginBottom: 16 }}>
        <button
          type="button"
          className={activeArea === "round" ? "" : "secondary"}
          onClick={() => setActiveArea("round")}
        >
          Round
        </button>
        <button
          type="button"
          className={activeArea === "setup" ? "" : "secondary"}
          onClick={() => setActiveArea("setup")}
        >
          Setup
        </button>
      </div>

      {!unlocked && (
        <div className="card">
          <h2>Unlock Editing</h2>
          <p className="small">Enter the organiser PIN to register players and report results.</p>
          <div className="row">
            <input
              value={pin}
              onChange={(e) => setPin(e.target.value)}
              placeholder="Organiser PIN"
              type="password"
            />
            <button type="button" disabled={loading || pin.length < 4} onClick={() => void unlockEditor()}>
              Unlock
            </button>
          </div>
        </div>
      )}

      {activeArea === "round" && (
        <>
          {unlocked && (
            <div className="card">
              <h2>Next Round</h2>
              <div className="row">
                <button
                  type="button"
                  disabled={loading || players.length < 2 || (plan !== null && !roundComplete)}
                  onClick={() => void generatePairings()}
                >
                  Generate Pairings
                </button>
                {plan && (
                  <span className="small">
                    {roundComplete ? "Round complete." : "Report every result before pairing again."}
                  </span>
                )}
              </div>

              {plan && (
                <table style={{ marginTop: 12 }}>
                  <tbody>
                    {plan.pairings.map((pairing) => {
                      const done = reportedKeys.includes(pairKey(pairing));
                      return (
                        <tr key={pairKey(pairing)}>
                          <td>{pairing.player1Name}</td>
                          <td className="small">vs</td>
                          <td>{pairing.player2Name}</td>
                          <td>
                            {done ? (
                              <span className="small">Reported</span>
                            ) : (
                              <div className="row">
                                <button
                                  type="button"
                                  disabled={loading}
                                  onClick={() => void reportResult(pairing, "player1")}
                                >
                                  {pairing.player1Name} won
                                </button>
                                <button
                                  type="button"
                                  className="secondary"
                                  disabled={loading}
                                  onClick={() => void reportResult(pairing, "draw")}
                                >
                                  Draw
                                </button>
                                <button
                                  type="button"
                                  disabled={loading}
                                  onClick={() => void reportResult(pairing, "player2")}
                                >
                                  {pairing.player2Name} won
                                </button>
                              </div>
                            )}
                          </td>
                        </tr>
                      );
                    })}
                    {plan.bye && (
                      <tr>
                        <td>{plan.bye.name}</td>
                        <td className="small" colSpan={2}>
                          bye
                        </td>
                        <td>
                          {byeAwarded ? (
                            <span className="small">Awarded</span>
                          ) : (
                            <button
                              type="button"
                              disabled={loading}
                              onClick={() => plan.bye && void awardBye(plan.bye.playerId)}
                            >
                              Award bye
                            </button>
                          )}
                        </td>
                      </tr>
                    )}
                  </tbody>
                </table>
              )}
            </div>
          )}

          <div className="card">
            <h2>Standings</h2>
            {players.length === 0 ? (
              <p className="small">No players registered yet.</p>
            ) : (
              <table>
                <thead>
                  <tr>
                    <th>#</th>
                    <th>Player</th>
                    <th className="num">Points</th>
                    <th className="num">Played</th>
                    <th className="num">Opp. avg</th>
                    <th>Bye</th>
                  </tr>
                </thead>
                <tbody>
                  {players.map((player, index) => (
                    <tr key={player.id}>
                      <td>{index + 1}</td>
                      <td>{player.name}</td>
                      <td className="num">{formatPoints(player.points)}</td>
                      <td className="num">{player.matches_played}</td>
                      <td className="num">{formatOppWin(player.opp_win)}</td>
                      <td>{player.had_bye ? "yes" : ""}</td>
                    </tr>
                  ))}
                </tbody>
              </table>
            )}
          </div>

          <div className="card">
            <h2>Final Rankings</h2>
            <button type="button" className="secondary" onClick={() => void loadRankings()}>
              {rankings ? "Refresh" : "Show"}
            </button>
            {rankings && (
              <table style={{ marginTop: 12 }}>
                <tbody>
                  {rankings.map((row) => (
                    <tr key={row.player_id}>
                      <td>{row.rank}.</td>
                      <td>{row.name}</td>
                      <td className="num">{formatPoints(row.points)}</td>
                      <td className="num">{formatOppWin(row.opp_win)}</td>
                    </tr>
                  ))}
                </tbody>
              </table>
            )}
          </div>

          {matches.length > 0 && (
            <div className="card">
              <h2>Results</h2>
              <ul>
                {matches.map((match) => (
                  <li key={match.id}>
                    {formatResult(match, nameById)}
                  </li>
                ))}
              </ul>
            </div>
          )}
        </>
      )}

      {activeArea === "setup" && unlocked && (
        <>
          <div className="card">
            <h2>Register Player</h2>
            <div className="row">
              <input
                value={newPlayerName}
                onChange={(e) => setNewPlayerName(e.target.value)}
                placeholder="Player name"
              />
              <button
                type="button"
                disabled={loading || !newPlayerName.trim()}
                onClick={() => void registerPlayer()}
              >
                Register
              </button>
            </div>
          </div>

          <div className="card">
            <h2>Tournament</h2>
            <div className="row">
              <input value={renameDraft} onChange={(e) => setRenameDraft(e.target.value)} />
              <button
                type="button"
                disabled={loading || !renameDraft.trim()}
                onClick={() => void renameTournament()}
              >
                Rename
              </button>
            </div>
            <div className="row" style={{ marginTop: 12 }}>
              <button type="button" className="secondary" disabled={loading} onClick={() => void resetResults()}>
                Reset Results
              </button>
              <button type="button" className="danger" disabled={loading} onClick={() => void deleteTournament()}>
                Delete Tournament
              </button>
            </div>
          </div>
        </>
      )}
    </main>
  );
}

function pairKey(pairing: Pairing) {
  return [pairing.player1Id, pairing.player2Id].sort().join(":");
}

function formatPoints(value: number) {
  return Number.isInteger(value) ? String(value) : value.toFixed(1);
}

function formatOppWin(value: number | null) {
  return value === null ? "–" : value.toFixed(2);
}

function formatResult(match: Match, nameById: Map<string, string>) {
  const first = nameById.get(match.player1_id) ?? "Unknown";
  const second = nameById.get(match.player2_id) ?? "Unknown";
  return match.draw ? `${first} drew with ${second}` : `${first} beat ${second}`;
}

function safeStorageGet(key: string) {
  try {
    return window.localStorage.getItem(key);
  } catch {
    return null;
  }
}

function safeStorageSet(key: string, value: string) {
  try {
    window.localStorage.setItem(key, value);
  } catch {
    // Storage can be unavailable in private browsing; the token then lasts for this page only.
  }
}

function safeStorageRemove(key: string) {
  try {
    window.localStorage.removeItem(key);
  } catch {
    // Same as above.
  }
}
