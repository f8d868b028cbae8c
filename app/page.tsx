"use client";

import Link from "next/link";
import { useEffect, useState } from "react";

type TournamentSummary = {
  id: string;
  name: string;
  created_at: string;
};

export default function HomePage() {
  const [name, setName] = useState("");
  const [pin, setPin] = useState("");
  const [tournaments, setTournaments] = useState<TournamentSummary[]>([]);
  const [createdId, setCreatedId] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [loading, setLoading] = useState(false);

  useEffect(() => {
    void loadTournaments();
  }, []);

  async function loadTournaments() {
    try {
      const res = await fetch("/api/tournament", { cache: "no-store" });
      const data = await res.json().catch(() => ({}));
      if (res.ok) {
        setTournaments(data.tournaments ?? []);
      }
    } catch {
      setError("Could not load tournaments");
    }
  }

  async function createTournament() {
    setLoading(true);
    setError(null);

    try {
      const res = await fetch("/api/tournament", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ name, pin })
      });

      const data = await res.json().catch(() => ({}));
      if (!res.ok) {
        setError(data.error ?? "Could not create tournament");
        return;
      }

      setCreatedId(data.tournament.id);
      setName("");
      setPin("");
      await loadTournaments();
    } finally {
      setLoading(false);
    }
  }

  return (
    <main>
      <h1>Swiss Tournament</h1>
      <p className="small">Pair each round by score, never repeat a match-up, rank by points.</p>

      <div className="card">
        <h2>New Tournament</h2>
        <div className="row">
          <input value={name} onChange={(e) => setName(e.target.value)} placeholder="Tournament name" />
          <input
            value={pin}
            onChange={(e) => setPin(e.target.value)}
            placeholder="Organiser PIN"
            type="password"
          />
          <button
            type="button"
            disabled={loading || !name.trim() || pin.length < 4}
            onClick={() => void createTournament()}
          >
            Create
          </button>
        </div>

        {error && <p className="error">{error}</p>}

        {createdId && (
          <p>
            Tournament created: <Link href={`/t/${createdId}`}>open it</Link>
          </p>
        )}
      </div>

      <div className="card">
        <h2>Tournaments</h2>
        {tournaments.length === 0 ? (
          <p className="small">No tournaments yet.</p>
        ) : (
          <ul>
            {tournaments.map((tournament) => (
              <li key={tournament.id}>
                <Link href={`/t/${tournament.id}`}>{tournament.name}</Link>
              </li>
            ))}
          </ul>
        )}
      </div>
    </main>
  );
}
