import { NextRequest } from "next/server";
import { created, handleRouteError, ok, parseJson } from "@/lib/api";
import { hashPin } from "@/lib/auth";
import { createTournamentSchema } from "@/lib/schemas";
import { getStore } from "@/lib/storeProvider";

export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const tournaments = await getStore().listTournaments();
    return ok({ tournaments });
  } catch (error) {
    return handleRouteError("list_tournaments", error);
  }
}

export async function POST(request: NextRequest) {
  const parsed = await parseJson(request, createTournamentSchema);
  if (!parsed.ok) {
    return parsed.response;
  }

  try {
    const pinHash = await hashPin(parsed.data.pin);
    const tournament = await getStore().createTournament({
      name: parsed.data.name,
      pinHash
    });

    return created({
      tournament,
      tournamentUrl: `/t/${tournament.id}`
    });
  } catch (error) {
    return handleRouteError("create_tournament", error);
  }
}
