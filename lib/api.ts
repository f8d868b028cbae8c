import { NextRequest, NextResponse } from "next/server";
import { ZodError, type ZodSchema } from "zod";
import { getBearerToken, verifyEditToken } from "@/lib/auth";
import { isTournamentError } from "@/lib/errors";
import { tournamentIdSchema } from "@/lib/schemas";

export async function parseJson<T>(request: NextRequest, schema: ZodSchema<T>) {
  try {
    const payload = await request.json();
    return { ok: true as const, data: schema.parse(payload) };
  } catch (error) {
    if (error instanceof ZodError) {
      return {
        ok: false as const,
        response: badRequest("Invalid request body", error.flatten())
      };
    }

    return { ok: false as const, response: badRequest("Invalid JSON") };
  }
}

/** Ids that are not uuids can never match a tournament, so they read as missing. */
export function isTournamentId(value: string) {
  return tournamentIdSchema.safeParse(value).success;
}

export async function requireEditor(request: NextRequest, tournamentId: string) {
  const token = getBearerToken(request.headers.get("authorization"));
  if (!token) {
    return { ok: false as const, response: unauthorized("Missing editor token") };
  }

  try {
    const claims = await verifyEditToken(token);
    if (claims.tournamentId !== tournamentId) {
      return { ok: false as const, response: forbidden("Token tournament mismatch") };
    }

    return { ok: true as const };
  } catch (error) {
    return { ok: false as const, response: handleRouteError("editor_auth", error) };
  }
}

export function handleRouteError(scope: string, error: unknown) {
  if (isTournamentError(error)) {
    return NextResponse.json(
      { error: error.message, code: error.code },
      { status: error.statusCode }
    );
  }

  console.error(`[${scope}] unhandled error:`, error);
  return serverError();
}

export function ok(data: unknown) {
  return NextResponse.json(data, { status: 200 });
}

export function created(data: unknown) {
  return NextResponse.json(data, { status: 201 });
}

export function badRequest(message: string, details?: unknown) {
  return NextResponse.json({ error: message, details }, { status: 400 });
}

export function unauthorized(message = "Unauthorized") {
  return NextResponse.json({ error: message }, { status: 401 });
}

export function forbidden(message = "Forbidden") {
  return NextResponse.json({ error: message }, { status: 403 });
}

export function notFound(message = "Not found") {
  return NextResponse.json({ error: message }, { status: 404 });
}

export function serverError(message = "Internal server error") {
  return NextResponse.json({ error: message }, { status: 500 });
}
