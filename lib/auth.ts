import bcrypt from "bcryptjs";
import { SignJWT, errors, jwtVerify, type JWTPayload } from "jose";
import { requireJwtSecret } from "@/lib/config";
import { EditTokenError } from "@/lib/errors";

const issuer = "swiss-tournament";
const audience = "tournament-editor";
const PIN_HASH_ROUNDS = 12;
const EDIT_TOKEN_TTL_SECONDS = 60 * 60 * 24 * 7;

/** What an unlocked PIN grants: editing one tournament until the token expires. */
export interface EditorClaims {
  tournamentId: string;
  role: "editor";
}

export interface SignedEditToken {
  token: string;
  expiresAt: string;
}

function signingKey() {
  return new TextEncoder().encode(requireJwtSecret());
}

export async function hashPin(pin: string, rounds = PIN_HASH_ROUNDS) {
  return bcrypt.hash(pin, rounds);
}

export async function verifyPin(pin: string, hash: string) {
  return bcrypt.compare(pin, hash);
}

export async function signEditToken(
  claims: Pick<EditorClaims, "tournamentId">,
  ttlSeconds = EDIT_TOKEN_TTL_SECONDS
): Promise<SignedEditToken> {
  const exp = Math.floor(Date.now() / 1000) + ttlSeconds;

  const token = await new SignJWT({ role: "editor" })
    .setProtectedHeader({ alg: "HS256" })
    .setIssuer(issuer)
    .setAudience(audience)
    .setSubject(claims.tournamentId)
    .setIssuedAt()
    .setExpirationTime(exp)
    .sign(signingKey());

  return {
    token,
    expiresAt: new Date(exp * 1000).toISOString()
  };
}

export async function verifyEditToken(token: string): Promise<EditorClaims> {
  let payload: JWTPayload;

  try {
    ({ payload } = await jwtVerify(token, signingKey(), { issuer, audience }));
  } catch (error) {
    if (error instanceof errors.JOSEError) {
      throw new EditTokenError(error.code);
    }

    throw error;
  }

  return toEditorClaims(payload);
}

function toEditorClaims(payload: JWTPayload): EditorClaims {
  if (typeof payload.sub !== "string" || payload.sub === "" || payload.role !== "editor") {
    throw new EditTokenError("claims");
  }

  return { tournamentId: payload.sub, role: "editor" };
}

export function getBearerToken(header: string | null) {
  if (!header) {
    return null;
  }

  const [scheme, token] = header.split(" ");
  if (scheme !== "Bearer" || !token) {
    return null;
  }

  return token;
}
