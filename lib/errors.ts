export type TournamentErrorCode =
  | "INVALID_MATCH"
  | "REMATCH"
  | "NO_ELIGIBLE_PLAYER_FOR_BYE"
  | "PAIRING_CONFLICT"
  | "BYE_NOT_ALLOWED"
  | "PLAYER_NOT_FOUND"
  | "TOURNAMENT_NOT_FOUND"
  | "INVALID_EDIT_TOKEN";

export class TournamentError extends Error {
  constructor(
    public readonly code: TournamentErrorCode,
    message: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidMatchError extends TournamentError {
  constructor(public readonly playerId: string) {
    super("INVALID_MATCH", "A player cannot be matched against themselves", 400);
  }
}

export class RematchError extends TournamentError {
  constructor(
    public readonly player1Id: string,
    public readonly player2Id: string
  ) {
    super("REMATCH", "These players have already played each other", 409);
  }
}

export class NoEligiblePlayerForByeError extends TournamentError {
  constructor() {
    super(
      "NO_ELIGIBLE_PLAYER_FOR_BYE",
      "Odd number of players and every player has already received a bye",
      409
    );
  }
}

export class PairingConflictError extends TournamentError {
  constructor(public readonly playerId: string) {
    super(
      "PAIRING_CONFLICT",
      "No opponent is left that this player has not already played",
      409
    );
  }
}

export type ByeRejection = "already-awarded" | "even-field";

export class ByeNotAllowedError extends TournamentError {
  constructor(
    public readonly playerId: string,
    public readonly reason: ByeRejection
  ) {
    super(
      "BYE_NOT_ALLOWED",
      reason === "already-awarded"
        ? "Player has already received a bye"
        : "A bye is only awarded when the field has an odd number of players",
      409
    );
  }
}

export class PlayerNotFoundError extends TournamentError {
  constructor(public readonly playerId: string) {
    super("PLAYER_NOT_FOUND", `Player not found: ${playerId}`, 404);
  }
}

export class TournamentNotFoundError extends TournamentError {
  constructor(public readonly tournamentId: string) {
    super("TOURNAMENT_NOT_FOUND", "Tournament not found", 404);
  }
}

/** `reason` is the jose error code, or "claims" when the payload is not an editor grant. */
export class EditTokenError extends TournamentError {
  constructor(public readonly reason: string) {
    super("INVALID_EDIT_TOKEN", "Invalid editor token", 401);
  }
}

export function isTournamentError(error: unknown): error is TournamentError {
  return error instanceof TournamentError;
}
