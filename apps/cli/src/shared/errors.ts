// apps/cli/src/shared/errors.ts

export interface HttpErrorShape {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

export class HttpError extends Error implements HttpErrorShape {
  public statusCode: number;
  public error: string;
  public details?: Record<string, unknown>;

  constructor(
    statusCode: number,
    error: string,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.statusCode = statusCode;
    this.error = error;
    this.details = details;
  }
}

export function createHttpError(
  statusCode: number,
  message: string,
  error: string = "Error",
  details?: Record<string, unknown>
): HttpError {
  return new HttpError(statusCode, error, message, details);
}

// ───────────────────────────
// Resolution failures
// ───────────────────────────

export type ResolutionErrorCode =
  | "NotFound"
  | "NotPresentInGeneration"
  | "MalformedOverride";

export type EntityKind = "pokemon" | "move" | "type" | "ability" | "game" | "evolution";

export const ENTITY_LABELS: Record<EntityKind, string> = {
  pokemon: "Pokémon",
  move: "Move",
  type: "Type",
  ability: "Ability",
  game: "Game",
  evolution: "Evolution"
};

export class ResolutionError extends Error {
  public code: ResolutionErrorCode;
  public details?: Record<string, unknown>;

  constructor(
    code: ResolutionErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ResolutionError";
    this.code = code;
    this.details = details;
  }
}

export function createResolutionError(
  code: ResolutionErrorCode,
  message: string,
  details?: Record<string, unknown>
): ResolutionError {
  return new ResolutionError(code, message, details);
}

export function notFound(kind: EntityKind, name: string): ResolutionError {
  return createResolutionError(
    "NotFound",
    `${ENTITY_LABELS[kind]} '${name}' not found.`,
    { kind, name }
  );
}

export function notPresentInGeneration(
  kind: EntityKind,
  name: string,
  generation: number
): ResolutionError {
  return createResolutionError(
    "NotPresentInGeneration",
    `${ENTITY_LABELS[kind]} '${name}' is not present in generation ${generation}.`,
    { kind, name, generation }
  );
}

export function malformedOverride(
  message: string,
  details?: Record<string, unknown>
): ResolutionError {
  return createResolutionError("MalformedOverride", message, details);
}

const RESOLUTION_STATUS: Record<ResolutionErrorCode, number> = {
  NotFound: 404,
  NotPresentInGeneration: 404,
  MalformedOverride: 500
};

export function toErrorResponse(err: unknown): {
  statusCode: number;
  payload: HttpErrorShape;
} {
  if (err instanceof HttpError) {
    return {
      statusCode: err.statusCode,
      payload: {
        error: err.error,
        message: err.message,
        ...(err.details ? { details: err.details } : {})
      }
    };
  }

  if (err instanceof ResolutionError) {
    return {
      statusCode: RESOLUTION_STATUS[err.code],
      payload: {
        error: err.code,
        message: err.message,
        ...(err.details ? { details: err.details } : {})
      }
    };
  }

  if (err instanceof Error) {
    return {
      statusCode: 500,
      payload: {
        error: "InternalServerError",
        message: err.message || "Internal server error"
      }
    };
  }

  return {
    statusCode: 500,
    payload: {
      error: "InternalServerError",
      message: "Internal server error"
    }
  };
}
