/**
 * Error model for the birth → chart pipeline.
 *
 * Errors are returned as values. `category` separates bad input from
 * missing or malformed data supplied by a remote collaborator, so callers can
 * choose a different fallback for each.
 */

import type { ZodError } from "zod";
import type { PlanetId } from "../astro/schemas/positions.schema.js";

export type ErrorCategory = "validation" | "external_data";

type BaseError<K extends string, C extends ErrorCategory> = {
  kind: K;
  category: C;
  message: string;
};

export type FutureBirthDateError = BaseError<"FutureBirthDate", "validation"> & {
  birth_date: string;
  today: string;
};

export type BirthDateTooOldError = BaseError<"BirthDateTooOld", "validation"> & {
  birth_date: string;
  earliest_allowed: string;
};

export type IncompleteBirthDataError = BaseError<"IncompleteBirthData", "validation"> & {
  missing_fields: string[];
};

export type MalformedPlaceNameError = BaseError<"MalformedPlaceName", "validation"> & {
  raw_name: string;
};

export type InvalidBirthDateError = BaseError<"InvalidBirthDate", "validation"> & {
  input: string;
};

export type InvalidBirthTimeError = BaseError<"InvalidBirthTime", "validation"> & {
  input: string;
};

export type UnknownTimezoneError = BaseError<"UnknownTimezone", "validation"> & {
  timezone: string;
};

export type InvalidCoordinatesError = BaseError<"InvalidCoordinates", "validation"> & {
  latitude: number;
  longitude: number;
};

export type IncompleteEphemerisDataError = BaseError<
  "IncompleteEphemerisData",
  "external_data"
> & {
  requested: number;
  received: number;
  missing_planets: PlanetId[];
};

export type DuplicatePlanetError = BaseError<"DuplicatePlanet", "external_data"> & {
  duplicated_planets: PlanetId[];
};

export type PositionMismatchError = BaseError<"PositionMismatch", "external_data"> & {
  index: number;
  tropical_planet: PlanetId | null;
  sidereal_planet: PlanetId | null;
};

export type MalformedEphemerisResponseError = BaseError<
  "MalformedEphemerisResponse",
  "external_data"
> & {
  issues: string[];
};

export type MalformedCompatibilityError = BaseError<
  "MalformedCompatibility",
  "external_data"
> & {
  issues: string[];
};

export type BirthDataError =
  | FutureBirthDateError
  | BirthDateTooOldError
  | IncompleteBirthDataError
  | MalformedPlaceNameError
  | InvalidBirthDateError
  | InvalidBirthTimeError
  | UnknownTimezoneError
  | InvalidCoordinatesError;

export type EphemerisDataError =
  | IncompleteEphemerisDataError
  | DuplicatePlanetError
  | PositionMismatchError
  | MalformedEphemerisResponseError;

export type ChartError = BirthDataError | EphemerisDataError;

export type NatalError = ChartError | MalformedCompatibilityError;

export type Result<T, E extends NatalError = NatalError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends NatalError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function isValidationError(error: NatalError): error is BirthDataError {
  return error.category === "validation";
}

export function isExternalDataError(
  error: NatalError
): error is EphemerisDataError | MalformedCompatibilityError {
  return error.category === "external_data";
}

/**
 * Flatten zod issues into "path: message" strings.
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}
