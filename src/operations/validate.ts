/**
 * Reference validation of reported hits
 *
 * Checks a hit's coordinates and sequence against the reference it claims to
 * come from. A failing hit is a finding, never an exception.
 */

import type { Hit } from "../types";

/**
 * Why a hit failed validation, in the order the checks run
 */
export const ValidationFailure = {
  NEGATIVE_COORDINATE: "negative coordinate",
  END_PRECEDES_START: "end precedes start",
  END_EXCEEDS_REFERENCE: "end exceeds reference length",
  LENGTH_MISMATCH: "length mismatch with reference slice",
  SEQUENCE_MISMATCH: "sequence mismatch vs reference",
} as const;

export type ValidationFailure = (typeof ValidationFailure)[keyof typeof ValidationFailure];

export type ValidationOutcome =
  | { readonly status: "OK" }
  | { readonly status: "FAIL"; readonly reason: ValidationFailure };

export interface HitValidationOptions {
  /** Compare sequences exactly instead of case-folded (default false) */
  caseSensitive?: boolean;
}

export interface ValidatedHit {
  readonly hit: Hit;
  readonly outcome: ValidationOutcome;
}

const OK: ValidationOutcome = { status: "OK" };

function fail(reason: ValidationFailure): ValidationOutcome {
  return { status: "FAIL", reason };
}

/**
 * Validate one hit against a reference sequence; the first failing check wins
 *
 * @example
 * ```typescript
 * validateHit({ ...hit, start: 5, end: 3 }, reference);
 * // { status: "FAIL", reason: "end precedes start" }
 * ```
 */
export function validateHit(
  hit: Hit,
  reference: string,
  options: HitValidationOptions = {}
): ValidationOutcome {
  if (hit.start < 0 || hit.end < 0) {
    return fail(ValidationFailure.NEGATIVE_COORDINATE);
  }
  if (hit.end < hit.start) {
    return fail(ValidationFailure.END_PRECEDES_START);
  }
  if (hit.end > reference.length) {
    return fail(ValidationFailure.END_EXCEEDS_REFERENCE);
  }

  const slice = reference.slice(hit.start, hit.end);
  if (slice.length !== hit.length) {
    return fail(ValidationFailure.LENGTH_MISMATCH);
  }

  const caseSensitive = options.caseSensitive ?? false;
  const expected = caseSensitive ? slice : slice.toLowerCase();
  const reported = caseSensitive ? hit.sequence : hit.sequence.toLowerCase();
  return expected === reported ? OK : fail(ValidationFailure.SEQUENCE_MISMATCH);
}

/**
 * Validate every hit, keeping input order
 */
export function validateHits(
  hits: readonly Hit[],
  reference: string,
  options: HitValidationOptions = {}
): { results: ValidatedHit[]; failures: number } {
  let failures = 0;
  const results = hits.map((hit) => {
    const outcome = validateHit(hit, reference, options);
    if (outcome.status === "FAIL") failures++;
    return { hit, outcome };
  });
  return { results, failures };
}

/**
 * `OK` or `FAIL (<reason>)`
 */
export function formatOutcome(outcome: ValidationOutcome): string {
  return outcome.status === "OK" ? "OK" : `FAIL (${outcome.reason})`;
}
