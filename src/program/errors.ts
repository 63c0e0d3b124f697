/**
 * Pokedex Errors
 *
 * Every failure the library surfaces is one of these. Empty results are not errors.
 */

import type { ZodError } from 'zod';

export class PokedexError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A store read or write could not complete. The original failure is kept as `cause`.
 */
export class DataAccessError extends PokedexError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Data access failed during ${operation}: ${detail}`, { cause });
    this.operation = operation;
  }
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export class InvalidCriteriaError extends PokedexError {
  readonly issues: ZodError['issues'];

  constructor(error: ZodError) {
    super(`Invalid filter criteria: ${describeIssues(error)}`);
    this.issues = error.issues;
  }
}

export class InvalidDumpError extends PokedexError {
  readonly issues: ZodError['issues'];

  constructor(error: ZodError) {
    super(`Invalid Pokédex dump: ${describeIssues(error)}`);
    this.issues = error.issues;
  }
}

export type ComparisonErrorCode = 'invalid_count' | 'not_found';

const COMPARISON_MESSAGES: Record<ComparisonErrorCode, string> = {
  invalid_count: 'Invalid number of Pokémon for comparison. Select 2-6 Pokémon.',
  not_found: 'One or more Pokémon could not be found in the database.',
};

export class ComparisonError extends PokedexError {
  readonly code: ComparisonErrorCode;

  constructor(code: ComparisonErrorCode, detail?: string) {
    super(detail ? `${COMPARISON_MESSAGES[code]} (${detail})` : COMPARISON_MESSAGES[code]);
    this.code = code;
  }
}

/**
 * Run a store operation, rethrowing anything that is not already a PokedexError
 * as a DataAccessError.
 */
export async function withDataAccess<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof PokedexError) throw error;
    throw new DataAccessError(operation, error);
  }
}
