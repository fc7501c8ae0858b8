/**
 * Scoutbook Error Types
 *
 * Every failure the core surfaces carries a stable `reason` code plus the
 * identifiers a command layer needs to build a user-facing message.
 *
 * RECOVERY:
 * - duplicate_report: offer to show the stored report instead
 * - regression: re-submit with allowRegression if the user opts in
 * - upstream_fetch_failure: prompt for a manual retry (no automatic retry)
 */

export type ScoutbookErrorReason =
  | 'duplicate_report'
  | 'regression'
  | 'not_found'
  | 'upstream_fetch_failure'
  | 'malformed_input';

export interface ErrorDetails {
  readonly [key: string]: unknown;
}

/**
 * Base class for all domain errors
 */
export abstract class ScoutbookError extends Error {
  abstract readonly reason: ScoutbookErrorReason;

  constructor(
    message: string,
    public readonly details: ErrorDetails = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * One-line summary for logs and command replies
   */
  getSummary(): string {
    return `[${this.reason}] ${this.message}`;
  }
}

/**
 * A report with this token is already stored. Permanent, never retried.
 */
export class DuplicateReportError extends ScoutbookError {
  readonly reason = 'duplicate_report' as const;

  constructor(public readonly token: string) {
    super(`Report '${token}' already exists.`, { token });
  }
}

/**
 * Incoming report is weaker than the player's current best report.
 */
export class RegressionError extends ScoutbookError {
  readonly reason = 'regression' as const;

  constructor(
    public readonly token: string,
    public readonly incomingStrength: number,
    public readonly bestStrength: number,
    public readonly bestToken: string
  ) {
    super(
      `Report '${token}' has fewer military ships (${incomingStrength}) than best report '${bestToken}' (${bestStrength}).`,
      { token, incomingStrength, bestStrength, bestToken }
    );
  }
}

export type EntityKind = 'player' | 'planet' | 'report';

export class NotFoundError extends ScoutbookError {
  readonly reason = 'not_found' as const;

  constructor(public readonly entity: EntityKind, public readonly key: string) {
    super(`${entity} '${key}' not found`, { entity, key });
  }
}

/**
 * A collaborator feed failed or timed out.
 */
export class UpstreamFetchError extends ScoutbookError {
  readonly reason = 'upstream_fetch_failure' as const;

  constructor(
    public readonly feed: string,
    public readonly url: string,
    public readonly cause: Error
  ) {
    super(`${feed} request failed: ${cause.message}`, { feed, url });
  }
}

/**
 * A feed adapter could not turn its raw payload into the normalized shape.
 */
export class MalformedInputError extends ScoutbookError {
  readonly reason = 'malformed_input' as const;

  constructor(
    public readonly source: string,
    public readonly issues: readonly string[],
    options?: ErrorOptions
  ) {
    super(`Malformed ${source}: ${issues.join('; ')}`, { source, issues }, options);
  }
}

/**
 * Type guard for domain errors
 */
export function isScoutbookError(error: unknown): error is ScoutbookError {
  return error instanceof ScoutbookError;
}
