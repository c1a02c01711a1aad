/**
 * Error types; each carries a stable `code`
 */

import type { ZodIssue } from 'zod';

export type AnalyticsErrorCode = 'CONFIG_INVALID' | 'SNAPSHOT_INVALID' | 'MISSING_CUSTOMER';

export class AnalyticsError extends Error {
  constructor(
    message: string,
    public readonly code: AnalyticsErrorCode
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends AnalyticsError {
  constructor(public readonly fieldErrors: Record<string, string[] | undefined>) {
    super(`Invalid environment configuration: ${Object.keys(fieldErrors).join(', ')}`, 'CONFIG_INVALID');
  }
}

export class SnapshotValidationError extends AnalyticsError {
  constructor(public readonly issues: ZodIssue[]) {
    super(
      `Invalid source snapshot: ${issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`,
      'SNAPSHOT_INVALID'
    );
  }
}

export class MissingCustomerError extends AnalyticsError {
  constructor(public readonly orderIds: string[]) {
    super(`Orders without a matching customer: ${orderIds.join(', ')}`, 'MISSING_CUSTOMER');
  }
}
