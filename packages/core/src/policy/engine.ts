/**
 * Query guard — validation followed by row-limit enforcement.
 *
 * raw query → validateQuery → (accepted) → enforceRowLimit → final SQL
 */

import { type GuardConfig, type PrepareOutcome, defaultGuardConfig } from './types.js';
import { validateQuery } from './validate.js';
import { enforceRowLimit, resolveRowLimit } from './rewrite.js';
import { ROW_LIMITS } from '../db/defaults.js';

export interface QueryGuard {
  /** Validate a raw query and bound it to the resolved row limit */
  prepare(query: string, rowLimit?: number | null): PrepareOutcome;

  /** Get the current guard config */
  getConfig(): GuardConfig;
}

export class DefaultQueryGuard implements QueryGuard {
  private readonly config: GuardConfig;

  constructor(config: Partial<GuardConfig> = {}) {
    const merged = { ...defaultGuardConfig(), ...config };
    const maxLimit = Math.min(Math.max(Math.trunc(merged.maxLimit), 1), ROW_LIMITS.max);
    this.config = {
      ...merged,
      maxLimit,
      defaultLimit: Math.min(Math.max(Math.trunc(merged.defaultLimit), 1), maxLimit),
    };
  }

  prepare(query: string, rowLimit?: number | null): PrepareOutcome {
    const validation = validateQuery(query, this.config);
    if (!validation.ok) {
      return { ok: false, rejection: validation };
    }

    const effectiveLimit = resolveRowLimit(rowLimit, this.config);
    const rewrite = enforceRowLimit(query.trim(), effectiveLimit);
    const warnings: string[] = [];

    if (rowLimit !== undefined && rowLimit !== null && rowLimit !== effectiveLimit) {
      warnings.push(`row_limit ${rowLimit} adjusted to ${effectiveLimit} (allowed range 1-${this.config.maxLimit}).`);
    }

    switch (rewrite.action) {
      case 'appended':
        warnings.push(`LIMIT ${effectiveLimit} appended (no LIMIT was present).`);
        break;
      case 'clamped':
        warnings.push(
          `LIMIT clamped from ${rewrite.originalLimit ?? 'ALL'} to ${effectiveLimit}.`,
        );
        break;
      case 'wrapped':
        warnings.push(`Query wrapped in an outer SELECT with LIMIT ${effectiveLimit}.`);
        break;
      case 'kept':
        break;
    }

    return { ok: true, sql: rewrite.sql, effectiveLimit, rewrite, warnings };
  }

  getConfig(): GuardConfig {
    return { ...this.config };
  }
}
