/**
 * P-code Resolver Error Types
 *
 * Unresolved input is never an error: lookups return `undefined` and record
 * diagnostics instead. Errors are reserved for malformed setup data
 * (registry rows, grammar tables, configuration files), which is rejected at
 * the boundary before any resolution runs.
 */

import type { ZodError } from 'zod';

/**
 * Where a setup failure was detected
 */
export type SetupStage = 'admin-info' | 'pcode-formats' | 'config' | 'parent-admins';

/**
 * Error thrown when setup data cannot be used to build a resolver.
 *
 * RECOVERY:
 * - Inspect `issues` for the offending rows or keys
 * - Fix the source table or configuration file and rebuild the resolver
 *
 * @example
 * ```typescript
 * try {
 *   resolver.loadPcodeFormatsFromCsv(text);
 * } catch (error) {
 *   if (error instanceof PcodeSetupError) {
 *     console.error(error.getSummary());
 *   }
 * }
 * ```
 */
export class PcodeSetupError extends Error {
  public readonly name = 'PcodeSetupError' as const;

  constructor(
    message: string,
    public readonly stage: SetupStage,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, PcodeSetupError.prototype);
  }

  /**
   * Build a setup error from a failed zod parse
   */
  static fromZodError(message: string, stage: SetupStage, error: ZodError): PcodeSetupError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    return new PcodeSetupError(message, stage, issues);
  }

  /**
   * Get formatted summary of the setup failure
   */
  getSummary(): string {
    const lines: string[] = [`${this.message} [${this.stage}]`];

    for (const issue of this.issues.slice(0, 10)) {
      lines.push(`  - ${issue}`);
    }

    if (this.issues.length > 10) {
      lines.push(`  ... and ${this.issues.length - 10} more issues`);
    }

    return lines.join('\n');
  }
}

/**
 * Type guard for setup errors
 */
export function isPcodeSetupError(error: unknown): error is PcodeSetupError {
  return error instanceof PcodeSetupError;
}
