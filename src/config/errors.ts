import type { ZodIssue } from 'zod';

/**
 * Raised at construction time for any configuration the engine cannot run.
 */
export class SimulationConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid simulation config: ${issues.join('; ')}`);
    this.name = 'SimulationConfigError';
    this.issues = issues;
  }

  static fromZod(issues: readonly ZodIssue[]): SimulationConfigError {
    return new SimulationConfigError(
      issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    );
  }
}
