import type { AllowDenyPatternConfig } from './config.js';
import type { AllowedPredicate } from './types.js';

/**
 * Regex allow/deny filter for dataset and table names.
 * Patterns match from the start of the name; deny wins over allow.
 */
export class AllowDenyPattern implements AllowedPredicate {
  private readonly allowPatterns: RegExp[];
  private readonly denyPatterns: RegExp[];

  constructor(config: AllowDenyPatternConfig) {
    const flags = config.ignoreCase ? 'i' : '';
    this.allowPatterns = config.allow.map((pattern) => new RegExp(`^(?:${pattern})`, flags));
    this.denyPatterns = config.deny.map((pattern) => new RegExp(`^(?:${pattern})`, flags));
  }

  static allowAll(): AllowDenyPattern {
    return new AllowDenyPattern({ allow: ['.*'], deny: [], ignoreCase: true });
  }

  allowed(name: string): boolean {
    if (this.denyPatterns.some((pattern) => pattern.test(name))) {
      return false;
    }
    return this.allowPatterns.some((pattern) => pattern.test(name));
  }
}
