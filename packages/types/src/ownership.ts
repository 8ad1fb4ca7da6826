/**
 * Ownership Types: repository ownership manifest (CODEOWNERS format).
 */

export interface OwnershipRule {
  /** Path pattern as written in the manifest */
  pattern: string;
  /** Reviewer identities; empty means the rule explicitly leaves paths unowned */
  owners: string[];
  /** 1-based line number in the manifest */
  line: number;
}

export interface OwnershipMatch {
  path: string;
  owners: string[];
  /** Rule that decided the result; null when no rule matched */
  rule: OwnershipRule | null;
}
