/**
 * Role Hierarchy
 *
 * Total order over role names. Built once from configuration and shared by
 * reference; never mutated after construction.
 */
export class RoleHierarchy {
  private readonly ranks: ReadonlyMap<string, number>;

  constructor(table: Readonly<Record<string, number>>) {
    this.ranks = new Map(Object.entries(table));
  }

  isKnown(role: string): boolean {
    return this.ranks.has(role);
  }

  /** Rank of a single role, 0 when the role is not in the table. */
  rankOf(role: string): number {
    return this.ranks.get(role) ?? 0;
  }

  /**
   * Highest rank among the given roles. Unknown names are ignored, an empty
   * (or all-unknown) set ranks 0.
   */
  effectiveRank(roles: readonly string[]): number {
    return roles.reduce((max, role) => Math.max(max, this.rankOf(role)), 0);
  }
}
