/**
 * DiscordAllowlist — resolves whether a Discord user may open agent
 * conversations (/ask, /code).
 *
 * Supports:
 *   '*'                    — wildcard, allow everyone
 *   '123456789012345678'   — exact Discord user ID
 *   'role:RoleName'        — anyone with a matching guild role (case-insensitive)
 *
 * The bot owner is always allowed. An empty list allows nobody else.
 * Read from ALLOW_FROM as a comma-separated string.
 */

export type AllowlistMatchSource = 'owner' | 'wildcard' | 'user_id' | 'role' | 'none';

export interface AllowlistMatch {
  allowed: boolean;
  matchKey?: string;
  matchSource: AllowlistMatchSource;
}

export interface DiscordAllowlistConfig {
  /**
   * Comma-separated allowlist string.
   * Examples: "*", "123456789,987654321", "role:Admin,role:Moderator,123456789"
   */
  allowFrom?: string;
  /** Always allowed, whatever the list says */
  ownerId?: string;
}

export class DiscordAllowlist {
  private entries: string[];
  private hasWildcard: boolean;
  private roleEntries: string[];
  private userIdEntries: string[];
  private ownerId: string | undefined;

  constructor(config: DiscordAllowlistConfig) {
    const raw = config.allowFrom ?? '';
    this.entries = raw
      .split(',')
      .map((e) => e.trim())
      .filter(Boolean);

    this.hasWildcard = this.entries.includes('*');
    this.roleEntries = this.entries
      .filter((e) => e.startsWith('role:'))
      .map((e) => e.slice(5).toLowerCase());
    this.userIdEntries = this.entries
      .filter((e) => !e.startsWith('role:') && e !== '*');
    this.ownerId = config.ownerId;
  }

  /** No entries: only the owner gets through */
  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /**
   * @param userId    — The Discord user ID (snowflake string)
   * @param roleNames — Names of the member's guild roles (empty outside a guild)
   */
  isAllowed(userId: string, roleNames: readonly string[] = []): AllowlistMatch {
    if (this.ownerId && userId === this.ownerId) {
      return { allowed: true, matchKey: userId, matchSource: 'owner' };
    }

    if (this.hasWildcard) {
      return { allowed: true, matchKey: '*', matchSource: 'wildcard' };
    }

    if (this.userIdEntries.includes(userId)) {
      return { allowed: true, matchKey: userId, matchSource: 'user_id' };
    }

    if (this.roleEntries.length > 0) {
      const memberRoles = new Set(roleNames.map((r) => r.toLowerCase()));
      const roleName = this.roleEntries.find((r) => memberRoles.has(r));
      if (roleName) {
        return { allowed: true, matchKey: `role:${roleName}`, matchSource: 'role' };
      }
    }

    return { allowed: false, matchSource: 'none' };
  }

  /** Serialize back to the comma-separated format */
  toString(): string {
    return this.entries.join(',');
  }
}
