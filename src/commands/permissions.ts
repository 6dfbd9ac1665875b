import { PermissionLevel } from './types.js'

/**
 * Maps usernames to permission levels using the configured admin list.
 *
 * The first admin in the list is the owner. There is no trusted list or
 * account lookup yet: `Trusted` falls back to the admin list and
 * `Registered` lets everyone through.
 */
export class PermissionEvaluator {
  private readonly admins: string[]
  private readonly adminSet: Set<string>

  constructor(adminUsernames: readonly string[]) {
    this.admins = adminUsernames.map((name) => name.trim().toLowerCase()).filter(Boolean)
    this.adminSet = new Set(this.admins)
  }

  /** The owner's lowercase username, if any admins are configured. */
  get owner(): string | undefined {
    return this.admins[0]
  }

  isAdmin(username: string): boolean {
    return this.adminSet.has(username.toLowerCase())
  }

  /** Returns true when `username` satisfies `required`. */
  check(username: string, required: PermissionLevel): boolean {
    const name = username.toLowerCase()
    switch (required) {
      case PermissionLevel.Owner:
        return this.owner !== undefined && name === this.owner
      case PermissionLevel.Admin:
      case PermissionLevel.Trusted:
        return this.adminSet.has(name)
      case PermissionLevel.Registered:
      case PermissionLevel.Everyone:
        return true
    }
  }

  /** Highest level `username` qualifies for. Used for listings, not for gating. */
  levelOf(username: string): PermissionLevel {
    const name = username.toLowerCase()
    if (this.owner !== undefined && name === this.owner) return PermissionLevel.Owner
    if (this.adminSet.has(name)) return PermissionLevel.Admin
    return PermissionLevel.Everyone
  }
}
