import { GenerationError } from "../errors/UUIDError"

/**
 * Supplies the POSIX ids embedded in DCE security (version 2) UUIDs.
 */
export interface PlatformIds {
  /** @throws {GenerationError} UNSUPPORTED_PLATFORM where there is no uid. */
  currentUserId(): number
  /** @throws {GenerationError} UNSUPPORTED_PLATFORM where there is no gid. */
  currentGroupId(): number
}

/**
 * Reads ids from the running process. process.getuid and process.getgid
 * exist on POSIX platforms only.
 */
export class NodePlatformIds implements PlatformIds {
  currentUserId(): number {
    if (typeof process.getuid !== "function") {
      throw NodePlatformIds.unsupported("user id")
    }
    return process.getuid()
  }

  currentGroupId(): number {
    if (typeof process.getgid !== "function") {
      throw NodePlatformIds.unsupported("group id")
    }
    return process.getgid()
  }

  private static unsupported(what: string): GenerationError {
    return new GenerationError(
      "UNSUPPORTED_PLATFORM",
      `NodePlatformIds: platform "${process.platform}" does not expose a POSIX ${what}. ` +
      `Pass the id explicitly or use Domain.ORG with a caller-supplied id.`
    )
  }
}

/**
 * Fixed ids, for tests and for hosts that map identities themselves.
 */
export class StaticPlatformIds implements PlatformIds {
  constructor(
    private readonly userId: number,
    private readonly groupId: number
  ) {}

  currentUserId(): number {
    return this.userId
  }

  currentGroupId(): number {
    return this.groupId
  }
}
