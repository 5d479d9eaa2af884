/**
 * User-facing errors
 *
 * Commands throw these; `defineCommand` turns them into a status message.
 */

export class FinderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FinderError";
  }
}

export class NotInProjectError extends FinderError {
  constructor() {
    super("You're not in a project");
    this.name = "NotInProjectError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
