/**
 * Mutual exclusion around remote calls.
 *
 * One guard is shared by every accessor of a session, so at most one remote
 * call is outstanding at a time. The guard must be released on every exit
 * path of `fn`, including a rejection.
 */
export interface IExclusiveGuard {
  /**
   * Whether some caller currently holds the guard
   */
  readonly isLocked: boolean;

  /**
   * Run `fn` while holding the guard, waiting for earlier holders first
   */
  runExclusive<T>(fn: () => Promise<T>): Promise<T>;
}
