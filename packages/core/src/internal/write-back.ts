/**
 * Scoped write-back shared by every hole/restore operation
 */

/**
 * Run `fn` against a scratch location, then commit the scratch back to its
 * container. The commit runs on every exit path, so the caller sees `fn`'s
 * result or error only after the container is whole again.
 */
export function withWriteBack<S, R>(
  scratch: S,
  commit: (scratch: S) => void,
  fn: (scratch: S) => R
): R {
  try {
    return fn(scratch);
  } finally {
    commit(scratch);
  }
}
