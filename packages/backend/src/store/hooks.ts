/**
 * Run post-commit hooks in registration order. The unit of work has already
 * committed, so a failing hook is logged and the remaining hooks still run.
 * Never rejects. Stores start it without awaiting, after `transaction()` has
 * its result.
 */
export async function runAfterCommitHooks(hooks: Array<() => Promise<void>>): Promise<void> {
  for (const hook of hooks) {
    try {
      await hook();
    } catch (err) {
      console.error('[store] After-commit hook failed:', err);
    }
  }
}
