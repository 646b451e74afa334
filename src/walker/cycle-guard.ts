import type { WalkerOptions } from './types';
import { hasIdentity } from '../utils/type-guards';

/**
 * Outcome of {@link CycleGuard.enter}.
 *
 * - `proceed`: traverse `value` (the child itself, or its replacement) and
 *   call `leave()` afterwards.
 * - `skip`: the child is a back-reference with no usable replacement (none
 *   configured, or one that is itself an ancestor); drop it together with
 *   its key. `leave()` must NOT be called.
 */
export type CycleDecision =
  | { type: 'proceed'; value: unknown }
  | { type: 'skip' };

export type CycleGuard = {
  enter(child: unknown): CycleDecision;
  leave(): void;
  /**
   * Number of entries currently on the ancestor stack.
   */
  readonly size: number;
  /**
   * Empties the stack; used when a walk ends.
   */
  reset(): void;
};

/**
 * Checks if a value is already on the current recursion path.
 *
 * Identity only: primitives never match, so two equal strings on the path
 * are not a cycle.
 */
function isOnPath(stack: readonly unknown[], child: unknown): boolean {
  if (!hasIdentity(child)) return false;

  for (const ancestor of stack) {
    // Same reference as an ancestor: the traversal has looped.
    if (ancestor === child) return true;
  }
  return false;
}

/**
 * Creates the ancestor-path guard for one walker.
 *
 * Logic:
 * 1. Configuration Check:
 *    Reads `detectCycles` and `alreadyVisitedReplacementFunction` on every
 *    call, so options changed between walks apply to the next walk.
 *    When detection is off, `enter` always proceeds and `leave` is a no-op.
 * 2. Detection:
 *    Scans the current path for the child's identity.
 * 3. Policy:
 *    - Not on the path: push the child, proceed with it.
 *    - On the path, no replacement: skip.
 *    - On the path, with replacement: push the replacement, proceed with it.
 *    - On the path, with a replacement that is also on the path: skip.
 *
 * Strict LIFO:
 * Every `proceed` is matched by exactly one `leave()` in a `finally` block of
 * the caller, so the stack mirrors the recursion even when a visitor throws.
 *
 * @param getOptions - Reads the walker's current options.
 */
export function createCycleGuard(
  getOptions: () => WalkerOptions
): CycleGuard {
  const stack: unknown[] = [];
  // Whether each pushed frame was recorded, so `leave` mirrors `enter` even
  // if `detectCycles` changes mid-walk.
  const recorded: boolean[] = [];

  return {
    enter(child) {
      const { detectCycles, alreadyVisitedReplacementFunction } = getOptions();
      if (!detectCycles) {
        recorded.push(false);
        return { type: 'proceed', value: child };
      }

      let value = child;
      if (isOnPath(stack, child)) {
        if (!alreadyVisitedReplacementFunction) return { type: 'skip' };
        value = alreadyVisitedReplacementFunction(child);
        // A replacement that is itself an ancestor would loop again.
        if (isOnPath(stack, value)) return { type: 'skip' };
      }

      stack.push(value);
      recorded.push(true);
      return { type: 'proceed', value };
    },

    leave() {
      if (recorded.pop()) stack.pop();
    },

    get size() {
      return stack.length;
    },

    reset() {
      stack.length = 0;
      recorded.length = 0;
    }
  };
}
