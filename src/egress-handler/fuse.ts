/**
 * One-shot broadcast signal.
 *
 * A fuse starts intact and can be broken exactly once. Any number of watchers
 * may wait on it, before or after the break, and all of them resolve.
 */

export type Fuse = {
  /** Break the fuse. Later calls do nothing. */
  break(): void;
  /** Resolves once the fuse is broken. */
  watch(): Promise<void>;
  isBroken(): boolean;
};

export function createFuse(): Fuse {
  let broken = false;
  let release: () => void = () => {};
  const blown = new Promise<void>((resolve) => {
    release = resolve;
  });

  return {
    break() {
      if (broken) {
        return;
      }
      broken = true;
      release();
    },
    watch() {
      return blown;
    },
    isBroken() {
      return broken;
    },
  };
}
