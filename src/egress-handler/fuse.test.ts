import { describe, expect, it } from "vitest";
import { createFuse } from "./fuse.js";

describe("fuse", () => {
  it("starts intact", () => {
    const fuse = createFuse();
    expect(fuse.isBroken()).toBe(false);
  });

  it("releases every watcher registered before the break", async () => {
    const fuse = createFuse();
    const seen: number[] = [];
    const watchers = [1, 2, 3].map((n) => fuse.watch().then(() => seen.push(n)));

    fuse.break();
    await Promise.all(watchers);

    expect(seen).toEqual([1, 2, 3]);
    expect(fuse.isBroken()).toBe(true);
  });

  it("releases watchers that arrive after the break", async () => {
    const fuse = createFuse();
    fuse.break();

    await expect(fuse.watch()).resolves.toBeUndefined();
  });

  it("ignores repeated breaks", async () => {
    const fuse = createFuse();
    let released = 0;
    void fuse.watch().then(() => {
      released++;
    });

    await Promise.all(Array.from({ length: 5 }, async () => fuse.break()));
    fuse.break();
    await fuse.watch();

    expect(released).toBe(1);
    expect(fuse.isBroken()).toBe(true);
  });

  it("does not release watchers while intact", async () => {
    const fuse = createFuse();
    const outcome = await Promise.race([
      fuse.watch().then(() => "broken"),
      new Promise<string>((r) => setTimeout(() => r("intact"), 20)),
    ]);
    expect(outcome).toBe("intact");
  });
});
