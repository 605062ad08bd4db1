import { describe, expect, it } from "vitest";
import {
  EgressError,
  deadlineExceeded,
  errEgressNotFound,
  errorCodeOf,
  fatal,
  isFatal,
  userError,
} from "./errors.js";

describe("egress errors", () => {
  it("classifies at creation", () => {
    expect(isFatal(userError("bad url"))).toBe(false);
    expect(userError("bad url").code).toBe("invalid_argument");
    expect(errEgressNotFound().code).toBe("not_found");
    expect(deadlineExceeded("slow").code).toBe("deadline_exceeded");
  });

  it("tags plain errors as fatal and keeps the cause", () => {
    const cause = new Error("address in use");
    const err = fatal(cause);

    expect(err).toBeInstanceOf(EgressError);
    expect(err.fatal).toBe(true);
    expect(err.message).toBe("address in use");
    expect(err.code).toBe("internal");
    expect(err.cause).toBe(cause);
  });

  it("keeps the code of a wrapped egress error", () => {
    const err = fatal(new EgressError("no bus", { code: "unavailable" }));
    expect(err.code).toBe("unavailable");
    expect(isFatal(err)).toBe(true);
  });

  it("returns an already fatal error unchanged", () => {
    const err = new EgressError("boom", { fatal: true });
    expect(fatal(err)).toBe(err);
  });

  it("treats untagged errors as non-fatal", () => {
    expect(isFatal(new Error("boom"))).toBe(false);
    expect(isFatal("boom")).toBe(false);
    expect(errorCodeOf(new Error("boom"))).toBe("internal");
  });
});
