import { describe, it, expect } from "vitest";
import {
  AccessError,
  ArgumentError,
  LinkageError,
  ProxyError,
  describeError,
} from "../index.js";

describe("errors", () => {
  it("generation errors should carry their phase and name", () => {
    const access = new AccessError("contract app/Hidden is not visible");
    const argument = new ArgumentError("at least one contract is required");

    expect(access).toBeInstanceOf(ProxyError);
    expect(access).toBeInstanceOf(Error);
    expect(access.name).toBe("AccessError");
    expect(access.phase).toBe("generation");

    expect(argument).toBeInstanceOf(ProxyError);
    expect(argument.name).toBe("ArgumentError");
    expect(argument.phase).toBe("generation");
    expect(argument.message).toBe("at least one contract is required");
  });

  it("LinkageError should carry the method descriptor and cause", () => {
    const cause = new RangeError("boom");
    const error = new LinkageError("resolver failed", "Hello.hello(string)string", { cause });

    expect(error).toBeInstanceOf(ProxyError);
    expect(error.name).toBe("LinkageError");
    expect(error.phase).toBe("linkage");
    expect(error.method).toBe("Hello.hello(string)string");
    expect(error.cause).toBe(cause);
  });

  describe("describeError", () => {
    it("should render errors with their name", () => {
      expect(describeError(new TypeError("not a function"))).toBe("TypeError: not a function");
    });

    it("should render other values as strings", () => {
      expect(describeError("plain")).toBe("plain");
      expect(describeError(42)).toBe("42");
    });
  });
});
