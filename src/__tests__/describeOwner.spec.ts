import { describeOwner } from "../describeOwner";
import { ObjectDisposedError } from "../ObjectDisposedError";

describe("describeOwner", () => {
  it("returns strings as is", () => {
    expect(describeOwner("session #3")).toBe("session #3");
  });

  it("uses an overridden toString", () => {
    class Session {
      constructor(readonly id: number) { }
      toString() {
        return `Session(${this.id})`;
      }
    }
    expect(describeOwner(new Session(7))).toBe("Session(7)");
  });

  it("falls back to the constructor name when toString throws", () => {
    class Session {
      toString(): string {
        throw new Error("session closed");
      }
    }
    expect(describeOwner(new Session())).toBe("Session");
  });

  it("falls back to the constructor name", () => {
    class Session { }
    expect(describeOwner(new Session())).toBe("Session");
    expect(describeOwner({})).toBe("Object");
  });

  it("names prototype-less objects anonymous", () => {
    expect(describeOwner(Object.create(null))).toBe("anonymous");
  });

  it("uses function names", () => {
    function connect() { }
    expect(describeOwner(connect)).toBe("connect");
  });

  it("stringifies primitives", () => {
    expect(describeOwner(42)).toBe("42");
    expect(describeOwner(null)).toBe("null");
    expect(describeOwner(undefined)).toBe("undefined");
  });
});

describe("ObjectDisposedError", () => {
  it("carries the owner and its label", () => {
    const owner = { toString: () => "pool" };
    const error = new ObjectDisposedError(owner);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("ObjectDisposedError");
    expect(error.message).toBe("Object [pool] has been disposed!");
    expect(error.owner).toBe(owner);
  });
});
