import { describeOwner } from "./describeOwner";

export class ObjectDisposedError extends Error {
  override name = "ObjectDisposedError";
  readonly owner: unknown;

  constructor(owner: unknown) {
    super(`Object [${describeOwner(owner)}] has been disposed!`);
    this.owner = owner;
  }
}
