// owners whose toString() is running, so a guarded toString can't recurse
const describing = new WeakSet<object>();

export function describeOwner(owner: unknown): string {
  if (typeof owner === "string") {
    return owner;
  }
  if (typeof owner === "function") {
    return owner.name || "anonymous";
  }
  if (typeof owner === "object" && owner !== null) {
    // Object.create(null) has neither toString nor constructor
    if (
      typeof owner.toString === "function"
      && owner.toString !== Object.prototype.toString
      && !describing.has(owner)
    ) {
      describing.add(owner);
      try {
        return String(owner.toString());
      } catch {
        // a throwing toString falls back to the constructor name
      } finally {
        describing.delete(owner);
      }
    }
    return owner.constructor?.name || "anonymous";
  }
  return String(owner);
}
