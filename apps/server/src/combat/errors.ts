/**
 * Thrown when a cast request cannot be resolved: a missing request, or an
 * unknown spell id or tier.
 */
export class SpellArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SpellArgumentError";
  }
}
