/**
 * Placeholder put in a reference field whose target document no longer
 * exists. Encoding writes the original id back.
 */
export class BrokenReference {
  public constructor(
    public readonly modelName: string,
    public readonly id: unknown,
  ) {}

  public toString(): string {
    return `BrokenReference(${this.modelName}, ${String(this.id)})`;
  }
}
