/**
 * Fresh-name allocation shared by the dry interpreter and the code generator.
 *
 * One counter serves every prefix, so names are unique within a run. The code
 * generator rewinds the supply to the mark taken before the dry pass and then
 * issues the same names again.
 */

export class NameSupply {
  private counter: number;
  private readonly names: string[] = [];

  constructor(start: number = 0) {
    this.counter = start;
  }

  /**
   * Allocate the next name with the given prefix.
   */
  fresh(prefix: string): string {
    const name = `${prefix}${this.counter}`;
    this.counter++;
    this.names.push(name);
    return name;
  }

  /** Names issued so far, in allocation order */
  get issued(): readonly string[] {
    return this.names;
  }

  /**
   * Position to come back to with rewind().
   */
  mark(): number {
    return this.names.length;
  }

  /**
   * Forget every name issued after the mark.
   */
  rewind(mark: number): void {
    const dropped = this.names.length - mark;
    if (dropped <= 0) return;
    this.names.length = mark;
    this.counter -= dropped;
  }

  /** Names issued since the mark */
  since(mark: number): string[] {
    return this.names.slice(mark);
  }
}
