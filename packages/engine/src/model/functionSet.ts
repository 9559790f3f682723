import { FUNCTION_NAMES, FunctionName, functionBitFor } from '../params/registry.js';

/**
 * Set of part functions backed by the hardware's function bitmask.
 */
export class FunctionSet {
  private bits = 0;

  static fromMask(mask: number): FunctionSet {
    const set = new FunctionSet();
    for (const name of FUNCTION_NAMES) {
      if (mask & functionBitFor(name)) set.add(name);
    }
    return set;
  }

  add(name: FunctionName): void {
    this.bits |= functionBitFor(name);
  }

  has(name: FunctionName): boolean {
    return (this.bits & functionBitFor(name)) !== 0;
  }

  toArray(): FunctionName[] {
    return FUNCTION_NAMES.filter(name => this.has(name));
  }

  get mask(): number {
    return this.bits;
  }
}
