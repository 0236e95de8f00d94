// ============================================================
// Domain Store
//
// One ordered candidate-row list per column. Order is kept
// stable across removals since LCV breaks ties by it.
// ============================================================

import { InvalidBoardSizeError, InvalidVariableError } from './errors';

export class DomainStore {
  private domains: number[][];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) throw new InvalidBoardSizeError(size);
    this.domains = Array.from({ length: size }, () =>
      Array.from({ length: size }, (_, row) => row)
    );
  }

  get(variable: number): readonly number[] {
    return this.domains[this.checkVariable(variable)];
  }

  /** Returns true if the value was present. Never throws. */
  remove(variable: number, value: number): boolean {
    if (!this.isVariable(variable)) return false;
    const domain = this.domains[variable];
    const idx = domain.indexOf(value);
    if (idx === -1) return false;
    domain.splice(idx, 1);
    return true;
  }

  isEmpty(variable: number): boolean {
    return this.domains[this.checkVariable(variable)].length === 0;
  }

  sizeOf(variable: number): number {
    return this.domains[this.checkVariable(variable)].length;
  }

  totalSize(): number {
    let total = 0;
    for (const d of this.domains) total += d.length;
    return total;
  }

  snapshot(): number[][] {
    return this.domains.map(d => [...d]);
  }

  clone(): DomainStore {
    const copy = new DomainStore(this.size);
    copy.domains = this.snapshot();
    return copy;
  }

  private isVariable(variable: number): boolean {
    return Number.isInteger(variable) && variable >= 0 && variable < this.size;
  }

  private checkVariable(variable: number): number {
    if (!this.isVariable(variable)) throw new InvalidVariableError(variable, this.size);
    return variable;
  }
}
