import {
  IndexOutOfRangeError,
  TypeMismatchError,
  isNumericArrayType,
  type EncodeOptions,
  type Matrix,
  type NumericArrayType,
} from '@specwire/core';
import type { PropertyChannel } from './types.js';
import { Var, type VarOptions } from './var.js';

export type ArrayShape = readonly [rows: number, cols: number];

export interface ArrayVarOptions extends VarOptions {
  /** Known dimensions; read from the server on open when omitted */
  shape?: ArrayShape;
  /** Element type for whole-array writes; follows the server's type when omitted */
  elementType?: NumericArrayType;
}

function inRange(index: number, length: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < length;
}

function requireFinite(value: number, name: string): void {
  if (!Number.isFinite(value)) {
    throw new TypeMismatchError('finite number', String(value), { name });
  }
}

/**
 * A numeric array variable with element access.
 *
 * Whole-array reads and writes behave like {@link Var}. Single elements are
 * written with an assignment command on the server, which avoids sending
 * the whole array for one cell.
 *
 * The shape is known from the moment the object exists, either declared or
 * read by {@link ArrayVar.open}, so an index outside the array fails without
 * talking to the server. Notifications that resize the array update it.
 *
 * @example
 * ```typescript
 * const data = await client.arrayVar('SCAN_D', { shape: [100, 4] });
 * await data.set(0, 2, 1.5);
 * await data.setRow(1, [0, 0, 2.5, 1]);
 * const row = await data.get(0);
 * row.at(2); // 1.5
 * ```
 */
export class ArrayVar extends Var<'array'> {
  private readonly declaredShape: ArrayShape | undefined;
  private readonly declaredElementType: NumericArrayType | undefined;
  private learnedShape: ArrayShape = [0, 0];

  private constructor(channel: PropertyChannel, name: string, options: ArrayVarOptions) {
    super(channel, `var/${name}`, 'array', name, options);
    this.declaredShape = options.shape;
    this.declaredElementType = options.elementType;
  }

  /**
   * Address the array `var/<name>`. Without a declared shape the array is
   * read once to learn it.
   *
   * @throws TypeMismatchError if the server value is not a numeric array
   * @throws CommandFailedError if the variable does not exist
   */
  static async open(channel: PropertyChannel, name: string, options: ArrayVarOptions = {}): Promise<ArrayVar> {
    const variable = new ArrayVar(channel, name, options);
    if (!options.shape) {
      await variable.read();
    }
    return variable;
  }

  /** `[rows, cols]`: declared, or as last reported by the server */
  get shape(): ArrayShape {
    return this.declaredShape ?? this.learnedShape;
  }

  /**
   * Snapshot of one row.
   *
   * @throws IndexOutOfRangeError before any I/O if `row` is outside the array
   */
  async get(row: number): Promise<ArrayRow> {
    const shape = this.shape;
    if (!inRange(row, shape[0])) {
      throw new IndexOutOfRangeError([row], shape, { name: this.name });
    }
    const matrix = await this.read();
    return new ArrayRow(this, row, matrix[row] ?? []);
  }

  /**
   * Assign one element on the server.
   *
   * @throws TypeMismatchError if `value` is not a finite number
   * @throws IndexOutOfRangeError before any I/O if the index is outside the array
   * @throws CommandFailedError if the server rejects the assignment
   */
  async set(row: number, col: number, value: number): Promise<void> {
    requireFinite(value, this.name);
    this.checkCell(row, col);
    await this.assign(row, col, value);
  }

  /**
   * Assign a whole row, one element at a time.
   *
   * @throws TypeMismatchError if `values` does not hold one finite number per column
   * @throws IndexOutOfRangeError before any I/O if `row` is outside the array
   */
  async setRow(row: number, values: readonly number[]): Promise<void> {
    const shape = this.shape;
    if (!inRange(row, shape[0])) {
      throw new IndexOutOfRangeError([row], shape, { name: this.name });
    }
    if (values.length !== shape[1]) {
      throw new TypeMismatchError(`${shape[1]} values`, `${values.length} values`, { name: this.name });
    }
    values.forEach((value) => requireFinite(value, this.name));

    for (const [col, value] of values.entries()) {
      await this.assign(row, col, value);
    }
  }

  protected override encodeOptions(): EncodeOptions {
    const elementType =
      this.declaredElementType ??
      (this.lastWireType !== undefined && isNumericArrayType(this.lastWireType)
        ? this.lastWireType
        : undefined);
    return elementType === undefined ? {} : { elementType };
  }

  protected override store(value: Matrix, sequence: number): boolean {
    const stored = super.store(value, sequence);
    if (stored) {
      this.learnedShape = [value.length, value[0]?.length ?? 0];
    }
    return stored;
  }

  private checkCell(row: number, col: number): void {
    const shape = this.shape;
    if (!inRange(row, shape[0]) || !inRange(col, shape[1])) {
      throw new IndexOutOfRangeError([row, col], shape, { name: this.name });
    }
  }

  private async assign(row: number, col: number, value: number): Promise<void> {
    const target = this.shape[0] === 1 ? `${this.name}[${col}]` : `${this.name}[${row}][${col}]`;
    const result = await this.channel.run(`${target}=${value}`);

    const current = this.cached;
    if (current && current[row] !== undefined) {
      const next = current.map((cells) => [...cells]);
      next[row][col] = value;
      this.store(next, result.reply.sequence);
    }
  }
}

/**
 * One row of an {@link ArrayVar}, copied at the time it was read.
 */
export class ArrayRow {
  private readonly cells: readonly number[];

  constructor(
    private readonly owner: ArrayVar,
    readonly row: number,
    cells: readonly number[]
  ) {
    this.cells = [...cells];
  }

  get length(): number {
    return this.cells.length;
  }

  /**
   * @throws IndexOutOfRangeError if `col` is outside the row
   */
  at(col: number): number {
    if (!inRange(col, this.cells.length)) {
      throw new IndexOutOfRangeError([this.row, col], [this.row + 1, this.cells.length], {
        name: this.owner.name,
      });
    }
    return this.cells[col];
  }

  toArray(): number[] {
    return [...this.cells];
  }

  /** Assign one element of this row on the server */
  set(col: number, value: number): Promise<void> {
    return this.owner.set(this.row, col, value);
  }
}

/** Quote a string for use as a literal in a server command */
export function quoteString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * A string array variable (one string per row) with element access.
 *
 * @example
 * ```typescript
 * const labels = await client.stringArrayVar('LABELS');
 * await labels.set(0, 'I0 "upstream"');
 * await labels.get(0); // 'I0 "upstream"'
 * ```
 */
export class StringArrayVar extends Var<'strings'> {
  private count = 0;

  private constructor(channel: PropertyChannel, name: string, options: VarOptions) {
    super(channel, `var/${name}`, 'strings', name, options);
  }

  /**
   * Address the string array `var/<name>` and read it to learn its length.
   *
   * @throws TypeMismatchError if the server value is not a string array
   */
  static async open(channel: PropertyChannel, name: string, options: VarOptions = {}): Promise<StringArrayVar> {
    const variable = new StringArrayVar(channel, name, options);
    await variable.read();
    return variable;
  }

  /** Number of elements as last reported by the server */
  get length(): number {
    return this.count;
  }

  /**
   * @throws IndexOutOfRangeError before any I/O if `index` is outside the array
   */
  async get(index: number): Promise<string> {
    this.checkIndex(index);
    const list = await this.read();
    return list[index] ?? '';
  }

  /**
   * Assign one element on the server. The value is sent as a quoted literal.
   *
   * @throws IndexOutOfRangeError before any I/O if `index` is outside the array
   * @throws CommandFailedError if the server rejects the assignment
   */
  async set(index: number, value: string): Promise<void> {
    this.checkIndex(index);
    const result = await this.channel.run(`${this.name}[${index}]=${quoteString(value)}`);

    const current = this.cached;
    if (current && index < current.length) {
      const next = [...current];
      next[index] = value;
      this.store(next, result.reply.sequence);
    }
  }

  protected override store(value: string[], sequence: number): boolean {
    const stored = super.store(value, sequence);
    if (stored) {
      this.count = value.length;
    }
    return stored;
  }

  private checkIndex(index: number): void {
    if (!inRange(index, this.count)) {
      throw new IndexOutOfRangeError([index], [this.count], { name: this.name });
    }
  }
}
