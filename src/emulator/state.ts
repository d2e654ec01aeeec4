/**
 * COSMAC 1802 CPU State
 *
 * 16 general-purpose 16-bit registers (R0-RF)
 * 8-bit accumulator D and 1-bit data flag DF
 * 4-bit selectors P (program counter) and X (index register)
 * 64KB memory
 *
 * There is no dedicated program counter: P names which of the sixteen
 * registers is acting as one, and X does the same for the index register.
 */

import { CpuError, OK, fail, ok, type CpuResult } from './errors.js';

export const MEMORY_SIZE = 0x10000;
export const REGISTER_COUNT = 16;

/**
 * Plain copy of the visible CPU state, for display
 */
export interface CpuSnapshot {
  registers: number[];
  d: number;
  df: boolean;
  p: number;
  x: number;
  t: number;
  ie: boolean;
  q: boolean;
  ef: [boolean, boolean, boolean, boolean];
  pc: number;
  halted: boolean;
  cycles: number;
  instructions: number;
}

export class CpuState {
  readonly registers = new Uint16Array(REGISTER_COUNT);
  readonly memory = new Uint8Array(MEMORY_SIZE);

  private _d = 0;
  private _p = 0;
  private _x = 0;
  private _t = 0;

  df = false;
  ie = true;
  q = false;
  /** External flag inputs EF1-EF4; nothing in the emulator drives them */
  ef: [boolean, boolean, boolean, boolean] = [false, false, false, false];

  halted = false;
  cycles = 0;
  instructions = 0;

  // --- masked accessors ---
  get d(): number { return this._d; }
  set d(v: number) { this._d = v & 0xff; }

  get p(): number { return this._p; }
  set p(v: number) { this._p = v & 0x0f; }

  get x(): number { return this._x; }
  set x(v: number) { this._x = v & 0x0f; }

  get t(): number { return this._t; }
  set t(v: number) { this._t = v & 0xff; }

  /** Value of the register selected by P */
  get pc(): number { return this.registers[this._p]; }
  set pc(v: number) { this.registers[this._p] = v & 0xffff; }

  /** Value of the register selected by X */
  get rx(): number { return this.registers[this._x]; }
  set rx(v: number) { this.registers[this._x] = v & 0xffff; }

  /**
   * Return to the power-on state. P and X both select R0, as on the
   * real chip, and memory is cleared.
   */
  reset(): void {
    this.registers.fill(0);
    this.memory.fill(0);
    this._d = 0;
    this._p = 0;
    this._x = 0;
    this._t = 0;
    this.df = false;
    this.ie = true;
    this.q = false;
    this.ef = [false, false, false, false];
    this.halted = false;
    this.cycles = 0;
    this.instructions = 0;
  }

  getRegister(index: number): CpuResult<number> {
    if (!isRegisterIndex(index)) {
      return fail(CpuError.invalidRegister(index));
    }
    return ok(this.registers[index]);
  }

  setRegister(index: number, value: number): CpuResult {
    if (!isRegisterIndex(index)) {
      return fail(CpuError.invalidRegister(index));
    }
    this.registers[index] = value & 0xffff;
    return OK;
  }

  /**
   * Select the program counter register (0-15)
   */
  setP(index: number): CpuResult {
    if (!isRegisterIndex(index)) {
      return fail(CpuError.invalidRegister(index));
    }
    this._p = index;
    return OK;
  }

  /**
   * Select the index register (0-15)
   */
  setX(index: number): CpuResult {
    if (!isRegisterIndex(index)) {
      return fail(CpuError.invalidRegister(index));
    }
    this._x = index;
    return OK;
  }

  readByte(address: number): number {
    return this.memory[address & 0xffff];
  }

  writeByte(address: number, value: number): void {
    this.memory[address & 0xffff] = value & 0xff;
  }

  /**
   * Read `length` bytes starting at `start`, wrapping at the top of memory
   */
  readMemory(start: number, length: number): Uint8Array {
    const bytes = new Uint8Array(Math.max(0, length));
    for (let i = 0; i < bytes.length; i++) {
      bytes[i] = this.memory[(start + i) & 0xffff];
    }
    return bytes;
  }

  /**
   * Copy a program into memory. Fails without writing anything if it
   * would run past the end of memory.
   */
  loadProgram(program: ArrayLike<number>, start: number = 0): CpuResult {
    const end = start + program.length;
    if (!Number.isInteger(start) || start < 0 || end > MEMORY_SIZE) {
      return fail(CpuError.memoryOutOfBounds(end));
    }
    this.memory.set(program, start);
    return OK;
  }

  halt(): void {
    this.halted = true;
  }

  snapshot(): CpuSnapshot {
    return {
      registers: Array.from(this.registers),
      d: this._d,
      df: this.df,
      p: this._p,
      x: this._x,
      t: this._t,
      ie: this.ie,
      q: this.q,
      ef: [...this.ef],
      pc: this.pc,
      halted: this.halted,
      cycles: this.cycles,
      instructions: this.instructions,
    };
  }
}

function isRegisterIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < REGISTER_COUNT;
}
