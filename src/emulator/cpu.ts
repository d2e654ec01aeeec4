/**
 * COSMAC 1802 CPU Emulator
 *
 * Drives the fetch / advance / execute cycle over a CpuState.
 */

import { CpuError, OK, fail, ok, type CpuResult } from './errors.js';
import { execute } from './executor.js';
import { Instruction } from './instruction.js';
import { CpuState, type CpuSnapshot } from './state.js';

export interface CpuConfig {
  /** Cycle budget used by run() when none is given (default 10000) */
  runCycleBudget?: number;
}

export interface RunSummary {
  /** Instructions executed by this call */
  executed: number;
  halted: boolean;
}

export const DEFAULT_RUN_CYCLES = 10_000;

export class Cosmac1802 {
  readonly state = new CpuState();
  readonly runCycleBudget: number;

  /** Size of the last program installed with loadAssembled() */
  programSize = 0;

  constructor(config: CpuConfig = {}) {
    this.runCycleBudget = config.runCycleBudget ?? DEFAULT_RUN_CYCLES;
  }

  /**
   * Reset the CPU to its power-on state
   */
  reset(): void {
    this.state.reset();
    this.programSize = 0;
  }

  /**
   * Load bytes into memory at `start`
   */
  loadProgram(program: ArrayLike<number>, start: number = 0): CpuResult {
    return this.state.loadProgram(program, start);
  }

  /**
   * Install assembled code at address 0 and make it ready to run:
   * R0 is the program counter and points at the first byte.
   */
  loadAssembled(machineCode: Uint8Array): CpuResult {
    const loaded = this.state.loadProgram(machineCode, 0);
    if (!loaded.ok) {
      return loaded;
    }
    this.state.p = 0;
    this.state.registers[0] = 0;
    this.state.halted = false;
    this.programSize = machineCode.length;
    return OK;
  }

  /**
   * Decode the instruction at the program counter without executing it
   */
  fetch(): Instruction | undefined {
    return Instruction.decode(this.state.readMemory(this.state.pc, 3));
  }

  /**
   * Execute one instruction.
   *
   * The program counter is advanced by the instruction length before the
   * instruction runs. On failure the state is left as it was.
   */
  step(): CpuResult<Instruction> {
    const cpu = this.state;
    if (cpu.halted) {
      return fail(CpuError.halted());
    }

    const pc = cpu.pc;
    const instruction = this.fetch();
    if (!instruction) {
      return fail(CpuError.invalidInstruction(pc));
    }

    cpu.pc = pc + instruction.length;
    const result = execute(cpu, instruction);
    if (!result.ok) {
      cpu.pc = pc;
      return result;
    }
    return ok(instruction);
  }

  /**
   * Run until halted or `maxCycles` cycles have elapsed
   */
  run(maxCycles: number = this.runCycleBudget): CpuResult<RunSummary> {
    const startCycles = this.state.cycles;
    let executed = 0;

    while (!this.state.halted && this.state.cycles - startCycles < maxCycles) {
      const result = this.step();
      if (!result.ok) {
        return result;
      }
      executed++;
    }

    return ok({ executed, halted: this.state.halted });
  }

  // --- direct access for inspection and editing ---

  getRegister(index: number): CpuResult<number> {
    return this.state.getRegister(index);
  }

  setRegister(index: number, value: number): CpuResult {
    return this.state.setRegister(index, value);
  }

  setP(index: number): CpuResult {
    return this.state.setP(index);
  }

  setX(index: number): CpuResult {
    return this.state.setX(index);
  }

  readByte(address: number): number {
    return this.state.readByte(address);
  }

  writeByte(address: number, value: number): void {
    this.state.writeByte(address, value);
  }

  readMemory(start: number, length: number): Uint8Array {
    return this.state.readMemory(start, length);
  }

  get pc(): number {
    return this.state.pc;
  }

  set pc(value: number) {
    this.state.pc = value;
  }

  get halted(): boolean {
    return this.state.halted;
  }

  snapshot(): CpuSnapshot {
    return this.state.snapshot();
  }
}
