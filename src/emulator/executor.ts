/**
 * COSMAC 1802 Executor
 *
 * Applies one decoded instruction to a CPU state. The caller has already
 * advanced the program counter past the instruction, so branches simply
 * overwrite it.
 *
 * Every operation counts as one cycle; timing is not modeled.
 */

import { CpuError, OK, fail, type CpuResult } from './errors.js';
import { Instruction } from './instruction.js';
import { Opcode } from './opcodes.js';
import { CpuState } from './state.js';

// Value the input bus reads when INP has no device to sample
const IDLE_BUS = 0x00;

export function execute(cpu: CpuState, instruction: Instruction): CpuResult {
  if (cpu.halted) {
    return fail(CpuError.halted());
  }

  const n = instruction.register;
  const imm = instruction.immediate ?? 0;
  const addr = instruction.address ?? 0;

  switch (instruction.opcode) {
    // Memory reference
    case Opcode.IDL:
      cpu.halt();
      break;
    case Opcode.LDN:
      cpu.d = cpu.readByte(cpu.registers[n]);
      break;
    case Opcode.LDA:
      cpu.d = cpu.readByte(cpu.registers[n]);
      cpu.registers[n]++;
      break;
    case Opcode.STR:
      cpu.writeByte(cpu.registers[n], cpu.d);
      break;
    case Opcode.LDX:
      cpu.d = cpu.readByte(cpu.rx);
      break;
    case Opcode.LDXA:
      cpu.d = cpu.readByte(cpu.rx);
      cpu.rx = cpu.rx + 1;
      break;
    case Opcode.STXD:
      cpu.writeByte(cpu.rx, cpu.d);
      cpu.rx = cpu.rx - 1;
      break;
    case Opcode.LDI:
      cpu.d = imm;
      break;

    // Register operations
    case Opcode.INC:
      cpu.registers[n]++;
      break;
    case Opcode.DEC:
      cpu.registers[n]--;
      break;
    case Opcode.IRX:
      cpu.rx = cpu.rx + 1;
      break;
    case Opcode.GLO:
      cpu.d = cpu.registers[n] & 0xff;
      break;
    case Opcode.GHI:
      cpu.d = cpu.registers[n] >> 8;
      break;
    case Opcode.PLO:
      cpu.registers[n] = (cpu.registers[n] & 0xff00) | cpu.d;
      break;
    case Opcode.PHI:
      cpu.registers[n] = (cpu.registers[n] & 0x00ff) | (cpu.d << 8);
      break;
    case Opcode.SEP:
      cpu.p = n;
      break;
    case Opcode.SEX:
      cpu.x = n;
      break;

    // Logic
    case Opcode.OR:
      cpu.d = cpu.d | cpu.readByte(cpu.rx);
      break;
    case Opcode.ORI:
      cpu.d = cpu.d | imm;
      break;
    case Opcode.AND:
      cpu.d = cpu.d & cpu.readByte(cpu.rx);
      break;
    case Opcode.ANI:
      cpu.d = cpu.d & imm;
      break;
    case Opcode.XOR:
      cpu.d = cpu.d ^ cpu.readByte(cpu.rx);
      break;
    case Opcode.XRI:
      cpu.d = cpu.d ^ imm;
      break;

    // Arithmetic
    case Opcode.ADD:
      add(cpu, cpu.d, cpu.readByte(cpu.rx), 0);
      break;
    case Opcode.ADI:
      add(cpu, cpu.d, imm, 0);
      break;
    case Opcode.ADC:
      add(cpu, cpu.d, cpu.readByte(cpu.rx), cpu.df ? 1 : 0);
      break;
    case Opcode.ADCI:
      add(cpu, cpu.d, imm, cpu.df ? 1 : 0);
      break;
    case Opcode.SD:
      subtract(cpu, cpu.readByte(cpu.rx), cpu.d, 0);
      break;
    case Opcode.SDI:
      subtract(cpu, imm, cpu.d, 0);
      break;
    case Opcode.SDB:
      subtract(cpu, cpu.readByte(cpu.rx), cpu.d, cpu.df ? 0 : 1);
      break;
    case Opcode.SDBI:
      subtract(cpu, imm, cpu.d, cpu.df ? 0 : 1);
      break;
    case Opcode.SM:
      subtract(cpu, cpu.d, cpu.readByte(cpu.rx), 0);
      break;
    case Opcode.SMI:
      subtract(cpu, cpu.d, imm, 0);
      break;
    case Opcode.SMB:
      subtract(cpu, cpu.d, cpu.readByte(cpu.rx), cpu.df ? 0 : 1);
      break;
    case Opcode.SMBI:
      subtract(cpu, cpu.d, imm, cpu.df ? 0 : 1);
      break;

    // Shifts
    case Opcode.SHR:
      shiftRight(cpu, false);
      break;
    case Opcode.SHRC:
      shiftRight(cpu, cpu.df);
      break;
    case Opcode.SHL:
      shiftLeft(cpu, false);
      break;
    case Opcode.SHLC:
      shiftLeft(cpu, cpu.df);
      break;

    // Short branches
    case Opcode.BR:
      shortBranch(cpu, imm, true);
      break;
    case Opcode.BQ:
      shortBranch(cpu, imm, cpu.q);
      break;
    case Opcode.BZ:
      shortBranch(cpu, imm, cpu.d === 0);
      break;
    case Opcode.BDF:
      shortBranch(cpu, imm, cpu.df);
      break;
    case Opcode.B1:
      shortBranch(cpu, imm, cpu.ef[0]);
      break;
    case Opcode.B2:
      shortBranch(cpu, imm, cpu.ef[1]);
      break;
    case Opcode.B3:
      shortBranch(cpu, imm, cpu.ef[2]);
      break;
    case Opcode.B4:
      shortBranch(cpu, imm, cpu.ef[3]);
      break;
    case Opcode.BNQ:
      shortBranch(cpu, imm, !cpu.q);
      break;
    case Opcode.BNZ:
      shortBranch(cpu, imm, cpu.d !== 0);
      break;
    case Opcode.BNF:
      shortBranch(cpu, imm, !cpu.df);
      break;
    case Opcode.BN1:
      shortBranch(cpu, imm, !cpu.ef[0]);
      break;
    case Opcode.BN2:
      shortBranch(cpu, imm, !cpu.ef[1]);
      break;
    case Opcode.BN3:
      shortBranch(cpu, imm, !cpu.ef[2]);
      break;
    case Opcode.BN4:
      shortBranch(cpu, imm, !cpu.ef[3]);
      break;
    case Opcode.SKP:
      // The skipped byte was fetched as the operand
      break;

    // Long branches
    case Opcode.LBR:
      longBranch(cpu, addr, true);
      break;
    case Opcode.LBQ:
      longBranch(cpu, addr, cpu.q);
      break;
    case Opcode.LBZ:
      longBranch(cpu, addr, cpu.d === 0);
      break;
    case Opcode.LBDF:
      longBranch(cpu, addr, cpu.df);
      break;
    case Opcode.LBNQ:
      longBranch(cpu, addr, !cpu.q);
      break;
    case Opcode.LBNZ:
      longBranch(cpu, addr, cpu.d !== 0);
      break;
    case Opcode.LBNF:
      longBranch(cpu, addr, !cpu.df);
      break;

    // Long skips
    case Opcode.LSKP:
      break;
    case Opcode.LSNQ:
      longSkip(cpu, !cpu.q);
      break;
    case Opcode.LSNZ:
      longSkip(cpu, cpu.d !== 0);
      break;
    case Opcode.LSNF:
      longSkip(cpu, !cpu.df);
      break;
    case Opcode.LSIE:
      longSkip(cpu, cpu.ie);
      break;
    case Opcode.LSQ:
      longSkip(cpu, cpu.q);
      break;
    case Opcode.LSZ:
      longSkip(cpu, cpu.d === 0);
      break;
    case Opcode.LSDF:
      longSkip(cpu, cpu.df);
      break;
    case Opcode.NOP:
      break;

    // Control
    case Opcode.RET:
      returnFromInterrupt(cpu, true);
      break;
    case Opcode.DIS:
      returnFromInterrupt(cpu, false);
      break;
    case Opcode.SAV:
      cpu.writeByte(cpu.rx, cpu.t);
      break;
    case Opcode.MARK:
      cpu.t = (cpu.x << 4) | cpu.p;
      cpu.writeByte(cpu.registers[2], cpu.t);
      cpu.x = cpu.p;
      cpu.registers[2]--;
      break;
    case Opcode.REQ:
      cpu.q = false;
      break;
    case Opcode.SEQ:
      cpu.q = true;
      break;

    // I/O (no devices attached)
    case Opcode.OUT:
      cpu.rx = cpu.rx + 1;
      break;
    case Opcode.INP:
      cpu.writeByte(cpu.rx, IDLE_BUS);
      cpu.d = IDLE_BUS;
      break;

    default: {
      const unreachable: never = instruction.opcode;
      throw new Error(`Unhandled opcode: ${String(unreachable)}`);
    }
  }

  cpu.cycles++;
  cpu.instructions++;
  return OK;
}

/**
 * D = a + b + carry; DF is the carry out of the full sum, which is the
 * same as a carry out of either the first or the second addition.
 */
function add(cpu: CpuState, a: number, b: number, carry: number): void {
  const sum = a + b + carry;
  cpu.d = sum;
  cpu.df = sum > 0xff;
}

/**
 * D = a - b - borrow; DF = 1 when no borrow occurred
 */
function subtract(cpu: CpuState, a: number, b: number, borrow: number): void {
  const diff = a - b - borrow;
  cpu.d = diff;
  cpu.df = diff >= 0;
}

function shiftRight(cpu: CpuState, carryIn: boolean): void {
  const value = cpu.d;
  cpu.df = (value & 0x01) !== 0;
  cpu.d = (value >> 1) | (carryIn ? 0x80 : 0);
}

function shiftLeft(cpu: CpuState, carryIn: boolean): void {
  const value = cpu.d;
  cpu.df = (value & 0x80) !== 0;
  cpu.d = (value << 1) | (carryIn ? 0x01 : 0);
}

/**
 * Replace only the low byte of the program counter
 */
function shortBranch(cpu: CpuState, target: number, taken: boolean): void {
  if (taken) {
    cpu.pc = (cpu.pc & 0xff00) | target;
  }
}

function longBranch(cpu: CpuState, target: number, taken: boolean): void {
  if (taken) {
    cpu.pc = target;
  }
}

/**
 * The fetch already stepped over the two skipped bytes. When the skip
 * is not taken, back up so they execute as the next instruction.
 */
function longSkip(cpu: CpuState, taken: boolean): void {
  if (!taken) {
    cpu.pc = cpu.pc - 2;
  }
}

/**
 * RET/DIS: M(R(X)) -> (X,P), R(X)+1 with the old X, then set IE
 */
function returnFromInterrupt(cpu: CpuState, enable: boolean): void {
  const oldX = cpu.x;
  const value = cpu.readByte(cpu.registers[oldX]);
  cpu.registers[oldX]++;
  cpu.x = value >> 4;
  cpu.p = value & 0x0f;
  cpu.ie = enable;
}
