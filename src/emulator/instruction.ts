/**
 * Decoded COSMAC 1802 instruction
 */

import {
  Opcode,
  OPCODE_INFO,
  decodeOpcode,
  encodeOpcode,
  instructionLength,
  mnemonic,
  usesRegisterField,
  type InstructionLength,
} from './opcodes.js';

function hex(value: number, digits: number): string {
  return value.toString(16).toUpperCase().padStart(digits, '0');
}

export class Instruction {
  private constructor(
    public readonly opcode: Opcode,
    /** Low nibble of the opcode byte, whether or not the operation uses it */
    public readonly register: number,
    /** Second byte of a 2-byte instruction */
    public readonly immediate?: number,
    /** Big-endian operand of a 3-byte instruction */
    public readonly address?: number
  ) {}

  static of(opcode: Opcode, register: number = 0): Instruction {
    return new Instruction(opcode, register & 0x0f);
  }

  static withImmediate(opcode: Opcode, register: number, immediate: number): Instruction {
    return new Instruction(opcode, register & 0x0f, immediate & 0xff);
  }

  static withAddress(opcode: Opcode, register: number, address: number): Instruction {
    return new Instruction(opcode, register & 0x0f, undefined, address & 0xffff);
  }

  /**
   * Decode an instruction from the start of a byte sequence.
   * Returns undefined if there are fewer bytes than the operation needs.
   */
  static decode(bytes: ArrayLike<number>): Instruction | undefined {
    if (bytes.length === 0) {
      return undefined;
    }

    const first = bytes[0];
    const opcode = decodeOpcode(first);
    if (opcode === undefined) {
      return undefined;
    }
    const register = first & 0x0f;

    switch (instructionLength(opcode)) {
      case 1:
        return Instruction.of(opcode, register);
      case 2:
        if (bytes.length < 2) return undefined;
        return Instruction.withImmediate(opcode, register, bytes[1]);
      case 3:
        if (bytes.length < 3) return undefined;
        return Instruction.withAddress(opcode, register, (bytes[1] << 8) | bytes[2]);
    }
  }

  get length(): InstructionLength {
    return instructionLength(this.opcode);
  }

  get mnemonic(): string {
    return mnemonic(this.opcode);
  }

  encode(): Uint8Array {
    const bytes = [encodeOpcode(this.opcode, this.register)];
    if (this.immediate !== undefined) {
      bytes.push(this.immediate);
    }
    if (this.address !== undefined) {
      bytes.push((this.address >> 8) & 0xff, this.address & 0xff);
    }
    return new Uint8Array(bytes);
  }

  /**
   * Render as assembler-style text, e.g. `GLO R5`, `LDI 2A`, `LBR 1234`
   */
  toString(): string {
    let text = this.mnemonic;

    if (OPCODE_INFO[this.opcode].operand === 'port') {
      text += ` ${this.register & 0x07}`;
    } else if (usesRegisterField(this.opcode)) {
      text += ` R${hex(this.register, 1)}`;
    }
    if (this.immediate !== undefined) {
      text += ` ${hex(this.immediate, 2)}`;
    }
    if (this.address !== undefined) {
      text += ` ${hex(this.address, 4)}`;
    }

    return text;
  }
}

export interface DisassembledInstruction {
  address: number;
  bytes: Uint8Array;
  instruction: Instruction;
}

/**
 * Walk a block of machine code. A trailing instruction cut short by the
 * end of the block is left out.
 */
export function disassemble(code: Uint8Array, origin: number = 0): DisassembledInstruction[] {
  const result: DisassembledInstruction[] = [];
  let offset = 0;

  while (offset < code.length) {
    const instruction = Instruction.decode(code.subarray(offset, offset + 3));
    if (!instruction) break;

    result.push({
      address: (origin + offset) & 0xffff,
      bytes: code.slice(offset, offset + instruction.length),
      instruction,
    });
    offset += instruction.length;
  }

  return result;
}

/**
 * Format one disassembled entry as `ADDR: BYTES | TEXT`
 */
export function formatDisassembly(entry: DisassembledInstruction): string {
  const bytes = Array.from(entry.bytes, (b) => hex(b, 2)).join(' ');
  return `${hex(entry.address, 4)}: ${bytes.padEnd(8)} | ${entry.instruction.toString()}`;
}
