/**
 * COSMAC 1802 Assembler
 *
 * Two-pass assembler that converts 1802 assembly source to machine code.
 * Code is assembled from address 0; there are no directives.
 *
 * Line syntax: `[LABEL:] [MNEMONIC [OPERAND]] [; comment | # comment]`
 */

import { Instruction } from '../emulator/instruction.js';
import { OPCODE_INFO, instructionLength, opcodeForMnemonic, type Opcode } from '../emulator/opcodes.js';
import { AssemblyError, toAssemblerError, type AssemblerError } from './errors.js';
import { parseNumber, parsePort, parseRegister } from './operands.js';

export interface AssemblerResult {
  machineCode: Uint8Array;
  /** One `ADDR: BYTES | SOURCE` line per instruction */
  disassembly: string[];
  /** Label name (uppercase) -> address */
  symbols: Map<string, number>;
  errors: AssemblerError[];
}

interface SourceLine {
  /** 1-based */
  line: number;
  label?: string;
  /** Instruction text with label and comment removed; empty if none */
  text: string;
}

export class Assembler {
  private source: string;
  private symbols: Map<string, number> = new Map();
  private output: number[] = [];
  private disassembly: string[] = [];
  private pc: number = 0;
  private errors: AssemblerError[] = [];

  constructor(source: string) {
    this.source = source;
  }

  assemble(): AssemblerResult {
    this.symbols = new Map();
    this.output = [];
    this.disassembly = [];
    this.pc = 0;
    this.errors = [];

    const lines = splitLines(this.source);

    // Pass 1: Collect labels and calculate addresses
    this.pass1(lines);

    if (this.errors.length > 0) {
      return this.failed();
    }

    // Pass 2: Generate machine code
    this.pc = 0;
    this.pass2(lines);

    if (this.errors.length > 0) {
      return this.failed();
    }

    return {
      machineCode: new Uint8Array(this.output),
      disassembly: this.disassembly,
      symbols: this.symbols,
      errors: [],
    };
  }

  private failed(): AssemblerResult {
    return {
      machineCode: new Uint8Array(),
      disassembly: [],
      symbols: this.symbols,
      errors: this.errors,
    };
  }

  private pass1(lines: SourceLine[]): void {
    for (const line of lines) {
      if (line.label) {
        // Redefinition replaces the earlier address
        this.symbols.set(line.label, this.pc);
      }
      if (!line.text) continue;

      try {
        this.pc += instructionLength(lookupMnemonic(line.text));
      } catch (e: unknown) {
        this.report(e, line.line);
        return;
      }
    }
  }

  private pass2(lines: SourceLine[]): void {
    for (const line of lines) {
      if (!line.text) continue;

      let bytes: Uint8Array;
      try {
        bytes = this.encodeLine(line.text).encode();
      } catch (e: unknown) {
        this.report(e, line.line);
        return;
      }

      this.disassembly.push(formatListingLine(this.pc, bytes, line.text));
      this.output.push(...bytes);
      this.pc += bytes.length;
    }
  }

  private encodeLine(text: string): Instruction {
    const opcode = lookupMnemonic(text);
    // Tokens after the first operand are ignored
    const operand: string | undefined = tokenize(text)[1];
    const info = OPCODE_INFO[opcode];

    switch (info.operand) {
      case 'none':
        return Instruction.of(opcode);

      case 'register':
        // LDN R0 encodes as 0x00, which executes as IDL
        return Instruction.of(opcode, parseRegister(requireOperand(operand, 'Register operand required')));

      case 'port':
        return Instruction.of(opcode, parsePort(requireOperand(operand, 'Port number required')));

      case 'immediate':
        return Instruction.withImmediate(
          opcode,
          0,
          parseNumber(requireOperand(operand, 'Immediate value required'))
        );

      case 'short':
        // Only the low byte of the target is encoded
        return Instruction.withImmediate(
          opcode,
          0,
          this.resolveTarget(requireOperand(operand, 'Branch target required'))
        );

      case 'long':
        return Instruction.withAddress(
          opcode,
          0,
          this.resolveTarget(requireOperand(operand, 'Branch target required'))
        );
    }
  }

  /**
   * Labels take priority over numbers, so `A:` shadows the value 0x0A
   */
  private resolveTarget(operand: string): number {
    const address = this.symbols.get(operand.toUpperCase());
    if (address !== undefined) {
      return address & 0xffff;
    }
    return parseNumber(operand);
  }

  private report(e: unknown, line: number): void {
    if (!(e instanceof AssemblyError)) {
      throw e;
    }
    this.errors.push(toAssemblerError(e, line));
  }
}

/**
 * Assemble source text
 */
export function assemble(source: string): AssemblerResult {
  return new Assembler(source).assemble();
}

/**
 * Cut a line at the first `;` or `#`
 */
export function stripComment(line: string): string {
  const match = /[;#]/.exec(line);
  return match ? line.slice(0, match.index) : line;
}

function splitLines(source: string): SourceLine[] {
  const result: SourceLine[] = [];

  source.split(/\r?\n/).forEach((raw, index) => {
    const stripped = stripComment(raw).trim();
    if (!stripped) return;

    const colon = stripped.indexOf(':');
    if (colon === -1) {
      result.push({ line: index + 1, text: stripped });
      return;
    }

    const label = stripped.slice(0, colon).trim().toUpperCase();
    result.push({
      line: index + 1,
      label: label || undefined,
      text: stripped.slice(colon + 1).trim(),
    });
  });

  return result;
}

function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

function lookupMnemonic(text: string): Opcode {
  const name = tokenize(text)[0].toUpperCase();
  const opcode = opcodeForMnemonic(name);
  if (opcode === undefined) {
    throw AssemblyError.invalidInstruction(name);
  }
  return opcode;
}

function requireOperand(operand: string | undefined, message: string): string {
  if (operand === undefined) {
    throw AssemblyError.invalidOperand(message);
  }
  return operand;
}

function formatListingLine(address: number, bytes: Uint8Array, source: string): string {
  const addr = address.toString(16).toUpperCase().padStart(4, '0');
  const hex = Array.from(bytes, (b) => b.toString(16).toUpperCase().padStart(2, '0')).join(' ');
  return `${addr}: ${hex.padEnd(8)} | ${source}`;
}
