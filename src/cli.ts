#!/usr/bin/env node
/**
 * COSMAC 1802 command-line tool
 *
 *   cosmac asm <input.asm> [-o output.bin] [--listing]
 *   cosmac dis <input.bin> [--origin ADDR]
 *   cosmac run <input.asm|input.bin> [--cycles N]
 */

import { readFileSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { assemble, type AssemblerResult } from './assembler/assembler.js';
import { AssemblyError } from './assembler/errors.js';
import { parseNumber } from './assembler/operands.js';
import { Cosmac1802 } from './emulator/cpu.js';
import { disassemble, formatDisassembly } from './emulator/instruction.js';
import type { CpuSnapshot } from './emulator/state.js';

const COMMANDS = ['asm', 'dis', 'run'] as const;
type Command = (typeof COMMANDS)[number];

export interface CliOptions {
  command: Command;
  inputFile: string;
  /** asm: binary to write */
  outputFile: string;
  /** asm: print the listing */
  listing: boolean;
  /** dis: address of the first byte */
  origin: number;
  /** run: cycle budget, CpuConfig default when absent */
  cycles?: number;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const SOURCE_FILE = /\.(asm|s)$/i;

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse `process.argv`-style arguments. Returns null when there are none
 * and 'help' when help was asked for; throws UsageError on bad input.
 */
export function parseArgs(args: string[]): CliOptions | 'help' | null {
  const cliArgs = args.slice(2); // Skip node and script path
  if (cliArgs.length === 0) {
    return null;
  }

  const [command, ...rest] = cliArgs;
  if (command === '-h' || command === '--help') {
    return 'help';
  }
  if (!isCommand(command)) {
    throw new UsageError(`Unknown command '${command}'`);
  }

  let inputFile = '';
  let outputFile = '';
  let listing = false;
  let origin = 0;
  let cycles: number | undefined;

  const only = (arg: string, allowed: Command): void => {
    if (command !== allowed) {
      throw new UsageError(`Option '${arg}' does not apply to '${command}'`);
    }
  };
  const valueOf = (arg: string, index: number): string => {
    if (index >= rest.length) {
      throw new UsageError(`${arg} requires a value`);
    }
    return rest[index];
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    if (arg === '-h' || arg === '--help') {
      return 'help';
    } else if (arg === '-o' || arg === '--output') {
      only(arg, 'asm');
      outputFile = valueOf(arg, ++i);
    } else if (arg === '--listing') {
      only(arg, 'asm');
      listing = true;
    } else if (arg === '--origin') {
      only(arg, 'dis');
      origin = parseOrigin(valueOf(arg, ++i));
    } else if (arg === '--cycles') {
      only(arg, 'run');
      cycles = parseCycles(valueOf(arg, ++i));
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option '${arg}'`);
    } else if (inputFile) {
      throw new UsageError(`Unexpected argument '${arg}'`);
    } else {
      inputFile = arg;
    }
  }

  if (!inputFile) {
    throw new UsageError('No input file specified');
  }
  if (!outputFile) {
    outputFile = inputFile.replace(SOURCE_FILE, '') + '.bin';
  }

  return { command, inputFile, outputFile, listing, origin, cycles };
}

// Origins use assembler number syntax, so `100` is 0x100
function parseOrigin(value: string): number {
  try {
    return parseNumber(value);
  } catch (e: unknown) {
    if (e instanceof AssemblyError) {
      throw new UsageError(`Invalid origin '${value}'`);
    }
    throw e;
  }
}

function parseCycles(value: string): number {
  if (!/^[0-9]+$/.test(value) || Number(value) === 0) {
    throw new UsageError(`Invalid cycle count '${value}'`);
  }
  return Number(value);
}

function printUsage(): void {
  console.log(`COSMAC 1802 assembler, disassembler and emulator

Usage:
  cosmac asm <input.asm> [-o output.bin] [--listing]
  cosmac dis <input.bin> [--origin ADDR]
  cosmac run <input.asm|input.bin> [--cycles N]

Commands:
  asm   Assemble source to a raw binary
  dis   Disassemble a raw binary
  run   Load a program at 0, run it and print the CPU state

Options:
  -o, --output <file>  asm: output file (default: <input>.bin)
  --listing            asm: print address, bytes and source of each instruction
  --origin <addr>      dis: address of the first byte (assembler number syntax)
  --cycles <n>         run: cycle budget (default 10000)
  -h, --help           Show this help message`);
}

/**
 * Render a CPU snapshot: flags on one line, then the registers four per row
 */
export function formatState(state: CpuSnapshot): string {
  const hex = (value: number, digits: number) => value.toString(16).toUpperCase().padStart(digits, '0');
  const bit = (flag: boolean) => (flag ? '1' : '0');

  const lines = [
    `D=${hex(state.d, 2)} DF=${bit(state.df)} Q=${bit(state.q)} IE=${bit(state.ie)} ` +
      `P=${hex(state.p, 1)} X=${hex(state.x, 1)} T=${hex(state.t, 2)}`,
  ];
  for (let row = 0; row < 16; row += 4) {
    lines.push(
      state.registers
        .slice(row, row + 4)
        .map((value, i) => `R${hex(row + i, 1)}=${hex(value, 4)}`)
        .join(' ')
    );
  }
  return lines.join('\n');
}

/**
 * Symbol table lines sorted by address, e.g. `  LOOP  0002`
 */
export function formatSymbols(symbols: Map<string, number>): string[] {
  const entries = [...symbols].sort(([nameA, a], [nameB, b]) => a - b || nameA.localeCompare(nameB));
  const width = Math.max(...entries.map(([name]) => name.length));
  return entries.map(
    ([name, address]) => `  ${name.padEnd(width)}  ${address.toString(16).toUpperCase().padStart(4, '0')}`
  );
}

function readInput(path: string): Buffer | undefined {
  try {
    return readFileSync(path);
  } catch (e: unknown) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      console.error(`Error: File not found: ${path}`);
    } else {
      console.error(`Error: Cannot read file: ${path}`);
    }
    return undefined;
  }
}

/**
 * Assemble source text, reporting errors as `FILE: MESSAGE`
 */
function assembleFile(path: string, source: string): AssemblerResult | undefined {
  const result = assemble(source);
  if (result.errors.length > 0) {
    for (const error of result.errors) {
      console.error(`${path}: ${error.message}`);
    }
    return undefined;
  }
  return result;
}

function runAsm(options: CliOptions): number {
  const input = readInput(options.inputFile);
  if (!input) return 1;

  const result = assembleFile(options.inputFile, input.toString('utf-8'));
  if (!result) return 1;

  try {
    writeFileSync(options.outputFile, result.machineCode);
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    console.error(`Error: Cannot write file: ${options.outputFile} (${reason})`);
    return 1;
  }
  console.log(`Assembled ${result.machineCode.length} bytes to ${options.outputFile}`);

  if (options.listing) {
    console.log('');
    for (const line of result.disassembly) {
      console.log(line);
    }
  }

  if (result.symbols.size > 0) {
    console.log('\nSymbols:');
    for (const line of formatSymbols(result.symbols)) {
      console.log(line);
    }
  }

  return 0;
}

function runDis(options: CliOptions): number {
  const bytes = readInput(options.inputFile);
  if (!bytes) return 1;

  let decoded = 0;
  for (const entry of disassemble(bytes, options.origin)) {
    console.log(formatDisassembly(entry));
    decoded += entry.bytes.length;
  }

  if (decoded < bytes.length) {
    console.log(`; ${bytes.length - decoded} trailing byte(s) not decoded`);
  }
  return 0;
}

function runRun(options: CliOptions): number {
  const input = readInput(options.inputFile);
  if (!input) return 1;

  const program = SOURCE_FILE.test(options.inputFile)
    ? assembleFile(options.inputFile, input.toString('utf-8'))?.machineCode
    : input;
  if (!program) return 1;

  const cpu = new Cosmac1802({ runCycleBudget: options.cycles });
  const loaded = cpu.loadAssembled(program);
  if (!loaded.ok) {
    console.error(`Error: ${loaded.error.message}`);
    return 1;
  }

  const result = cpu.run();
  if (!result.ok) {
    console.error(`Error: ${result.error.message}`);
    console.log(formatState(cpu.snapshot()));
    return 1;
  }

  const { executed, halted } = result.value;
  console.log(
    halted
      ? `Halted after ${executed} instructions`
      : `Stopped after ${executed} instructions (cycle budget ${cpu.runCycleBudget})`
  );
  console.log(formatState(cpu.snapshot()));
  return 0;
}

export function main(args: string[] = process.argv): number {
  let options: CliOptions | 'help' | null;
  try {
    options = parseArgs(args);
  } catch (e: unknown) {
    if (!(e instanceof UsageError)) throw e;
    console.error(`Error: ${e.message}`);
    console.error("Run 'cosmac --help' for usage");
    return 1;
  }

  if (options === null || options === 'help') {
    printUsage();
    return options === 'help' ? 0 : 1;
  }

  switch (options.command) {
    case 'asm':
      return runAsm(options);
    case 'dis':
      return runDis(options);
    case 'run':
      return runRun(options);
  }
}

// Run if executed directly
if (process.argv[1] && fileURLToPath(import.meta.url) === resolve(process.argv[1])) {
  process.exit(main());
}
