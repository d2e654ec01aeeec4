// cosmac-1802 - RCA 1802 (COSMAC) emulator and assembler

// CPU Emulator
export * from './emulator/index.js';

// Assembler
export * from './assembler/index.js';

// Command-line tool
export { main as runCli, parseArgs, formatState, formatSymbols, type CliOptions } from './cli.js';
