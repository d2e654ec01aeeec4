/**
 * COSMAC 1802 Assembler
 *
 * Assembles 1802 assembly source code into machine code.
 */

export * from './errors.js';
export * from './operands.js';
export * from './assembler.js';
