/**
 * COSMAC 1802 Emulator
 */

export * from './opcodes.js';
export * from './errors.js';
export * from './instruction.js';
export * from './state.js';
export * from './executor.js';
export * from './cpu.js';
