/**
 * Operand parsing for the assembler. Each parser throws AssemblyError on
 * malformed input.
 */

import { AssemblyError } from './errors.js';

const HEX_DIGITS = /^[0-9a-f]+$/i;
const DECIMAL = /^\+?[0-9]+$/;

/**
 * Parse a register operand: `R` followed by one hex digit, or a bare hex
 * digit (`R5`, `rA`, `F`).
 */
export function parseRegister(text: string): number {
  const upper = text.trim().toUpperCase();
  const digit = upper.startsWith('R') ? upper.slice(1) : upper;

  if (digit.length === 1 && HEX_DIGITS.test(digit)) {
    return parseInt(digit, 16);
  }

  throw AssemblyError.invalidRegister(`Register must be R0-RF or 0-F, got: ${upper}`);
}

/**
 * Parse a 16-bit number.
 *
 * `0x1F` and `$1F` are hex. Text made only of hex digits is read as hex,
 * falling back to decimal when the hex value does not fit (`10` is 16,
 * `65535` is 65535). Anything else must be decimal. Commas are ignored.
 */
export function parseNumber(text: string): number {
  const s = text.trim().replace(/,/g, '');

  if (s.startsWith('0x') || s.startsWith('0X')) {
    return parseHex(s.slice(2), s);
  }
  if (s.startsWith('$')) {
    return parseHex(s.slice(1), s);
  }
  if (HEX_DIGITS.test(s)) {
    const value = parseInt(s, 16);
    if (value <= 0xffff) {
      return value;
    }
    return parseDecimal(s);
  }
  return parseDecimal(s);
}

/**
 * Parse an I/O port for OUT / INP. Written like a register (`R4` or `4`)
 * but limited to 1-7.
 */
export function parsePort(text: string): number {
  const port = parseRegister(text);
  if (port < 1 || port > 7) {
    throw AssemblyError.invalidOperand(`Port must be 1-7, got: ${text.trim()}`);
  }
  return port;
}

function parseHex(digits: string, original: string): number {
  if (!HEX_DIGITS.test(digits)) {
    throw AssemblyError.invalidOperand(`Invalid hex number: ${original}`);
  }
  const value = parseInt(digits, 16);
  if (value > 0xffff) {
    throw AssemblyError.invalidOperand(`Invalid hex number: ${original}`);
  }
  return value;
}

function parseDecimal(s: string): number {
  if (!DECIMAL.test(s)) {
    throw AssemblyError.invalidOperand(`Invalid number: ${s}`);
  }
  const value = parseInt(s, 10);
  if (value > 0xffff) {
    throw AssemblyError.invalidOperand(`Invalid number: ${s}`);
  }
  return value;
}
