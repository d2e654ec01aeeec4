/**
 * Emulator error reporting.
 *
 * Nothing in the emulator throws to its caller: failures come back as
 * the `error` arm of a CpuResult.
 */

export type CpuErrorKind =
  | 'invalid-register'
  | 'memory-out-of-bounds'
  | 'invalid-instruction'
  | 'halted';

function hex4(value: number): string {
  return '0x' + value.toString(16).padStart(4, '0');
}

export class CpuError extends Error {
  constructor(
    public readonly kind: CpuErrorKind,
    message: string,
    /** Register index, address or end address the error refers to */
    public readonly value?: number
  ) {
    super(message);
    this.name = 'CpuError';
  }

  static invalidRegister(index: number): CpuError {
    return new CpuError('invalid-register', `Invalid register: ${index}`, index);
  }

  static memoryOutOfBounds(address: number): CpuError {
    return new CpuError('memory-out-of-bounds', `Memory address out of bounds: ${hex4(address)}`, address);
  }

  static invalidInstruction(address: number): CpuError {
    return new CpuError('invalid-instruction', `Invalid instruction at address ${hex4(address)}`, address);
  }

  static halted(): CpuError {
    return new CpuError('halted', 'CPU is halted');
  }
}

export type CpuResult<T = void> = { ok: true; value: T } | { ok: false; error: CpuError };

export const OK: CpuResult = { ok: true, value: undefined };

export function ok<T>(value: T): CpuResult<T> {
  return { ok: true, value };
}

export function fail<T = void>(error: CpuError): CpuResult<T> {
  return { ok: false, error };
}
