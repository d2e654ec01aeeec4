/**
 * Assembler errors
 */

export type AssemblyErrorKind = 'invalid-instruction' | 'invalid-register' | 'invalid-operand';

const KIND_TEXT: Record<AssemblyErrorKind, string> = {
  'invalid-instruction': 'Invalid instruction',
  'invalid-register': 'Invalid register',
  'invalid-operand': 'Invalid operand',
};

/**
 * Thrown by the operand parsers; the assembler catches it at the line
 * boundary and attaches the line number.
 */
export class AssemblyError extends Error {
  constructor(
    public readonly kind: AssemblyErrorKind,
    public readonly detail: string
  ) {
    super(`${KIND_TEXT[kind]}: ${detail}`);
    this.name = 'AssemblyError';
  }

  static invalidInstruction(detail: string): AssemblyError {
    return new AssemblyError('invalid-instruction', detail);
  }

  static invalidRegister(detail: string): AssemblyError {
    return new AssemblyError('invalid-register', detail);
  }

  static invalidOperand(detail: string): AssemblyError {
    return new AssemblyError('invalid-operand', detail);
  }
}

export interface AssemblerError {
  kind: AssemblyErrorKind;
  /** Rendered text, e.g. `Parse error on line 3: Invalid register: R16` */
  message: string;
  /** 1-based source line */
  line: number;
}

export function toAssemblerError(error: AssemblyError, line: number): AssemblerError {
  return {
    kind: error.kind,
    message: `Parse error on line ${line}: ${error.message}`,
    line,
  };
}
