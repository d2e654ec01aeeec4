/**
 * COSMAC 1802 Opcode Table
 *
 * Maps every byte value to an operation. Register-field operations take
 * the low nibble as N and occupy a whole 16-entry row; the rest are
 * single bytes.
 */

export enum Opcode {
  // Memory reference and register operations
  IDL = 'IDL',
  LDN = 'LDN',
  INC = 'INC',
  DEC = 'DEC',
  LDA = 'LDA',
  STR = 'STR',
  IRX = 'IRX',
  OUT = 'OUT',
  INP = 'INP',

  // Short branches
  BR = 'BR',
  BQ = 'BQ',
  BZ = 'BZ',
  BDF = 'BDF',
  B1 = 'B1',
  B2 = 'B2',
  B3 = 'B3',
  B4 = 'B4',
  SKP = 'SKP',
  BNQ = 'BNQ',
  BNZ = 'BNZ',
  BNF = 'BNF',
  BN1 = 'BN1',
  BN2 = 'BN2',
  BN3 = 'BN3',
  BN4 = 'BN4',

  // Control and X-indexed operations
  RET = 'RET',
  DIS = 'DIS',
  LDXA = 'LDXA',
  STXD = 'STXD',
  ADC = 'ADC',
  SDB = 'SDB',
  SHRC = 'SHRC',
  SMB = 'SMB',
  SAV = 'SAV',
  MARK = 'MARK',
  REQ = 'REQ',
  SEQ = 'SEQ',
  ADCI = 'ADCI',
  SDBI = 'SDBI',
  SHLC = 'SHLC',
  SMBI = 'SMBI',

  // Register byte transfers
  GLO = 'GLO',
  GHI = 'GHI',
  PLO = 'PLO',
  PHI = 'PHI',

  // Long branches and skips
  LBR = 'LBR',
  LBQ = 'LBQ',
  LBZ = 'LBZ',
  LBDF = 'LBDF',
  NOP = 'NOP',
  LSNQ = 'LSNQ',
  LSNZ = 'LSNZ',
  LSNF = 'LSNF',
  LSKP = 'LSKP',
  LBNQ = 'LBNQ',
  LBNZ = 'LBNZ',
  LBNF = 'LBNF',
  LSIE = 'LSIE',
  LSQ = 'LSQ',
  LSZ = 'LSZ',
  LSDF = 'LSDF',

  // P and X selection
  SEP = 'SEP',
  SEX = 'SEX',

  // ALU
  LDX = 'LDX',
  OR = 'OR',
  AND = 'AND',
  XOR = 'XOR',
  ADD = 'ADD',
  SD = 'SD',
  SHR = 'SHR',
  SM = 'SM',
  LDI = 'LDI',
  ORI = 'ORI',
  ANI = 'ANI',
  XRI = 'XRI',
  ADI = 'ADI',
  SDI = 'SDI',
  SHL = 'SHL',
  SMI = 'SMI',
}

export type InstructionLength = 1 | 2 | 3;

/**
 * What the assembler expects after the mnemonic.
 *
 * `register` and `port` are folded into the opcode byte; the others
 * become trailing operand bytes.
 */
export type OperandKind = 'none' | 'register' | 'port' | 'immediate' | 'short' | 'long';

export interface OpcodeInfo {
  readonly mnemonic: string;
  /** First byte of the encoding; register and port operations OR their field into it */
  readonly base: number;
  readonly length: InstructionLength;
  readonly operand: OperandKind;
  /** Undocumented bytes that also decode to this operation */
  readonly aliases?: readonly number[];
}

function op(
  mnemonic: string,
  base: number,
  length: InstructionLength,
  operand: OperandKind,
  aliases?: readonly number[]
): OpcodeInfo {
  return { mnemonic, base, length, operand, aliases };
}

/**
 * Per-operation encoding. SHLC (0x7E) is a 1-byte operation here, as on
 * the chip; older tables list it as 2 bytes with an immediate. Since the
 * assembler ignores tokens after what an operation takes, `SHLC 5`
 * assembles to the single byte 0x7E.
 */
export const OPCODE_INFO: Readonly<Record<Opcode, OpcodeInfo>> = {
  [Opcode.IDL]: op('IDL', 0x00, 1, 'none'),
  [Opcode.LDN]: op('LDN', 0x00, 1, 'register'),
  [Opcode.INC]: op('INC', 0x10, 1, 'register'),
  [Opcode.DEC]: op('DEC', 0x20, 1, 'register'),
  [Opcode.LDA]: op('LDA', 0x40, 1, 'register'),
  [Opcode.STR]: op('STR', 0x50, 1, 'register'),
  // 0x68 is unassigned on the 1802 and behaves as IRX
  [Opcode.IRX]: op('IRX', 0x60, 1, 'none', [0x68]),
  [Opcode.OUT]: op('OUT', 0x60, 1, 'port'),
  [Opcode.INP]: op('INP', 0x68, 1, 'port'),

  [Opcode.BR]: op('BR', 0x30, 2, 'short'),
  [Opcode.BQ]: op('BQ', 0x31, 2, 'short'),
  [Opcode.BZ]: op('BZ', 0x32, 2, 'short'),
  [Opcode.BDF]: op('BDF', 0x33, 2, 'short'),
  [Opcode.B1]: op('B1', 0x34, 2, 'short'),
  [Opcode.B2]: op('B2', 0x35, 2, 'short'),
  [Opcode.B3]: op('B3', 0x36, 2, 'short'),
  [Opcode.B4]: op('B4', 0x37, 2, 'short'),
  [Opcode.SKP]: op('SKP', 0x38, 2, 'short'),
  [Opcode.BNQ]: op('BNQ', 0x39, 2, 'short'),
  [Opcode.BNZ]: op('BNZ', 0x3a, 2, 'short'),
  [Opcode.BNF]: op('BNF', 0x3b, 2, 'short'),
  [Opcode.BN1]: op('BN1', 0x3c, 2, 'short'),
  [Opcode.BN2]: op('BN2', 0x3d, 2, 'short'),
  [Opcode.BN3]: op('BN3', 0x3e, 2, 'short'),
  [Opcode.BN4]: op('BN4', 0x3f, 2, 'short'),

  [Opcode.RET]: op('RET', 0x70, 1, 'none'),
  [Opcode.DIS]: op('DIS', 0x71, 1, 'none'),
  [Opcode.LDXA]: op('LDXA', 0x72, 1, 'none'),
  [Opcode.STXD]: op('STXD', 0x73, 1, 'none'),
  [Opcode.ADC]: op('ADC', 0x74, 1, 'none'),
  [Opcode.SDB]: op('SDB', 0x75, 1, 'none'),
  [Opcode.SHRC]: op('SHRC', 0x76, 1, 'none'),
  [Opcode.SMB]: op('SMB', 0x77, 1, 'none'),
  [Opcode.SAV]: op('SAV', 0x78, 1, 'none'),
  [Opcode.MARK]: op('MARK', 0x79, 1, 'none'),
  [Opcode.REQ]: op('REQ', 0x7a, 1, 'none'),
  [Opcode.SEQ]: op('SEQ', 0x7b, 1, 'none'),
  [Opcode.ADCI]: op('ADCI', 0x7c, 2, 'immediate'),
  [Opcode.SDBI]: op('SDBI', 0x7d, 2, 'immediate'),
  [Opcode.SHLC]: op('SHLC', 0x7e, 1, 'none'),
  [Opcode.SMBI]: op('SMBI', 0x7f, 2, 'immediate'),

  [Opcode.GLO]: op('GLO', 0x80, 1, 'register'),
  [Opcode.GHI]: op('GHI', 0x90, 1, 'register'),
  [Opcode.PLO]: op('PLO', 0xa0, 1, 'register'),
  [Opcode.PHI]: op('PHI', 0xb0, 1, 'register'),

  [Opcode.LBR]: op('LBR', 0xc0, 3, 'long'),
  [Opcode.LBQ]: op('LBQ', 0xc1, 3, 'long'),
  [Opcode.LBZ]: op('LBZ', 0xc2, 3, 'long'),
  [Opcode.LBDF]: op('LBDF', 0xc3, 3, 'long'),
  [Opcode.NOP]: op('NOP', 0xc4, 1, 'none'),
  [Opcode.LSNQ]: op('LSNQ', 0xc5, 3, 'long'),
  [Opcode.LSNZ]: op('LSNZ', 0xc6, 3, 'long'),
  [Opcode.LSNF]: op('LSNF', 0xc7, 3, 'long'),
  [Opcode.LSKP]: op('LSKP', 0xc8, 3, 'long'),
  [Opcode.LBNQ]: op('LBNQ', 0xc9, 3, 'long'),
  [Opcode.LBNZ]: op('LBNZ', 0xca, 3, 'long'),
  [Opcode.LBNF]: op('LBNF', 0xcb, 3, 'long'),
  [Opcode.LSIE]: op('LSIE', 0xcc, 3, 'long'),
  [Opcode.LSQ]: op('LSQ', 0xcd, 3, 'long'),
  [Opcode.LSZ]: op('LSZ', 0xce, 3, 'long'),
  [Opcode.LSDF]: op('LSDF', 0xcf, 3, 'long'),

  [Opcode.SEP]: op('SEP', 0xd0, 1, 'register'),
  [Opcode.SEX]: op('SEX', 0xe0, 1, 'register'),

  [Opcode.LDX]: op('LDX', 0xf0, 1, 'none'),
  [Opcode.OR]: op('OR', 0xf1, 1, 'none'),
  [Opcode.AND]: op('AND', 0xf2, 1, 'none'),
  [Opcode.XOR]: op('XOR', 0xf3, 1, 'none'),
  [Opcode.ADD]: op('ADD', 0xf4, 1, 'none'),
  [Opcode.SD]: op('SD', 0xf5, 1, 'none'),
  [Opcode.SHR]: op('SHR', 0xf6, 1, 'none'),
  [Opcode.SM]: op('SM', 0xf7, 1, 'none'),
  [Opcode.LDI]: op('LDI', 0xf8, 2, 'immediate'),
  [Opcode.ORI]: op('ORI', 0xf9, 2, 'immediate'),
  [Opcode.ANI]: op('ANI', 0xfa, 2, 'immediate'),
  [Opcode.XRI]: op('XRI', 0xfb, 2, 'immediate'),
  [Opcode.ADI]: op('ADI', 0xfc, 2, 'immediate'),
  [Opcode.SDI]: op('SDI', 0xfd, 2, 'immediate'),
  [Opcode.SHL]: op('SHL', 0xfe, 1, 'none'),
  [Opcode.SMI]: op('SMI', 0xff, 2, 'immediate'),
};

export const ALL_OPCODES: readonly Opcode[] = Object.values(Opcode);

// Byte -> operation. Rows are filled first so that singletons sharing a
// row (IDL over LDN R0, IRX over OUT/INP 0) take precedence.
const DECODE_TABLE: readonly Opcode[] = (() => {
  const table = new Array<Opcode | undefined>(256).fill(undefined);

  for (const opcode of ALL_OPCODES) {
    const info = OPCODE_INFO[opcode];
    if (info.operand === 'register') {
      for (let n = 0; n < 16; n++) table[info.base | n] = opcode;
    } else if (info.operand === 'port') {
      for (let port = 1; port < 8; port++) table[info.base | port] = opcode;
    }
  }

  for (const opcode of ALL_OPCODES) {
    const info = OPCODE_INFO[opcode];
    if (info.operand === 'register' || info.operand === 'port') continue;
    table[info.base] = opcode;
    for (const alias of info.aliases ?? []) table[alias] = opcode;
  }

  return table.map((opcode, byte) => {
    if (opcode === undefined) {
      throw new Error(`Opcode table has no entry for 0x${byte.toString(16).padStart(2, '0')}`);
    }
    return opcode;
  });
})();

const MNEMONIC_TABLE: ReadonlyMap<string, Opcode> = new Map(
  ALL_OPCODES.map((opcode) => [OPCODE_INFO[opcode].mnemonic, opcode] as const)
);

/**
 * Decode an opcode byte. Every value 0-255 maps to an operation;
 * `undefined` is returned only for values that are not a byte.
 */
export function decodeOpcode(byte: number): Opcode | undefined {
  if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
    return undefined;
  }
  return DECODE_TABLE[byte];
}

export function instructionLength(opcode: Opcode): InstructionLength {
  return OPCODE_INFO[opcode].length;
}

export function mnemonic(opcode: Opcode): string {
  return OPCODE_INFO[opcode].mnemonic;
}

/**
 * Look up an operation by its mnemonic (case-insensitive)
 */
export function opcodeForMnemonic(name: string): Opcode | undefined {
  return MNEMONIC_TABLE.get(name.toUpperCase());
}

/**
 * Whether the low nibble of the opcode byte is a meaningful operand
 */
export function usesRegisterField(opcode: Opcode): boolean {
  const { operand } = OPCODE_INFO[opcode];
  return operand === 'register' || operand === 'port';
}

/**
 * Build the first byte of an instruction. Register operations take N
 * from the low nibble, OUT/INP take the port from the low three bits.
 */
export function encodeOpcode(opcode: Opcode, register: number = 0): number {
  const info = OPCODE_INFO[opcode];
  switch (info.operand) {
    case 'register':
      return info.base | (register & 0x0f);
    case 'port':
      return info.base | (register & 0x07);
    default:
      return info.base;
  }
}
