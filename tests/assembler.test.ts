import { describe, it, expect } from 'vitest';
import { Assembler, assemble, stripComment } from '../src/assembler/assembler.js';
import { Cosmac1802 } from '../src/emulator/cpu.js';

describe('Assembler', () => {
  describe('basic assembly', () => {
    it('should assemble empty source', () => {
      const result = new Assembler('').assemble();
      expect(result.machineCode).toHaveLength(0);
      expect(result.disassembly).toHaveLength(0);
      expect(result.errors).toHaveLength(0);
    });

    it('should assemble an immediate, a register op and IDL', () => {
      const result = assemble('LDI 0x42\nPHI R5\nIDL');
      expect(result.errors).toHaveLength(0);
      expect(result.machineCode).toEqual(new Uint8Array([0xf8, 0x42, 0xb5, 0x00]));
    });

    it('should be case-insensitive for mnemonics and registers', () => {
      const result = assemble('ldi 1\nglo ra\nsex r2');
      expect(result.machineCode).toEqual(new Uint8Array([0xf8, 0x01, 0x8a, 0xe2]));
    });

    it('should encode every operand form', () => {
      const result = assemble(`
        IRX
        OUT 1
        INP 7
        LDN R1
        ADCI 0x10
        SHLC
        SKP 0
        LSKP 0
        NOP
      `);
      expect(result.errors).toHaveLength(0);
      expect(Array.from(result.machineCode)).toEqual([
        0x60, 0x61, 0x6f, 0x01, 0x7c, 0x10, 0x7e, 0x38, 0x00, 0xc8, 0x00, 0x00, 0xc4,
      ]);
    });

    it('should encode LDN R0 as 0x00', () => {
      const result = assemble('LDN R0');
      expect(result.errors).toHaveLength(0);
      expect(result.machineCode).toEqual(new Uint8Array([0x00]));
      expect(result.disassembly).toEqual(['0000: 00       | LDN R0']);
    });

    it('should accept ports written like registers', () => {
      const result = assemble('OUT R4\nINP R2\nOUT 4\nINP 7');
      expect(result.errors).toHaveLength(0);
      expect(Array.from(result.machineCode)).toEqual([0x64, 0x6a, 0x64, 0x6f]);
    });

    it('should keep the low byte of an immediate', () => {
      const result = assemble('LDI 0x1234');
      expect(result.machineCode).toEqual(new Uint8Array([0xf8, 0x34]));
    });

    it('should assemble SHLC as one byte even with an operand', () => {
      const result = assemble('SHLC 5\nIDL');
      expect(result.errors).toHaveLength(0);
      expect(result.machineCode).toEqual(new Uint8Array([0x7e, 0x00]));
    });

    it('should ignore tokens after the operand', () => {
      const result = assemble('LDI 5 extra');
      expect(result.machineCode).toEqual(new Uint8Array([0xf8, 0x05]));
    });
  });

  describe('comments and blank lines', () => {
    it('should strip ; and # comments', () => {
      const result = assemble(`
        ; whole-line comment
        LDI 1   ; load one
        # another style
        IDL     # stop
      `);
      expect(result.machineCode).toEqual(new Uint8Array([0xf8, 0x01, 0x00]));
    });

    it('should cut at whichever comment marker comes first', () => {
      expect(stripComment('NOP # a ; b')).toBe('NOP ');
      expect(stripComment('NOP ; a # b')).toBe('NOP ');
      expect(stripComment('NOP')).toBe('NOP');
    });
  });

  describe('label resolution', () => {
    it('should resolve a backward label', () => {
      const result = assemble('START: LDI 0x10\nPHI R3\nBR START');
      expect(result.errors).toHaveLength(0);
      expect(result.machineCode).toEqual(new Uint8Array([0xf8, 0x10, 0xb3, 0x30, 0x00]));
      expect(result.symbols.get('START')).toBe(0);
    });

    it('should resolve a forward label', () => {
      const result = assemble(`
        LBR main
        NOP
      main:
        IDL
      `);
      expect(result.errors).toHaveLength(0);
      expect(result.machineCode).toEqual(new Uint8Array([0xc0, 0x00, 0x04, 0xc4, 0x00]));
      expect(result.symbols.get('MAIN')).toBe(4);
    });

    it('should record a label on a line of its own at the next address', () => {
      const result = assemble('LDI 1\nhere:\nNOP');
      expect(result.symbols.get('HERE')).toBe(2);
    });

    it('should let a later label definition win', () => {
      const result = assemble(`
      dup: NOP
      dup: NOP
        BR dup
      `);
      expect(result.errors).toHaveLength(0);
      expect(result.symbols.get('DUP')).toBe(1);
      expect(result.machineCode[3]).toBe(0x01);
    });

    it('should prefer a label over a number with the same text', () => {
      const result = assemble('NOP\nNOP\nA: NOP\nBR A');
      expect(result.machineCode[4]).toBe(0x02);
    });

    it('should use numeric branch targets', () => {
      const result = assemble('BR 0x80\nLBNZ $1234');
      expect(Array.from(result.machineCode)).toEqual([0x30, 0x80, 0xca, 0x12, 0x34]);
    });

    it('should keep only the low byte for a short branch to a far label', () => {
      const lines = ['LBR far'];
      for (let i = 0; i < 0x100; i++) lines.push('NOP');
      lines.push('far: BR far');
      const result = assemble(lines.join('\n'));
      expect(result.symbols.get('FAR')).toBe(0x103);
      expect(Array.from(result.machineCode.slice(0, 3))).toEqual([0xc0, 0x01, 0x03]);
      expect(Array.from(result.machineCode.slice(0x103))).toEqual([0x30, 0x03]);
    });
  });

  describe('disassembly', () => {
    it('should produce one listing line per instruction', () => {
      const result = assemble('START: LDI 0x10 ; setup\nPHI R3\nBR START');
      expect(result.disassembly).toEqual([
        '0000: F8 10    | LDI 0x10',
        '0002: B3       | PHI R3',
        '0003: 30 00    | BR START',
      ]);
    });

    it('should show a long branch with all three bytes', () => {
      const result = assemble('LBR 0x1234');
      expect(result.disassembly).toEqual(['0000: C0 12 34 | LBR 0x1234']);
    });
  });

  describe('errors', () => {
    it('should report an unknown mnemonic with its line', () => {
      const result = assemble('NOP\nFOO R1\nNOP');
      expect(result.errors).toEqual([
        { kind: 'invalid-instruction', message: 'Parse error on line 2: Invalid instruction: FOO', line: 2 },
      ]);
      expect(result.machineCode).toHaveLength(0);
      expect(result.disassembly).toHaveLength(0);
    });

    it('should count blank and comment lines in line numbers', () => {
      const result = assemble('\n; comment\n\nLDI 0xZZ');
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].line).toBe(4);
      expect(result.errors[0].message).toBe('Parse error on line 4: Invalid operand: Invalid hex number: 0xZZ');
    });

    it('should report a bad register', () => {
      const result = assemble('GLO R16');
      expect(result.errors[0].kind).toBe('invalid-register');
      expect(result.errors[0].message).toBe(
        'Parse error on line 1: Invalid register: Register must be R0-RF or 0-F, got: R16'
      );
    });


    it('should report a missing operand', () => {
      expect(assemble('LDI').errors[0].message).toBe('Parse error on line 1: Invalid operand: Immediate value required');
      expect(assemble('INC').errors[0].message).toBe('Parse error on line 1: Invalid operand: Register operand required');
      expect(assemble('BR').errors[0].message).toBe('Parse error on line 1: Invalid operand: Branch target required');
      expect(assemble('OUT').errors[0].message).toBe('Parse error on line 1: Invalid operand: Port number required');
    });

    it('should reject an undefined label as a number', () => {
      const result = assemble('BR nowhere');
      expect(result.errors[0].message).toBe('Parse error on line 1: Invalid operand: Invalid number: nowhere');
    });

    it('should reject ports outside 1-7', () => {
      expect(assemble('OUT 0').errors[0].message).toBe('Parse error on line 1: Invalid operand: Port must be 1-7, got: 0');
      expect(assemble('INP R8').errors[0].message).toBe('Parse error on line 1: Invalid operand: Port must be 1-7, got: R8');
      expect(assemble('OUT 0x4').errors[0].kind).toBe('invalid-register');
    });

    it('should stop at the first error', () => {
      const result = assemble('LDI zz\nGLO R99');
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].line).toBe(1);
    });
  });

  describe('integration with the emulator', () => {
    it('should assemble a countdown loop that runs to completion', () => {
      const result = assemble(`
        LDI 0x03      ; counter
      loop:
        SMI 0x01
        BNZ loop
        SEQ
        IDL
      `);
      expect(result.errors).toHaveLength(0);

      const cpu = new Cosmac1802();
      cpu.loadAssembled(result.machineCode);
      const run = cpu.run();
      expect(run.ok).toBe(true);
      expect(cpu.halted).toBe(true);
      expect(cpu.state.q).toBe(true);
      expect(cpu.state.d).toBe(0);
    });

    it('should store through a pointer built with PHI/PLO', () => {
      const result = assemble(`
        LDI 0x12
        PHI R7
        LDI 0x34
        PLO R7
        LDI 0xAB
        STR R7
        IDL
      `);
      const cpu = new Cosmac1802();
      cpu.loadAssembled(result.machineCode);
      cpu.run();
      expect(cpu.readByte(0x1234)).toBe(0xab);
    });
  });
});
