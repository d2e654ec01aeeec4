import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync, readFileSync, existsSync, mkdirSync, rmSync } from 'fs';
import { main, parseArgs, formatState, formatSymbols } from '../src/cli.js';
import { CpuState } from '../src/emulator/state.js';
import { tmpdir } from 'os';
import { join } from 'path';

describe('CLI', () => {
  const testDir = join(tmpdir(), 'cosmac-cli-test-' + Date.now());
  let consoleLogs: string[] = [];
  let consoleErrors: string[] = [];
  let originalLog: typeof console.log;
  let originalError: typeof console.error;

  const cosmac = (...args: string[]) => main(['node', 'cosmac', ...args]);

  beforeEach(() => {
    mkdirSync(testDir, { recursive: true });
    consoleLogs = [];
    consoleErrors = [];
    originalLog = console.log;
    originalError = console.error;
    console.log = (...args: unknown[]) => consoleLogs.push(args.join(' '));
    console.error = (...args: unknown[]) => consoleErrors.push(args.join(' '));
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('argument parsing', () => {
    it('should show usage and fail with no arguments', () => {
      expect(cosmac()).toBe(1);
      expect(consoleLogs.some((l) => l.includes('Usage'))).toBe(true);
    });

    it('should show usage with --help, before or after a command', () => {
      expect(cosmac('--help')).toBe(0);
      expect(cosmac('asm', '-h')).toBe(0);
      expect(consoleErrors).toHaveLength(0);
    });

    it('should reject an unknown command', () => {
      expect(cosmac('build', 'x.asm')).toBe(1);
      expect(consoleErrors[0]).toBe("Error: Unknown command 'build'");
    });

    it('should reject an option meant for another command', () => {
      expect(cosmac('asm', 'x.asm', '--cycles', '5')).toBe(1);
      expect(consoleErrors[0]).toBe("Error: Option '--cycles' does not apply to 'asm'");
    });

    it('should reject an option with no value', () => {
      expect(cosmac('asm', 'x.asm', '-o')).toBe(1);
      expect(consoleErrors[0]).toBe('Error: -o requires a value');
    });

    it('should reject a bad origin or cycle count', () => {
      expect(cosmac('dis', 'x.bin', '--origin', 'zz')).toBe(1);
      expect(cosmac('run', 'x.bin', '--cycles', '0')).toBe(1);
      expect(consoleErrors).toContain("Error: Invalid origin 'zz'");
      expect(consoleErrors).toContain("Error: Invalid cycle count '0'");
    });

    it('should require an input file', () => {
      expect(cosmac('dis')).toBe(1);
      expect(consoleErrors[0]).toBe('Error: No input file specified');
    });

    it('should read the origin with assembler number rules', () => {
      const options = parseArgs(['node', 'cosmac', 'dis', 'rom.bin', '--origin', '100']);
      expect(options !== null && options !== 'help' && options.origin).toBe(0x100);
    });

    it('should derive the output name from the source name', () => {
      const options = parseArgs(['node', 'cosmac', 'asm', 'prog.s']);
      expect(options !== null && options !== 'help' && options.outputFile).toBe('prog.bin');
    });
  });

  describe('asm', () => {
    it('should write the binary next to the source', () => {
      const inputPath = join(testDir, 'test.asm');
      const outputPath = join(testDir, 'test.bin');
      writeFileSync(inputPath, 'LDI 0x42\nPHI R5\nIDL');

      expect(cosmac('asm', inputPath)).toBe(0);
      expect(Array.from(readFileSync(outputPath))).toEqual([0xf8, 0x42, 0xb5, 0x00]);
      expect(consoleLogs).toEqual([`Assembled 4 bytes to ${outputPath}`]);
    });

    it('should honour -o', () => {
      const inputPath = join(testDir, 'test.asm');
      const outputPath = join(testDir, 'rom.bin');
      writeFileSync(inputPath, 'NOP');

      expect(cosmac('asm', inputPath, '-o', outputPath)).toBe(0);
      expect(existsSync(outputPath)).toBe(true);
    });

    it('should print the listing and the symbol table', () => {
      const inputPath = join(testDir, 'test.asm');
      const outputPath = join(testDir, 'test.bin');
      writeFileSync(inputPath, 'main:\n  NOP\nloop:\n  BR loop');

      expect(cosmac('asm', inputPath, '--listing')).toBe(0);
      expect(consoleLogs).toEqual([
        `Assembled 3 bytes to ${outputPath}`,
        '',
        '0000: C4       | NOP',
        '0001: 30 01    | BR loop',
        '\nSymbols:',
        '  MAIN  0000',
        '  LOOP  0001',
      ]);
    });

    it('should report assembly errors once per line and write nothing', () => {
      const inputPath = join(testDir, 'error.asm');
      writeFileSync(inputPath, 'NOP\nBOGUS\nNOP');

      expect(cosmac('asm', inputPath)).toBe(1);
      expect(consoleErrors).toEqual([`${inputPath}: Parse error on line 2: Invalid instruction: BOGUS`]);
      expect(existsSync(join(testDir, 'error.bin'))).toBe(false);
    });

    it('should report a missing input file', () => {
      const missing = join(testDir, 'nonexistent.asm');
      expect(cosmac('asm', missing)).toBe(1);
      expect(consoleErrors).toEqual([`Error: File not found: ${missing}`]);
    });
  });

  describe('dis', () => {
    it('should disassemble from the given origin and note a truncated tail', () => {
      const inputPath = join(testDir, 'rom.bin');
      writeFileSync(inputPath, new Uint8Array([0xf8, 0x42, 0xb5, 0xc0, 0x12]));

      expect(cosmac('dis', inputPath, '--origin', '0x100')).toBe(0);
      expect(consoleLogs).toEqual([
        '0100: F8 42    | LDI 42',
        '0102: B5       | PHI R5',
        '; 2 trailing byte(s) not decoded',
      ]);
    });

    it('should print nothing for an empty file', () => {
      const inputPath = join(testDir, 'empty.bin');
      writeFileSync(inputPath, new Uint8Array([]));

      expect(cosmac('dis', inputPath)).toBe(0);
      expect(consoleLogs).toEqual([]);
    });
  });

  describe('run', () => {
    it('should assemble a source file, run it and print the state', () => {
      const inputPath = join(testDir, 'prog.asm');
      writeFileSync(inputPath, 'LDI 0x05\nPHI R1\nSEQ\nIDL');

      expect(cosmac('run', inputPath)).toBe(0);
      expect(consoleLogs[0]).toBe('Halted after 4 instructions');
      expect(consoleLogs[1].split('\n').slice(0, 2)).toEqual([
        'D=05 DF=0 Q=1 IE=1 P=0 X=0 T=00',
        'R0=0005 R1=0500 R2=0000 R3=0000',
      ]);
    });

    it('should stop a raw binary at the cycle budget', () => {
      const inputPath = join(testDir, 'loop.bin');
      writeFileSync(inputPath, new Uint8Array([0x30, 0x00]));

      expect(cosmac('run', inputPath, '--cycles', '10')).toBe(0);
      expect(consoleLogs[0]).toBe('Stopped after 10 instructions (cycle budget 10)');
    });

    it('should not run a source file that fails to assemble', () => {
      const inputPath = join(testDir, 'bad.asm');
      writeFileSync(inputPath, 'LDI');

      expect(cosmac('run', inputPath)).toBe(1);
      expect(consoleErrors).toEqual([
        `${inputPath}: Parse error on line 1: Invalid operand: Immediate value required`,
      ]);
      expect(consoleLogs).toEqual([]);
    });
  });
});

describe('formatState', () => {
  it('should show flags, selectors and all sixteen registers', () => {
    const state = new CpuState();
    state.d = 0xab;
    state.df = true;
    state.p = 3;
    state.x = 0xe;
    state.t = 0x3e;
    state.registers[3] = 0x1234;
    state.registers[15] = 0xffff;

    expect(formatState(state.snapshot())).toBe(
      [
        'D=AB DF=1 Q=0 IE=1 P=3 X=E T=3E',
        'R0=0000 R1=0000 R2=0000 R3=1234',
        'R4=0000 R5=0000 R6=0000 R7=0000',
        'R8=0000 R9=0000 RA=0000 RB=0000',
        'RC=0000 RD=0000 RE=0000 RF=FFFF',
      ].join('\n')
    );
  });
});

describe('formatSymbols', () => {
  it('should sort by address and align names', () => {
    const symbols = new Map([
      ['END', 0x20],
      ['START', 0],
      ['A', 0x20],
    ]);
    expect(formatSymbols(symbols)).toEqual(['  START  0000', '  A      0020', '  END    0020']);
  });
});
