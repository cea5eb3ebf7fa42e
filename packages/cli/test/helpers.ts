import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { CliIO } from '../src/program.js';

export interface CapturedIO {
  io: CliIO;
  stdout(): string;
  stderr(): string;
}

export function captureIO(options: { isTTY?: boolean } = {}): CapturedIO {
  let out = '';
  let err = '';
  return {
    io: {
      stdout: {
        write: (chunk: string) => {
          out += chunk;
          return true;
        },
      },
      stderr: {
        write: (chunk: string) => {
          err += chunk;
          return true;
        },
        isTTY: options.isTTY ?? false,
      },
    },
    stdout: () => out,
    stderr: () => err,
  };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'exprcc-'));
}
