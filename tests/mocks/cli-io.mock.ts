/**
 * CLIの入出力を記録するモック
 */
import { CliIO } from '../../cli/common';

export interface RecordingIO {
  io: CliIO;
  stdout(): string;
  stderr(): string;
}

export function createRecordingIO(): RecordingIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: {
      stdout: text => {
        out.push(text);
      },
      stderr: text => {
        err.push(text);
      },
    },
    stdout: () => out.join(''),
    stderr: () => err.join(''),
  };
}
