/**
 * CLI共通処理
 */
import chalk from 'chalk';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { loadConfig, readConfig } from '../src/config';
import { ArchiverError, ConfigurationError, RetrievalError, ManagementError, errorMessage } from '../src/errors';
import { readPvFile, writeTextFile } from '../src/io/file';
import { ArchiverConfig } from '../src/types/config';
import { LogLevel, getLogger, setLogFile, setLogLevel } from '../src/utils/logger';
import { standardizeDatetime } from '../src/utils/time-utils';

const logger = getLogger('archappl.cli');

/**
 * CLIの入出力先
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processIO: CliIO = {
  stdout: text => {
    process.stdout.write(text);
  },
  stderr: text => {
    process.stderr.write(text);
  },
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG_ERROR = 2;

/**
 * 繰り返し指定できるオプションの値を配列に集める
 */
export function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

/**
 * -v の指定回数を数える
 */
export function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

/**
 * 時刻オプションの検証・正規化
 */
export function parseTimeOption(value: string): string {
  try {
    return standardizeDatetime(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
}

/**
 * 正の数値オプションの検証
 */
export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

/**
 * 正の整数オプションの検証
 */
export function parsePositiveInt(value: string): number {
  const parsed = parsePositiveNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * -v の回数からログレベルを設定（0: 変更なし, 1: info, 2以上: debug）
 */
export function applyVerbosity(verbose: number): void {
  const levels: LogLevel[] = ['info', 'debug'];
  if (verbose > 0) {
    setLogLevel(levels[Math.min(verbose, levels.length) - 1]);
  }
}

/**
 * --log-file 指定時はログをファイルにも追記する
 */
export function applyLogFile(logFile?: string): void {
  if (logFile) {
    setLogFile(logFile);
    logger.info(`Write log messages to ${logFile}`);
  }
}

/**
 * 位置引数・--pv・--pv-file からPVリストを組み立てる（出現順、重複除去）
 */
export async function resolvePvList(args: string[], pvOptions: string[], pvFile?: string): Promise<string[]> {
  const pvs = [...args, ...pvOptions];
  if (pvFile) {
    pvs.push(...await readPvFile(pvFile));
  }
  return Array.from(new Set(pvs.map(pv => pv.trim()).filter(pv => pv !== '')));
}

/**
 * 設定を読み込む（--config-file 指定時はそのファイルのみ）
 */
export async function loadCliConfig(configFile?: string): Promise<Readonly<ArchiverConfig>> {
  return configFile ? readConfig(configFile) : loadConfig();
}

/**
 * 結果を標準出力またはファイルに出す
 */
export async function emit(io: CliIO, content: string, outputPath?: string): Promise<void> {
  if (outputPath) {
    await writeTextFile(outputPath, content);
    io.stderr(chalk.green(`Output written to ${outputPath}\n`));
  } else {
    io.stdout(content);
  }
}

/**
 * 例外に対応する終了コード
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigurationError ? EXIT_CONFIG_ERROR : EXIT_FAILURE;
}

/**
 * 例外を人が読める形で標準エラーに出す
 */
export function reportError(io: CliIO, error: unknown): void {
  let label = 'Error';
  if (error instanceof ConfigurationError) {
    label = 'Configuration error';
  } else if (error instanceof RetrievalError) {
    label = 'Retrieval error';
  } else if (error instanceof ManagementError) {
    label = 'Management error';
  }

  const pv = error instanceof RetrievalError || error instanceof ManagementError ? error.pv : undefined;
  const message = errorMessage(error);
  const prefix = pv && !message.includes(pv) ? `${pv}: ` : '';
  io.stderr(chalk.red(`${label}: ${prefix}${message}`) + '\n');

  if (!(error instanceof ArchiverError) && error instanceof Error && error.stack) {
    io.stderr(chalk.gray(error.stack) + '\n');
  }
}

/**
 * PVごとの失敗を標準エラーに出す
 */
export function reportPvFailures(io: CliIO, failures: Map<string, ArchiverError>): void {
  for (const [pv, error] of failures) {
    const message = error.message.includes(pv) ? error.message : `${pv}: ${error.message}`;
    io.stderr(chalk.red(message) + '\n');
  }
}

/**
 * commanderの出力先と終了処理を差し替える
 */
export function configureProgram(program: Command, io: CliIO): Command {
  return program
    .exitOverride()
    .configureOutput({
      writeOut: text => io.stdout(text),
      writeErr: text => io.stderr(text),
      outputError: (text, write) => write(chalk.red(text)),
    });
}

/**
 * コマンドを実行し、終了コードを返す
 * ライブラリ・コマンドからの例外はすべてここで終了コードに変換する
 */
export async function runProgram(
  program: Command,
  argv: string[],
  io: CliIO,
  action: () => Promise<number>
): Promise<number> {
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help / --version は正常終了
      return error.exitCode === 0 ? EXIT_OK : EXIT_FAILURE;
    }
    reportError(io, error);
    return exitCodeFor(error);
  }

  try {
    return await action();
  } catch (error) {
    reportError(io, error);
    return exitCodeFor(error);
  }
}
