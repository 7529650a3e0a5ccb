#!/usr/bin/env node
/**
 * archappl-inspect CLIエントリーポイント
 * 管理APIでPVのアーカイブ状態などを調べる
 */
import chalk from 'chalk';
import { Command, Option } from 'commander';
import { ALL_PVS_LIMIT, ArchiverMgmtClient } from '../src/mgmt-client';
import { ArchiverError, RetrievalError, ManagementError } from '../src/errors';
import { StructuredFormat, projectSubKeys, renderStructured, toPlain } from '../src/formatters/structured';
import { VERSION } from '../src';
import {
  CliIO,
  EXIT_FAILURE,
  EXIT_OK,
  applyLogFile,
  applyVerbosity,
  collect,
  configureProgram,
  emit,
  increaseVerbosity,
  loadCliConfig,
  parsePositiveInt,
  processIO,
  reportPvFailures,
  resolvePvList,
  runProgram,
} from './common';

export type InspectKey = 'status' | 'type' | 'details' | 'stores';

/**
 * archappl-inspect のオプション
 */
export type InspectOptions = {
  pv: string[];
  pvFile?: string;
  list?: string | boolean;
  limit?: number;
  key: InspectKey;
  subKeys?: string[];
  info: boolean;
  showConfig: boolean;
  output?: string;
  outputFormat: StructuredFormat;
  url?: string;
  configFile?: string;
  logFile?: string;
  verbose: number;
};

/**
 * --limit の値（"all" は無制限）
 */
function parseLimit(value: string): number {
  return value.trim().toLowerCase() === 'all' ? ALL_PVS_LIMIT : parsePositiveInt(value);
}

function parseSubKeys(value: string): string[] {
  return value.split(',').map(key => key.trim()).filter(key => key !== '');
}

/**
 * コマンド定義を作成
 */
export function createInspectCommand(): Command {
  const program = new Command();

  program
    .name('archappl-inspect')
    .description('Archiver ApplianceのPVのアーカイブ状態を調べる')
    .version(VERSION)
    .argument('[pvs...]', 'PV名');

  program
    .option('--pv <name>', 'PV名（複数回指定可能）', collect, [])
    .option('--pv-file <path>', 'PV名リストファイル（1行1PV、# はコメント）')
    .option('--list [pattern]', 'アーカイブ中のPV名を一覧表示（グロブパターンで絞り込み可能）')
    .option('--limit <number>', '--list の件数上限（all で無制限）', parseLimit)
    .addOption(
      new Option('--key <key>', 'PVごとに取得する情報').choices(['status', 'type', 'details', 'stores']).default('status')
    )
    .option('--sub-keys <keys>', '出力するキー（カンマ区切り）', parseSubKeys)
    .option('--info', 'アプライアンス情報を表示', false)
    .option('--show-config', '使用中の設定を表示', false)
    .option('-o, --output <path>', '出力ファイル（省略時は標準出力）')
    .addOption(
      new Option('-f, --output-format <format>', '出力形式').choices(['json', 'yaml']).default('json')
    )
    .option('--url <url>', '管理APIのURL（設定ファイルより優先）')
    .option('--config-file <path>', '設定ファイルのパス')
    .option('--log-file <path>', 'ログをファイルにも追記')
    .option('-v, --verbose', '詳細ログを出力（-vv でデバッグ）', increaseVerbosity, 0);

  program.addHelpText('after', `
例:
  # PVのアーカイブ状態
  $ archappl-inspect TST:ai1 TST:ai2

  # 一部のキーのみYAMLで表示
  $ archappl-inspect --pv TST:ai1 --sub-keys status,lastEvent -f yaml

  # "TST" で始まるPV名を100件まで一覧表示
  $ archappl-inspect --list "TST*" --limit 100
`);

  return program;
}

/**
 * PVごとに情報を取得し、失敗したPVは別に集める
 */
async function collectPerPv(
  pvs: string[],
  fetch: (pv: string) => Promise<unknown>
): Promise<{ results: Map<string, unknown>; failures: Map<string, ArchiverError> }> {
  const results = new Map<string, unknown>();
  const failures = new Map<string, ArchiverError>();

  for (const pv of pvs) {
    try {
      results.set(pv, await fetch(pv));
    } catch (error) {
      if (error instanceof RetrievalError || error instanceof ManagementError) {
        failures.set(pv, error);
      } else {
        throw error;
      }
    }
  }

  return { results, failures };
}

/**
 * 調査処理本体
 */
async function executeInspect(program: Command, io: CliIO): Promise<number> {
  const options = program.opts<InspectOptions>();
  applyVerbosity(options.verbose);
  applyLogFile(options.logFile);

  const pvs = await resolvePvList(program.args, options.pv, options.pvFile);
  const listing = options.list !== undefined && options.list !== false;
  const actions = [options.showConfig, options.info, listing, pvs.length > 0].filter(Boolean).length;
  if (actions !== 1) {
    io.stderr(chalk.red('Specify exactly one of: PV names, --list, --info, --show-config.') + '\n');
    return EXIT_FAILURE;
  }

  const config = await loadCliConfig(options.configFile);
  const render = (value: unknown): string => renderStructured(value, options.outputFormat);

  if (options.showConfig) {
    await emit(io, render(config), options.output);
    return EXIT_OK;
  }

  const client = ArchiverMgmtClient.fromConfig(config, { url: options.url });

  if (options.info) {
    await emit(io, render(await client.getApplianceInfo()), options.output);
    return EXIT_OK;
  }

  if (listing) {
    const pattern = typeof options.list === 'string' ? options.list : undefined;
    const names = await client.getAllPvs(pattern, { limit: options.limit });
    await emit(io, names.map(name => `${name}\n`).join(''), options.output);
    return EXIT_OK;
  }

  let results = new Map<string, unknown>();
  let failures = new Map<string, ArchiverError>();
  switch (options.key) {
    case 'status':
      results = await client.getPvStatus(pvs);
      break;
    case 'type':
      ({ results, failures } = await collectPerPv(pvs, pv => client.getPvTypeInfo(pv)));
      break;
    case 'details':
      ({ results, failures } = await collectPerPv(pvs, pv => client.getPvDetails(pv)));
      break;
    case 'stores':
      ({ results, failures } = await collectPerPv(pvs, pv => client.getStoresForPv(pv)));
      break;
  }

  reportPvFailures(io, failures);
  if (results.size > 0) {
    const plain = toPlain(results);
    const output = options.subKeys && typeof plain === 'object' && plain !== null
      ? projectSubKeys(Object.fromEntries(Object.entries(plain)), options.subKeys)
      : plain;
    await emit(io, render(output), options.output);
  }

  return failures.size > 0 || results.size === 0 ? EXIT_FAILURE : EXIT_OK;
}

/**
 * archappl-inspect を実行
 * @param argv コマンドライン引数（プログラム名を除く）
 * @param io 入出力先
 * @returns 終了コード
 */
export async function runInspect(argv: string[], io: CliIO = processIO): Promise<number> {
  const program = configureProgram(createInspectCommand(), io);
  return runProgram(program, argv, io, () => executeInspect(program, io));
}

if (require.main === module) {
  runInspect(process.argv.slice(2)).then(
    code => process.exit(code),
    error => {
      console.error(chalk.red('Unexpected error:'), error);
      process.exit(1);
    }
  );
}
