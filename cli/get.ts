#!/usr/bin/env node
/**
 * archappl-get CLIエントリーポイント
 * PVの時系列データを取得し、時刻で結合してCSV/JSONに出力する
 */
import chalk from 'chalk';
import { Command, Option } from 'commander';
import { ArchiverDataClient } from '../src/data-client';
import { buildDataset } from '../src/dataset';
import { CsvFormatter } from '../src/formatters/csv';
import { datasetToRecords, renderStructured } from '../src/formatters/structured';
import { DataFormat, OutputFormat } from '../src/types/config';
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
  parsePositiveNumber,
  parseTimeOption,
  processIO,
  reportPvFailures,
  resolvePvList,
  runProgram,
} from './common';

/**
 * archappl-get のオプション
 */
export type GetOptions = {
  pv: string[];
  pvFile?: string;
  from?: string;
  to?: string;
  url?: string;
  useJson?: boolean;
  useCsv?: boolean;
  resample?: number;
  output?: string;
  outputFormat?: OutputFormat;
  localTime: boolean;
  configFile?: string;
  logFile?: string;
  verbose: number;
};

/**
 * コマンド定義を作成
 */
export function createGetCommand(): Command {
  const program = new Command();

  program
    .name('archappl-get')
    .description('Archiver ApplianceからPVの時系列データを取得する')
    .version(VERSION)
    .argument('[pvs...]', 'PV名');

  program
    .option('--pv <name>', 'PV名（複数回指定可能）', collect, [])
    .option('--pv-file <path>', 'PV名リストファイル（1行1PV、# はコメント）')
    .option('--from <time>', '開始時刻（ISO 8601、YYYYMMDDHHmm、または "1 hour ago" 形式）', parseTimeOption)
    .option('--to <time>', '終了時刻（省略時は現在時刻）', parseTimeOption)
    .option('--url <url>', 'データ取得APIのURL（設定ファイルより優先）')
    .addOption(new Option('--use-json', 'サーバーからJSON形式で取得').conflicts('useCsv'))
    .option('--use-csv', 'サーバーからCSV形式で取得')
    .option('--resample <seconds>', '指定間隔（秒）で再サンプリング', parsePositiveNumber)
    .option('-o, --output <path>', '出力ファイル（省略時は標準出力）')
    .addOption(
      new Option('-f, --output-format <format>', '出力形式（省略時は設定ファイルの値）').choices(['csv', 'json'])
    )
    .option('--local-time', 'CSVのタイムスタンプをローカル時刻で出力', false)
    .option('--config-file <path>', '設定ファイルのパス')
    .option('--log-file <path>', 'ログをファイルにも追記')
    .option('-v, --verbose', '詳細ログを出力（-vv でデバッグ）', increaseVerbosity, 0);

  program.addHelpText('after', `
例:
  # 直近1時間（設定の default_window）
  $ archappl-get TST:ai1 TST:ai2

  # 期間指定・JSON出力
  $ archappl-get --pv TST:ai1 --from "2 days ago" --to 202501011700 -f json

  # PVリストファイルから取得し、60秒間隔でCSVファイルに出力
  $ archappl-get --pv-file pvs.txt --resample 60 -o out/data.csv
`);

  return program;
}

function serverFormat(options: GetOptions): DataFormat | undefined {
  if (options.useJson) {
    return 'json';
  }
  return options.useCsv ? 'csv' : undefined;
}

/**
 * 取得処理本体
 * @returns 終了コード（失敗したPVがある、または何も取得できなかった場合は1）
 */
async function executeGet(program: Command, io: CliIO): Promise<number> {
  const options = program.opts<GetOptions>();
  applyVerbosity(options.verbose);
  applyLogFile(options.logFile);

  const pvs = await resolvePvList(program.args, options.pv, options.pvFile);
  if (pvs.length === 0) {
    io.stderr(chalk.red('No PV specified. Use positional arguments, --pv or --pv-file.') + '\n');
    return EXIT_FAILURE;
  }

  const config = await loadCliConfig(options.configFile);
  const client = ArchiverDataClient.fromConfig(config, {
    url: options.url,
    format: serverFormat(options),
  });

  const result = await client.getDataForPvs(pvs, { from: options.from, to: options.to });
  reportPvFailures(io, result.errors);

  if (result.data.size === 0) {
    io.stderr(chalk.red('No data retrieved.') + '\n');
    return EXIT_FAILURE;
  }

  const dataset = buildDataset(
    pvs.flatMap(pv => {
      const series = result.data.get(pv);
      return series ? [series] : [];
    }),
    { resampleSeconds: options.resample }
  );

  const outputFormat = options.outputFormat ?? config.cli.get.output_format;
  const content = outputFormat === 'json'
    ? renderStructured(datasetToRecords(dataset), 'json')
    : new CsvFormatter({ localTime: options.localTime }).format(dataset);

  await emit(io, content, options.output);
  return result.errors.size > 0 ? EXIT_FAILURE : EXIT_OK;
}

/**
 * archappl-get を実行
 * @param argv コマンドライン引数（プログラム名を除く）
 * @param io 入出力先
 * @returns 終了コード
 */
export async function runGet(argv: string[], io: CliIO = processIO): Promise<number> {
  const program = configureProgram(createGetCommand(), io);
  return runProgram(program, argv, io, () => executeGet(program, io));
}

if (require.main === module) {
  runGet(process.argv.slice(2)).then(
    code => process.exit(code),
    error => {
      console.error(chalk.red('Unexpected error:'), error);
      process.exit(1);
    }
  );
}
