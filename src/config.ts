/**
 * 設定ファイル読み込み・解析モジュール
 *
 * 検索順序（最初に存在したファイルを採用）:
 *   1. 環境変数 ARCHAPPL_CONFIG_FILE で指定されたパス
 *   2. ~/.archappl/config.ini
 *   3. /etc/archappl/config.ini
 *   4. パッケージ同梱の config/default.ini
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as ini from 'ini';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { ArchiverConfig } from './types/config';
import { parseDuration } from './utils/time-utils';
import { getLogger } from './utils/logger';

const logger = getLogger('archappl.config');

/**
 * 設定ファイルのパスを指定する環境変数名
 */
export const ENV_CONFIG_PATH_NAME = 'ARCHAPPL_CONFIG_FILE';

/**
 * 同梱設定ファイルのパス
 * ソース実行時（src/）とビルド後（dist/src/）の両方から探す
 */
export function bundledConfigPath(): string {
  const candidates = [
    path.resolve(__dirname, '..', 'config', 'default.ini'),
    path.resolve(__dirname, '..', '..', 'config', 'default.ini'),
  ];
  return candidates.find(candidate => fs.existsSync(candidate)) ?? candidates[0];
}

/**
 * 環境変数以外の検索パス（優先順）
 * @param homeDir ホームディレクトリ
 */
export function defaultSearchPaths(homeDir: string = os.homedir()): string[] {
  return [
    path.join(homeDir, '.archappl', 'config.ini'),
    '/etc/archappl/config.ini',
    bundledConfigPath(),
  ];
}

export interface ConfigSearchOptions {
  env?: NodeJS.ProcessEnv;
  searchPaths?: string[];
}

function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * 採用する設定ファイルのパスを決定
 * @throws ConfigurationError いずれのファイルも存在しない場合
 */
export function getConfigPath(options: ConfigSearchOptions = {}): string {
  const env = options.env ?? process.env;
  const searchPaths = options.searchPaths ?? defaultSearchPaths();

  const envPath = env[ENV_CONFIG_PATH_NAME];
  if (envPath) {
    const resolved = path.resolve(envPath.replace(/^~(?=$|\/)/, os.homedir()));
    if (isFile(resolved)) {
      return resolved;
    }
    logger.warn(`${ENV_CONFIG_PATH_NAME} points to a missing file: ${resolved}`);
  }

  const found = searchPaths.find(isFile);
  if (!found) {
    throw new ConfigurationError(
      `No configuration file found (searched: ${[envPath, ...searchPaths].filter(Boolean).join(', ')})`
    );
  }
  return path.resolve(found);
}

const optionalPort = z.preprocess(
  value => (value === undefined || value === '' ? undefined : Number(value)),
  z.number().int().min(1).max(65535).optional()
);

const booleanFlag = z.preprocess(value => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'yes', 'on', 'true'].includes(normalized)) return true;
    if (['0', 'no', 'off', 'false', ''].includes(normalized)) return false;
  }
  return value;
}, z.boolean());

const serverSectionSchema = z.object({
  url: z.string().trim().url(),
  admin_port: optionalPort,
  data_port: optionalPort,
  data_format: z.preprocess(
    value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(['json', 'csv'])
  ).default('json'),
  admin_disabled: booleanFlag.default(false),
  default_window: z.string().trim().min(1).default('1 hour'),
  timeout: z.preprocess(
    value => (value === undefined || value === '' ? undefined : Number(value)),
    z.number().int().positive().optional()
  ).default(30000),
});

const getSectionSchema = z.object({
  output_format: z.enum(['csv', 'json']).default('csv'),
});

const rawConfigSchema = z.object({
  main: z.object({ use: z.string().trim().min(1) }),
});

/**
 * INIの構文チェックと区切り文字の正規化
 * iniパッケージは不正な行を黙って無視し、"key: value" 形式も解釈しないため、
 * 事前に行単位で確認して "key = value" に揃える
 */
function normalizeIniContent(content: string, configPath: string): string {
  return content.split(/\r?\n/).map((rawLine, index) => {
    const line = rawLine.trim();
    if (line === '' || line.startsWith(';') || line.startsWith('#') || /^\[[^\]]+\]$/.test(line)) {
      return rawLine;
    }

    const delimiter = line.search(/[=:]/);
    if (delimiter <= 0) {
      throw new ConfigurationError(
        `Malformed line ${index + 1} in ${configPath}: "${line}"`,
        configPath
      );
    }
    if (line[delimiter] === ':') {
      return `${line.substring(0, delimiter).trim()} = ${line.substring(delimiter + 1).trim()}`;
    }
    return rawLine;
  }).join('\n');
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function joinPort(url: string, port?: number): string {
  const base = url.replace(/\/+$/, '');
  return port === undefined ? base : `${base}:${port}`;
}

/**
 * オブジェクトを再帰的に凍結
 */
function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * 設定ファイルを読み込み、検証する
 * @param configPath 設定ファイルのパス（省略時は同梱のデフォルト）
 * @returns 凍結された設定オブジェクト
 * @throws ConfigurationError 読み込み・構文・内容のいずれかに問題がある場合
 */
export async function readConfig(configPath: string = bundledConfigPath()): Promise<Readonly<ArchiverConfig>> {
  const resolvedPath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.promises.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration file ${resolvedPath}`, resolvedPath, { cause: error });
  }

  const parsed: Record<string, unknown> = ini.parse(normalizeIniContent(content, resolvedPath));

  const main = rawConfigSchema.safeParse(parsed);
  if (!main.success) {
    throw new ConfigurationError(`Invalid [main] section in ${resolvedPath}: ${formatIssues(main.error)}`, resolvedPath);
  }

  const serverName = main.data.main.use;
  if (!(serverName in parsed)) {
    throw new ConfigurationError(`'${serverName}' section not found in ${resolvedPath}`, resolvedPath);
  }

  const server = serverSectionSchema.safeParse(parsed[serverName]);
  if (!server.success) {
    throw new ConfigurationError(`Invalid [${serverName}] section in ${resolvedPath}: ${formatIssues(server.error)}`, resolvedPath);
  }

  try {
    parseDuration(server.data.default_window);
  } catch (error) {
    throw new ConfigurationError(`Invalid default_window in [${serverName}]: ${server.data.default_window}`, resolvedPath, { cause: error });
  }

  const cliSection = parsed.cli;
  const rawGetSection =
    typeof cliSection === 'object' && cliSection !== null && 'archappl-get' in cliSection
      ? cliSection['archappl-get']
      : {};
  const getSection = getSectionSchema.safeParse(rawGetSection);
  if (!getSection.success) {
    throw new ConfigurationError(`Invalid [cli.archappl-get] section in ${resolvedPath}: ${formatIssues(getSection.error)}`, resolvedPath);
  }

  logger.debug(`Loaded configuration from ${resolvedPath} (server: ${serverName})`);

  return deepFreeze<ArchiverConfig>({
    path: resolvedPath,
    server_name: serverName,
    server: server.data,
    data_url: joinPort(server.data.url, server.data.data_port),
    admin_url: joinPort(server.data.url, server.data.admin_port),
    cli: {
      get: getSection.data,
    },
  });
}

/**
 * 検索順序に従って設定ファイルを見つけて読み込む
 */
export async function loadConfig(options: ConfigSearchOptions = {}): Promise<Readonly<ArchiverConfig>> {
  return readConfig(getConfigPath(options));
}

let siteConfig: Promise<Readonly<ArchiverConfig>> | undefined;

/**
 * プロセス内で一度だけ解決されるサイト設定
 */
export function getSiteConfig(): Promise<Readonly<ArchiverConfig>> {
  if (!siteConfig) {
    // 失敗した場合は次回の呼び出しで再解決する
    siteConfig = loadConfig().catch(error => {
      siteConfig = undefined;
      throw error;
    });
  }
  return siteConfig;
}
