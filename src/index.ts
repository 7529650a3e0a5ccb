/**
 * archappl のメインエントリーポイント
 *
 * 外部からのインポート用エクスポート一覧
 */
import { ArchiverDataClient } from './data-client';
import { ArchiverMgmtClient } from './mgmt-client';
import { buildDataset } from './dataset';
import { CsvFormatter } from './formatters/csv';

// クライアント
export { ArchiverDataClient, ArchiverMgmtClient };
export type { DataClientOptions } from './data-client';
export type { MgmtClientOptions, ListPvsOptions, ArchiveParameters, ArchivalParameterUpdate } from './mgmt-client';

// 設定
export {
  ENV_CONFIG_PATH_NAME,
  getConfigPath,
  readConfig,
  loadConfig,
  getSiteConfig,
} from './config';

// データ結合・出力
export { buildDataset, CsvFormatter };
export { renderStructured } from './formatters/structured';

// 時刻処理
export { standardizeDatetime, parseRelativeTime, parseDuration, epochToIso } from './utils/time-utils';

// ログ
export { setLogLevel } from './utils/logger';

// エラー
export * from './errors';

// 型定義をエクスポート
export * from './types/config';
export * from './types/data';
export type { ApplianceInfo, PVStatus, PVTypeInfo, PVDetail } from './schemas';

/**
 * メインモジュール情報
 */
export const VERSION = '0.1.0';
export const MODULE_NAME = 'archappl';
