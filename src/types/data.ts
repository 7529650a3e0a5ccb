/**
 * 時系列データおよび関連型定義
 */
import { ArchiverError, ManagementError } from '../errors';
import { PVMeta, SampleValue } from '../schemas';

export type { PVMeta, SampleValue };

/**
 * 1サンプル（タイムスタンプ・値・アラーム状態）
 */
export interface Sample {
  /**
   * ISO 8601 UTC（ミリ秒精度）
   */
  timestamp: string;
  secs: number;
  nanos: number;
  value: SampleValue;
  severity: number;
  status: number;
}

/**
 * 1つのPVの時系列（タイムスタンプ昇順、同時刻は受信順）
 */
export interface TimeSeries {
  pv: string;
  meta: PVMeta;
  samples: Sample[];
}

/**
 * 時間範囲の指定
 * 省略時は to = 現在時刻、from = to - default_window
 */
export interface TimeRange {
  from?: string | Date;
  to?: string | Date;
}

/**
 * 複数PV取得の結果
 * 取得できたPVと失敗したPVを分けて保持する（一部の失敗で全体を中断しない）
 */
export interface MultiPVResult {
  data: Map<string, TimeSeries>;
  errors: Map<string, ArchiverError>;
}

/**
 * 管理操作のPVごとの結果
 */
export interface ManagementResult {
  pv: string;
  ok: boolean;
  /**
   * サーバーが返したステータス文字列（validation メッセージを含む）
   */
  status: string;
  error?: ManagementError;
}

/**
 * 複数PVをタイムスタンプで結合した表
 */
export interface Dataset {
  columns: string[];
  rows: DatasetRow[];
}

export interface DatasetRow {
  timestamp: string;
  values: Array<SampleValue | null>;
}
