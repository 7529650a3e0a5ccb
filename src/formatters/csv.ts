/**
 * CSVフォーマッタ
 * 結合済みデータセットをCSVに変換・出力するモジュール
 */
import { Dataset, SampleValue } from '../types/data';
import { writeTextFile } from '../io/file';
import { convertUtcToLocal } from '../utils/time-utils';

export interface CsvFormatterOptions {
  /**
   * タイムスタンプをローカル時刻（YYYY-MM-DD HH:mm:ss.SSS）で出力するか
   */
  localTime?: boolean;
}

/**
 * CSVのセル値をエスケープ
 */
export function escapeCsvCell(text: string): string {
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

function formatValue(value: SampleValue | null): string {
  if (value === null) {
    return '';
  }
  if (Array.isArray(value)) {
    return escapeCsvCell(value.join('|'));
  }
  return escapeCsvCell(String(value));
}

/**
 * CSVフォーマッタクラス
 */
export class CsvFormatter {
  /**
   * @param options 出力設定
   */
  constructor(private options: CsvFormatterOptions = {}) {}

  /**
   * データセットからCSVコンテンツを生成
   * ヘッダー行: timestamp + PV名のリスト
   * @param dataset データセット
   */
  format(dataset: Dataset): string {
    const header = ['timestamp', ...dataset.columns].map(escapeCsvCell).join(',');

    const rows = dataset.rows.map(row => {
      const timestamp = this.options.localTime ? convertUtcToLocal(row.timestamp) : row.timestamp;
      return [timestamp, ...row.values.map(formatValue)].join(',');
    });

    return [header, ...rows].join('\n') + '\n';
  }

  /**
   * データセットをCSVファイルに書き込む
   * @param dataset データセット
   * @param filePath 出力先
   */
  async writeData(dataset: Dataset, filePath: string): Promise<void> {
    await writeTextFile(filePath, this.format(dataset));
  }
}
