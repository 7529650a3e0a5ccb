/**
 * JSON / YAML フォーマッタ
 */
import * as yaml from 'js-yaml';
import { Dataset } from '../types/data';

export type StructuredFormat = 'json' | 'yaml';

/**
 * Mapを含む値をJSON/YAMLで表現できるプレーンな値に変換
 */
export function toPlain(value: unknown): unknown {
  if (value instanceof Map) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of value) {
      result[String(key)] = toPlain(item);
    }
    return result;
  }
  if (value instanceof Error) {
    return { error: value.name, message: value.message };
  }
  if (Array.isArray(value)) {
    return value.map(toPlain);
  }
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toPlain(item);
    }
    return result;
  }
  return value;
}

/**
 * 2階層目を指定キーのみに絞り込む（存在しないキーは "N/A"）
 * @param data 1階層目がPV名のオブジェクト
 * @param subKeys 残すキー
 */
export function projectSubKeys(data: Record<string, unknown>, subKeys: string[]): Record<string, Record<string, unknown>> {
  const result: Record<string, Record<string, unknown>> = {};
  for (const [key, item] of Object.entries(data)) {
    const source: Record<string, unknown> = typeof item === 'object' && item !== null ? Object.fromEntries(Object.entries(item)) : {};
    result[key] = Object.fromEntries(
      subKeys.map(subKey => [subKey, subKey in source ? source[subKey] : 'N/A'])
    );
  }
  return result;
}

/**
 * データセットを行ごとのオブジェクトに変換
 */
export function datasetToRecords(dataset: Dataset): Array<Record<string, unknown>> {
  return dataset.rows.map(row => {
    const record: Record<string, unknown> = { timestamp: row.timestamp };
    dataset.columns.forEach((column, index) => {
      record[column] = row.values[index];
    });
    return record;
  });
}

/**
 * 値をJSONまたはYAML文字列に変換
 * @param value 出力する値（Mapを含んでよい）
 * @param format 出力形式
 */
export function renderStructured(value: unknown, format: StructuredFormat = 'json'): string {
  const plain = toPlain(value);
  if (format === 'yaml') {
    return yaml.dump(plain, { noRefs: true, lineWidth: -1 });
  }
  return JSON.stringify(plain, null, 2) + '\n';
}
