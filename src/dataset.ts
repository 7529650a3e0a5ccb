/**
 * 複数PVの時系列をタイムスタンプで結合するモジュール
 */
import { Dataset, DatasetRow, SampleValue, TimeSeries } from './types/data';

export interface DatasetOptions {
  /**
   * 指定した場合、先頭時刻から一定間隔（秒）の格子に再サンプリングする
   */
  resampleSeconds?: number;
}

interface SampleEvent {
  timestamp: string;
  secs: number;
  nanos: number;
  column: number;
  value: SampleValue;
}

/**
 * 時系列をタイムスタンプの和集合で結合し、欠損は直前の値で補完する
 * @param series PVごとの時系列（列順は入力順）
 * @param options 再サンプリング設定
 * @returns 結合された表
 */
export function buildDataset(series: TimeSeries[], options: DatasetOptions = {}): Dataset {
  const columns = series.map(item => item.pv);

  const events: SampleEvent[] = [];
  series.forEach((item, column) => {
    for (const sample of item.samples) {
      events.push({ timestamp: sample.timestamp, secs: sample.secs, nanos: sample.nanos, column, value: sample.value });
    }
  });
  events.sort((a, b) => a.secs - b.secs || a.nanos - b.nanos || a.column - b.column);

  const rows: DatasetRow[] = [];
  const current: Array<SampleValue | null> = columns.map(() => null);

  for (const event of events) {
    current[event.column] = event.value;
    const last = rows[rows.length - 1];
    if (last && last.timestamp === event.timestamp) {
      last.values = [...current];
    } else {
      rows.push({ timestamp: event.timestamp, values: [...current] });
    }
  }

  if (options.resampleSeconds !== undefined) {
    return { columns, rows: resampleRows(rows, options.resampleSeconds) };
  }
  return { columns, rows };
}

/**
 * 一定間隔の格子上で直前の行の値を採用する
 * 格子点はエポックからの間隔の整数倍に揃える
 * 最初の行より前の格子点と、すべての列に値が揃う前の格子点は出力しない
 * @param rows 時刻昇順・補完済みの行
 * @param intervalSeconds 間隔（秒）
 */
function resampleRows(rows: DatasetRow[], intervalSeconds: number): DatasetRow[] {
  if (!(intervalSeconds > 0)) {
    throw new RangeError(`Resample interval must be positive: ${intervalSeconds}`);
  }
  if (rows.length === 0) {
    return [];
  }

  const step = intervalSeconds * 1000;
  const first = Date.parse(rows[0].timestamp);
  const start = Math.ceil(first / step) * step;
  const end = Date.parse(rows[rows.length - 1].timestamp);
  const resampled: DatasetRow[] = [];

  let cursor = 0;
  for (let t = start; t <= end; t += step) {
    while (cursor + 1 < rows.length && Date.parse(rows[cursor + 1].timestamp) <= t) {
      cursor++;
    }
    const values = rows[cursor].values;
    if (values.every(value => value !== null)) {
      resampled.push({ timestamp: new Date(t).toISOString(), values: [...values] });
    }
  }

  return resampled;
}
