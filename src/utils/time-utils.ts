/**
 * 時刻処理ユーティリティ
 */
import { TimeFormatError } from '../errors';

type TimeUnit =
  | 'years'
  | 'months'
  | 'weeks'
  | 'days'
  | 'hours'
  | 'minutes'
  | 'seconds'
  | 'milliseconds';

/**
 * 単位名（別名を含む）から正規の単位への対応表
 */
const UNIT_TABLE: Record<string, TimeUnit> = {
  years: 'years', year: 'years',
  months: 'months', month: 'months',
  weeks: 'weeks', week: 'weeks',
  days: 'days', day: 'days',
  hours: 'hours', hour: 'hours',
  minutes: 'minutes', minute: 'minutes', mins: 'minutes', min: 'minutes',
  seconds: 'seconds', second: 'seconds', secs: 'seconds', sec: 'seconds',
  milliseconds: 'milliseconds', millisecond: 'milliseconds', msecs: 'milliseconds', msec: 'milliseconds'
};

const UNIT_MS: Record<Exclude<TimeUnit, 'years' | 'months'>, number> = {
  weeks: 7 * 24 * 3600 * 1000,
  days: 24 * 3600 * 1000,
  hours: 3600 * 1000,
  minutes: 60 * 1000,
  seconds: 1000,
  milliseconds: 1
};

interface DurationPart {
  amount: number;
  unit: TimeUnit;
}

/**
 * "1 hour and 30 mins" のような期間表現を分解する
 * @param body 期間表現（before/after等の方向語を除いたもの）
 * @param input エラー表示用の元の入力
 */
function parseDurationParts(body: string, input: string): DurationPart[] {
  const parts = body
    .split(/,|\band\b/)
    .map(part => part.trim())
    .filter(part => part !== '');

  if (parts.length === 0) {
    throw new TimeFormatError(input, 'no duration given');
  }

  return parts.map(part => {
    const match = part.match(/^(\d+)\s*([a-z]+)$/);
    if (!match) {
      throw new TimeFormatError(input, `cannot parse "${part}"`);
    }
    const unit = Object.prototype.hasOwnProperty.call(UNIT_TABLE, match[2]) ? UNIT_TABLE[match[2]] : undefined;
    if (!unit) {
      throw new TimeFormatError(input, `unknown time unit "${match[2]}"`);
    }
    return { amount: parseInt(match[1], 10), unit };
  });
}

/**
 * 方向語（before / ago / after / later）を含む相対時刻表現かどうか
 */
export function isRelativeExpression(value: string): boolean {
  return /\b(before|ago|after|later)\b/i.test(value);
}

/**
 * 相対時刻表現を基準時刻からの絶対時刻に変換
 * 例: "1 hour and 30 mins before", "after 15 seconds", "2 days ago"
 * 方向語がない場合は過去方向とみなす
 * @param expr 相対時刻表現
 * @param ref 基準時刻（デフォルト: 現在時刻）
 */
export function parseRelativeTime(expr: string, ref: Date = new Date()): Date {
  const text = expr.trim().toLowerCase();
  const forward = /^after\b/.test(text) || /\blater$/.test(text);
  const body = text
    .replace(/^after\b/, '')
    .replace(/\b(before|ago|later)$/, '');

  const sign = forward ? 1 : -1;
  let months = 0;
  let millis = 0;
  for (const { amount, unit } of parseDurationParts(body, expr)) {
    if (unit === 'years') {
      months += amount * 12;
    } else if (unit === 'months') {
      months += amount;
    } else {
      millis += amount * UNIT_MS[unit];
    }
  }

  // 年・月を先に適用し、日は移動先の月末で頭打ちにする
  return new Date(addCalendarMonths(ref, sign * months).getTime() + sign * millis);
}

/**
 * UTCの暦で月を加算（例: 3/31 の1か月前は 2/29 または 2/28）
 */
export function addCalendarMonths(date: Date, months: number): Date {
  const result = new Date(date.getTime());
  if (months === 0) {
    return result;
  }
  const day = result.getUTCDate();
  result.setUTCDate(1);
  result.setUTCMonth(result.getUTCMonth() + months);
  const lastDay = new Date(Date.UTC(result.getUTCFullYear(), result.getUTCMonth() + 1, 0)).getUTCDate();
  result.setUTCDate(Math.min(day, lastDay));
  return result;
}

/**
 * 期間表現をミリ秒に変換（年・月は長さが一定でないため不可）
 * 数値のみの場合は秒として扱う
 */
export function parseDuration(expr: string): number {
  const text = expr.trim().toLowerCase();
  if (/^\d+(\.\d+)?$/.test(text)) {
    return parseFloat(text) * 1000;
  }

  return parseDurationParts(text, expr).reduce((total, { amount, unit }) => {
    if (unit === 'years' || unit === 'months') {
      throw new TimeFormatError(expr, 'calendar units are not allowed in a duration');
    }
    return total + amount * UNIT_MS[unit];
  }, 0);
}

/**
 * YYYYMMDDHHmm形式のローカル時刻をUTC時刻（ISO文字列）に変換
 * @param dateTimeStr YYYYMMDDHHmm形式の文字列（例: "202301010000"）
 */
export function convertLocalToUtc(dateTimeStr: string): string {
  const year = parseInt(dateTimeStr.substring(0, 4), 10);
  const month = parseInt(dateTimeStr.substring(4, 6), 10);
  const day = parseInt(dateTimeStr.substring(6, 8), 10);
  const hour = parseInt(dateTimeStr.substring(8, 10), 10);
  const minute = parseInt(dateTimeStr.substring(10, 12), 10);

  const localDate = new Date(year, month - 1, day, hour, minute);
  if (
    localDate.getFullYear() !== year ||
    localDate.getMonth() !== month - 1 ||
    localDate.getDate() !== day ||
    localDate.getHours() !== hour ||
    localDate.getMinutes() !== minute
  ) {
    throw new TimeFormatError(dateTimeStr, 'not a valid local date time');
  }

  return localDate.toISOString();
}

// 日付のみ、または日時（秒・小数秒・Z/オフセットは任意）
const ISO_8601_PATTERN = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * 時刻をArchiver Applianceが受け付けるISO 8601 UTC形式（ミリ秒付き）に正規化
 * 受け付ける形式: Date、ISO 8601文字列（任意のオフセット）、YYYYMMDDHHmm（ローカル時刻）、相対時刻表現
 * @param input 時刻
 * @param ref 相対時刻表現の基準時刻
 * @returns 例: "2021-04-15T21:25:00.000Z"
 */
export function standardizeDatetime(input: string | Date, ref?: Date): string {
  if (input instanceof Date) {
    if (isNaN(input.getTime())) {
      throw new TimeFormatError(String(input), 'invalid date');
    }
    return input.toISOString();
  }

  const text = input.trim();
  if (/^\d{12}$/.test(text)) {
    return convertLocalToUtc(text);
  }
  if (isRelativeExpression(text)) {
    return parseRelativeTime(text, ref).toISOString();
  }

  if (!ISO_8601_PATTERN.test(text)) {
    throw new TimeFormatError(input);
  }
  const date = new Date(text);
  if (isNaN(date.getTime())) {
    throw new TimeFormatError(input);
  }
  return date.toISOString();
}

/**
 * EPICSのタイムスタンプ（秒＋ナノ秒）をISO文字列に変換（ミリ秒精度）
 */
export function epochToIso(secs: number, nanos: number = 0): string {
  return new Date(secs * 1000 + Math.floor(nanos / 1e6)).toISOString();
}

/**
 * UTC時刻をシステムのローカルタイムに変換
 * @param utcTimestamp UTC時刻のISO文字列
 * @returns ローカル時刻の文字列（YYYY-MM-DD HH:mm:ss.SSS形式）
 */
export function convertUtcToLocal(utcTimestamp: string): string {
  const date = new Date(utcTimestamp);

  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  const millis = String(date.getMilliseconds()).padStart(3, '0');

  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}.${millis}`;
}
