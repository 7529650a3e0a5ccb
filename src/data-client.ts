/**
 * データ取得クライアント
 * Archiver Applianceのretrieval APIへのアクセスを提供
 */
import { AxiosAdapter } from 'axios';
import { HttpClient, HttpRequestError, QueryParams } from './io/http';
import {
  ArchiverError,
  InvalidPVError,
  ResponseDecodeError,
  RetrievalError,
  TimeFormatError,
  errorMessage,
} from './errors';
import { ArchiverConfig, DataFormat } from './types/config';
import { MultiPVResult, Sample, TimeRange, TimeSeries } from './types/data';
import {
  RawSample,
  dataAtTimeResponseSchema,
  dataResponseSchema,
  decodeResponse,
  rawSampleSchema,
} from './schemas';
import { epochToIso, parseDuration, standardizeDatetime } from './utils/time-utils';
import { getSiteConfig } from './config';
import { getLogger } from './utils/logger';

const logger = getLogger('archappl.data');

export const DEFAULT_DATA_URL = 'http://127.0.0.1:17665';
export const RETRIEVAL_PATH = '/retrieval/data';

/**
 * データ取得クライアントの設定
 */
export interface DataClientOptions {
  /**
   * データ取得APIのベースURL（ポート番号を含む）
   */
  url?: string;
  format?: DataFormat;
  timeout?: number;
  /**
   * 開始時刻省略時の取得期間（例: "1 hour"）
   */
  defaultWindow?: string;
  adapter?: AxiosAdapter;
}

/**
 * サンプルを (secs, nanos) の昇順に並べ替える（安定ソート）
 */
export function sortSamples(samples: Sample[]): Sample[] {
  return [...samples].sort((a, b) => a.secs - b.secs || a.nanos - b.nanos);
}

function toSample(raw: RawSample): Sample {
  return {
    timestamp: epochToIso(raw.secs, raw.nanos),
    secs: raw.secs,
    nanos: raw.nanos,
    value: raw.val,
    severity: raw.severity,
    status: raw.status,
  };
}

/**
 * CSVの値を数値・文字列・配列に変換
 * 波形（配列）は "|" 区切り
 */
function parseCsvValue(text: string): string | number | Array<string | number> {
  const toScalar = (part: string): string | number => {
    const trimmed = part.trim();
    const num = Number(trimmed);
    return trimmed !== '' && Number.isFinite(num) ? num : trimmed;
  };
  return text.includes('|') ? text.split('|').map(toScalar) : toScalar(text);
}

/**
 * getData.csv のレスポンスを解析
 * 各行: 秒, 値, severity, status, ナノ秒
 * @param pv PV名
 * @param body レスポンスボディ
 */
export function parseCsvResponse(pv: string, body: string): TimeSeries {
  const samples = body
    .split(/\r?\n/)
    .map((line, index) => ({ line: line.trim(), lineNo: index + 1 }))
    .filter(({ line }) => line !== '')
    .map(({ line, lineNo }) => {
      const columns = line.split(',');
      if (columns.length < 5) {
        throw new ResponseDecodeError(`getData.csv line ${lineNo}`, [`expected 5 columns, got ${columns.length}`], { pv });
      }
      const [secs, val, severity, status, nanos] = columns;
      return decodeResponse(
        rawSampleSchema,
        {
          secs: Number(secs),
          val: parseCsvValue(val),
          severity: Number(severity),
          status: Number(status),
          nanos: Number(nanos),
        },
        `getData.csv line ${lineNo}`,
        pv
      );
    })
    .map(toSample);

  return { pv, meta: { name: pv }, samples: sortSamples(samples) };
}

/**
 * getData.json のレスポンスを解析
 * @param pv PV名
 * @param body レスポンスボディ
 */
export function parseJsonResponse(pv: string, body: unknown): TimeSeries {
  const decoded = decodeResponse(dataResponseSchema, body, 'getData.json', pv);
  if (decoded.length === 0) {
    return { pv, meta: { name: pv }, samples: [] };
  }

  const entry = decoded.find(item => item.meta.name === pv) ?? decoded[0];
  return {
    pv,
    meta: entry.meta,
    samples: sortSamples(entry.data.map(toSample)),
  };
}

/**
 * データ取得クライアントクラス
 * url は構築後に変更できるが、リクエスト実行中の変更は想定しない（単一所有者向け）
 */
export class ArchiverDataClient {
  private httpClient: HttpClient;
  private dataFormat: DataFormat;
  private readonly defaultWindow: string;

  /**
   * @param options クライアント設定
   */
  constructor(options: DataClientOptions = {}) {
    this.httpClient = new HttpClient(
      { base_url: options.url || DEFAULT_DATA_URL, timeout: options.timeout ?? 30000 },
      { adapter: options.adapter }
    );
    this.dataFormat = options.format ?? 'json';
    this.defaultWindow = options.defaultWindow ?? '1 hour';
    parseDuration(this.defaultWindow);

    logger.debug(`URL of data client is: ${this.endpoint}`);
  }

  /**
   * 設定オブジェクトからクライアントを作成
   * @param config 解決済みの設定
   * @param overrides 設定より優先する値
   */
  static fromConfig(config: ArchiverConfig, overrides: DataClientOptions = {}): ArchiverDataClient {
    return new ArchiverDataClient({
      ...overrides,
      url: overrides.url ?? config.data_url,
      format: overrides.format ?? config.server.data_format,
      timeout: overrides.timeout ?? config.server.timeout,
      defaultWindow: overrides.defaultWindow ?? config.server.default_window,
    });
  }

  /**
   * サイト設定を解決してクライアントを作成
   */
  static async create(overrides: DataClientOptions = {}): Promise<ArchiverDataClient> {
    return ArchiverDataClient.fromConfig(await getSiteConfig(), overrides);
  }

  get url(): string {
    return this.httpClient.baseUrl;
  }

  set url(url: string) {
    this.httpClient.setBaseUrl(url);
  }

  get format(): DataFormat {
    return this.dataFormat;
  }

  set format(format: DataFormat) {
    this.dataFormat = format;
  }

  /**
   * データ取得エンドポイントの完全なURL
   */
  get endpoint(): string {
    return `${this.url}${RETRIEVAL_PATH}/getData.${this.dataFormat}`;
  }

  /**
   * 1つのPVの時系列データを取得
   * @param pv PV名
   * @param range 時間範囲（省略時は直近 default_window）
   * @returns タイムスタンプ昇順の時系列
   * @throws InvalidPVError サーバーがPVを未知として拒否した場合
   * @throws RetrievalError 通信エラー・HTTPエラー・不正なレスポンスの場合
   */
  async getData(pv: string, range: TimeRange = {}): Promise<TimeSeries> {
    const { from, to } = this.resolveRange(range);
    const params: QueryParams = { pv, from, to };
    const path = `${RETRIEVAL_PATH}/getData.${this.dataFormat}`;

    logger.info(`Fetching ${pv} from ${from} to ${to}`);

    try {
      if (this.dataFormat === 'csv') {
        return parseCsvResponse(pv, await this.httpClient.getText(path, params));
      }
      return parseJsonResponse(pv, await this.httpClient.get(path, params));
    } catch (error) {
      throw toRetrievalError(error, pv);
    }
  }

  /**
   * 複数PVの時系列データを取得
   * PVごとに独立して取得し、失敗したPVは errors に記録して処理を続ける
   * @param pvs PV名リスト（重複は1回だけ取得）
   * @param range 時間範囲
   */
  async getDataForPvs(pvs: string[], range: TimeRange = {}): Promise<MultiPVResult> {
    // 全PVで同じ時間範囲を使う
    const resolved = this.resolveRange(range);
    const result: MultiPVResult = { data: new Map(), errors: new Map() };
    const uniquePvs = Array.from(new Set(pvs));

    for (const [index, pv] of uniquePvs.entries()) {
      try {
        result.data.set(pv, await this.getData(pv, resolved));
        logger.info(`[${index + 1}/${uniquePvs.length}] Fetched ${pv}`);
      } catch (error) {
        const failure = toRetrievalError(error, pv);
        logger.warn(`[${index + 1}/${uniquePvs.length}] Failed to fetch ${pv}: ${failure.message}`);
        result.errors.set(pv, failure);
      }
    }

    return result;
  }

  /**
   * 指定時刻における各PVの値を取得
   * @param pvs PV名リスト
   * @param at 時刻
   * @returns PV名→サンプル（値がないPVは含まれない）
   */
  async getDataAtTime(pvs: string[], at: string | Date): Promise<Map<string, Sample>> {
    const atIso = standardizeDatetime(at);
    let body: unknown;
    try {
      body = await this.httpClient.post(`${RETRIEVAL_PATH}/getDataAtTime`, pvs, { at: atIso });
    } catch (error) {
      throw toRetrievalError(error);
    }

    const decoded = decodeResponse(dataAtTimeResponseSchema, body, 'getDataAtTime');
    const result = new Map<string, Sample>();
    for (const pv of pvs) {
      const raw = decoded[pv];
      if (raw) {
        result.set(pv, toSample(raw));
      }
    }
    return result;
  }

  /**
   * 時間範囲をISO文字列に正規化
   */
  private resolveRange(range: TimeRange): { from: string; to: string } {
    const now = new Date();
    const to = range.to !== undefined ? standardizeDatetime(range.to, now) : now.toISOString();
    const from = range.from !== undefined
      ? standardizeDatetime(range.from, now)
      : new Date(new Date(to).getTime() - parseDuration(this.defaultWindow)).toISOString();

    if (new Date(from).getTime() > new Date(to).getTime()) {
      throw new TimeFormatError(`${from} - ${to}`, 'start time is after end time');
    }
    return { from, to };
  }

  toString(): string {
    return `[(${this.dataFormat}) Data Client] hooked to Archiver Appliance at: ${this.url}`;
  }
}

/**
 * 任意の例外をRetrievalError系に変換
 * 404はPVが存在しないことを示すためInvalidPVErrorにする
 */
function toRetrievalError(error: unknown, pv?: string): ArchiverError {
  if (error instanceof ArchiverError) {
    return error;
  }
  if (error instanceof HttpRequestError) {
    if (error.status === 404 && pv !== undefined) {
      return new InvalidPVError(pv, { status: 404, cause: error });
    }
    return new RetrievalError(
      `Failed to retrieve data${pv ? ` for ${pv}` : ''}: ${error.message}`,
      { pv, status: error.status, cause: error }
    );
  }
  return new RetrievalError(`Failed to retrieve data${pv ? ` for ${pv}` : ''}: ${errorMessage(error)}`, { pv, cause: error });
}
