/**
 * 管理クライアント
 * Archiver Applianceの管理API（/mgmt/bpl）へのアクセスを提供
 */
import { AxiosAdapter } from 'axios';
import { z } from 'zod';
import { HttpClient, HttpRequestError, QueryParams } from './io/http';
import { ArchiverError, ConfigurationError, InvalidPVError, ManagementError, errorMessage } from './errors';
import { ArchiverConfig } from './types/config';
import { ManagementResult } from './types/data';
import {
  ApplianceInfo,
  ManagementReply,
  PVDetail,
  PVStatus,
  PVTypeInfo,
  applianceInfoSchema,
  decodeResponse,
  managementResponseSchema,
  pvDetailListSchema,
  pvNameListSchema,
  pvStatusListSchema,
  pvTypeInfoSchema,
  storesSchema,
} from './schemas';
import { getSiteConfig } from './config';
import { getLogger } from './utils/logger';

const logger = getLogger('archappl.mgmt');

export const DEFAULT_ADMIN_URL = 'http://127.0.0.1:17665';
export const MGMT_PATH = '/mgmt/bpl';

// サーバー側の既定上限（500件）を外す値
export const ALL_PVS_LIMIT = -1;

export interface MgmtClientOptions {
  /**
   * 管理APIのベースURL（ポート番号を含む）
   */
  url?: string;
  timeout?: number;
  adapter?: AxiosAdapter;
}

export interface ListPvsOptions {
  /**
   * 返却件数の上限（-1 で無制限）
   */
  limit?: number;
  /**
   * trueの場合はエイリアス等を含む全PV名（getAllExpandedPVNames）
   */
  expanded?: boolean;
}

/**
 * アーカイブ開始時のパラメータ
 */
export interface ArchiveParameters {
  samplingperiod?: number;
  samplingmethod?: 'SCAN' | 'MONITOR';
  controllingPV?: string;
  policy?: string;
  appliance?: string;
}

export type ArchivalParameterUpdate = Pick<ArchiveParameters, 'samplingperiod' | 'samplingmethod'>;

/**
 * グロブパターンを正規表現に変換（* と ? のみ特殊文字）
 */
export function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map(char => {
      if (char === '*') return '.*';
      if (char === '?') return '.';
      return char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`);
}

/**
 * サーバー応答から失敗理由を取り出す（成功ならundefined）
 */
function replyFailure(reply: ManagementReply): string | undefined {
  if (reply.validation) return reply.validation;
  if (reply.error) return reply.error;
  if (reply.status === undefined) return 'Unrecognized reply from server';
  if (/\b(no|not|fail(ed|ure)?|error|unable|invalid)\b/i.test(reply.status)) return reply.status;
  return undefined;
}

/**
 * 管理クライアントクラス
 * url は構築後に変更できるが、リクエスト実行中の変更は想定しない（単一所有者向け）
 */
export class ArchiverMgmtClient {
  private httpClient: HttpClient;

  /**
   * @param options クライアント設定
   */
  constructor(options: MgmtClientOptions = {}) {
    this.httpClient = new HttpClient(
      { base_url: options.url || DEFAULT_ADMIN_URL, timeout: options.timeout ?? 30000 },
      { adapter: options.adapter }
    );
  }

  /**
   * 設定オブジェクトからクライアントを作成
   * @throws ConfigurationError 設定で管理APIが無効化されている場合
   */
  static fromConfig(config: ArchiverConfig, overrides: MgmtClientOptions = {}): ArchiverMgmtClient {
    if (config.server.admin_disabled) {
      throw new ConfigurationError(
        `Management client is disabled by 'admin_disabled' in [${config.server_name}]`,
        config.path
      );
    }
    return new ArchiverMgmtClient({
      ...overrides,
      url: overrides.url ?? config.admin_url,
      timeout: overrides.timeout ?? config.server.timeout,
    });
  }

  /**
   * サイト設定を解決してクライアントを作成
   */
  static async create(overrides: MgmtClientOptions = {}): Promise<ArchiverMgmtClient> {
    return ArchiverMgmtClient.fromConfig(await getSiteConfig(), overrides);
  }

  get url(): string {
    return this.httpClient.baseUrl;
  }

  set url(url: string) {
    this.httpClient.setBaseUrl(url);
  }

  /**
   * 管理APIの完全なURL
   */
  get endpoint(): string {
    return `${this.url}${MGMT_PATH}`;
  }

  /**
   * アプライアンス情報を取得
   */
  async getApplianceInfo(): Promise<ApplianceInfo> {
    const body = await this.request('getApplianceInfo', () => this.httpClient.get(`${MGMT_PATH}/getApplianceInfo`));
    return this.decode(applianceInfoSchema, body, 'getApplianceInfo');
  }

  /**
   * アーカイブ中のPV名を取得
   * @param pattern グロブパターン（例: "TST*"）、省略時は全件
   * @param options 件数上限など（省略時は -1 で全件）
   * @returns パターンに一致するPV名（サーバーの返却順、重複除去済み）
   */
  async getAllPvs(pattern?: string, options: ListPvsOptions = {}): Promise<string[]> {
    const endpoint = options.expanded ? 'getAllExpandedPVNames' : 'getAllPVs';
    const params: QueryParams = { pv: pattern, limit: options.limit ?? ALL_PVS_LIMIT };
    const body = await this.request(endpoint, () => this.httpClient.get(`${MGMT_PATH}/${endpoint}`, params));
    const names = this.decode(pvNameListSchema, body, endpoint);

    const unique = Array.from(new Set(names));
    if (!pattern) {
      return unique;
    }

    const matcher = globToRegExp(pattern);
    const matched = unique.filter(name => matcher.test(name));
    if (matched.length !== unique.length) {
      logger.warn(`${unique.length - matched.length} PV name(s) returned by ${endpoint} did not match "${pattern}"`);
    }
    return matched;
  }

  /**
   * PVのアーカイブ状態を取得
   * @param pvs PV名（複数可、グロブ可）
   * @returns PV名→状態
   */
  async getPvStatus(pvs: string | string[]): Promise<Map<string, PVStatus>> {
    const pvList = Array.isArray(pvs) ? pvs : [pvs];
    const body = await this.request('getPVStatus', () =>
      this.httpClient.get(`${MGMT_PATH}/getPVStatus`, { pv: pvList.join(',') })
    );
    const statuses = this.decode(pvStatusListSchema, body, 'getPVStatus');
    return new Map(statuses.map(status => [status.pvName, status]));
  }

  /**
   * PVのアーカイブパラメータ（PVTypeInfo）を取得
   * @throws InvalidPVError アーカイブされていないPVの場合
   */
  async getPvTypeInfo(pv: string): Promise<PVTypeInfo> {
    let body: unknown;
    try {
      body = await this.httpClient.get(`${MGMT_PATH}/getPVTypeInfo`, { pv });
    } catch (error) {
      if (error instanceof HttpRequestError && error.status === 404) {
        throw new InvalidPVError(pv, { status: 404, cause: error });
      }
      throw toManagementError('getPVTypeInfo', error, pv);
    }
    if (body === null || body === '' || (typeof body === 'object' && Object.keys(body).length === 0)) {
      throw new InvalidPVError(pv);
    }
    return this.decode(pvTypeInfoSchema, body, 'getPVTypeInfo', pv);
  }

  /**
   * PVの詳細情報を取得
   */
  async getPvDetails(pv: string): Promise<PVDetail[]> {
    const body = await this.request('getPVDetails', () => this.httpClient.get(`${MGMT_PATH}/getPVDetails`, { pv }), pv);
    return this.decode(pvDetailListSchema, body, 'getPVDetails', pv);
  }

  /**
   * PVのデータストア名を取得
   */
  async getStoresForPv(pv: string): Promise<Record<string, string>> {
    const body = await this.request('getStoresForPV', () => this.httpClient.get(`${MGMT_PATH}/getStoresForPV`, { pv }), pv);
    return this.decode(storesSchema, body, 'getStoresForPV', pv);
  }

  /**
   * PVのアーカイブを開始
   * 1件はGET、複数件はJSONリストをPOSTする
   */
  async archivePvs(pvs: string[], params: ArchiveParameters = {}): Promise<ManagementResult[]> {
    if (pvs.length === 1) {
      return this.runOperation('archivePV', pvs, () =>
        this.httpClient.get(`${MGMT_PATH}/archivePV`, { pv: pvs[0], ...params })
      );
    }
    return this.runOperation('archivePV', pvs, () =>
      this.httpClient.post(`${MGMT_PATH}/archivePV`, pvs.map(pv => ({ pv, ...params })))
    );
  }

  /**
   * PVのアーカイブを一時停止
   */
  async pausePvs(pvs: string[]): Promise<ManagementResult[]> {
    return this.runBulkOperation('pauseArchivingPV', pvs);
  }

  /**
   * 一時停止中のPVのアーカイブを再開
   */
  async resumePvs(pvs: string[]): Promise<ManagementResult[]> {
    return this.runBulkOperation('resumeArchivingPV', pvs);
  }

  /**
   * アーカイブ要求を取り消す（1件ずつ送信）
   */
  async abortPvs(pvs: string[]): Promise<ManagementResult[]> {
    const results: ManagementResult[] = [];
    for (const pv of pvs) {
      results.push(...await this.runOperation('abortArchivingPV', [pv], () =>
        this.httpClient.get(`${MGMT_PATH}/abortArchivingPV`, { pv })
      ));
    }
    return results;
  }

  /**
   * PVをアーカイブ対象から削除（事前に一時停止が必要）
   * @param pv PV名
   * @param deleteData 保存済みデータも削除するか
   */
  async deletePv(pv: string, deleteData: boolean = false): Promise<ManagementResult> {
    const [result] = await this.runOperation('deletePV', [pv], () =>
      this.httpClient.get(`${MGMT_PATH}/deletePV`, { pv, deleteData })
    );
    return result;
  }

  /**
   * サンプリング周期・方式を変更
   */
  async changeArchivalParameters(pv: string, params: ArchivalParameterUpdate): Promise<ManagementResult> {
    const [result] = await this.runOperation('changeArchivalParameters', [pv], () =>
      this.httpClient.get(`${MGMT_PATH}/changeArchivalParameters`, { pv, ...params })
    );
    return result;
  }

  /**
   * 1件のPVのアーカイブを開始（失敗時は例外）
   * @throws ManagementError
   */
  async archivePv(pv: string, params: ArchiveParameters = {}): Promise<ManagementResult> {
    return throwIfFailed(await this.archivePvs([pv], params));
  }

  /**
   * 1件のPVを一時停止（失敗時は例外）
   * @throws ManagementError
   */
  async pausePv(pv: string): Promise<ManagementResult> {
    return throwIfFailed(await this.pausePvs([pv]));
  }

  /**
   * 1件のPVを再開（失敗時は例外）
   * @throws ManagementError
   */
  async resumePv(pv: string): Promise<ManagementResult> {
    return throwIfFailed(await this.resumePvs([pv]));
  }

  private runBulkOperation(operation: string, pvs: string[]): Promise<ManagementResult[]> {
    if (pvs.length === 1) {
      return this.runOperation(operation, pvs, () =>
        this.httpClient.get(`${MGMT_PATH}/${operation}`, { pv: pvs[0] })
      );
    }
    return this.runOperation(operation, pvs, () => this.httpClient.post(`${MGMT_PATH}/${operation}`, pvs));
  }

  /**
   * 管理操作を実行し、PVごとの結果に変換
   * @param operation エンドポイント名
   * @param pvs 対象PV
   * @param send リクエスト送信処理
   */
  private async runOperation(
    operation: string,
    pvs: string[],
    send: () => Promise<unknown>
  ): Promise<ManagementResult[]> {
    const body = await this.request(operation, send, pvs.length === 1 ? pvs[0] : undefined);
    const decoded = this.decode(managementResponseSchema, body, operation);
    const replies = Array.isArray(decoded) ? decoded : [decoded];

    return pvs.map((pv, index) => {
      // pvNameがない応答は送信順に対応づける
      const reply = replies.find(item => item.pvName === pv)
        ?? (replies[index] && replies[index].pvName === undefined ? replies[index] : undefined);

      if (!reply) {
        const reason = 'No reply for this PV';
        return { pv, ok: false, status: reason, error: new ManagementError(`${operation} failed for ${pv}: ${reason}`, { pv, reason }) };
      }

      const failure = replyFailure(reply);
      const status = reply.status ?? failure ?? '';
      if (failure !== undefined) {
        logger.warn(`${operation} failed for ${pv}: ${failure}`);
        return {
          pv,
          ok: false,
          status,
          error: new ManagementError(`${operation} failed for ${pv}: ${failure}`, { pv, reason: failure }),
        };
      }
      return { pv, ok: true, status };
    });
  }

  /**
   * リクエストを実行し、HTTPエラーをManagementErrorに変換
   */
  private async request(operation: string, send: () => Promise<unknown>, pv?: string): Promise<unknown> {
    try {
      return await send();
    } catch (error) {
      throw toManagementError(operation, error, pv);
    }
  }

  private decode<S extends z.ZodTypeAny>(schema: S, body: unknown, operation: string, pv?: string): z.infer<S> {
    try {
      return decodeResponse(schema, body, operation, pv);
    } catch (error) {
      throw toManagementError(operation, error, pv);
    }
  }

  toString(): string {
    return `[Admin Client] Archiver Appliance on: ${this.endpoint}`;
  }
}

function toManagementError(operation: string, error: unknown, pv?: string): ArchiverError {
  if (error instanceof ManagementError || error instanceof InvalidPVError) {
    return error;
  }
  const reason = errorMessage(error);
  return new ManagementError(`${operation} failed${pv ? ` for ${pv}` : ''}: ${reason}`, { pv, reason, cause: error });
}

function throwIfFailed(results: ManagementResult[]): ManagementResult {
  const [result] = results;
  if (result.error) {
    throw result.error;
  }
  return result;
}
