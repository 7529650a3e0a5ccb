/**
 * HTTP通信モジュール
 * APIリクエストの共通処理を提供
 */
import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { getLogger } from '../utils/logger';

const logger = getLogger('archappl.http');

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * HTTPクライアント設定
 */
export interface HttpClientConfig {
  base_url: string;
  timeout: number;
}

/**
 * HTTPクライアントの追加オプション
 */
export interface HttpClientOptions {
  /**
   * axiosのアダプタ（リクエストの送信方法を差し替える場合に指定）
   */
  adapter?: AxiosAdapter;
}

/**
 * HTTPレベルの失敗
 * statusがundefinedの場合はサーバーから応答がなかったことを示す
 */
export class HttpRequestError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    public readonly body?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'HttpRequestError';
  }
}

/**
 * HTTP通信クライアントクラス
 * ベースURLは変更可能だが、リクエスト実行中の変更は想定しない
 */
export class HttpClient {
  private client: AxiosInstance;

  /**
   * @param config HTTPクライアント設定
   * @param options 追加オプション
   */
  constructor(config: HttpClientConfig, options: HttpClientOptions = {}) {
    this.client = axios.create({
      baseURL: config.base_url,
      timeout: config.timeout,
      adapter: options.adapter,
      headers: {
        'Content-Type': 'application/json',
        'Accept': 'application/json',
      },
    });

    // レスポンスインターセプタ
    this.client.interceptors.response.use(
      this.handleSuccess,
      this.handleError
    );
  }

  get baseUrl(): string {
    return this.client.defaults.baseURL || '';
  }

  /**
   * ベースURLを変更
   */
  setBaseUrl(url: string): void {
    this.client.defaults.baseURL = url;
  }

  /**
   * GETリクエストを送信しJSONを受け取る
   * @param url エンドポイントURL
   * @param params クエリパラメータ
   * @returns 未検証のレスポンスボディ
   */
  async get(url: string, params?: QueryParams): Promise<unknown> {
    const config: AxiosRequestConfig = { params };
    logger.debug(`GET ${this.baseUrl}${url}`, params ?? {});
    const response = await this.client.get<unknown>(url, config);
    return response.data;
  }

  /**
   * GETリクエストを送信しテキストを受け取る（CSV用）
   * @param url エンドポイントURL
   * @param params クエリパラメータ
   */
  async getText(url: string, params?: QueryParams): Promise<string> {
    const config: AxiosRequestConfig = {
      params,
      responseType: 'text',
      headers: { 'Accept': 'text/csv, text/plain' },
    };
    logger.debug(`GET ${this.baseUrl}${url}`, params ?? {});
    const response = await this.client.get<unknown>(url, config);
    return typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
  }

  /**
   * POSTリクエストを送信
   * @param url エンドポイントURL
   * @param data リクエストボディ
   * @param params クエリパラメータ
   * @returns 未検証のレスポンスボディ
   */
  async post(url: string, data: unknown, params?: QueryParams): Promise<unknown> {
    logger.debug(`POST ${this.baseUrl}${url}`, params ?? {});
    const response = await this.client.post<unknown>(url, data, { params });
    return response.data;
  }

  /**
   * 成功時のレスポンス処理
   * @param response レスポンス
   * @returns 処理されたレスポンス
   */
  private handleSuccess(response: AxiosResponse): AxiosResponse {
    return response;
  }

  /**
   * エラー時のレスポンス処理
   * @param error エラー
   * @throws HttpRequestError
   */
  private handleError(error: unknown): never {
    if (axios.isAxiosError(error)) {
      const { response, request, message, config } = error;
      const url = `${config?.baseURL ?? ''}${config?.url ?? ''}`;

      // レスポンスがある場合（サーバーからのエラー）
      if (response) {
        const status = response.status;
        const data: unknown = response.data;

        let errorMessage = `Server error (${status})`;
        if (typeof data === 'object' && data !== null && 'error' in data) {
          errorMessage += `: ${String(data.error)}`;
        } else if (typeof data === 'string' && data.trim() !== '') {
          errorMessage += `: ${data.trim().split('\n')[0]}`;
        }

        throw new HttpRequestError(errorMessage, url, status, data, { cause: error });
      }

      // リクエスト送信後にレスポンスがない場合
      if (request) {
        throw new HttpRequestError(`No response: could not reach ${url || 'server'} (${message})`, url, undefined, undefined, { cause: error });
      }

      // リクエスト設定時のエラー
      throw new HttpRequestError(`Request setup error: ${message}`, url, undefined, undefined, { cause: error });
    }

    // その他のエラー
    throw error;
  }
}
