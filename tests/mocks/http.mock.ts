/**
 * HttpClientのモック
 * テストごとにルートを登録し、送信されたリクエストを記録する
 *
 * 使い方:
 *   jest.mock('../../src/io/http', () => ({
 *     ...jest.requireActual('../../src/io/http'),
 *     HttpClient: jest.requireActual('../mocks/http.mock').MockHttpClient,
 *   }));
 */
import type { HttpClientConfig, QueryParams } from '../../src/io/http';

type HttpModule = typeof import('../../src/io/http');

export type HttpMethod = 'GET' | 'POST';

/**
 * ルートハンドラ（例外を投げるとHTTPエラーを模擬できる）
 */
export type RouteHandler = (params: QueryParams, data: unknown) => unknown;

export interface RecordedRequest {
  method: HttpMethod;
  baseUrl: string;
  url: string;
  params: QueryParams;
  data?: unknown;
}

const routes = new Map<string, RouteHandler>();
const requests: RecordedRequest[] = [];

/**
 * 模擬サーバー
 */
export const mockServer = {
  /**
   * ルートを登録
   * @param method HTTPメソッド
   * @param url パス（例: "/retrieval/data/getData.json"）
   * @param handler レスポンスを返す関数
   */
  on(method: HttpMethod, url: string, handler: RouteHandler): void {
    routes.set(`${method} ${url}`, handler);
  },

  get requests(): RecordedRequest[] {
    return requests;
  },

  reset(): void {
    routes.clear();
    requests.length = 0;
  },
};

/**
 * 指定ステータスのHTTPエラーを作成
 */
export function httpError(status: number, url: string, body?: unknown): Error {
  const { HttpRequestError } = jest.requireActual<HttpModule>('../../src/io/http');
  let message = `Server error (${status})`;
  if (typeof body === 'string') {
    message += `: ${body}`;
  }
  return new HttpRequestError(message, url, status, body);
}

function dispatch(method: HttpMethod, baseUrl: string, url: string, params: QueryParams = {}, data?: unknown): unknown {
  requests.push({ method, baseUrl, url, params, data });
  const handler = routes.get(`${method} ${url}`);
  if (!handler) {
    throw httpError(404, `${baseUrl}${url}`);
  }
  return handler(params, data);
}

/**
 * HttpClientの代替クラス
 */
export class MockHttpClient {
  private base: string;

  constructor(config: HttpClientConfig) {
    this.base = config.base_url;
  }

  get baseUrl(): string {
    return this.base;
  }

  setBaseUrl(url: string): void {
    this.base = url;
  }

  async get(url: string, params?: QueryParams): Promise<unknown> {
    return dispatch('GET', this.base, url, params);
  }

  async getText(url: string, params?: QueryParams): Promise<string> {
    const body = dispatch('GET', this.base, url, params);
    return typeof body === 'string' ? body : JSON.stringify(body);
  }

  async post(url: string, data: unknown, params?: QueryParams): Promise<unknown> {
    return dispatch('POST', this.base, url, params, data);
  }
}
