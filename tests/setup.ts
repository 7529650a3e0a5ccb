/**
 * Jestグローバルセットアップファイル
 */

// ファイルをモジュールとして扱うためのエクスポート
export {};

// グローバルタイムアウトの設定
jest.setTimeout(10000);

// グローバルマッチャーの追加
expect.extend({
  toBeWithinRange(received: number, floor: number, ceiling: number) {
    const pass = received >= floor && received <= ceiling;
    return {
      message: () =>
        pass
          ? `expected ${received} not to be within range ${floor} - ${ceiling}`
          : `expected ${received} to be within range ${floor} - ${ceiling}`,
      pass,
    };
  },
});

// カスタムマッチャータイプの定義
declare global {
  namespace jest {
    interface Matchers<R> {
      toBeWithinRange(floor: number, ceiling: number): R;
    }
  }
}

// コンソール出力のモック化
beforeAll(() => {
  // ロガーは warning を console.warn に出すため抑制
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'warn').mockImplementation(() => {});
  // エラーはそのまま出力（デバッグのため）
});

// テスト終了時にモックをリストア
afterAll(() => {
  jest.restoreAllMocks();
});
