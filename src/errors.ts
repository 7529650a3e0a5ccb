/**
 * エラー型定義
 * クライアントが送出するすべての例外はArchiverErrorを継承する
 */

/**
 * 基底エラークラス
 */
export class ArchiverError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 設定ファイルが見つからない、または解析に失敗した
 */
export class ConfigurationError extends ArchiverError {
  /**
   * @param message エラーメッセージ
   * @param configPath 問題のあった設定ファイル（特定できる場合）
   */
  constructor(message: string, public readonly configPath?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * データ取得時の通信・HTTPエラー
 */
export class RetrievalError extends ArchiverError {
  public readonly pv?: string;
  public readonly status?: number;

  constructor(message: string, details: { pv?: string; status?: number; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.pv = details.pv;
    this.status = details.status;
  }
}

/**
 * レスポンスがスキーマに一致しない
 */
export class ResponseDecodeError extends RetrievalError {
  /**
   * @param context デコード対象の説明（エンドポイント名など）
   * @param issues スキーマ違反の一覧
   */
  constructor(
    public readonly context: string,
    public readonly issues: string[],
    details: { pv?: string; cause?: unknown } = {}
  ) {
    super(`Invalid response from ${context}: ${issues.join('; ')}`, details);
  }
}

/**
 * サーバーが未知のPVとして拒否した
 */
export class InvalidPVError extends RetrievalError {
  public readonly pv: string;

  constructor(pv: string, details: { status?: number; cause?: unknown } = {}) {
    super(`PV "${pv}" is not archived or does not exist`, { ...details, pv });
    this.pv = pv;
  }
}

/**
 * 管理APIの操作がサーバーに拒否された
 */
export class ManagementError extends ArchiverError {
  public readonly pv?: string;
  public readonly reason?: string;

  constructor(message: string, details: { pv?: string; reason?: string; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.pv = details.pv;
    this.reason = details.reason;
  }
}

/**
 * 時刻表現を解釈できない
 */
export class TimeFormatError extends ArchiverError {
  constructor(public readonly input: string, reason?: string) {
    super(`Invalid time expression "${input}"${reason ? `: ${reason}` : ''}`);
  }
}

/**
 * 任意の例外値からメッセージを取り出す
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
