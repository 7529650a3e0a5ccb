/**
 * 設定ファイルの型定義
 */

export type DataFormat = 'json' | 'csv';

export type OutputFormat = 'csv' | 'json';

export interface ServerConfig {
  /**
   * Archiver Applianceのベース URL（スキーム＋ホスト）
   */
  url: string;
  admin_port?: number;
  data_port?: number;
  data_format: DataFormat;
  admin_disabled: boolean;
  /**
   * 開始時刻省略時の取得期間（例: "1 hour"）
   */
  default_window: string;
  timeout: number;
}

export interface GetCommandConfig {
  output_format: OutputFormat;
}

export interface ArchiverConfig {
  /**
   * 読み込んだ設定ファイルの絶対パス
   */
  path: string;
  /**
   * [main] use で選択されたセクション名
   */
  server_name: string;
  server: ServerConfig;
  /**
   * データ取得APIのURL（url + data_port）
   */
  data_url: string;
  /**
   * 管理APIのURL（url + admin_port）
   */
  admin_url: string;
  cli: {
    get: GetCommandConfig;
  };
}
