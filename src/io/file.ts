/**
 * ファイル操作モジュール
 * ファイルの読み書き操作を提供
 */
import * as fs from 'fs';
import * as path from 'path';
import { getLogger } from '../utils/logger';

const logger = getLogger('archappl.file');

/**
 * ディレクトリが存在しない場合は作成
 * @param dirPath ディレクトリパス
 */
export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  try {
    await fs.promises.access(dirPath);
  } catch {
    await fs.promises.mkdir(dirPath, { recursive: true });
    logger.info(`Created directory: ${dirPath}`);
  }
}

/**
 * テキストをファイルに書き込む（親ディレクトリは自動作成）
 * @param filePath ファイルパス
 * @param content 内容
 */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await ensureDirectoryExists(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf-8');
  logger.info(`Wrote ${filePath}`);
}

/**
 * PVリストファイルを読み込む
 * 1行1PV、空行と # で始まる行は無視、重複は除去
 * @param filePath ファイルパス
 * @returns PV名リスト（出現順）
 */
export async function readPvFile(filePath: string): Promise<string[]> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  const pvs = content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line !== '' && !line.startsWith('#'));
  return Array.from(new Set(pvs));
}
