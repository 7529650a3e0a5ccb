/**
 * ロガーのテスト
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { getLogFile, getLogLevel, getLogger, isLogLevel, setLogFile, setLogLevel } from '../../../src/utils/logger';

describe('Logger', () => {
  const originalLevel = getLogLevel();
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    jest.mocked(console.warn).mockClear();
  });

  afterEach(() => {
    errorSpy.mockRestore();
    setLogFile(undefined);
    setLogLevel(originalLevel);
  });

  it('設定したレベル未満のログは出力しないこと', () => {
    setLogLevel('warning');
    const logger = getLogger('archappl.test');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(errorSpy).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('レベル・名前・メッセージを1行で出力すること', () => {
    setLogLevel('debug');

    getLogger('archappl.test').info('Fetched TST:ai1');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] INFO: archappl\.test: Fetched TST:ai1$/);
  });

  it('ログファイル設定時は同じレコードをタイムスタンプ付きで追記すること', () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'archappl-log-'));
    const logPath = path.join(tmpDir, 'nested', 'app.log');
    try {
      setLogLevel('info');
      setLogFile(logPath);
      const logger = getLogger('archappl.test');

      logger.debug('hidden');
      logger.info('Fetched %s', 'TST:ai1');
      logger.warn('100% done');

      expect(getLogFile()).toBe(logPath);
      const lines = fs.readFileSync(logPath, 'utf-8').split('\n');
      expect(lines).toHaveLength(3);
      expect(lines[0]).toMatch(/^\[\d{8}T\d{2}:\d{2}:\d{2}\.\d{3}\] INFO: archappl\.test: Fetched TST:ai1$/);
      expect(lines[1]).toMatch(/^\[\d{8}T\d{2}:\d{2}:\d{2}\.\d{3}\] WARNING: archappl\.test: 100% done$/);
      expect(lines[2]).toBe('');
    } finally {
      setLogFile(undefined);
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it('ログレベル名を判定できること', () => {
    expect(isLogLevel('critical')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
