/**
 * CSVフォーマッタのテスト
 * src/formatters/csv.tsの単体テスト
 */
import * as fs from 'fs';
import { CsvFormatter, escapeCsvCell } from '../../../src/formatters/csv';
import { Dataset } from '../../../src/types/data';

// ファイルシステム操作のモック
jest.mock('fs', () => ({
  promises: {
    mkdir: jest.fn().mockResolvedValue(undefined),
    writeFile: jest.fn().mockResolvedValue(undefined),
    access: jest.fn().mockImplementation((dirPath: string) => {
      // outディレクトリは存在するとみなす
      if (dirPath.endsWith('/out')) {
        return Promise.resolve();
      }
      // 他のパスは存在しないとみなす
      return Promise.reject(new Error('ENOENT'));
    }),
  },
}));

// テスト後にモックをリセット
afterEach(() => {
  jest.clearAllMocks();
});

describe('CsvFormatter', () => {
  const dataset: Dataset = {
    columns: ['TST:ai1', 'TST:wave', 'TST:msg'],
    rows: [
      { timestamp: '2023-11-14T22:13:20.000Z', values: [1.5, null, null] },
      { timestamp: '2023-11-14T22:13:25.000Z', values: [2, [1, 2, 3], 'a, "b"'] },
    ],
  };

  describe('format', () => {
    it('ヘッダー行と各行を出力すること', () => {
      const content = new CsvFormatter().format(dataset);

      expect(content).toBe([
        'timestamp,TST:ai1,TST:wave,TST:msg',
        '2023-11-14T22:13:20.000Z,1.5,,',
        '2023-11-14T22:13:25.000Z,2,1|2|3,"a, ""b"""',
        '',
      ].join('\n'));
    });

    it('行がない場合はヘッダーのみ出力すること', () => {
      expect(new CsvFormatter().format({ columns: ['TST:ai1'], rows: [] })).toBe('timestamp,TST:ai1\n');
    });

    it('localTime 指定時はローカル時刻で出力すること', () => {
      const content = new CsvFormatter({ localTime: true }).format({
        columns: ['TST:ai1'],
        rows: [{ timestamp: '2023-11-14T22:13:20.500Z', values: [1] }],
      });

      const [, row] = content.split('\n');
      expect(row).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.500,1$/);
    });
  });

  describe('writeData', () => {
    it('存在するディレクトリにはそのまま書き込むこと', async () => {
      await new CsvFormatter().writeData(dataset, 'data/out/result.csv');

      expect(fs.promises.mkdir).not.toHaveBeenCalled();
      expect(fs.promises.writeFile).toHaveBeenCalledWith(
        'data/out/result.csv',
        new CsvFormatter().format(dataset),
        'utf-8'
      );
    });

    it('存在しないディレクトリは作成すること', async () => {
      await new CsvFormatter().writeData(dataset, 'exports/2023/result.csv');

      expect(fs.promises.mkdir).toHaveBeenCalledWith('exports/2023', { recursive: true });
      expect(fs.promises.writeFile).toHaveBeenCalledTimes(1);
    });
  });
});

describe('escapeCsvCell', () => {
  it('区切り文字や引用符を含む値だけを引用すること', () => {
    expect(escapeCsvCell('plain')).toBe('plain');
    expect(escapeCsvCell('a,b')).toBe('"a,b"');
    expect(escapeCsvCell('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvCell('two\nlines')).toBe('"two\nlines"');
  });
});
