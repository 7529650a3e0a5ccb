/**
 * データセット結合のテスト
 */
import { buildDataset } from '../../src/dataset';
import { makeSeries } from '../fixtures/test-data';

describe('buildDataset', () => {
  it('タイムスタンプの和集合で結合し、欠損は直前の値で補完すること', () => {
    const dataset = buildDataset([
      makeSeries('A', [[0, 1], [10, 3]]),
      makeSeries('B', [[5, 20]]),
    ]);

    expect(dataset).toEqual({
      columns: ['A', 'B'],
      rows: [
        { timestamp: '2023-11-14T22:13:20.000Z', values: [1, null] },
        { timestamp: '2023-11-14T22:13:25.000Z', values: [1, 20] },
        { timestamp: '2023-11-14T22:13:30.000Z', values: [3, 20] },
      ],
    });
  });

  it('同じ時刻のサンプルは1行にまとめること', () => {
    const dataset = buildDataset([
      makeSeries('A', [[0, 1]]),
      makeSeries('B', [[0, 'on']]),
    ]);

    expect(dataset.rows).toEqual([
      { timestamp: '2023-11-14T22:13:20.000Z', values: [1, 'on'] },
    ]);
  });

  it('列の順序は入力の順序に従うこと', () => {
    const dataset = buildDataset([makeSeries('Z', []), makeSeries('A', [[0, 1]])]);

    expect(dataset.columns).toEqual(['Z', 'A']);
    expect(dataset.rows).toEqual([{ timestamp: '2023-11-14T22:13:20.000Z', values: [null, 1] }]);
  });

  it('時系列がない場合は空の表になること', () => {
    expect(buildDataset([])).toEqual({ columns: [], rows: [] });
  });

  describe('再サンプリング', () => {
    it('一定間隔の格子上で直前の値を採用すること', () => {
      const dataset = buildDataset(
        [makeSeries('A', [[0, 1], [10, 3]]), makeSeries('B', [[0, 10], [7, 20]])],
        { resampleSeconds: 5 }
      );

      expect(dataset.rows).toEqual([
        { timestamp: '2023-11-14T22:13:20.000Z', values: [1, 10] },
        { timestamp: '2023-11-14T22:13:25.000Z', values: [1, 10] },
        { timestamp: '2023-11-14T22:13:30.000Z', values: [3, 20] },
      ]);
    });

    it('すべての列に値が揃う前の格子点は出力しないこと', () => {
      const dataset = buildDataset(
        [makeSeries('A', [[0, 1], [10, 3]]), makeSeries('B', [[6, 2]])],
        { resampleSeconds: 5 }
      );

      expect(dataset.rows).toEqual([
        { timestamp: '2023-11-14T22:13:30.000Z', values: [3, 2] },
      ]);
    });

    it('格子点を間隔の整数倍の時刻に揃えること', () => {
      const dataset = buildDataset([makeSeries('A', [[2, 1], [12, 3]])], { resampleSeconds: 5 });

      expect(dataset.rows).toEqual([
        { timestamp: '2023-11-14T22:13:25.000Z', values: [1] },
        { timestamp: '2023-11-14T22:13:30.000Z', values: [1] },
      ]);
    });

    it('間隔が正でない場合はRangeErrorになること', () => {
      expect(() => buildDataset([makeSeries('A', [[0, 1]])], { resampleSeconds: 0 })).toThrow(RangeError);
    });
  });
});
