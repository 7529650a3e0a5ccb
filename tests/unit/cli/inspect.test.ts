/**
 * archappl-inspect CLIのテスト
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { runInspect } from '../../../cli/inspect';
import { mockServer } from '../../mocks/http.mock';
import { createRecordingIO } from '../../mocks/cli-io.mock';
import {
  TEST_INI,
  TEST_PV,
  TEST_PV_2,
  UNKNOWN_PV,
  ai1TypeInfo,
  applianceInfo,
  pvStatusList,
} from '../../fixtures/test-data';

// HttpClientモジュールのモック
jest.mock('../../../src/io/http', () => ({
  ...jest.requireActual('../../../src/io/http'),
  HttpClient: jest.requireActual('../../mocks/http.mock').MockHttpClient,
}));

const MGMT = '/mgmt/bpl';

describe('archappl-inspect', () => {
  let tmpDir: string;
  let configFile: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'archappl-inspect-'));
    configFile = path.join(tmpDir, 'config.ini');
    fs.writeFileSync(configFile, TEST_INI, 'utf-8');

    mockServer.reset();
    mockServer.on('GET', `${MGMT}/getAllPVs`, () => [TEST_PV, TEST_PV_2, 'OTHER:x']);
    mockServer.on('GET', `${MGMT}/getPVStatus`, () => pvStatusList);
    mockServer.on('GET', `${MGMT}/getApplianceInfo`, () => applianceInfo);
    mockServer.on('GET', `${MGMT}/getPVTypeInfo`, params => (params.pv === TEST_PV ? ai1TypeInfo : {}));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('--list でパターンに一致するPV名を1行ずつ出力すること', async () => {
    const { io, stdout } = createRecordingIO();

    const code = await runInspect(['--list', 'TST*', '--config-file', configFile], io);

    expect(code).toBe(0);
    expect(stdout()).toBe(`${TEST_PV}\n${TEST_PV_2}\n`);
    expect(mockServer.requests[0].baseUrl).toBe('http://archiver.test:17665');
    expect(mockServer.requests[0].params).toEqual({ pv: 'TST*', limit: -1 });
  });

  it('--limit all で件数上限なしを要求すること', async () => {
    const { io } = createRecordingIO();

    expect(await runInspect(['--list', 'TST*', '--limit', 'all', '--config-file', configFile], io)).toBe(0);
    expect(mockServer.requests[0].params).toEqual({ pv: 'TST*', limit: -1 });
  });

  it('--limit に正の整数・all 以外を指定すると終了コード1を返すこと', async () => {
    const { io, stderr } = createRecordingIO();

    expect(await runInspect(['--list', '--limit', '0', '--config-file', configFile], io)).toBe(1);
    expect(stderr()).toContain('Must be a positive number.');
    expect(mockServer.requests).toHaveLength(0);
  });

  it('--list のパターン省略時は全件を出力すること', async () => {
    const { io, stdout } = createRecordingIO();

    expect(await runInspect(['--list', '--limit', '5', '--config-file', configFile], io)).toBe(0);
    expect(stdout()).toBe(`${TEST_PV}\n${TEST_PV_2}\nOTHER:x\n`);
    expect(mockServer.requests[0].params).toEqual({ pv: undefined, limit: 5 });
  });

  it('PV名を指定するとアーカイブ状態をJSONで出力すること', async () => {
    const { io, stdout } = createRecordingIO();

    const code = await runInspect([TEST_PV, TEST_PV_2, '--config-file', configFile], io);

    expect(code).toBe(0);
    expect(JSON.parse(stdout())).toEqual({
      [TEST_PV]: pvStatusList[0],
      [TEST_PV_2]: pvStatusList[1],
    });
  });

  it('--sub-keys で出力するキーを絞り込むこと', async () => {
    const { io, stdout } = createRecordingIO();

    const code = await runInspect(['--pv', TEST_PV, '--pv', TEST_PV_2, '--sub-keys', 'status,lastEvent', '--config-file', configFile], io);

    expect(code).toBe(0);
    expect(JSON.parse(stdout())).toEqual({
      [TEST_PV]: { status: 'Being archived', lastEvent: 'Nov/14/2023 22:13:30 UTC' },
      [TEST_PV_2]: { status: 'Paused', lastEvent: 'N/A' },
    });
  });

  it('--key type で存在しないPVがある場合はPV名を表示して終了コード1を返すこと', async () => {
    const { io, stdout, stderr } = createRecordingIO();

    const code = await runInspect([TEST_PV, UNKNOWN_PV, '--key', 'type', '--config-file', configFile], io);

    expect(code).toBe(1);
    expect(stderr()).toContain(`PV "${UNKNOWN_PV}" is not archived or does not exist`);
    expect(JSON.parse(stdout())).toEqual({ [TEST_PV]: ai1TypeInfo });
  });

  it('--info でアプライアンス情報をYAMLで出力すること', async () => {
    const { io, stdout } = createRecordingIO();

    const code = await runInspect(['--info', '-f', 'yaml', '--config-file', configFile], io);

    expect(code).toBe(0);
    expect(stdout()).toContain('identity: appliance0\n');
  });

  it('--show-config で使用中の設定を出力すること', async () => {
    const { io, stdout } = createRecordingIO();

    const code = await runInspect(['--show-config', '--config-file', configFile], io);

    expect(code).toBe(0);
    const shown = JSON.parse(stdout());
    expect(shown.path).toBe(configFile);
    expect(shown.server_name).toBe('site');
    expect(shown.data_url).toBe('http://archiver.test:17668');
    expect(mockServer.requests).toHaveLength(0);
  });

  it('操作が指定されていない場合は終了コード1を返すこと', async () => {
    const { io, stderr } = createRecordingIO();

    expect(await runInspect(['--config-file', configFile], io)).toBe(1);
    expect(stderr()).toContain('Specify exactly one of');
  });

  it('複数の操作を同時に指定した場合は終了コード1を返すこと', async () => {
    const { io } = createRecordingIO();

    expect(await runInspect([TEST_PV, '--info', '--config-file', configFile], io)).toBe(1);
    expect(mockServer.requests).toHaveLength(0);
  });

  it('管理APIが無効化されている場合は終了コード2を返すこと', async () => {
    const disabledFile = path.join(tmpDir, 'disabled.ini');
    fs.writeFileSync(
      disabledFile,
      '[main]\nuse = site\n[site]\nurl = http://archiver.test\nadmin_disabled = true\n',
      'utf-8'
    );
    const { io, stderr } = createRecordingIO();

    const code = await runInspect(['--info', '--config-file', disabledFile], io);

    expect(code).toBe(2);
    expect(stderr()).toContain('Management client is disabled');
  });

  it('-o 指定時はファイルに書き込むこと', async () => {
    const outputPath = path.join(tmpDir, 'status.json');
    const { io, stdout } = createRecordingIO();

    expect(await runInspect([TEST_PV, '-o', outputPath, '--config-file', configFile], io)).toBe(0);
    expect(stdout()).toBe('');
    expect(JSON.parse(fs.readFileSync(outputPath, 'utf-8'))).toHaveProperty([TEST_PV, 'status'], 'Being archived');
  });
});
