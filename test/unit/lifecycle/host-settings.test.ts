import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { applyHostSettings } from '../../../src/lifecycle/host-settings.js';
import { makeConfig } from '../../helpers/fakes.js';

describe('applyHostSettings', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bs-host-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true });
  });

  const paths = () => ({ salt_etc_dir: path.join(tmpDir, 'etc'), salt_cache_dir: path.join(tmpDir, 'cache') });

  it('writes the master address and minion id', async () => {
    await applyHostSettings(makeConfig({ paths: paths(), minion: { master_address: 'salt.example.com', minion_id: 'web01' } }));

    expect(await fs.readFile(path.join(tmpDir, 'etc', 'minion.d', '99-master-address.conf'), 'utf-8')).toBe('master: salt.example.com\n');
    expect(await fs.readFile(path.join(tmpDir, 'etc', 'minion_id'), 'utf-8')).toBe('web01\n');
    expect((await fs.stat(path.join(tmpDir, 'cache', 'minion', 'proc'))).isDirectory()).toBe(true);
  });

  it('writes nothing for a master-only run', async () => {
    await applyHostSettings(makeConfig({ paths: paths(), targets: { minion: false, master: true } }));
    expect(await fs.readdir(tmpDir)).toEqual([]);
  });
});
