import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { deepMerge, loadConfig, parseEnvBoolean, readEnvironment } from '../../../src/config/loader.js';
import { BootstrapErrorCode } from '../../../src/shared/errors.js';
import { parseArguments } from '../../../src/config/arguments.js';
import { SALTSTACK_REPO_URL } from '../../../src/config/schema.js';

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bs-config-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true });
  });

  async function writeDefaults(content: string): Promise<string> {
    const file = path.join(tmpDir, 'defaults.yaml');
    await fs.writeFile(file, content, 'utf-8');
    return file;
  }

  it('returns the built-in defaults', () => {
    const { config, defaultsFile } = loadConfig({ env: {} });
    expect(defaultsFile).toBeNull();
    expect(config.targets).toEqual({ minion: true, master: false, syndic: false });
    expect(config.lifecycle.sleep_seconds).toBe(3);
    expect(config.paths.salt_pki_dir).toBe('/etc/salt/pki');
    expect(config.output.log_file).toBe('/tmp/bootstrap-salt.log');
  });

  it('switches git:// repository URLs from the defaults file to https with -G', async () => {
    const defaultsFile = await writeDefaults(
      'git:\n  repo_url: git://github.com/saltstack/salt.git\n  upstream_url: git://github.com/saltstack/salt.git\n',
    );
    const withoutFlag = loadConfig({ env: {}, defaultsFile });
    expect(withoutFlag.config.git.upstream_url).toBe('git://github.com/saltstack/salt.git');

    const parsed = parseArguments(['-G', 'git'], '1.2.3');
    const { config } = loadConfig({ env: {}, defaultsFile, overrides: parsed?.overrides });
    expect(config.git.repo_url).toBe(SALTSTACK_REPO_URL);
    expect(config.git.upstream_url).toBe(SALTSTACK_REPO_URL);
  });

  it('derives the pki directory from the etc directory', () => {
    const { config } = loadConfig({ env: { BS_SALT_ETC_DIR: '/opt/salt/etc' } });
    expect(config.paths.salt_pki_dir).toBe('/opt/salt/etc/pki');
  });

  it('keeps an explicit pki directory', () => {
    const { config } = loadConfig({ env: { BS_SALT_ETC_DIR: '/opt/salt/etc', BS_SALT_PKI_DIR: '/srv/pki' } });
    expect(config.paths.salt_pki_dir).toBe('/srv/pki');
  });

  it('reads the defaults file', async () => {
    const file = await writeDefaults('lifecycle:\n  sleep_seconds: 10\npackages:\n  extra:\n    - vim\n');
    const { config, defaultsFile } = loadConfig({ env: {}, defaultsFile: file });
    expect(defaultsFile).toBe(file);
    expect(config.lifecycle.sleep_seconds).toBe(10);
    expect(config.lifecycle.start_daemons).toBe(true);
    expect(config.packages.extra).toEqual(['vim']);
  });

  it('finds the defaults file through BS_DEFAULTS_FILE', async () => {
    const file = await writeDefaults('targets:\n  master: true\n');
    const { config, defaultsFile } = loadConfig({ env: { BS_DEFAULTS_FILE: file } });
    expect(defaultsFile).toBe(file);
    expect(config.targets.master).toBe(true);
  });

  it('layers file, environment and flags in that order', async () => {
    const file = await writeDefaults('network:\n  http_proxy: http://file-proxy:3128\nlifecycle:\n  sleep_seconds: 10\n');
    const { config } = loadConfig({
      env: { BS_HTTP_PROXY: 'http://env-proxy:3128' },
      defaultsFile: file,
      overrides: { lifecycle: { sleep_seconds: 1 } },
    });
    expect(config.network.http_proxy).toBe('http://env-proxy:3128');
    expect(config.lifecycle.sleep_seconds).toBe(1);
  });

  it('accepts an empty defaults file', async () => {
    const file = await writeDefaults('');
    expect(loadConfig({ env: {}, defaultsFile: file }).config.lifecycle.sleep_seconds).toBe(3);
  });

  it('rejects a missing defaults file', () => {
    const missing = path.join(tmpDir, 'missing.yaml');
    expect(() => loadConfig({ env: {}, defaultsFile: missing })).toThrow(`Defaults file not found: ${missing}`);
  });

  it('rejects a defaults file that is not a mapping', async () => {
    const file = await writeDefaults('- a\n- b\n');
    expect(() => loadConfig({ env: {}, defaultsFile: file })).toThrow(`Defaults file ${file} must contain a mapping`);
  });

  it('rejects invalid values', async () => {
    const file = await writeDefaults('lifecycle:\n  sleep_seconds: soon\n');
    expect(() => loadConfig({ env: {}, defaultsFile: file })).toThrow(
      expect.objectContaining({ code: BootstrapErrorCode.CONFIG_INVALID }),
    );
  });

  it('names the offending key', () => {
    expect(() => loadConfig({ env: {}, overrides: { lifecycle: { sleep_seconds: -1 } } })).toThrow(
      /^Invalid configuration: lifecycle\.sleep_seconds: /,
    );
  });
});

describe('parseEnvBoolean', () => {
  it('accepts the usual spellings', () => {
    expect(parseEnvBoolean('BS_COLORS', 'TRUE')).toBe(true);
    expect(parseEnvBoolean('BS_COLORS', '1')).toBe(true);
    expect(parseEnvBoolean('BS_COLORS', ' no ')).toBe(false);
  });

  it('treats unset and empty as undefined', () => {
    expect(parseEnvBoolean('BS_COLORS', undefined)).toBeUndefined();
    expect(parseEnvBoolean('BS_COLORS', '')).toBeUndefined();
  });

  it('rejects anything else', () => {
    expect(() => parseEnvBoolean('BS_COLORS', 'maybe')).toThrow('BS_COLORS must be a boolean, got "maybe"');
  });
});

describe('readEnvironment', () => {
  it('maps BS_* variables onto config keys', () => {
    const overrides = readEnvironment({
      BS_ECHO_DEBUG: 'yes',
      BS_KEEP_TEMP_FILES: '1',
      BS_SALT_MASTER_ADDRESS: 'salt.example.com',
      BS_SALT_GIT_CHECKOUT_DIR: '/srv/salt-src',
    });
    expect(overrides.output?.debug).toBe(true);
    expect(overrides.lifecycle?.keep_temp_files).toBe(true);
    expect(overrides.minion?.master_address).toBe('salt.example.com');
    expect(overrides.git?.checkout_dir).toBe('/srv/salt-src');
    expect(overrides.output?.color).toBeUndefined();
  });
});

describe('deepMerge', () => {
  it('merges nested objects and keeps values the override leaves undefined', () => {
    expect(deepMerge({ a: { x: 1, y: 2 }, b: [1, 2] }, { a: { x: 3, y: undefined }, b: [9] })).toEqual({ a: { x: 3, y: 2 }, b: [9] });
  });
});
