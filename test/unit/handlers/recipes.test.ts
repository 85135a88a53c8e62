import { createDefaultRegistry } from '../../../src/handlers/index.js';
import { saltRepoDefinition } from '../../../src/handlers/recipes/rhel.js';
import { saltstackRepository } from '../../../src/handlers/recipes/suse.js';
import type { HandlerContext } from '../../../src/types/context.js';
import type { ConfigOverrides } from '../../../src/types/config.js';
import type { Identity } from '../../../src/types/identity.js';
import type { InstallMode } from '../../../src/types/install.js';
import { BootstrapErrorCode } from '../../../src/shared/errors.js';
import { RecordingExecutor, makeContext } from '../../helpers/fakes.js';

const registry = createDefaultRegistry();

const CENTOS7: Partial<Identity> = { distroName: 'CentOS', distroNameNormalized: 'centos', version: '7.9', majorVersion: '7', minorVersion: '9', codename: null };
const ROCKY_LIKE: Partial<Identity> = { ...CENTOS7, version: '8.8', majorVersion: '8', minorVersion: '8' };
const DEBIAN11: Partial<Identity> = { distroName: 'Debian', distroNameNormalized: 'debian', version: '11', majorVersion: '11', minorVersion: null, codename: 'bullseye' };
const ARCH: Partial<Identity> = { distroName: 'Arch Linux', distroNameNormalized: 'arch_linux', version: '', majorVersion: null, minorVersion: null, codename: null };
const FREEBSD: Partial<Identity> = { distroName: 'FreeBSD', distroNameNormalized: 'freebsd', version: '13.2', majorVersion: '13', minorVersion: '2', codename: null };
const SLES: Partial<Identity> = { distroName: 'suse', distroNameNormalized: 'suse', version: '15.5', majorVersion: '15', minorVersion: '5', codename: null };

async function run(
  name: string,
  options: { identity?: Partial<Identity>; mode?: InstallMode; config?: ConfigOverrides; executor?: RecordingExecutor } = {},
): Promise<string[]> {
  const handler = registry.get(name);
  if (!handler) throw new Error(`${name} is not registered`);
  const executor = options.executor ?? new RecordingExecutor();
  const ctx: HandlerContext = makeContext({ ...options, executor });
  await handler(ctx);
  return executor.lines();
}

const APT_INSTALL = 'apt-get install -y --no-install-recommends -o DPkg::Options::=--force-confold';

describe('createDefaultRegistry', () => {
  it('registers the distro-agnostic defaults', () => {
    expect(registry.get('config_salt')).toBeDefined();
    expect(registry.get('preseed_master')).toBeDefined();
    expect(registry.get('daemons_running')).toBeDefined();
  });

  it('registers an install handler for each supported channel', () => {
    for (const name of [
      'install_ubuntu_stable',
      'install_ubuntu_daily',
      'install_ubuntu_onedir',
      'install_debian_git',
      'install_centos_testing',
      'install_amazon_linux_ami_stable',
      'install_fedora_stable',
      'install_opensuse_stable',
      'install_suse_git',
      'install_arch_linux_stable',
      'install_freebsd_stable',
    ]) {
      expect(registry.get(name)).toBeDefined();
    }
  });

  it('overrides configuration for FreeBSD', () => {
    expect(registry.get('config_freebsd_salt')).toBeDefined();
  });
});

describe('apt recipes', () => {
  it('installs base and build dependencies for git installs', async () => {
    const lines = await run('install_debian_git_deps', { identity: DEBIAN11, mode: { type: 'git', revision: 'develop' } });
    expect(lines).toEqual([
      'apt-get update',
      `${APT_INSTALL} ca-certificates curl gnupg procps pciutils python3-apt`,
      `${APT_INSTALL} git python3 python3-dev python3-pip python3-setuptools build-essential`,
    ]);
  });

  it('upgrades the system and installs extra packages when asked', async () => {
    const lines = await run('install_ubuntu_stable_deps', {
      config: { lifecycle: { upgrade_system: true }, packages: { extra: ['vim'], disable_repos: true } },
    });
    expect(lines).toEqual([
      'apt-get update',
      'apt-get upgrade -y -o DPkg::Options::=--force-confold',
      `${APT_INSTALL} ca-certificates curl gnupg procps pciutils python3-apt`,
      `${APT_INSTALL} vim`,
    ]);
  });

  it('runs apt non-interactively', async () => {
    const executor = new RecordingExecutor();
    await run('install_ubuntu_stable', { executor });
    expect(executor.commands[0]?.env).toEqual({ DEBIAN_FRONTEND: 'noninteractive' });
    expect(executor.lines()).toEqual([`${APT_INSTALL} salt-minion`]);
  });

  it('adds the daily PPA', async () => {
    const lines = await run('install_ubuntu_daily_deps', { mode: { type: 'daily' } });
    expect(lines.slice(-2)).toEqual(['add-apt-repository -y ppa:saltstack/salt-daily', 'apt-get update']);
  });

  it('installs from the checkout with pip requirements when allowed', async () => {
    const lines = await run('install_debian_git', {
      identity: DEBIAN11,
      mode: { type: 'git', revision: 'develop' },
      config: { lifecycle: { pip_allowed: true } },
    });
    expect(lines).toEqual([
      'python3 -m pip install -r /tmp/git/salt/requirements/base.txt',
      'python3 -m pip install --upgrade /tmp/git/salt',
    ]);
  });

  it('installs systemd units from the checkout', async () => {
    const lines = await run('install_debian_git_post', {
      identity: DEBIAN11,
      mode: { type: 'git', revision: 'develop' },
      config: { targets: { master: true } },
    });
    expect(lines).toEqual([
      'install -m 0644 /tmp/git/salt/pkg/common/salt-minion.service /lib/systemd/system/salt-minion.service',
      'install -m 0644 /tmp/git/salt/pkg/common/salt-master.service /lib/systemd/system/salt-master.service',
      'systemctl daemon-reload',
      'systemctl enable salt-minion.service',
      'systemctl enable salt-master.service',
    ]);
  });

  it('fails the repository setup without a codename', async () => {
    const handler = registry.get('install_debian_stable_deps');
    if (!handler) throw new Error('install_debian_stable_deps is not registered');
    const ctx = makeContext({ identity: { ...DEBIAN11, codename: null } });
    await expect(handler(ctx)).rejects.toMatchObject({ code: BootstrapErrorCode.HANDLER_FAILED });
  });
});

describe('rpm recipes', () => {
  it('uses yum before EL 8', async () => {
    expect(await run('install_centos_stable', { identity: CENTOS7, config: { targets: { master: true } } })).toEqual([
      'yum install -y salt-minion salt-master',
    ]);
  });

  it('uses dnf from EL 8 and enables the testing repository for testing installs', async () => {
    expect(await run('install_centos_testing', { identity: ROCKY_LIKE, mode: { type: 'testing' } })).toEqual([
      'dnf install -y --enablerepo=salt-testing salt-minion',
    ]);
  });

  it('enables the units after install', async () => {
    expect(await run('install_centos_stable_post', { identity: CENTOS7 })).toEqual([
      'systemctl daemon-reload',
      'systemctl enable salt-minion.service',
    ]);
  });

  it('restarts the selected daemons', async () => {
    expect(await run('install_centos_restart_daemons', { identity: CENTOS7 })).toEqual([
      'systemctl stop salt-minion.service',
      'systemctl start salt-minion.service',
    ]);
  });
});

describe('saltRepoDefinition', () => {
  it('defines the stable repository enabled and testing disabled', () => {
    const definition = saltRepoDefinition('https://repo.example.com/stable', 'https://repo.example.com/testing');
    expect(definition.split('\n')).toEqual([
      '[salt-repo]',
      'name=Salt repo for RHEL/CentOS $releasever',
      'baseurl=https://repo.example.com/stable',
      'enabled=1',
      'gpgcheck=1',
      'gpgkey=file:///etc/pki/rpm-gpg/SALT-PROJECT-GPG-PUBKEY-2023.pub',
      '',
      '[salt-testing]',
      'name=Salt testing repo for RHEL/CentOS $releasever',
      'baseurl=https://repo.example.com/testing',
      'enabled=0',
      'gpgcheck=1',
      'gpgkey=file:///etc/pki/rpm-gpg/SALT-PROJECT-GPG-PUBKEY-2023.pub',
      '',
    ]);
  });
});

describe('zypper recipes', () => {
  it('builds the project repository URL', () => {
    expect(saltstackRepository('suse', '15', '5')).toBe(
      'https://download.opensuse.org/repositories/systemsmanagement:/saltstack/SLE_15/systemsmanagement:saltstack.repo',
    );
    expect(saltstackRepository('opensuse', '15', '5')).toBe(
      'https://download.opensuse.org/repositories/systemsmanagement:/saltstack/openSUSE_Leap_15.5/systemsmanagement:saltstack.repo',
    );
  });

  it('adds the repository once and tolerates partial refresh failures', async () => {
    const executor = new RecordingExecutor().reply('zypper --non-interactive --gpg-auto-import-keys refresh', { exitCode: 4 });
    const lines = await run('install_suse_stable_deps', { identity: SLES, executor });
    expect(lines).toEqual([
      'zypper --non-interactive repos',
      `zypper --non-interactive addrepo --refresh ${saltstackRepository('suse', '15', '5')} systemsmanagement_saltstack`,
      'zypper --non-interactive --gpg-auto-import-keys refresh',
      'zypper --non-interactive install --auto-agree-with-licenses curl python3 python3-pyzmq python3-PyYAML python3-Jinja2',
    ]);
  });

  it('skips a repository that is already configured', async () => {
    const executor = new RecordingExecutor().reply('zypper --non-interactive repos', { stdout: '1 | systemsmanagement_saltstack | Yes' });
    const lines = await run('install_suse_stable_deps', { identity: SLES, executor });
    expect(lines[1]).toBe('zypper --non-interactive --gpg-auto-import-keys refresh');
  });

  it('fails on other refresh errors', async () => {
    const executor = new RecordingExecutor().reply('zypper --non-interactive --gpg-auto-import-keys refresh', { exitCode: 7 });
    await expect(run('install_opensuse_stable_deps', { identity: { ...SLES, distroNameNormalized: 'opensuse' }, executor })).rejects.toThrow(
      'zypper refresh exited with 7',
    );
  });
});

describe('arch recipes', () => {
  it('initialises the keyring on fresh images', async () => {
    const executor = new RecordingExecutor().reply('test -d', { exitCode: 1 });
    const lines = await run('install_arch_linux_stable_deps', { identity: ARCH, executor });
    expect(lines).toEqual([
      'test -d /etc/pacman.d/gnupg',
      'pacman-key --init',
      'pacman-key --populate archlinux',
      'pacman -Sy --noconfirm --needed pacman',
    ]);
  });

  it('installs the single salt package', async () => {
    expect(await run('install_arch_linux_stable', { identity: ARCH })).toEqual(['pacman -Syu --noconfirm --needed salt']);
  });
});

describe('freebsd recipes', () => {
  it('bootstraps pkg before installing dependencies', async () => {
    const executor = new RecordingExecutor();
    const lines = await run('install_freebsd_stable_deps', { identity: FREEBSD, executor });
    expect(lines).toEqual(['pkg bootstrap -f', 'pkg update -f', 'pkg install -y -r FreeBSD swig']);
    expect(executor.commands[0]?.env).toEqual({ ASSUME_ALWAYS_YES: 'yes' });
  });

  it('enables daemons through rc.conf', async () => {
    expect(await run('install_freebsd_post', { identity: FREEBSD, config: { targets: { master: true } } })).toEqual([
      'sysrc salt_minion_enable=YES',
      'sysrc salt_master_enable=YES',
    ]);
  });
});
