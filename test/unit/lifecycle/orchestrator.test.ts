import { HandlerRegistry } from '../../../src/dispatch/registry.js';
import { LifecycleOrchestrator } from '../../../src/lifecycle/orchestrator.js';
import type { OrchestratorOptions } from '../../../src/lifecycle/orchestrator.js';
import type { CheckoutResult, SourceRetriever } from '../../../src/source/git.js';
import type { ConfigOverrides } from '../../../src/types/config.js';
import type { InstallMode } from '../../../src/types/install.js';
import type { Handler } from '../../../src/types/phase.js';
import { BootstrapErrorCode } from '../../../src/shared/errors.js';
import { makeContext } from '../../helpers/fakes.js';

describe('LifecycleOrchestrator', () => {
  let calls: string[];
  let sleep: jest.Mock<Promise<void>, [number]>;
  let hostSettings: jest.Mock<Promise<void>, []>;
  let diagnostics: jest.Mock<Promise<void>, []>;

  beforeEach(() => {
    calls = [];
    sleep = jest.fn<Promise<void>, [number]>(async () => {});
    hostSettings = jest.fn<Promise<void>, []>(async () => {
      calls.push('host-settings');
    });
    diagnostics = jest.fn<Promise<void>, []>(async () => {});
  });

  const record = (name: string): Handler => async () => {
    calls.push(name);
  };

  function fullRegistry(mode = 'stable'): HandlerRegistry {
    return new HandlerRegistry()
      .register('install_ubuntu_deps', record('install_ubuntu_deps'))
      .register(`install_ubuntu_${mode}`, record(`install_ubuntu_${mode}`))
      .register('install_ubuntu_post', record('install_ubuntu_post'))
      .register('install_ubuntu_check_services', record('install_ubuntu_check_services'))
      .register('install_ubuntu_restart_daemons', record('install_ubuntu_restart_daemons'))
      .register('daemons_running', record('daemons_running'));
  }

  function orchestrator(
    registry: HandlerRegistry,
    options: { config?: ConfigOverrides; mode?: InstallMode; sourceRetriever?: SourceRetriever } = {},
  ): LifecycleOrchestrator {
    const opts: OrchestratorOptions = {
      registry,
      context: makeContext({ config: options.config, mode: options.mode }),
      sourceRetriever: options.sourceRetriever,
      sleep,
      applyHostSettings: hostSettings,
      diagnostics,
    };
    return new LifecycleOrchestrator(opts);
  }

  it('fails before running anything when the install phase has no handler', async () => {
    const registry = new HandlerRegistry().register('install_ubuntu_deps', record('install_ubuntu_deps'));

    await expect(orchestrator(registry).run()).rejects.toMatchObject({
      code: BootstrapErrorCode.HANDLER_NOT_FOUND,
      message: 'No installation function found for Ubuntu 20.04 (stable (latest))',
    });
    expect(calls).toEqual([]);
  });

  it('runs the resolved handlers in phase order', async () => {
    const outcome = await orchestrator(fullRegistry()).run();

    expect(outcome).toEqual({
      status: 'installed',
      executed: [
        'install_ubuntu_deps',
        'install_ubuntu_stable',
        'install_ubuntu_post',
        'install_ubuntu_check_services',
        'install_ubuntu_restart_daemons',
        'daemons_running',
      ],
      checkout: null,
    });
    expect(calls).toEqual([
      'install_ubuntu_deps',
      'install_ubuntu_stable',
      'host-settings',
      'install_ubuntu_post',
      'install_ubuntu_check_services',
      'install_ubuntu_restart_daemons',
      'daemons_running',
    ]);
  });

  it('waits before restarting and checking daemons', async () => {
    await orchestrator(fullRegistry(), { config: { lifecycle: { sleep_seconds: 7 } } }).run();
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(7);
  });

  it('skips optional phases without a handler', async () => {
    const registry = new HandlerRegistry()
      .register('install_ubuntu_deps', record('install_ubuntu_deps'))
      .register('install_ubuntu_stable', record('install_ubuntu_stable'));

    const outcome = await orchestrator(registry).run();
    expect(outcome.status).toBe('installed');
    expect(outcome.executed).toEqual(['install_ubuntu_deps', 'install_ubuntu_stable']);
  });

  it('stops successfully when a handler halts the run', async () => {
    const registry = new HandlerRegistry().register('config_salt', async () => {
      calls.push('config_salt');
      return { halt: true, reason: 'nothing to configure' };
    });

    const outcome = await orchestrator(registry, {
      config: { lifecycle: { config_only: true }, paths: { config_dir: '/tmp/salt-config' } },
    }).run();

    expect(outcome).toEqual({ status: 'halted', executed: ['config_salt'], checkout: null });
    expect(hostSettings).not.toHaveBeenCalled();
  });

  it('reports a configuration-only run as configured', async () => {
    const registry = new HandlerRegistry().register('config_salt', record('config_salt'));
    const outcome = await orchestrator(registry, {
      config: { lifecycle: { config_only: true, start_daemons: false }, paths: { config_dir: '/tmp/salt-config' } },
    }).run();

    expect(outcome.status).toBe('configured');
    expect(outcome.executed).toEqual(['config_salt']);
  });

  it('wraps handler failures and stops', async () => {
    const registry = fullRegistry().register('install_ubuntu_stable', async () => {
      throw new Error('apt broke');
    });

    await expect(orchestrator(registry).run()).rejects.toMatchObject({
      code: BootstrapErrorCode.HANDLER_FAILED,
      message: 'Failed to run install_ubuntu_stable()',
      context: { phase: 'install', handler: 'install_ubuntu_stable', cause: 'apt broke' },
    });
    expect(calls).toEqual(['install_ubuntu_deps']);
  });

  it('dumps diagnostics when daemons are not running', async () => {
    const registry = fullRegistry().register('daemons_running', async () => {
      throw new Error('salt-minion missing');
    });

    await expect(orchestrator(registry).run()).rejects.toMatchObject({ code: BootstrapErrorCode.DAEMONS_NOT_RUNNING });
    expect(diagnostics).toHaveBeenCalledTimes(1);
  });

  it('retrieves the source after dependencies for git installs', async () => {
    const checkout: CheckoutResult = { path: '/tmp/git/salt', revision: 'v3006.1', updated: false, shallow: true };
    const retrieve = jest.fn(async () => {
      calls.push('retrieve');
      return checkout;
    });

    const outcome = await orchestrator(fullRegistry('git'), {
      mode: { type: 'git', revision: 'v3006.1' },
      sourceRetriever: { retrieve },
    }).run();

    expect(retrieve).toHaveBeenCalledWith('v3006.1');
    expect(calls.slice(0, 3)).toEqual(['install_ubuntu_deps', 'retrieve', 'install_ubuntu_git']);
    expect(outcome.checkout).toEqual(checkout);
  });

  it('requires a source retriever for git installs', async () => {
    await expect(orchestrator(fullRegistry('git'), { mode: { type: 'git', revision: 'develop' } }).run()).rejects.toMatchObject({
      code: BootstrapErrorCode.SOURCE_RETRIEVAL_FAILED,
    });
  });
});
