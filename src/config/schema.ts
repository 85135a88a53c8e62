import { z } from "zod";

/** Canonical upstream Salt repository; tags are always fetched from here. */
export const SALTSTACK_REPO_URL = "https://github.com/saltstack/salt.git";

export const configSchema = z.object({
  output: z.object({
    color: z.boolean(),
    debug: z.boolean(),
    log_file: z.string().min(1),
  }),
  targets: z.object({
    minion: z.boolean(),
    master: z.boolean(),
    syndic: z.boolean(),
  }),
  lifecycle: z.object({
    config_only: z.boolean(),
    no_deps: z.boolean(),
    start_daemons: z.boolean(),
    disable_checks: z.boolean(),
    sleep_seconds: z.number().int().nonnegative(),
    force_overwrite: z.boolean(),
    keep_temp_files: z.boolean(),
    upgrade_system: z.boolean(),
    pip_allowed: z.boolean(),
  }),
  paths: z
    .object({
      config_dir: z.string().nullable(),
      keys_dir: z.string().nullable(),
      salt_etc_dir: z.string().min(1),
      // Defaults to <salt_etc_dir>/pki.
      salt_pki_dir: z.string().min(1).optional(),
      salt_cache_dir: z.string().min(1),
    })
    .transform((paths) => ({ ...paths, salt_pki_dir: paths.salt_pki_dir ?? `${paths.salt_etc_dir}/pki` })),
  minion: z.object({
    master_address: z.string().nullable(),
    minion_id: z.string().nullable(),
  }),
  network: z.object({
    http_proxy: z.string().url().nullable(),
    insecure_downloads: z.boolean(),
  }),
  packages: z.object({
    extra: z.array(z.string().min(1)),
    disable_repos: z.boolean(),
    repo_base_url: z.string().url(),
  }),
  git: z.object({
    repo_url: z.string().min(1),
    upstream_url: z.string().min(1),
    checkout_dir: z.string().min(1),
  }),
});
