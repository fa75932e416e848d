import type { EnvConfig } from "./types.js";

export const ENV_VARIABLES = {
  username: "RACKOPS_USERNAME",
  password: "RACKOPS_PASSWORD",
  nfs_share: "RACKOPS_NFS_SHARE",
  http_share: "RACKOPS_HTTP_SHARE",
} as const satisfies Record<keyof EnvConfig, string>;

export function readEnvironment(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const overrides: { -readonly [K in keyof EnvConfig]: EnvConfig[K] } = {};
  const username = env[ENV_VARIABLES.username];
  const password = env[ENV_VARIABLES.password];
  const nfsShare = env[ENV_VARIABLES.nfs_share];
  const httpShare = env[ENV_VARIABLES.http_share];

  if (username && username.length > 0) overrides.username = username;
  if (password && password.length > 0) overrides.password = password;
  if (nfsShare && nfsShare.length > 0) overrides.nfs_share = nfsShare;
  if (httpShare && httpShare.length > 0) overrides.http_share = httpShare;
  return Object.freeze(overrides);
}
