/**
 * Configuration of a sync deployment, after defaults are applied.
 *
 * @module sync_config
 */

export type UpstreamRepositoryConfig = {
  /** Repository name used in the state store and workspace paths */
  name: string;
  /** Path of the local clone */
  root: string;
  remote: string;
  /** Branch the upstream project integrates into */
  branch: string;
};

export type TargetRepositoryConfig = {
  name: string;
  root: string;
  remote: string;
  /** Ref new target workspaces start from and are reset to */
  baselineRef: string;
  /** Subdirectory of the target tree holding the upstream project */
  upstreamPath: string;
  /** Subdirectory holding generated test metadata */
  metadataPath: string;
};

export type TrackerConfig = {
  url: string;
  /** Default routing for new and unclassifiable issues */
  product: string;
  component: string;
  apiKey?: string;
};

export type GithubConfig = {
  owner: string;
  repo: string;
  token?: string;
  webhookSecret?: string;
};

export type TryConfig = {
  remote: string;
  /** Prefix completed with the pushed revision */
  resultsUrl: string;
};

export type SyncConfig = {
  upstream: UpstreamRepositoryConfig;
  target: TargetRepositoryConfig;
  /** Directory holding per-sync workspaces */
  worktreeRoot: string;
  /** Directory of the file-backed state store */
  stateDir: string;
  ci: {
    /** The one status context the reactor acts on */
    context: string;
  };
  tracker: TrackerConfig;
  github: GithubConfig;
  try: TryConfig;
  commandTimeoutMs?: number;
};
