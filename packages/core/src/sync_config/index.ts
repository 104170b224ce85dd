export { loadSyncConfig, parseSyncConfig, ConfigError, DEFAULT_CONFIG_FILENAME } from './sync_config';
export type {
  SyncConfig,
  UpstreamRepositoryConfig,
  TargetRepositoryConfig,
  TrackerConfig,
  GithubConfig,
  TryConfig,
} from './sync_config.types';
