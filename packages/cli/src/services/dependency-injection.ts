import { Octokit } from '@octokit/rest';
import {
  Classifier,
  CiReactor,
  Config,
  Logger,
  Orchestrator,
  Translator,
  Workspace,
} from '@wpt-sync/core';
import type { BuildTool, SyncStore } from '@wpt-sync/core';
import {
  DEFAULT_CONFIG_FILENAME,
  FsSyncStore,
  LocalBuildTool,
  LocalGitModule,
  createExecCommand,
  loadSyncConfig,
} from '@wpt-sync/core/fs';
import { BugzillaTracker, GitHubForge, GithubWebhookHandler } from '@wpt-sync/core/github';

/**
 * Settings taken from the command line
 */
export type ServiceOptions = {
  /** Defaults to WPT_SYNC_CONFIG, then wpt-sync.yaml */
  configPath?: string;
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * The engine assembled from a configuration file
 */
export type SyncEngine = {
  config: Config.SyncConfig;
  store: SyncStore.ISyncStore;
  workspaces: Workspace.WorkspaceManager;
  buildTool: BuildTool.IBuildTool;
  orchestrator: Orchestrator.SyncOrchestrator;
  reactor: CiReactor.StatusReactor;
  logger: Logger.Logger;
};

/**
 * Dependency Injection Service for the wpt-sync CLI
 *
 * Creates the engine and its collaborators once per process from the
 * configuration file.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private options: ServiceOptions = {};
  private config: Config.SyncConfig | null = null;
  private engine: SyncEngine | null = null;
  private forge: GitHubForge | null = null;
  private webhookHandler: GithubWebhookHandler | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Replaces the options and drops everything built from the previous ones
   */
  configure(options: ServiceOptions): void {
    this.options = options;
    this.config = null;
    this.engine = null;
    this.forge = null;
    this.webhookHandler = null;
  }

  getLogger(prefix: string = ''): Logger.Logger {
    if (this.options.verbose) {
      return Logger.createLogger(prefix, 'debug');
    }
    return Logger.createLogger(prefix, this.options.quiet ? 'error' : undefined);
  }

  async getConfig(): Promise<Config.SyncConfig> {
    if (!this.config) {
      const configPath = this.options.configPath
        ?? process.env['WPT_SYNC_CONFIG']
        ?? DEFAULT_CONFIG_FILENAME;
      this.config = await loadSyncConfig(configPath);
    }
    return this.config;
  }

  /**
   * Creates the orchestrator, the status reactor and their collaborators
   */
  async getEngine(): Promise<SyncEngine> {
    if (this.engine) {
      return this.engine;
    }

    const config = await this.getConfig();
    const logger = this.getLogger('[wpt-sync] ');
    const execCommand = createExecCommand();
    const timeoutMs = config.commandTimeoutMs;

    const upstreamGit = new LocalGitModule({ repoRoot: config.upstream.root, execCommand, timeoutMs });
    const targetGit = new LocalGitModule({ repoRoot: config.target.root, execCommand, timeoutMs });
    const buildTool = new LocalBuildTool({ execCommand, logger: logger.child('[BuildTool] '), timeoutMs });
    const store = new FsSyncStore({ stateDir: config.stateDir });
    const workspaces = new Workspace.WorkspaceManager({
      worktreeRoot: config.worktreeRoot,
      logger: logger.child('[Workspaces] '),
    });
    const tracker = new BugzillaTracker({
      url: config.tracker.url,
      apiKey: config.tracker.apiKey,
      logger: logger.child('[Bugzilla] '),
    });

    const orchestrator = new Orchestrator.SyncOrchestrator({
      config,
      upstreamGit,
      targetGit,
      store,
      workspaces,
      translator: new Translator.CommitTranslator({
        upstreamPath: config.target.upstreamPath,
        logger: logger.child('[CommitTranslator] '),
      }),
      classifier: new Classifier.RoutingClassifier({
        buildTool,
        upstreamPath: config.target.upstreamPath,
        logger: logger.child('[RoutingClassifier] '),
      }),
      buildTool,
      tracker,
      logger: logger.child('[SyncOrchestrator] '),
    });
    const reactor = new CiReactor.StatusReactor({
      context: config.ci.context,
      store,
      workspaces,
      orchestrator,
      logger: logger.child('[StatusReactor] '),
    });

    this.engine = { config, store, workspaces, buildTool, orchestrator, reactor, logger };
    return this.engine;
  }

  /**
   * GitHub client for the upstream repository
   */
  async getForge(): Promise<GitHubForge> {
    if (!this.forge) {
      const config = await this.getConfig();
      const octokit = new Octokit(config.github.token ? { auth: config.github.token } : {});
      this.forge = new GitHubForge({ owner: config.github.owner, repo: config.github.repo }, octokit);
    }
    return this.forge;
  }

  /**
   * Verifier for GitHub deliveries, keyed by github.webhookSecret
   *
   * @throws ConfigError when no secret is configured
   */
  async getWebhookHandler(): Promise<GithubWebhookHandler> {
    if (!this.webhookHandler) {
      const config = await this.getConfig();
      const secret = config.github.webhookSecret;
      if (!secret) {
        throw new Config.ConfigError(
          'No webhook secret configured (set github.webhookSecret or GITHUB_WEBHOOK_SECRET)',
          this.options.configPath ?? DEFAULT_CONFIG_FILENAME,
        );
      }
      this.webhookHandler = new GithubWebhookHandler({ secret });
    }
    return this.webhookHandler;
  }
}
