import type { IBuildTool } from '../build_tool';
import type { Logger } from '../logger';

/**
 * Routing target for a tracker issue (e.g. product and component)
 */
export type RoutingDecision = {
  primary: string;
  secondary: string;
};

export type RoutingClassifierDependencies = {
  buildTool: IBuildTool;
  /** Subpath of the target tree that holds the upstream project */
  upstreamPath: string;
  logger: Logger;
};
