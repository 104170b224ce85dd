export { StatusReactor } from './status_reactor';
export type { StatusDecision, StatusReactorDependencies } from './ci_reactor.types';
