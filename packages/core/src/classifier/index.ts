export {
  RoutingClassifier,
  ClassificationError,
  UNKNOWN_CLASSIFICATION,
  chooseClassification,
  parseComponentReport,
  toRoutingDecision,
} from './routing_classifier';
export type { RoutingClassifierDependencies, RoutingDecision } from './classifier.types';
