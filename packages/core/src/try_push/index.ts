export {
  TEST_TYPE_SUITES,
  TryPushError,
  constructTryMessage,
  parseAffectedTests,
  pushToTry,
} from './try_push';
export type { TryPushOptions, TryPushResult } from './try_push';
