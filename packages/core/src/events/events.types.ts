/**
 * Inbound events accepted by the sync engine, after boundary validation.
 *
 * @module events
 */

/**
 * A change request (pull request) opened upstream
 */
export type ChangeRequestEvent = {
  changeRequestId: number;
  title: string;
  body: string;
};

/** CI states the reactor acts on; anything else is ignored */
export type KnownStatusState = 'pending' | 'passed';

/**
 * A CI status notification for one upstream revision
 */
export type StatusEvent = {
  /** CI system and job family that produced the status */
  context: string;
  state: KnownStatusState | (string & {});
  /** Upstream revision the status refers to */
  sha: string;
};
