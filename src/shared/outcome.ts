// ═══════════════════════════════════════════════════════
// outcome.ts — Named results for every parse and I/O boundary
// Failures are values here; nothing in the core rethrows them.
// ═══════════════════════════════════════════════════════

export type FailureKind =
  | 'state_unreadable'        // map URL carried no usable `ms` parameter
  | 'element_not_found'       // no label in the candidate list matched
  | 'pointer_failed'          // mouse or wheel input threw
  | 'navigation_failed'       // goto timed out or the page crashed
  | 'malformed_payload'       // response body had an unexpected shape
  | 'unreadable_body'         // response body was not JSON
  | 'redirect_anomaly'        // detail page bounced to another host or came back empty
  | 'missing_previous_lease'; // required fact absent, listing skipped

export type Outcome<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'absent' }
  | { kind: 'error'; errorKind: FailureKind; message: string };

export const ok = <T>(value: T): Outcome<T> => ({ kind: 'ok', value });
export const absent = <T>(): Outcome<T> => ({ kind: 'absent' });
export const failure = <T>(errorKind: FailureKind, message: string): Outcome<T> =>
  ({ kind: 'error', errorKind, message });

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
