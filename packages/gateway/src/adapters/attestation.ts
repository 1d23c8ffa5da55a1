/**
 * Attestation service interface (Circle's Iris API shape).
 */

import type { HexData } from '../boundaries/index.js';

export type AttestationResponse =
  | { status: 'complete'; message: HexData; attestation: HexData }
  | { status: 'pending' };

export interface AttestationProvider {
  /**
   * Look up the attested message for a burn. `pending` until the burn's
   * transaction is final and signed.
   */
  fetchAttestation(sourceDomain: number, nonce: bigint): Promise<AttestationResponse>;
}
