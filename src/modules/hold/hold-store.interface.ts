export const HOLD_STORE = 'HOLD_STORE';

export type HoldResult =
  | { granted: true }
  | { granted: false; conflicts: string[] };

/**
 * Short-lived, TTL-bounded claims on seats
 */
export interface HoldStore {
  /**
   * Claim every seat for `holderId`, or none of them. On refusal
   * `conflicts` lists exactly the seats held by someone else.
   * Seats already held by the same holder are refreshed, and seats held by
   * one of `replaceable` (holders known to be closed) are taken over.
   */
  acquire(
    showtimeId: string,
    seatIds: string[],
    holderId: string,
    ttlMs: number,
    replaceable?: string[],
  ): Promise<HoldResult>;

  /**
   * Drop the holds `holderId` still owns. Returns how many were released.
   */
  release(
    showtimeId: string,
    seatIds: string[],
    holderId: string,
  ): Promise<number>;

  /**
   * Seats currently held, for display. Never used for correctness.
   */
  snapshot(showtimeId: string): Promise<string[]>;
}
