/**
 * @fileoverview Single-shot stop flag shared by the session's shutdown triggers.
 *
 * Page close, browser disconnect and SIGINT all call trigger(). Only the
 * first call has an effect; the flag never goes back to unset. Everything
 * runs on the one event loop, so no locking is involved.
 */

import { setTimeout as delay } from 'timers/promises'
import type { StopReason } from '../types.js'

export class StopSignal {
  private firstReason: StopReason | null = null

  /** Whether any producer has fired */
  get isSet(): boolean {
    return this.firstReason !== null
  }

  /** Reason given by the first producer, or null while unset */
  get reason(): StopReason | null {
    return this.firstReason
  }

  /**
   * Set the flag.
   * @returns True only for the call that actually set it
   */
  trigger(reason: StopReason): boolean {
    if (this.firstReason !== null) {
      return false
    }
    this.firstReason = reason
    return true
  }

  /**
   * Poll until the flag is set.
   * @param pollIntervalMs - Delay between checks
   * @returns The winning reason
   */
  async wait(pollIntervalMs: number): Promise<StopReason> {
    let reason = this.firstReason
    while (reason === null) {
      await delay(pollIntervalMs)
      reason = this.firstReason
    }
    return reason
  }
}
