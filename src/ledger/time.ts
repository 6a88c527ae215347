/**
 * Slot <-> POSIX time conversion
 *
 * Deadlines live in POSIX milliseconds (what the validator compares
 * against), validity intervals in slots (what the ledger checks).
 */

import { SLOT_CONFIG_NETWORK, slotToBeginUnixTime, unixTimeToEnclosingSlot } from '@meshsdk/core'
import type { SlotConfig } from '@meshsdk/core'

export type CardanoNetwork = 'mainnet' | 'preprod' | 'preview'

export class SlotClock {
  readonly config: SlotConfig

  constructor(config: SlotConfig) {
    this.config = config
  }

  static forNetwork(network: CardanoNetwork): SlotClock {
    return new SlotClock(SLOT_CONFIG_NETWORK[network])
  }

  /** Start time of a slot, POSIX ms */
  slotToTime(slot: number): number {
    return slotToBeginUnixTime(slot, this.config)
  }

  /** Slot containing a POSIX ms instant */
  timeToSlot(time: number): number {
    return unixTimeToEnclosingSlot(time, this.config)
  }

  /** First slot whose start is strictly after `time` */
  firstSlotAfter(time: number): number {
    return this.timeToSlot(time) + 1
  }
}
