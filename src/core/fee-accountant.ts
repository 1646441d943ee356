/**
 * Fee Accountant
 * Works out what the replacement has to pay: the originals' modified fees, the
 * modified fees of everything that descends from them, and the stricter of the two
 * original fee rates
 */

import { MempoolEntryUnavailableError } from '../errors/index.ts';
import type {
  CandidatePair,
  CandidateTransaction,
  FeeRequirements,
} from '../interfaces/combine.interface.ts';
import type { DescendantFees, NodeRpc } from '../interfaces/node-rpc.interface.ts';
import { formatFeeRatePerKb, formatKilobytes, formatMoney } from '../utils/amount.ts';
import { type Logger, NullLogger } from '../utils/logger.ts';

/**
 * Merge descendant sets; a later set overwrites an id seen earlier
 */
export function mergeDescendants(...sets: DescendantFees[]): Map<string, number> {
  const merged = new Map<string, number>();
  for (const set of sets) {
    for (const [txid, fee] of set) {
      merged.set(txid, fee);
    }
  }
  return merged;
}

export function calculateFeeRequirements(
  fee1: number,
  size1: number,
  fee2: number,
  size2: number,
  descendants: ReadonlyMap<string, number>,
): FeeRequirements {
  const oldFees = fee1 + fee2;
  let descendantFees = 0;
  for (const fee of descendants.values()) {
    descendantFees += fee;
  }

  return {
    fee1,
    fee2,
    size1,
    size2,
    oldFees,
    oldFeeRate: oldFees / (size1 + size2),
    descendants,
    descendantFees,
    requiredFee: oldFees + descendantFees,
    minFeeRate: Math.max(fee1 / size1, fee2 / size2),
  };
}

export class FeeAccountant {
  private readonly rpc: NodeRpc;
  private readonly logger: Logger;

  constructor(rpc: NodeRpc, logger: Logger = new NullLogger()) {
    this.rpc = rpc;
    this.logger = logger;
  }

  async assess(pair: CandidatePair): Promise<FeeRequirements> {
    const fee1 = await this.modifiedFee(pair.first);
    const fee2 = await this.modifiedFee(pair.second);

    const descendants1 = await this.descendants(pair.first);
    const descendants2 = await this.descendants(pair.second);

    const requirements = calculateFeeRequirements(
      fee1,
      pair.first.size,
      fee2,
      pair.second.size,
      mergeDescendants(descendants1, descendants2),
    );

    this.logger.debug?.(
      `Old sizes: ${formatKilobytes(requirements.size1)} KB ${formatKilobytes(requirements.size2)} KB ` +
        `(${formatKilobytes(requirements.size1 + requirements.size2)} KB combined), ` +
        `Old fees: ${formatMoney(fee1)}, ${formatFeeRatePerKb(fee1, requirements.size1)} BTC/KB; ` +
        `${formatMoney(fee2)}, ${formatFeeRatePerKb(fee2, requirements.size2)} BTC/KB ` +
        `(${formatMoney(requirements.oldFees)}, ` +
        `${formatFeeRatePerKb(requirements.oldFees, requirements.size1 + requirements.size2)} BTC/KB combined)`,
    );
    if (requirements.descendants.size > 0) {
      this.logger.debug?.('Replacement must also pay for descendants', {
        count: requirements.descendants.size,
        descendantFees: requirements.descendantFees,
      });
    }

    return requirements;
  }

  private async modifiedFee(candidate: CandidateTransaction): Promise<number> {
    const entry = await this.rpc.getMempoolEntry(candidate.txid);
    if (entry === null) {
      throw new MempoolEntryUnavailableError(candidate.txid.toHex());
    }
    return entry.modifiedFee;
  }

  private async descendants(candidate: CandidateTransaction): Promise<DescendantFees> {
    const descendants = await this.rpc.getMempoolDescendants(candidate.txid);
    if (descendants === null) {
      throw new MempoolEntryUnavailableError(candidate.txid.toHex());
    }
    return descendants;
  }
}
