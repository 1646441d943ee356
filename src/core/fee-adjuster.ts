/**
 * Fee Adjuster
 *
 * Takes the fee for the replacement out of its change output until the fee covers
 * the originals and their descendants, the fee rate is at least the higher of the
 * two original rates, and the relay bandwidth of the replacement is paid for.
 * Payee outputs and inputs are never touched.
 */

import { InsufficientChangeForFeeError } from '../errors/index.ts';
import type {
  FeeAdjustment,
  FeeRequirements,
  FundedReplacement,
} from '../interfaces/combine.interface.ts';
import type { NodeRpc } from '../interfaces/node-rpc.interface.ts';
import type { TransactionData } from '../interfaces/transaction.interface.ts';
import { formatFeeRatePerKb, formatKilobytes, formatMoney } from '../utils/amount.ts';
import { type Logger, NullLogger } from '../utils/logger.ts';
import { transactionSize, withOutputValue } from '../utils/transaction-data.ts';
import { signWithWallet } from './replacement-builder.ts';

export interface FeePlanInput {
  /** Fee currently paid, satoshis */
  fee: number;
  /** Signed size, bytes */
  size: number;
  requiredFee: number;
  /** sat/byte */
  minFeeRate: number;
  /** sat per 1000 bytes; omit to skip the bandwidth charge */
  minRelayFeeRate?: number;
}

export interface FeePlan {
  /** Raises the fee to requiredFee + 1 */
  shortfall: number;
  /** Raises the fee rate to minFeeRate */
  rateDeficit: number;
  relayBandwidthFee: number;
  /** Total to take out of change */
  total: number;
}

/**
 * Work out how much more the replacement must pay.
 *
 * The absolute shortfall is overpaid by one satoshi so the result never sits exactly
 * on the requirement; the rate deficit is rounded up to whole satoshis.
 */
export function planFeeAdjustment(input: FeePlanInput): FeePlan {
  let fee = input.fee;

  let shortfall = 0;
  if (fee < input.requiredFee) {
    shortfall = input.requiredFee + 1 - fee;
    fee += shortfall;
  }

  let rateDeficit = 0;
  if (fee / input.size < input.minFeeRate) {
    rateDeficit = Math.ceil(input.minFeeRate * input.size - fee);
    fee += rateDeficit;
  }

  const relayBandwidthFee = input.minRelayFeeRate === undefined
    ? 0
    : Math.floor((input.size * input.minRelayFeeRate) / 1000);

  return {
    shortfall,
    rateDeficit,
    relayBandwidthFee,
    total: shortfall + rateDeficit + relayBandwidthFee,
  };
}

export function meetsFeeRequirements(
  fee: number,
  size: number,
  requirements: Pick<FeeRequirements, 'requiredFee' | 'minFeeRate'>,
): boolean {
  return fee >= requirements.requiredFee && fee / size >= requirements.minFeeRate;
}

export class FeeAdjuster {
  /** Re-signing can change the size; give up if it has not settled by then */
  static readonly MAX_PASSES = 3;

  private readonly rpc: NodeRpc;
  private readonly logger: Logger;

  constructor(rpc: NodeRpc, logger: Logger = new NullLogger()) {
    this.rpc = rpc;
    this.logger = logger;
  }

  async adjust(funded: FundedReplacement, requirements: FeeRequirements): Promise<FeeAdjustment> {
    const { relayFee: minRelayFeeRate } = await this.rpc.getNetworkInfo();

    let tx: TransactionData = funded.tx;
    let fee = funded.fee;
    let relayBandwidthFee = 0;

    for (let pass = 1; pass <= FeeAdjuster.MAX_PASSES; pass++) {
      const size = transactionSize(tx);
      const plan = planFeeAdjustment({
        fee,
        size,
        requiredFee: requirements.requiredFee,
        minFeeRate: requirements.minFeeRate,
        // bandwidth is only charged once
        ...(pass === 1 ? { minRelayFeeRate } : {}),
      });

      const change = tx.outputs[funded.changeIndex];
      if (change === undefined) {
        throw new RangeError(`Change index ${funded.changeIndex} out of range`);
      }
      const changeValue = change.value - plan.total;
      if (changeValue <= 0) {
        throw new InsufficientChangeForFeeError(change.value, plan.total);
      }

      this.logger.debug?.('Adjusting change output', {
        pass,
        size,
        shortfall: plan.shortfall,
        rateDeficit: plan.rateDeficit,
        relayBandwidthFee: plan.relayBandwidthFee,
        change: changeValue,
      });

      tx = await signWithWallet(this.rpc, withOutputValue(tx, funded.changeIndex, changeValue));
      fee += plan.total;
      relayBandwidthFee += plan.relayBandwidthFee;

      const signedSize = transactionSize(tx);
      if (meetsFeeRequirements(fee, signedSize, requirements)) {
        this.logger.debug?.(
          `New tx size: ${formatKilobytes(signedSize)} KB, New fee: ${formatMoney(fee)}, ` +
            `${formatFeeRatePerKb(fee, signedSize)} BTC/KB`,
        );
        return {
          tx,
          fee,
          size: signedSize,
          feeRate: fee / signedSize,
          relayBandwidthFee,
          passes: pass,
        };
      }
    }

    throw new InsufficientChangeForFeeError(
      tx.outputs[funded.changeIndex]?.value ?? 0,
      0,
      `Unable to settle the replacement fee after ${FeeAdjuster.MAX_PASSES} signing passes`,
    );
  }
}
