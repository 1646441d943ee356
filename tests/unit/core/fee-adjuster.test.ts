import { Buffer } from 'node:buffer';

import { describe, expect, it } from 'vitest';

import { FeeAccountant } from '../../../src/core/fee-accountant.ts';
import { FeeAdjuster, meetsFeeRequirements, planFeeAdjustment } from '../../../src/core/fee-adjuster.ts';
import { InputValidator } from '../../../src/core/input-validator.ts';
import { OutputConsolidator } from '../../../src/core/output-consolidator.ts';
import { ReplacementBuilder } from '../../../src/core/replacement-builder.ts';
import { InsufficientChangeForFeeError } from '../../../src/errors/index.ts';
import type { SignResult } from '../../../src/interfaces/node-rpc.interface.ts';
import { decodeTransaction, encodeTransaction, withInputs } from '../../../src/utils/transaction-data.ts';
import { SCRIPTS } from '../../fixtures/transactions.ts';
import { createFakeNode, FakeNodeRpc } from '../../mocks/fake-node-rpc.ts';

/**
 * Signs with scriptSigs of `scriptLength(n)` bytes on the n-th signing call
 */
class VariableSignatureNode extends FakeNodeRpc {
  private signings = 0;

  constructor(private readonly scriptLength: (signing: number) => number) {
    super();
  }

  override async signRawTransaction(hex: string): Promise<SignResult> {
    const result = await super.signRawTransaction(hex);
    this.signings++;
    const tx = decodeTransaction(result.hex);
    const length = this.scriptLength(this.signings);
    return {
      ...result,
      hex: encodeTransaction(
        withInputs(
          tx,
          tx.inputs.map((input) => ({ ...input, script: Buffer.alloc(length, 0x51) })),
        ),
      ),
    };
  }
}

async function fundedReplacement(rpc?: FakeNodeRpc) {
  const node = createFakeNode({}, rpc);
  const pair = await new InputValidator(node.rpc).validate([node.txid1, node.txid2]);
  const outputs = await new OutputConsolidator(node.rpc).consolidate(pair);
  const requirements = await new FeeAccountant(node.rpc).assess(pair);
  const funded = await new ReplacementBuilder(node.rpc).build(pair, outputs, requirements);
  return { node, funded, requirements };
}

describe('planFeeAdjustment', () => {
  it('should cover the shortfall plus one, the rate deficit and relay bandwidth', () => {
    expect(
      planFeeAdjustment({ fee: 1000, size: 547, requiredFee: 6465, minFeeRate: 15, minRelayFeeRate: 1000 }),
    ).toEqual({ shortfall: 5466, rateDeficit: 1739, relayBandwidthFee: 547, total: 7752 });
  });

  it('should charge nothing when the fee already satisfies both requirements', () => {
    expect(planFeeAdjustment({ fee: 10_000, size: 500, requiredFee: 6000, minFeeRate: 15 })).toEqual({
      shortfall: 0,
      rateDeficit: 0,
      relayBandwidthFee: 0,
      total: 0,
    });
  });

  it('should not overpay a fee that equals the requirement exactly', () => {
    const plan = planFeeAdjustment({ fee: 6465, size: 100, requiredFee: 6465, minFeeRate: 1 });

    expect(plan.shortfall).toBe(0);
  });

  it('should round a fractional rate deficit up', () => {
    const plan = planFeeAdjustment({ fee: 7000, size: 501, requiredFee: 5000, minFeeRate: 14.5 });

    expect(plan.rateDeficit).toBe(265);
  });

  it('should round the relay bandwidth fee down', () => {
    const plan = planFeeAdjustment({
      fee: 100_000,
      size: 547,
      requiredFee: 0,
      minFeeRate: 0,
      minRelayFeeRate: 1500,
    });

    expect(plan.relayBandwidthFee).toBe(820);
    expect(plan.total).toBe(820);
  });
});

describe('meetsFeeRequirements', () => {
  it('should check the absolute fee and the fee rate', () => {
    const requirements = { requiredFee: 6465, minFeeRate: 15 };

    expect(meetsFeeRequirements(8205, 547, requirements)).toBe(true);
    expect(meetsFeeRequirements(8204, 547, requirements)).toBe(false);
    expect(meetsFeeRequirements(6000, 100, requirements)).toBe(false);
  });
});

describe('FeeAdjuster', () => {
  it('should take the whole adjustment out of the change output in one pass', async () => {
    const { node, funded, requirements } = await fundedReplacement();

    const adjusted = await new FeeAdjuster(node.rpc).adjust(funded, requirements);

    expect(adjusted.fee).toBe(8752);
    expect(adjusted.size).toBe(547);
    expect(adjusted.feeRate).toBe(16);
    expect(adjusted.relayBandwidthFee).toBe(547);
    expect(adjusted.passes).toBe(1);
    expect(adjusted.tx.outputs).toEqual([
      { value: 7000, script: SCRIPTS.payeeA },
      { value: 1000, script: SCRIPTS.payeeB },
      { value: 54213, script: SCRIPTS.change1 },
    ]);
  });

  it('should charge relay bandwidth at the node relay fee rate', async () => {
    const { node, funded, requirements } = await fundedReplacement();
    node.rpc.relayFee = 2000;

    const adjusted = await new FeeAdjuster(node.rpc).adjust(funded, requirements);

    expect(adjusted.relayBandwidthFee).toBe(1094);
    expect(adjusted.fee).toBe(9299);
    expect(adjusted.tx.outputs[2]?.value).toBe(53666);
  });

  it('should re-sign and top up when the signed size grows', async () => {
    const rpc = new VariableSignatureNode((signing) => (signing === 1 ? 100 : 107));
    rpc.relayFee = 0;
    const { funded, requirements } = await fundedReplacement(rpc);

    const adjusted = await new FeeAdjuster(rpc).adjust(funded, requirements);

    expect(adjusted.passes).toBe(2);
    expect(adjusted.fee).toBe(8205);
    expect(adjusted.size).toBe(547);
    expect(adjusted.tx.outputs[2]?.value).toBe(54760);
  });

  it('should give up when the size never settles', async () => {
    const rpc = new VariableSignatureNode((signing) => 40 + 20 * signing);
    rpc.relayFee = 0;
    const { funded, requirements } = await fundedReplacement(rpc);

    await expect(new FeeAdjuster(rpc).adjust(funded, requirements)).rejects.toThrow(
      'Unable to settle the replacement fee after 3 signing passes',
    );
  });

  it('should fail when the deduction would leave zero change', async () => {
    const rpc = new FakeNodeRpc();
    // 70965 in, 8000 to payees, 547 left as change: exactly the relay charge
    rpc.fundFee = 62_418;
    const { funded, requirements } = await fundedReplacement(rpc);

    const run = new FeeAdjuster(rpc).adjust(funded, requirements);

    await expect(run).rejects.toThrow(InsufficientChangeForFeeError);
    await expect(run).rejects.toThrow(
      'Unable to sufficiently bump fee: change output of 547 sat cannot absorb 547 sat',
    );
    expect(rpc.callCount('signRawTransaction')).toBe(1);
  });
});
