import { describe, expect, it, vi } from 'vitest';

import { calculateFeeRequirements } from '../../../src/core/fee-accountant.ts';
import { InputValidator } from '../../../src/core/input-validator.ts';
import { OutputConsolidator } from '../../../src/core/output-consolidator.ts';
import { buildSkeleton, ReplacementBuilder, signWithWallet } from '../../../src/core/replacement-builder.ts';
import {
  ConflictInvariantViolatedError,
  RpcTransportError,
  SigningIncompleteError,
} from '../../../src/errors/index.ts';
import type { CandidatePair } from '../../../src/interfaces/combine.interface.ts';
import { SEQUENCE_OPT_IN, SEQUENCE_OPT_OUT } from '../../../src/interfaces/transaction.interface.ts';
import type { Logger } from '../../../src/utils/logger.ts';
import { decodeTransaction, formatOutpoint } from '../../../src/utils/transaction-data.ts';
import { buildTransaction, createOriginals, PREVOUT_1, PREVOUT_2, SCRIPTS, txidOf } from '../../fixtures/transactions.ts';
import { createFakeNode } from '../../mocks/fake-node-rpc.ts';

function fixturePair(locktime = 0): CandidatePair {
  const { tx2, txid1, txid2 } = createOriginals();
  const tx1 = buildTransaction(
    [PREVOUT_1, { txid: txidOf('a2'), vout: 7 }],
    [
      { value: 5000, script: SCRIPTS.payeeA },
      { value: 3000, script: SCRIPTS.change1 },
    ],
    locktime,
  );
  return {
    first: { position: 1, txid: txid1, tx: tx1, size: 368 },
    second: { position: 2, txid: txid2, tx: tx2, size: 251 },
  };
}

const payees = [
  { value: 7000, script: SCRIPTS.payeeA },
  { value: 1000, script: SCRIPTS.payeeB },
];
const consolidation = { consolidated: payees, payees, changeScripts: [] };

describe('buildSkeleton', () => {
  it('should keep the first input of each original and copy version and locktime of tx1', () => {
    const skeleton = buildSkeleton(fixturePair(650_000), consolidation, new Map());

    expect(skeleton.dropped).toBeUndefined();
    expect(skeleton.tx.version).toBe(2);
    expect(skeleton.tx.locktime).toBe(650_000);
    expect(skeleton.tx.inputs.map((input) => formatOutpoint(input.prevout))).toEqual([
      formatOutpoint(PREVOUT_1),
      formatOutpoint(PREVOUT_2),
    ]);
    expect(skeleton.tx.outputs).toEqual(payees);
  });

  it('should strip the signatures copied from the originals', () => {
    const skeleton = buildSkeleton(fixturePair(), consolidation, new Map());

    for (const input of skeleton.tx.inputs) {
      expect(input.script.length).toBe(0);
      expect(input.witness).toEqual([]);
    }
  });

  it('should drop the second input when it spends a descendant', () => {
    const skeleton = buildSkeleton(
      fixturePair(),
      consolidation,
      new Map([[PREVOUT_2.txid.toHex(), 100]]),
    );

    expect(skeleton.dropped).toBe('second');
    expect(skeleton.tx.inputs.map((input) => formatOutpoint(input.prevout))).toEqual([
      formatOutpoint(PREVOUT_1),
    ]);
  });

  it('should drop the first input when only it spends a descendant', () => {
    const skeleton = buildSkeleton(
      fixturePair(),
      consolidation,
      new Map([[PREVOUT_1.txid.toHex(), 100]]),
    );

    expect(skeleton.dropped).toBe('first');
    expect(skeleton.tx.inputs.map((input) => formatOutpoint(input.prevout))).toEqual([
      formatOutpoint(PREVOUT_2),
    ]);
  });

  it('should only drop the second input when both spend descendants', () => {
    const skeleton = buildSkeleton(
      fixturePair(),
      consolidation,
      new Map([
        [PREVOUT_1.txid.toHex(), 100],
        [PREVOUT_2.txid.toHex(), 100],
      ]),
    );

    expect(skeleton.dropped).toBe('second');
  });

  it('should refuse an original without inputs', () => {
    const pair = fixturePair();
    const empty: CandidatePair = {
      ...pair,
      second: { ...pair.second, tx: buildTransaction([], pair.second.tx.outputs.slice()) },
    };

    expect(() => buildSkeleton(empty, consolidation, new Map())).toThrow(ConflictInvariantViolatedError);
  });
});

describe('signWithWallet', () => {
  it('should return the decoded signed transaction', async () => {
    const { rpc } = createFakeNode();
    const unsigned = buildSkeleton(fixturePair(), consolidation, new Map()).tx;

    const signed = await signWithWallet(rpc, unsigned);

    expect(signed.inputs.every((input) => input.script.length === 107)).toBe(true);
  });

  it('should pass the wallet errors on when signing is incomplete', async () => {
    const { rpc } = createFakeNode();
    rpc.signComplete = false;
    rpc.signErrors = ['Unable to sign input, invalid stack size'];

    await expect(
      signWithWallet(rpc, buildSkeleton(fixturePair(), consolidation, new Map()).tx),
    ).rejects.toMatchObject({
      details: ['Unable to sign input, invalid stack size'],
      kind: 'internal',
    });
    await expect(
      signWithWallet(rpc, buildSkeleton(fixturePair(), consolidation, new Map()).tx),
    ).rejects.toThrow(SigningIncompleteError);
  });
});

describe('ReplacementBuilder', () => {
  async function prepare() {
    const node = createFakeNode();
    const pair = await new InputValidator(node.rpc).validate([node.txid1, node.txid2]);
    const outputs = await new OutputConsolidator(node.rpc).consolidate(pair);
    const requirements = calculateFeeRequirements(node.fee1, 220, node.fee2, 251, new Map());
    return { node, pair, outputs, requirements };
  }

  it('should fund, set opt-out sequences and sign', async () => {
    const { node, pair, outputs, requirements } = await prepare();

    const funded = await new ReplacementBuilder(node.rpc).build(pair, outputs, requirements);

    expect(funded.fee).toBe(1000);
    expect(funded.changeIndex).toBe(2);
    expect(funded.tx.outputs[2]).toEqual({ value: 61965, script: SCRIPTS.change1 });
    expect(funded.tx.inputs.map((input) => input.sequence)).toEqual([
      SEQUENCE_OPT_OUT,
      SEQUENCE_OPT_OUT,
      SEQUENCE_OPT_OUT,
    ]);
    expect(funded.tx.inputs.every((input) => input.script.length === 107)).toBe(true);
  });

  it('should use sequence 0 everywhere when opting in', async () => {
    const { node, pair, outputs, requirements } = await prepare();

    const funded = await new ReplacementBuilder(node.rpc).build(pair, outputs, requirements, { optIn: true });

    expect(new Set(funded.tx.inputs.map((input) => input.sequence))).toEqual(new Set([SEQUENCE_OPT_IN]));
  });

  it('should send only the payees to the wallet for funding', async () => {
    const { node, pair, outputs, requirements } = await prepare();

    await new ReplacementBuilder(node.rpc).build(pair, outputs, requirements);

    const request = decodeTransaction(node.rpc.fundRequests[0]?.hex ?? '');
    expect(request.outputs).toEqual(payees);
  });

  it('should warn about a dropped input', async () => {
    const { node, pair, outputs } = await prepare();
    const requirements = calculateFeeRequirements(
      node.fee1,
      220,
      node.fee2,
      251,
      new Map([[PREVOUT_2.txid.toHex(), 100]]),
    );
    const logger: Logger = { warn: vi.fn(), error: vi.fn(), info: vi.fn() };

    const funded = await new ReplacementBuilder(node.rpc, logger).build(pair, outputs, requirements);

    expect(funded.dropped).toBe('second');
    expect(logger.warn).toHaveBeenCalledWith(
      `Dropping second input ${formatOutpoint(PREVOUT_2)}: it spends a descendant`,
    );
  });

  it('should report a change position outside the funded outputs as a funding failure', async () => {
    const { node, pair, outputs, requirements } = await prepare();
    node.rpc.changePositionOverride = 9;

    await expect(new ReplacementBuilder(node.rpc).build(pair, outputs, requirements)).rejects.toThrow(
      'Unable to fund replacement transaction: change position 9 is outside the 3 outputs',
    );
  });

  it('should let transport errors through unchanged', async () => {
    const { node, pair, outputs, requirements } = await prepare();
    node.rpc.fundError = new RpcTransportError('fundrawtransaction', 'connect ECONNREFUSED');

    const run = new ReplacementBuilder(node.rpc).build(pair, outputs, requirements);

    await expect(run).rejects.toThrow(RpcTransportError);
    await expect(run).rejects.toThrow('fundrawtransaction: connect ECONNREFUSED');
  });
});
