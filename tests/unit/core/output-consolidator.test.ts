import { Buffer } from 'node:buffer';

import { describe, expect, it, vi } from 'vitest';

import { OutputConsolidator, ScriptValueMap } from '../../../src/core/output-consolidator.ts';
import type { CandidatePair } from '../../../src/interfaces/combine.interface.ts';
import type { TransactionOutput } from '../../../src/interfaces/transaction.interface.ts';
import type { Logger } from '../../../src/utils/logger.ts';
import { buildTransaction, PREVOUT_1, PREVOUT_2, SCRIPTS, txidOf } from '../../fixtures/transactions.ts';
import { FakeNodeRpc } from '../../mocks/fake-node-rpc.ts';

function pairOf(outputs1: TransactionOutput[], outputs2: TransactionOutput[]): CandidatePair {
  return {
    first: { position: 1, txid: txidOf('01'), tx: buildTransaction([PREVOUT_1], outputs1), size: 0 },
    second: { position: 2, txid: txidOf('02'), tx: buildTransaction([PREVOUT_2], outputs2), size: 0 },
  };
}

describe('ScriptValueMap', () => {
  it('should sum values per script and keep first-seen order', () => {
    const map = new ScriptValueMap();

    expect(map.add(SCRIPTS.payeeB, 10)).toBe(false);
    expect(map.add(SCRIPTS.payeeA, 20)).toBe(false);
    expect(map.add(Buffer.from(SCRIPTS.payeeB), 5)).toBe(true);

    expect(map.size).toBe(2);
    expect(map.get(SCRIPTS.payeeB)).toBe(15);
    expect(map.has(SCRIPTS.change1)).toBe(false);
    expect(map.toOutputs().map((output) => output.value)).toEqual([15, 20]);
  });

  it('should not alias the caller buffer', () => {
    const script = Buffer.from(SCRIPTS.payeeA);
    const map = new ScriptValueMap();
    map.add(script, 1);
    script.fill(0);

    expect(map.toOutputs()[0]?.script.equals(SCRIPTS.payeeA)).toBe(true);
  });
});

describe('OutputConsolidator', () => {
  it('should merge a destination paid by both transactions into one output', async () => {
    const rpc = new FakeNodeRpc();
    rpc.addOwnedScript(SCRIPTS.change1);
    rpc.addOwnedScript(SCRIPTS.change2);

    const result = await new OutputConsolidator(rpc).consolidate(
      pairOf(
        [
          { value: 5000, script: SCRIPTS.payeeA },
          { value: 3000, script: SCRIPTS.change1 },
        ],
        [
          { value: 2000, script: SCRIPTS.payeeA },
          { value: 1000, script: SCRIPTS.payeeB },
          { value: 4000, script: SCRIPTS.change2 },
        ],
      ),
    );

    expect(result.consolidated.map((output) => output.value)).toEqual([7000, 3000, 1000, 4000]);
    expect(result.payees).toEqual([
      { value: 7000, script: SCRIPTS.payeeA },
      { value: 1000, script: SCRIPTS.payeeB },
    ]);
    expect(result.changeScripts).toEqual([SCRIPTS.change1, SCRIPTS.change2]);
    expect(result.changeAnchor).toEqual(SCRIPTS.change1);
  });

  it('should query ownership once per output', async () => {
    const rpc = new FakeNodeRpc();

    await new OutputConsolidator(rpc).consolidate(
      pairOf([{ value: 1, script: SCRIPTS.payeeA }], [{ value: 2, script: SCRIPTS.payeeA }]),
    );

    expect(rpc.callCount('isMine')).toBe(2);
  });

  it('should keep a wallet-owned script out of the payees even when both pay it', async () => {
    const rpc = new FakeNodeRpc();
    rpc.addOwnedScript(SCRIPTS.change1);

    const result = await new OutputConsolidator(rpc).consolidate(
      pairOf(
        [
          { value: 900, script: SCRIPTS.change1 },
          { value: 100, script: SCRIPTS.payeeA },
        ],
        [{ value: 700, script: SCRIPTS.change1 }],
      ),
    );

    expect(result.changeScripts).toEqual([SCRIPTS.change1]);
    expect(result.payees).toEqual([{ value: 100, script: SCRIPTS.payeeA }]);
    expect(result.consolidated[0]).toEqual({ value: 1600, script: SCRIPTS.change1 });
  });

  it('should leave the anchor unset when the wallet owns no output', async () => {
    const result = await new OutputConsolidator(new FakeNodeRpc()).consolidate(
      pairOf([{ value: 1, script: SCRIPTS.payeeA }], [{ value: 2, script: SCRIPTS.payeeB }]),
    );

    expect(result.changeAnchor).toBeUndefined();
    expect(result.payees).toHaveLength(2);
  });

  it('should log when more than one change output is found', async () => {
    const rpc = new FakeNodeRpc();
    rpc.addOwnedScript(SCRIPTS.change1);
    rpc.addOwnedScript(SCRIPTS.change2);
    const logger: Logger = { warn: vi.fn(), error: vi.fn(), info: vi.fn(), debug: vi.fn() };

    await new OutputConsolidator(rpc, logger).consolidate(
      pairOf([{ value: 1, script: SCRIPTS.change1 }], [{ value: 2, script: SCRIPTS.change2 }]),
    );

    expect(logger.info).toHaveBeenCalledWith(
      'Found 2 wallet-owned outputs; only the first is reused for change',
    );
  });
});
