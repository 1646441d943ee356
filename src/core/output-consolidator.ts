/**
 * Output Consolidator
 * Merges the outputs of both originals into one output per destination script and
 * picks out the wallet's own (change) outputs
 */

import { Buffer } from 'node:buffer';

import type { CandidatePair, OutputConsolidation } from '../interfaces/combine.interface.ts';
import type { NodeRpc } from '../interfaces/node-rpc.interface.ts';
import type { TransactionOutput } from '../interfaces/transaction.interface.ts';
import { type Logger, NullLogger } from '../utils/logger.ts';

/**
 * Insertion-ordered map from output script to summed value.
 * Scripts compare by bytes; output order of the replacement follows insertion order.
 */
export class ScriptValueMap {
  private readonly entries = new Map<string, TransactionOutput>();

  /**
   * Add value to the script's entry; returns true when an entry already existed
   */
  add(script: Buffer, value: number): boolean {
    const key = script.toString('hex');
    const existing = this.entries.get(key);
    if (existing) {
      this.entries.set(key, { script: existing.script, value: existing.value + value });
      return true;
    }
    this.entries.set(key, { script: Buffer.from(script), value });
    return false;
  }

  get(script: Buffer): number | undefined {
    return this.entries.get(script.toString('hex'))?.value;
  }

  has(script: Buffer): boolean {
    return this.entries.has(script.toString('hex'));
  }

  get size(): number {
    return this.entries.size;
  }

  toOutputs(): TransactionOutput[] {
    return [...this.entries.values()];
  }
}

export class OutputConsolidator {
  private readonly rpc: NodeRpc;
  private readonly logger: Logger;

  constructor(rpc: NodeRpc, logger: Logger = new NullLogger()) {
    this.rpc = rpc;
    this.logger = logger;
  }

  async consolidate(pair: CandidatePair): Promise<OutputConsolidation> {
    const outputs = new ScriptValueMap();
    const changeScripts: Buffer[] = [];

    for (const output of [...pair.first.tx.outputs, ...pair.second.tx.outputs]) {
      if (await this.rpc.isMine(output.script)) {
        if (!changeScripts.some((script) => script.equals(output.script))) {
          changeScripts.push(Buffer.from(output.script));
        }
        this.logger.debug?.('Found change output', {
          script: output.script.toString('hex'),
          changeOutputs: changeScripts.length,
        });
      }

      if (outputs.add(output.script, output.value)) {
        this.logger.debug?.('Found duplicate output script, consolidating', {
          script: output.script.toString('hex'),
          value: outputs.get(output.script),
        });
      }
    }

    if (changeScripts.length > 1) {
      this.logger.info(
        `Found ${changeScripts.length} wallet-owned outputs; only the first is reused for change`,
      );
    }

    const consolidated = outputs.toOutputs();
    const payees = consolidated.filter(
      (output) => !changeScripts.some((script) => script.equals(output.script)),
    );

    return {
      consolidated,
      payees,
      changeScripts,
      changeAnchor: changeScripts[0],
    };
  }
}
