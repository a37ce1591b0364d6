/**
 * Transport that touches nothing. Probes observe no state, so every
 * operation is scheduled; execution echoes the command that would run.
 */

import { Host } from '../domain/inventory';
import { Operation } from '../domain/operation';
import { renderCommand } from './commands';
import { ExecuteResult, Transport } from './transport';

export class DryRunTransport implements Transport {
  readonly name = 'dry-run';

  async probe(_host: Host, _keys: string[]): Promise<Record<string, string>> {
    return {};
  }

  async execute(host: Host, operation: Operation): Promise<ExecuteResult> {
    return { output: `[dry-run] ${host.id}: ${renderCommand(operation)}` };
  }
}
