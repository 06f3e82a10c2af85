import { Token } from '@levy/ledger';
import { getLogger } from '@levy/logger';
import { err, ok, type Result } from 'neverthrow';

import type { OperationOutcome, Scenario, SimulationReport } from './simulate-types.js';
import { applyOperation } from './simulate-utils.js';

const logger = getLogger('SimulateHandler');

/**
 * Simulate handler - builds a fresh token from the scenario and replays its
 * operations in order. A rejected operation is recorded and the run continues.
 * Reusable by the CLI command and by tests.
 */
export class SimulateHandler {
  execute(scenario: Scenario): Result<SimulationReport, Error> {
    const created = Token.create(scenario.token);
    if (created.isErr()) {
      return err(created.error);
    }
    const token = created.value;

    const outcomes = scenario.operations.map((operation, index): OperationOutcome =>
      applyOperation(token, operation).match(
        (summary) => ({ index, op: operation.op, status: 'committed', summary }),
        (error) => ({ index, op: operation.op, status: 'rejected', code: error.code, summary: error.message })
      )
    );

    const rejected = outcomes.filter((outcome) => outcome.status === 'rejected').length;
    logger.info({ operations: outcomes.length, rejected, symbol: token.symbol }, 'Scenario finished');

    return ok({
      token: {
        name: token.name,
        symbol: token.symbol,
        decimals: token.decimals,
        totalSupply: token.format(token.totalSupply()),
      },
      policyVersion: token.policy.getPolicySnapshot().version,
      outcomes,
      committed: outcomes.length - rejected,
      rejected,
      holders: token.holders().map((holder) => ({ account: holder.account, balance: token.format(holder.balance) })),
    });
  }
}
